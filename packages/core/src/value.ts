import type { Graph } from './graph';
import type { AnimationDriver } from './anim/adapter';
import type { BindingEffect, Computation, WriteOptions } from './types';

/** Outcome of running a computation. */
export type Evaluation<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

export type ValueInit<T> =
  | { kind: 'value'; value: T }
  | {
      kind: 'computed';
      computation: Computation<T>;
      /** Runs the first evaluation with the node already on the context. */
      evaluate: (node: Value<T>) => Evaluation<T>;
    };

/**
 * A reactive cell owned by a `Graph`.
 *
 * Edge sets and the attached driver are maintained by the graph; treat them as
 * read-only from the outside.
 */
export class Value<T> {
  /** Nodes read during the last computation. */
  readonly dependencies = new Set<Value<unknown>>();
  /** Nodes whose computation reads this one. Non-owning, pruned on destroy. */
  readonly dependents = new Set<Value<unknown>>();
  readonly connections = new Set<() => void>();
  readonly bindings = new Set<BindingEffect>();

  private slot: Evaluation<T>;
  /** @internal */
  animation: AnimationDriver<T> | undefined;
  /** @internal */
  destroyed = false;

  readonly computation: Computation<T> | undefined;

  constructor(
    readonly graph: Graph,
    readonly id: number,
    init: ValueInit<T>
  ) {
    if (init.kind === 'value') {
      this.computation = undefined;
      this.slot = { ok: true, value: init.value };
    } else {
      this.computation = init.computation;
      this.slot = { ok: false, error: undefined };
      this.slot = init.evaluate(this);
    }
  }

  /**
   * @internal
   * Throws the stored error while a computed node has never evaluated
   * successfully.
   */
  get current(): T {
    if (!this.slot.ok) throw this.slot.error;
    return this.slot.value;
  }

  set current(value: T) {
    this.slot = { ok: true, value };
  }

  /** @internal Records why a never-settled computed node still has no value. */
  fail(error: unknown): void {
    if (!this.slot.ok) this.slot = { ok: false, error };
  }

  /** False for a computed node whose evaluations have all thrown so far. */
  hasValue(): boolean {
    return this.slot.ok;
  }

  /** Tracked read. */
  get(): T {
    return this.graph.read(this);
  }

  peek(): T {
    return this.graph.peek(this);
  }

  set(value: T, options?: WriteOptions): void {
    this.graph.write(this, value, options);
  }

  isComputed(): boolean {
    return this.computation !== undefined;
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Calls `cb` with the settled value after every propagation. */
  onChange(cb: (value: T) => void): () => void {
    return this.graph.connect(this, () => cb(this.current));
  }

  destroy(): void {
    this.graph.destroy(this);
  }

  toString(): string {
    return `Value#${this.id}`;
  }
}

export function isValue<T>(source: T | Value<T>): source is Value<T> {
  return source instanceof Value;
}
