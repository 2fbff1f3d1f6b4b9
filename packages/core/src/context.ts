import type { Value } from './value';

export type UnitId = symbol;

/** `null` frames suspend dependency capture (see `Graph.untracked`). */
type Frame = Value<unknown> | null;

export const ROOT_UNIT: UnitId = Symbol('root');

/**
 * Tracks, per cooperative unit, which node is currently being derived.
 *
 * Every unit owns its own stack, so computations running in different units
 * never register edges against each other.
 */
export class ExecutionContext {
  private readonly stacks = new Map<UnitId, Frame[]>();
  private active: UnitId = ROOT_UNIT;
  private spawned = 0;

  /** Node being derived in the active unit, if any. */
  current(): Value<unknown> | undefined {
    const stack = this.stacks.get(this.active);
    if (!stack || stack.length === 0) return undefined;
    return stack[stack.length - 1] ?? undefined;
  }

  isDeriving(node: Value<unknown>): boolean {
    return this.stacks.get(this.active)?.includes(node) ?? false;
  }

  enter(frame: Frame): void {
    let stack = this.stacks.get(this.active);
    if (!stack) {
      stack = [];
      this.stacks.set(this.active, stack);
    }
    stack.push(frame);
  }

  exit(frame: Frame): void {
    const stack = this.stacks.get(this.active);
    if (!stack || stack[stack.length - 1] !== frame) {
      throw new Error('ExecutionContext.exit: frame is not on top of the stack');
    }
    stack.pop();
    if (stack.length === 0 && this.active !== ROOT_UNIT) {
      this.stacks.delete(this.active);
    }
  }

  activeUnit(): UnitId {
    return this.active;
  }

  spawnUnit(label = 'unit'): UnitId {
    this.spawned += 1;
    return Symbol(`${label}#${this.spawned}`);
  }

  releaseUnit(unit: UnitId): void {
    if (unit !== ROOT_UNIT) this.stacks.delete(unit);
  }

  runInUnit<R>(unit: UnitId, fn: () => R): R {
    const prev = this.active;
    this.active = unit;
    try {
      return fn();
    } finally {
      this.active = prev;
    }
  }

  /** Number of frames on the active unit's stack. */
  depth(): number {
    return this.stacks.get(this.active)?.length ?? 0;
  }
}
