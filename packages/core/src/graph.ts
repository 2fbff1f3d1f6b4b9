import { ExecutionContext } from './context';
import { Scheduler } from './scheduler';
import { Value, isValue, type Evaluation } from './value';
import { assertBindable, createBinding, reflectBindingAdapter } from './bind';
import type { AnimationHost } from './anim/adapter';
import type { Interpolate, SpringOptions, TweenProfile } from './anim/spec';
import { SpringDriver } from './anim/spring';
import { TweenDriver } from './anim/tween';
import type {
  BindingAdapter,
  Computation,
  ErrorContext,
  ErrorReporter,
  GraphOptions,
  Source,
  UpdateFlags,
  UpdateMode,
  Use,
  WriteOptions,
} from './types';

export const DEFAULT_GRAPH_OPTIONS = {
  mode: 'deferred',
  maxFlushPasses: 10_000,
} as const satisfies GraphOptions;

const DIRECT: UpdateFlags = { skipAnimation: false, animationStep: false };

function isComposite(v: unknown): boolean {
  return (typeof v === 'object' && v !== null) || typeof v === 'function';
}

/** Cheap equality for scalars; composites are never similar. */
export function isSimilar(a: unknown, b: unknown): boolean {
  if (isComposite(a)) return false;
  if (a === b) return true;
  return (
    typeof a === 'number' &&
    typeof b === 'number' &&
    Number.isNaN(a) &&
    Number.isNaN(b)
  );
}

function isComputedBy<T>(
  node: Value<unknown>,
  fn: Computation<T>
): node is Value<T> {
  return node.computation === fn;
}

const defaultErrorReporter: ErrorReporter = (error, context) => {
  const where = context.node ? ` (${context.node})` : '';
  console.error(`Graph: ${context.phase} error${where}`, error);
};

/**
 * Reactive value graph.
 *
 * Owns the nodes' edges, the pending-update scheduler, the memo cache of
 * computed nodes and every attached spring/tween. `tick(dt)` is the single
 * entry point that advances time.
 */
export class Graph implements AnimationHost {
  private readonly context = new ExecutionContext();
  private readonly scheduler: Scheduler;
  private readonly memo = new Map<Computation<unknown>, Value<unknown>>();
  private readonly animated = new Set<Value<unknown>>();
  private readonly onError: ErrorReporter;
  private readonly bindingAdapter: BindingAdapter;
  private readonly clock: (() => number) | undefined;
  private nextId = 1;
  private elapsed = 0;

  private readonly use: Use = (node) => this.read(node);

  constructor(opts: GraphOptions = {}) {
    this.onError = opts.onError ?? defaultErrorReporter;
    this.bindingAdapter = opts.bindingAdapter ?? reflectBindingAdapter;
    this.clock = opts.clock;
    this.scheduler = new Scheduler(
      {
        recompute: (node) => this.refresh(node),
        propagate: (node, update) => this.propagate(node, update),
      },
      this.context,
      {
        mode: opts.mode ?? DEFAULT_GRAPH_OPTIONS.mode,
        maxFlushPasses:
          opts.maxFlushPasses ?? DEFAULT_GRAPH_OPTIONS.maxFlushPasses,
        onError: this.onError,
      }
    );
  }

  // ---- nodes ---------------------------------------------------------------

  value<T>(initial: T): Value<T> {
    return new Value<T>(this, this.nextId++, { kind: 'value', value: initial });
  }

  /**
   * Memoized computed node: the same function object always yields the same
   * live node of this graph. The memo belongs to the graph, so another graph
   * given the same function builds its own node.
   *
   * The first evaluation runs eagerly. If it throws, the error goes to
   * `onError` and the node stays live without a value (`hasValue()` is false,
   * reads rethrow the error) until an upstream change lets it evaluate.
   */
  computed<T>(fn: Computation<T>): Value<T> {
    const hit = this.memo.get(fn);
    if (hit && !hit.destroyed && isComputedBy(hit, fn)) return hit;

    const node = new Value<T>(this, this.nextId++, {
      kind: 'computed',
      computation: fn,
      evaluate: (self) => {
        const result = this.evaluate(self, fn);
        if (!result.ok) {
          this.report(result.error, { phase: 'compute', node: self });
        }
        return result;
      },
    });
    this.memo.set(fn, node);
    return node;
  }

  read<T>(node: Value<T>): T {
    if (!node.destroyed) {
      const reader = this.context.current();
      if (reader && reader !== node && !reader.destroyed) {
        reader.dependencies.add(node);
        node.dependents.add(reader);
      }
    }
    return node.current;
  }

  peek<T>(node: Value<T>): T {
    return node.current;
  }

  sample<U>(source: Source<U>): U {
    return isValue(source) ? source.current : source;
  }

  /** Runs `fn` without registering dependencies for the enclosing computation. */
  untracked<R>(fn: () => R): R {
    this.context.enter(null);
    try {
      return fn();
    } finally {
      this.context.exit(null);
    }
  }

  write<T>(node: Value<T>, value: T, options: WriteOptions = {}): void {
    if (node.destroyed) {
      console.warn(`Graph.write: ${node} is destroyed`);
      return;
    }
    if (node.computation) {
      throw new Error(`Graph.write: ${node} is computed and cannot be written`);
    }

    const driver = node.animation;
    if (driver && !options.skipAnimation) {
      driver.retarget(value);
      return;
    }
    driver?.snap(value);

    this.assign(
      node,
      value,
      { skipAnimation: options.skipAnimation === true, animationStep: false },
      options.force === true
    );
  }

  publish<T>(node: Value<T>, value: T, update: UpdateFlags): void {
    if (node.destroyed) return;
    this.assign(node, value, update, false);
  }

  private assign<T>(
    node: Value<T>,
    value: T,
    update: UpdateFlags,
    force: boolean
  ): void {
    const prev = node.current;
    node.current = value;
    if (force || isComposite(value) || !isSimilar(prev, value)) {
      this.scheduler.enqueue(node, update);
    }
  }

  // ---- derivation ----------------------------------------------------------

  private evaluate<T>(node: Value<T>, fn: Computation<T>): Evaluation<T> {
    this.context.enter(node);
    try {
      return { ok: true, value: fn(this.use) };
    } catch (error) {
      return { ok: false, error };
    } finally {
      this.context.exit(node);
    }
  }

  private unlinkDependencies(node: Value<unknown>): void {
    for (const dep of node.dependencies) dep.dependents.delete(node);
    node.dependencies.clear();
  }

  /**
   * Re-runs a computed node from scratch and, when its value changed,
   * propagates like an applied update would. Returns whether it changed.
   */
  recompute(node: Value<unknown>): boolean {
    const changed = this.refresh(node);
    if (changed) this.propagate(node, DIRECT);
    return changed;
  }

  /**
   * Re-runs a computed node, rebuilding its dependency set. Notifying
   * dependents is left to the caller.
   *
   * On failure the error goes to `onError`, the previous value and
   * dependencies are restored, and `false` is returned.
   */
  private refresh<T>(node: Value<T>): boolean {
    const fn = node.computation;
    if (!fn || node.destroyed) return false;
    if (this.context.isDeriving(node)) {
      this.report(
        new Error(`Graph.recompute: ${node} depends on itself`),
        { phase: 'cycle', node }
      );
      return false;
    }

    const previous = [...node.dependencies];
    this.unlinkDependencies(node);
    const result = this.evaluate(node, fn);

    if (node.destroyed) {
      this.unlinkDependencies(node);
      return false;
    }
    if (!result.ok) {
      this.unlinkDependencies(node);
      for (const dep of previous) {
        if (dep.destroyed) continue;
        node.dependencies.add(dep);
        dep.dependents.add(node);
      }
      node.fail(result.error);
      this.report(result.error, { phase: 'compute', node });
      return false;
    }

    if (!node.hasValue()) {
      node.current = result.value;
      return true;
    }
    const prev = node.current;
    node.current = result.value;
    return isComposite(result.value) || !isSimilar(prev, result.value);
  }

  /** Schedules dependents, then fires bindings, then connections. */
  propagate(node: Value<unknown>, update: UpdateFlags = DIRECT): void {
    for (const dependent of [...node.dependents]) {
      this.scheduler.enqueue(dependent, {
        skipAnimation: update.skipAnimation,
        animationStep: false,
      });
    }
    for (const binding of [...node.bindings]) {
      try {
        binding(update);
      } catch (error) {
        this.report(error, { phase: 'binding', node });
      }
    }
    for (const connection of [...node.connections]) {
      try {
        connection();
      } catch (error) {
        this.report(error, { phase: 'connection', node });
      }
    }
  }

  // ---- subscriptions -------------------------------------------------------

  connect(node: Value<unknown>, callback: () => void): () => void {
    if (node.destroyed) {
      console.warn(`Graph.connect: ${node} is destroyed`);
      return () => undefined;
    }
    const own = () => callback();
    node.connections.add(own);
    return () => {
      node.connections.delete(own);
    };
  }

  /**
   * Mirrors a node onto `target[key]` through the binding adapter. The current
   * value, if the node has one yet, is applied immediately.
   */
  bind<T>(node: Value<T>, target: unknown, key: PropertyKey): () => void {
    assertBindable(target, key);
    if (node.destroyed) {
      throw new Error(`Graph.bind: ${node} is destroyed`);
    }
    const effect = createBinding(
      this.bindingAdapter,
      () => node.current,
      target,
      key
    );
    node.bindings.add(effect);
    if (node.hasValue()) effect(DIRECT);
    return () => {
      node.bindings.delete(effect);
    };
  }

  // ---- animation -----------------------------------------------------------

  private assertAnimatable(node: Value<unknown>, method: string): void {
    if (node.destroyed) {
      throw new Error(`Graph.${method}: ${node} is destroyed`);
    }
    if (node.computation) {
      throw new Error(
        `Graph.${method}: ${node} is computed; animate a plain value instead`
      );
    }
  }

  spring<T>(node: Value<T>, options: SpringOptions<T>): SpringDriver<T> {
    this.assertAnimatable(node, 'spring');
    this.detach(node);
    const driver = new SpringDriver(this, node, options);
    node.animation = driver;
    this.animated.add(node);
    return driver;
  }

  tween<T>(
    node: Value<T>,
    profile: TweenProfile,
    interpolate: Interpolate<T>
  ): TweenDriver<T> {
    this.assertAnimatable(node, 'tween');
    this.detach(node);
    const driver = new TweenDriver(this, node, profile, interpolate);
    node.animation = driver;
    this.animated.add(node);
    return driver;
  }

  /** Removes the node's spring or tween, leaving the value where it is. */
  detach(node: Value<unknown>): void {
    const driver = node.animation;
    if (!driver) return;
    driver.release();
    node.animation = undefined;
    this.animated.delete(node);
  }

  // ---- time ----------------------------------------------------------------

  now(): number {
    return this.clock ? this.clock() : this.elapsed;
  }

  /**
   * Advances time by `dt` seconds: settles pending writes, steps every spring
   * and tween, then settles the frames they published.
   */
  tick(dt = 0): void {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new Error(`Graph.tick: dt must be a finite number >= 0 (got ${dt})`);
    }
    this.elapsed += dt;
    this.scheduler.flush();
    const now = this.now();
    for (const node of [...this.animated]) {
      try {
        node.animation?.step(now);
      } catch (error) {
        this.report(error, { phase: 'animation', node });
      }
    }
    this.scheduler.flush();
  }

  flush(): number {
    return this.scheduler.flush();
  }

  mode(): UpdateMode {
    return this.scheduler.getMode();
  }

  setMode(mode: UpdateMode): void {
    this.scheduler.setMode(mode);
  }

  isPending(node: Value<unknown>): boolean {
    return this.scheduler.isPending(node);
  }

  pendingCount(): number {
    return this.scheduler.pendingCount();
  }

  // ---- teardown ------------------------------------------------------------

  /**
   * Unlinks the node from everything that references it. Dependents stay alive
   * and simply stop hearing from it. Safe to call repeatedly and mid-flush.
   */
  destroy(node: Value<unknown>): void {
    if (node.destroyed) return;
    node.destroyed = true;
    this.scheduler.cancel(node);
    this.detach(node);
    this.unlinkDependencies(node);
    for (const dependent of node.dependents) {
      dependent.dependencies.delete(node);
    }
    node.dependents.clear();
    if (node.computation && this.memo.get(node.computation) === node) {
      this.memo.delete(node.computation);
    }
    node.bindings.clear();
    node.connections.clear();
  }

  report(error: unknown, context: ErrorContext): void {
    this.onError(error, context);
  }
}

export function createGraph(opts?: GraphOptions): Graph {
  return new Graph(opts);
}
