import type { Value } from './value';

/** Reads a node from inside a computation, registering it as a dependency. */
export type Use = <U>(node: Value<U>) => U;

export type Computation<T> = (use: Use) => T;

/** A parameter that is either a constant or a node sampled on every tick. */
export type Source<T> = T | Value<T>;

export type UpdateMode = 'deferred' | 'immediate';

export interface UpdateFlags {
  /** The update bypassed any attached spring or tween. */
  skipAnimation: boolean;
  /** The update is a spring/tween frame; no computation needs to run. */
  animationStep: boolean;
}

export interface WriteOptions {
  /** Enqueue the node even when the value is unchanged. */
  force?: boolean;
  /** Assign directly instead of redirecting to an attached spring or tween. */
  skipAnimation?: boolean;
}

export type ErrorPhase =
  | 'compute'
  | 'connection'
  | 'binding'
  | 'cycle'
  | 'flush'
  | 'animation';

export interface ErrorContext {
  phase: ErrorPhase;
  node?: Value<unknown>;
}

export type ErrorReporter = (error: unknown, context: ErrorContext) => void;

/**
 * Pushes a settled value onto an externally owned object.
 *
 * The graph never inspects the target beyond the checks done at bind time.
 */
export interface BindingAdapter {
  apply(
    target: object,
    key: PropertyKey,
    value: unknown,
    update: UpdateFlags
  ): void;
}

export type BindingEffect = (update: UpdateFlags) => void;

export interface GraphOptions {
  mode?: UpdateMode;
  /** Current time in seconds. Defaults to the time accumulated by `tick()`. */
  clock?: () => number;
  onError?: ErrorReporter;
  bindingAdapter?: BindingAdapter;
  /** Upper bound on scheduler passes within one flush. */
  maxFlushPasses?: number;
}
