import type { Value } from '../value';
import type { ErrorContext, Source, UpdateFlags } from '../types';

/**
 * What a spring or tween needs from the graph it is attached to.
 *
 * `Graph` implements this; drivers never touch the scheduler directly.
 */
export interface AnimationHost {
  now(): number;
  sample<U>(source: Source<U>): U;
  /** Assigns `value` and enqueues the node when it changed. */
  publish<T>(node: Value<T>, value: T, update: UpdateFlags): void;
  report(error: unknown, context: ErrorContext): void;
}

export type DriverKind = 'spring' | 'tween';

/** A value driver attached to exactly one node. */
export interface AnimationDriver<T> {
  readonly kind: DriverKind;
  /** Redirected write: move toward `value` instead of jumping to it. */
  retarget(value: T): void;
  /** Direct write: come to rest at `value` without publishing. */
  snap(value: T): void;
  step(now: number): void;
  /** Called by the graph when the driver is replaced or the node destroyed. */
  release(): void;
}
