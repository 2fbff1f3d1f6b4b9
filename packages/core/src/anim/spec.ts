import type { Source } from '../types';
import type { ChannelCodec } from './codec';

export type EaseCurve =
  | 'sine'
  | 'quad'
  | 'cubic'
  | 'quart'
  | 'quint'
  | 'expo'
  | 'circ'
  | 'back'
  | 'elastic'
  | 'bounce';

export type EaseDirection = 'In' | 'Out' | 'InOut';

/**
 * Named easing curve. `easeIn`/`easeOut`/`easeInOut` are the quadratic family.
 */
export type Ease =
  | 'linear'
  | 'easeIn'
  | 'easeOut'
  | 'easeInOut'
  | `${EaseCurve}${EaseDirection}`;

export interface TweenProfile {
  duration: number; // s
  delay?: number; // s
  easing?: Ease;
  /** Play forward then backward within one cycle. */
  reverses?: boolean;
  /** Extra cycles after the first. Negative repeats forever. */
  repeatCount?: number;
}

export type Interpolate<T> = (from: T, to: T, t: number) => T;

export interface SpringOptions<T> {
  goal?: Source<T>;
  /** Angular frequency in rad/s. */
  speed?: Source<number>;
  /** Damping ratio: 1 is critical, below oscillates, above creeps. */
  damping?: Source<number>;
  codec: ChannelCodec<T>;
}

export const DEFAULT_TWEEN: Required<TweenProfile> = {
  duration: 1,
  delay: 0,
  easing: 'linear',
  reverses: false,
  repeatCount: 0,
};

export const DEFAULT_SPRING = {
  speed: 10,
  damping: 1,
} as const;

/** Per-channel displacement and velocity below which a spring is at rest. */
export const REST_EPSILON = 1e-4;
