import type { Value } from '../value';
import type { AnimationDriver, AnimationHost } from './adapter';
import { getEasing, type EaseFn } from './easing';
import { DEFAULT_TWEEN, type Interpolate, type TweenProfile } from './spec';

/**
 * Eases a node from its current value to each newly written goal.
 *
 * Time is measured against `origin` (start time plus delay); `alpha` runs over
 * [0, 1], or [0, 2] when the profile reverses.
 */
export class TweenDriver<T> implements AnimationDriver<T> {
  readonly kind = 'tween';
  readonly profile: Required<TweenProfile>;

  private readonly easing: EaseFn;
  private start: T;
  private goal: T;
  private origin: number | undefined;
  private repeatsLeft = 0;
  private released = false;

  constructor(
    private readonly host: AnimationHost,
    private readonly node: Value<T>,
    profile: TweenProfile,
    private readonly interpolate: Interpolate<T>
  ) {
    if (!Number.isFinite(profile.duration)) {
      throw new Error(
        `Graph.tween: duration must be a finite number (got ${profile.duration})`
      );
    }
    this.profile = {
      duration: Math.max(0, profile.duration),
      delay: Math.max(0, profile.delay ?? DEFAULT_TWEEN.delay),
      easing: profile.easing ?? DEFAULT_TWEEN.easing,
      reverses: profile.reverses ?? DEFAULT_TWEEN.reverses,
      repeatCount: profile.repeatCount ?? DEFAULT_TWEEN.repeatCount,
    };
    this.easing = getEasing(this.profile.easing);
    this.start = node.current;
    this.goal = node.current;
  }

  retarget(value: T): void {
    this.start = this.node.current;
    this.goal = value;
    this.origin = this.host.now() + this.profile.delay;
    this.repeatsLeft = this.profile.repeatCount;
  }

  snap(value: T): void {
    this.start = value;
    this.goal = value;
    this.origin = undefined;
  }

  step(now: number): void {
    if (this.released || this.origin === undefined) return;

    const elapsed = now - this.origin;
    if (elapsed < 0) return; // still in delay

    const { duration, reverses } = this.profile;
    const span = reverses ? 2 : 1;
    let alpha = duration > 0 ? elapsed / duration : Infinity;

    if (alpha > span) {
      if (this.repeatsLeft !== 0) {
        if (this.repeatsLeft > 0) this.repeatsLeft -= 1;
        this.origin = now + this.profile.delay;
        return;
      }
      this.origin = undefined;
      this.host.publish(this.node, reverses ? this.start : this.goal, {
        skipAnimation: false,
        animationStep: true,
      });
      return;
    }

    if (reverses && alpha > 1) alpha = 1 - (alpha - 1);
    const value = this.interpolate(this.start, this.goal, this.easing(alpha));
    this.host.publish(this.node, value, {
      skipAnimation: false,
      animationStep: true,
    });
  }

  isPlaying(): boolean {
    return this.origin !== undefined;
  }

  detach(): void {
    if (this.node.animation === this) this.node.graph.detach(this.node);
  }

  release(): void {
    this.released = true;
    this.origin = undefined;
  }
}
