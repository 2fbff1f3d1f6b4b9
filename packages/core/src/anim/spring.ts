import type { Value } from '../value';
import type { Source } from '../types';
import type { AnimationDriver, AnimationHost } from './adapter';
import type { ChannelCodec } from './codec';
import { DEFAULT_SPRING, REST_EPSILON, type SpringOptions } from './spec';
import { springCoefficients } from './springCoefficients';

export interface SpringState {
  position: number[];
  velocity: number[];
  target: number[];
  /** Time of the last retarget; undefined while at rest. */
  origin: number | undefined;
}

function validParameter(v: number): boolean {
  return Number.isFinite(v) && v >= 0;
}

function assertParameter(name: string, source: Source<number>): void {
  if (typeof source === 'number' && !validParameter(source)) {
    throw new Error(
      `Graph.spring: ${name} must be a finite number >= 0 (got ${source})`
    );
  }
}

/**
 * Drives a node with a damped harmonic oscillator per channel.
 *
 * Motion is evaluated in closed form from the last retarget, so the result at a
 * given time does not depend on how often `step()` ran in between.
 */
export class SpringDriver<T> implements AnimationDriver<T> {
  readonly kind = 'spring';

  private goalSource: Source<T>;
  private readonly speedSource: Source<number>;
  private readonly dampingSource: Source<number>;
  private readonly codec: ChannelCodec<T>;

  private goal: T;
  private speed: number;
  private damping: number;
  private type: string | undefined;

  private target: number[] = [];
  private startPosition: number[] = [];
  private startVelocity: number[] = [];
  private origin: number | undefined;
  private released = false;

  constructor(
    private readonly host: AnimationHost,
    private readonly node: Value<T>,
    options: SpringOptions<T>
  ) {
    this.speedSource = options.speed ?? DEFAULT_SPRING.speed;
    this.dampingSource = options.damping ?? DEFAULT_SPRING.damping;
    assertParameter('speed', this.speedSource);
    assertParameter('damping', this.dampingSource);

    this.codec = options.codec;
    this.speed = this.sampleParameter('speed', this.speedSource, 0);
    this.damping = this.sampleParameter('damping', this.dampingSource, 0);

    // Start at rest on the node's current value.
    const initial = node.current;
    this.goalSource = initial;
    this.goal = initial;
    this.restAt(initial);

    if (options.goal !== undefined) {
      this.goalSource = options.goal;
      this.moveTo(host.sample(options.goal));
    }
  }

  private sampleParameter(
    name: string,
    source: Source<number>,
    fallback: number
  ): number {
    const v = this.host.sample(source);
    if (validParameter(v)) return v;
    this.host.report(
      new Error(`SpringDriver: sampled ${name} is invalid (${v})`),
      { phase: 'animation', node: this.node }
    );
    return Math.max(0, Number.isFinite(v) ? v : fallback);
  }

  /** Re-establishes rest state on `value` without publishing. */
  private restAt(value: T): void {
    this.goal = value;
    this.type = this.codec.typeOf(value);
    this.target =
      this.type === undefined ? [] : this.codec.unpack(value, this.type);
    this.startPosition = [...this.target];
    this.startVelocity = this.target.map(() => 0);
    this.origin = undefined;
  }

  private moveTo(goal: T): void {
    const type = this.codec.typeOf(goal);
    if (type === undefined || type !== this.type) {
      // Shape changed: no motion to carry over.
      this.restAt(goal);
      this.host.publish(this.node, goal, {
        skipAnimation: false,
        animationStep: true,
      });
      return;
    }

    const now = this.host.now();
    const { position, velocity } = this.sample(now);
    this.goal = goal;
    this.target = this.codec.unpack(goal, type);
    this.startPosition = position;
    this.startVelocity = velocity;
    this.origin = now;
  }

  /** Position and velocity per channel at `now` with the current parameters. */
  private sample(now: number): { position: number[]; velocity: number[] } {
    if (this.origin === undefined) {
      return {
        position: [...this.startPosition],
        velocity: [...this.startVelocity],
      };
    }
    const c = springCoefficients(now - this.origin, this.damping, this.speed);
    const position: number[] = [];
    const velocity: number[] = [];
    this.target.forEach((target, i) => {
      const d0 = (this.startPosition[i] ?? target) - target;
      const v0 = this.startVelocity[i] ?? 0;
      let d = d0 * c.posPos + v0 * c.posVel;
      let v = d0 * c.velPos + v0 * c.velVel;
      if (!Number.isFinite(d) || !Number.isFinite(v)) {
        d = 0;
        v = 0;
      }
      position.push(target + d);
      velocity.push(v);
    });
    return { position, velocity };
  }

  retarget(value: T): void {
    this.goalSource = value;
    this.moveTo(value);
  }

  snap(value: T): void {
    this.goalSource = value;
    this.restAt(value);
  }

  step(now: number): void {
    if (this.released) return;

    const goal = this.host.sample(this.goalSource);
    const speed = this.sampleParameter('speed', this.speedSource, this.speed);
    const damping = this.sampleParameter(
      'damping',
      this.dampingSource,
      this.damping
    );
    if (speed !== this.speed || damping !== this.damping) {
      // Carry motion over using the old parameters, then switch.
      if (this.origin !== undefined) {
        const { position, velocity } = this.sample(now);
        this.startPosition = position;
        this.startVelocity = velocity;
        this.origin = now;
      }
      this.speed = speed;
      this.damping = damping;
    }
    if (!Object.is(goal, this.goal)) this.moveTo(goal);

    if (this.origin === undefined || this.type === undefined) return;

    const { position, velocity } = this.sample(now);
    const resting = position.every(
      (p, i) =>
        Math.abs(p - (this.target[i] ?? p)) < REST_EPSILON &&
        Math.abs(velocity[i] ?? 0) < REST_EPSILON
    );

    if (resting) {
      this.restAt(this.goal);
      this.host.publish(this.node, this.goal, {
        skipAnimation: false,
        animationStep: true,
      });
      return;
    }

    this.host.publish(this.node, this.codec.pack(position, this.type), {
      skipAnimation: false,
      animationStep: true,
    });
  }

  private channelsOf(value: T, method: string): number[] {
    const type = this.codec.typeOf(value);
    if (type === undefined || type !== this.type) {
      throw new Error(
        `SpringDriver.${method}: value does not match the spring's type (${String(this.type)})`
      );
    }
    return this.codec.unpack(value, type);
  }

  /** Jumps to `position`, keeping the current velocity. */
  setPosition(position: T): void {
    const channels = this.channelsOf(position, 'setPosition');
    const now = this.host.now();
    const { velocity } = this.sample(now);
    this.startPosition = channels;
    this.startVelocity = velocity;
    this.origin = now;
    this.host.publish(this.node, position, {
      skipAnimation: false,
      animationStep: true,
    });
  }

  setVelocity(velocity: T): void {
    const channels = this.channelsOf(velocity, 'setVelocity');
    const now = this.host.now();
    const { position } = this.sample(now);
    this.startPosition = position;
    this.startVelocity = channels;
    this.origin = now;
  }

  addVelocity(delta: T): void {
    const channels = this.channelsOf(delta, 'addVelocity');
    const now = this.host.now();
    const { position, velocity } = this.sample(now);
    this.startPosition = position;
    this.startVelocity = velocity.map((v, i) => v + (channels[i] ?? 0));
    this.origin = now;
  }

  state(): SpringState {
    const { position, velocity } = this.sample(this.host.now());
    return {
      position,
      velocity,
      target: [...this.target],
      origin: this.origin,
    };
  }

  isResting(): boolean {
    return this.origin === undefined;
  }

  detach(): void {
    if (this.node.animation === this) this.node.graph.detach(this.node);
  }

  release(): void {
    this.released = true;
    this.origin = undefined;
  }
}
