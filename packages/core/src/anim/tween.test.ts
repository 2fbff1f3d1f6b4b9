import { describe, it, expect } from 'vitest';
import { createGraph } from '../graph';
import { lerpNumber, lerpWith, vectorCodec } from './codec';

describe('anim/tween', () => {
  it('plays forward, back and repeats once when reversing', () => {
    const g = createGraph();
    const x = g.value(0);
    const tween = g.tween(
      x,
      { duration: 1, reverses: true, repeatCount: 1 },
      lerpNumber
    );

    x.set(10);
    expect(x.peek()).toBe(0);
    expect(tween.isPlaying()).toBe(true);

    const trace: Array<[number, number, boolean]> = [];
    for (const dt of [0.5, 0.5, 1, 0.5, 0.5, 0.5, 1, 0.5]) {
      g.tick(dt);
      trace.push([g.now(), x.peek(), tween.isPlaying()]);
    }

    expect(trace).toEqual([
      [0.5, 5, true],
      [1, 10, true], // alpha 1: at the goal
      [2, 0, true], // alpha 2: back at the start
      [2.5, 0, true], // past the span: restart
      [3, 5, true],
      [3.5, 10, true],
      [4.5, 0, true],
      [5, 0, false], // finished on the start value
    ]);
  });

  it('waits out the delay before moving', () => {
    const g = createGraph();
    const x = g.value(0);
    g.tween(x, { duration: 2, delay: 1 }, lerpNumber);

    x.set(8);
    g.tick(0.5);
    expect(x.peek()).toBe(0);
    g.tick(1);
    expect(x.peek()).toBe(2);
    g.tick(2);
    expect(x.peek()).toBe(8);
  });

  it('applies the easing curve', () => {
    const g = createGraph();
    const x = g.value(0);
    g.tween(x, { duration: 1, easing: 'easeIn' }, lerpNumber);

    x.set(10);
    g.tick(0.5);
    expect(x.peek()).toBe(2.5);
  });

  it('restarts from the current value when retargeted mid-flight', () => {
    const g = createGraph();
    const x = g.value(0);
    g.tween(x, { duration: 1 }, lerpNumber);

    x.set(10);
    g.tick(0.5);
    expect(x.peek()).toBe(5);

    x.set(0);
    g.tick(0.5);
    expect(x.peek()).toBe(2.5);
  });

  it('repeats forever with a negative repeat count', () => {
    const g = createGraph();
    const x = g.value(0);
    const tween = g.tween(x, { duration: 1, repeatCount: -1 }, lerpNumber);

    x.set(1);
    g.tick(1.5);
    expect(tween.isPlaying()).toBe(true);
    g.tick(0.5);
    expect(x.peek()).toBe(0.5);

    for (let i = 0; i < 20; i++) g.tick(0.75);
    expect(tween.isPlaying()).toBe(true);
  });

  it('finishes on the first tick when the duration is zero', () => {
    const g = createGraph();
    const x = g.value(0);
    const tween = g.tween(x, { duration: 0 }, lerpNumber);

    x.set(3);
    g.tick(0);
    expect(x.peek()).toBe(3);
    expect(tween.isPlaying()).toBe(false);
  });

  it('jumps and stops on skipAnimation writes', () => {
    const g = createGraph();
    const x = g.value(0);
    const tween = g.tween(x, { duration: 1 }, lerpNumber);

    x.set(10);
    g.tick(0.5);
    x.set(4, { skipAnimation: true });

    expect(x.peek()).toBe(4);
    expect(tween.isPlaying()).toBe(false);
    g.tick(0.5);
    expect(x.peek()).toBe(4);
  });

  it('interpolates composite values channel by channel', () => {
    const g = createGraph();
    const p = g.value<readonly number[]>([0, 0]);
    const sum = g.computed((use) => use(p).reduce((a, b) => a + b, 0));
    g.tween(p, { duration: 1 }, lerpWith(vectorCodec));

    p.set([2, 4]);
    g.tick(0.5);

    expect(p.peek()).toEqual([1, 2]);
    expect(sum.peek()).toBe(3);
  });

  it('fills in profile defaults', () => {
    const g = createGraph();
    const tween = g.tween(g.value(0), { duration: -1 }, lerpNumber);
    expect(tween.profile).toEqual({
      duration: 0,
      delay: 0,
      easing: 'linear',
      reverses: false,
      repeatCount: 0,
    });
    expect(() =>
      g.tween(g.value(0), { duration: Infinity }, lerpNumber)
    ).toThrow('Graph.tween: duration must be a finite number (got Infinity)');
  });

  it('replaces an earlier tween', () => {
    const g = createGraph();
    const x = g.value(0);
    const tween = g.tween(x, { duration: 1 }, lerpNumber);
    x.set(10);

    const other = g.tween(x, { duration: 2 }, lerpNumber);
    expect(tween.isPlaying()).toBe(false);
    expect(x.animation).toBe(other);

    tween.detach();
    expect(x.animation).toBe(other);
  });
});
