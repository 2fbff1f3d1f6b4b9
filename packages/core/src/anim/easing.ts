import type { Ease, EaseCurve, EaseDirection } from './spec';

export type EaseFn = (t: number) => number;

const c1 = 1.70158;
const c3 = c1 + 1;
const c4 = (2 * Math.PI) / 3;

function bounceOut(t: number): number {
  const n1 = 7.5625;
  const d1 = 2.75;
  if (t < 1 / d1) return n1 * t * t;
  if (t < 2 / d1) return n1 * (t -= 1.5 / d1) * t + 0.75;
  if (t < 2.5 / d1) return n1 * (t -= 2.25 / d1) * t + 0.9375;
  return n1 * (t -= 2.625 / d1) * t + 0.984375;
}

// "In" form of every curve; Out and InOut are derived below.
const curves: Record<EaseCurve, EaseFn> = {
  sine: (t) => 1 - Math.cos((t * Math.PI) / 2),
  quad: (t) => t * t,
  cubic: (t) => t * t * t,
  quart: (t) => t * t * t * t,
  quint: (t) => t * t * t * t * t,
  expo: (t) => (t === 0 ? 0 : Math.pow(2, 10 * t - 10)),
  circ: (t) => 1 - Math.sqrt(1 - t * t),
  back: (t) => c3 * t * t * t - c1 * t * t,
  elastic: (t) =>
    t === 0 || t === 1
      ? t
      : -Math.pow(2, 10 * t - 10) * Math.sin((t * 10 - 10.75) * c4),
  bounce: (t) => 1 - bounceOut(1 - t),
};

function isEaseCurve(name: string): name is EaseCurve {
  return Object.prototype.hasOwnProperty.call(curves, name);
}

function withDirection(fn: EaseFn, direction: EaseDirection): EaseFn {
  switch (direction) {
    case 'In':
      return fn;
    case 'Out':
      return (t) => 1 - fn(1 - t);
    case 'InOut':
      return (t) => (t < 0.5 ? fn(2 * t) / 2 : 1 - fn(2 - 2 * t) / 2);
  }
}

const cache = new Map<Ease, EaseFn>();

export function getEasing(ease: Ease): EaseFn {
  const hit = cache.get(ease);
  if (hit) return hit;

  let fn: EaseFn;
  if (ease === 'linear') {
    fn = (t) => t;
  } else if (ease === 'easeIn') {
    fn = curves.quad;
  } else if (ease === 'easeOut') {
    fn = withDirection(curves.quad, 'Out');
  } else if (ease === 'easeInOut') {
    fn = withDirection(curves.quad, 'InOut');
  } else {
    const m = /^([a-z]+)(InOut|In|Out)$/.exec(ease);
    const name = m?.[1] ?? '';
    if (!m || !isEaseCurve(name)) {
      throw new Error(`getEasing: unknown easing "${ease}"`);
    }
    const direction: EaseDirection =
      m[2] === 'InOut' ? 'InOut' : m[2] === 'Out' ? 'Out' : 'In';
    fn = withDirection(curves[name], direction);
  }

  cache.set(ease, fn);
  return fn;
}

export function ease(name: Ease, t: number): number {
  return getEasing(name)(t);
}
