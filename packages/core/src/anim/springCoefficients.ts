/**
 * Linear map from a spring's (displacement, velocity) at time 0 to the same
 * pair `t` seconds later:
 *
 *   d(t) = d0 * posPos + v0 * posVel
 *   v(t) = d0 * velPos + v0 * velVel
 */
export interface SpringCoefficients {
  posPos: number;
  posVel: number;
  velPos: number;
  velVel: number;
}

const IDENTITY: SpringCoefficients = {
  posPos: 1,
  posVel: 0,
  velPos: 0,
  velVel: 1,
};

/**
 * Closed-form solution of `x'' + 2*damping*speed*x' + speed^2*x = 0`.
 *
 * @param t - elapsed time in seconds
 * @param damping - damping ratio
 * @param speed - undamped angular frequency in rad/s
 */
export function springCoefficients(
  t: number,
  damping: number,
  speed: number
): SpringCoefficients {
  if (t === 0 || speed === 0) return { ...IDENTITY };

  if (damping > 1) {
    const alpha = Math.sqrt(damping * damping - 1);
    const z1 = -speed * (alpha + damping);
    const z2 = speed * (alpha - damping);
    const e1 = Math.exp(t * z1);
    const e2 = Math.exp(t * z2);
    // 1 / (z1 - z2)
    const k = -1 / (2 * alpha * speed);
    return {
      posPos: (z1 * e2 - z2 * e1) * k,
      posVel: (e1 - e2) * k,
      velPos: speed * speed * (e2 - e1) * k,
      velVel: (z1 * e1 - z2 * e2) * k,
    };
  }

  if (damping === 1) {
    const ws = speed * t;
    const e = Math.exp(-ws);
    return {
      posPos: e * (1 + ws),
      posVel: e * t,
      velPos: e * (-speed * speed * t),
      velVel: e * (1 - ws),
    };
  }

  const alpha = speed * Math.sqrt(1 - damping * damping);
  const beta = speed * damping;
  const e = Math.exp(-beta * t);
  const cos = e * Math.cos(alpha * t);
  const sinOverAlpha = (e * Math.sin(alpha * t)) / alpha;
  return {
    posPos: cos + beta * sinOverAlpha,
    posVel: sinOverAlpha,
    velPos: -speed * speed * sinOverAlpha,
    velVel: cos - beta * sinOverAlpha,
  };
}
