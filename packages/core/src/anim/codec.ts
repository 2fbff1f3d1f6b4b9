import type { Interpolate } from './spec';

/**
 * Decomposes values into flat numeric channels and rebuilds them.
 *
 * `typeOf` returns a tag identifying the value's shape, or `undefined` when the
 * value cannot be animated. Two values with the same tag have the same number
 * of channels in the same order.
 */
export interface ChannelCodec<T> {
  typeOf(value: T): string | undefined;
  unpack(value: T, type: string): number[];
  pack(channels: readonly number[], type: string): T;
}

export const numberCodec: ChannelCodec<number> = {
  typeOf: () => 'number',
  unpack: (value) => [value],
  pack: (channels) => channels[0] ?? 0,
};

/** Fixed-length numeric tuples; length is part of the tag. */
export const vectorCodec: ChannelCodec<readonly number[]> = {
  typeOf: (value) => `vector:${value.length}`,
  unpack: (value) => [...value],
  pack: (channels) => [...channels],
};

function recordKeys(type: string): string[] {
  const list = type.slice('record:'.length);
  return list === '' ? [] : list.split(',');
}

/**
 * Plain objects of numbers. Channels follow the sorted key order, so two
 * records with the same keys always line up.
 */
export const recordCodec: ChannelCodec<Readonly<Record<string, number>>> = {
  typeOf(value) {
    const keys = Object.keys(value).sort();
    if (keys.some((k) => k.includes(','))) return undefined;
    return `record:${keys.join(',')}`;
  },
  unpack(value, type) {
    return recordKeys(type).map((k) => value[k] ?? 0);
  },
  pack(channels, type) {
    const out: Record<string, number> = {};
    recordKeys(type).forEach((k, i) => {
      out[k] = channels[i] ?? 0;
    });
    return out;
  },
};

/**
 * Channel-wise linear interpolation. Values the codec cannot decompose, or
 * values of different shapes, switch over at the halfway point.
 */
export function lerpWith<T>(codec: ChannelCodec<T>): Interpolate<T> {
  return (from, to, t) => {
    const type = codec.typeOf(from);
    if (type === undefined || type !== codec.typeOf(to)) {
      return t < 0.5 ? from : to;
    }
    const a = codec.unpack(from, type);
    const b = codec.unpack(to, type);
    return codec.pack(
      a.map((v, i) => v + ((b[i] ?? v) - v) * t),
      type
    );
  };
}

export const lerpNumber: Interpolate<number> = (from, to, t) =>
  from + (to - from) * t;
