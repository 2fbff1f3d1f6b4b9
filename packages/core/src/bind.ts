import type { BindingAdapter, BindingEffect } from './types';

/** Assigns through `Reflect.set`, honouring setters on the prototype chain. */
export const reflectBindingAdapter: BindingAdapter = {
  apply(target, key, value) {
    if (!Reflect.set(target, key, value)) {
      throw new Error(`BindingAdapter: could not assign ${String(key)}`);
    }
  },
};

function findDescriptor(
  target: object,
  key: PropertyKey
): PropertyDescriptor | undefined {
  let proto: object | null = target;
  while (proto) {
    const d = Object.getOwnPropertyDescriptor(proto, key);
    if (d) return d;
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
}

export function assertBindable(
  target: unknown,
  key: PropertyKey
): asserts target is object {
  if ((typeof target !== 'object' && typeof target !== 'function') || target === null) {
    throw new Error(`Graph.bind: target for "${String(key)}" is not an object`);
  }
  const d = findDescriptor(target, key);
  if (!d) {
    throw new Error(`Graph.bind: property "${String(key)}" not found on target`);
  }
  if (!d.writable && !d.set) {
    throw new Error(`Graph.bind: property "${String(key)}" is read-only`);
  }
  if (Object.isFrozen(target) && d.writable) {
    throw new Error(`Graph.bind: target for "${String(key)}" is frozen`);
  }
}

export function createBinding(
  adapter: BindingAdapter,
  read: () => unknown,
  target: object,
  key: PropertyKey
): BindingEffect {
  return (update) => adapter.apply(target, key, read(), update);
}
