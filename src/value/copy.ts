import { defineField, kindOf } from './kinds';

/**
 * Deep copy over the value model.
 *
 * Logic:
 * 1. Primitives and opaque values are returned as is.
 * 2. Containers are copied once each; the memo table keeps shared references
 *    shared and cycles cyclic in the copy.
 * 3. Records keep their prototype; frozen containers come back frozen.
 */
export function deepCopy(value: unknown): unknown {
  return copyValue(value, new Map());
}

function copyValue(value: unknown, memo: Map<object, unknown>): unknown {
  if (typeof value !== 'object' || value === null) return value;
  if (memo.has(value)) return memo.get(value);

  const kind = kindOf(value);
  let copy: object;

  if (value instanceof Uint8Array) {
    copy = value.slice();
    memo.set(value, copy);
    return copy;
  }

  if (Array.isArray(value)) {
    const target: unknown[] = [];
    memo.set(value, target);
    for (const element of value) target.push(copyValue(element, memo));
    copy = target;
  } else if (value instanceof Map) {
    const target = new Map<unknown, unknown>();
    memo.set(value, target);
    for (const [key, element] of value) {
      target.set(key, copyValue(element, memo));
    }
    copy = target;
  } else if (value instanceof Set) {
    const target = new Set<unknown>();
    memo.set(value, target);
    for (const member of value) target.add(copyValue(member, memo));
    copy = target;
  } else if (kind === 'mapping' || kind === 'record') {
    const target: Record<string, unknown> = Object.create(
      Object.getPrototypeOf(value)
    );
    memo.set(value, target);
    for (const [field, element] of Object.entries(value)) {
      defineField(target, field, copyValue(element, memo));
    }
    copy = target;
  } else {
    return value;
  }

  if (Object.isFrozen(value)) Object.freeze(copy);
  return copy;
}
