import { StructuralTypeError } from '../errors';
import { isIndex, isNumber, isObjectLike, isString } from '../utils/type-guards';
import { defineField, describeKind, isMutable, kindOf, MISSING, type Missing } from './kinds';

/** A `(key, value)` pair produced by container enumeration. */
export type Entry = readonly [key: unknown, value: unknown];

/**
 * Normalises a key for a string-keyed container (plain object or record).
 * Numbers address their canonical decimal property name.
 *
 * @returns The property name, or `undefined` when the key cannot name one.
 */
export function propertyName(key: unknown): string | undefined {
  if (isString(key)) return key;
  if (isNumber(key) && Number.isFinite(key)) return String(key);
  return undefined;
}

/**
 * Resolves a possibly negative sequence index against a length.
 *
 * @returns The non-negative index, or `undefined` when it is not an integer
 *   or a negative index reaches before the start.
 */
export function resolveIndex(key: unknown, length: number): number | undefined {
  if (!isIndex(key)) return undefined;
  const index = key < 0 ? length + key : key;
  return index < 0 ? undefined : index;
}

/** Copies an object's own enumerable fields onto a fresh object of the same prototype. */
function cloneFields(node: object): Record<string, unknown> {
  const copy: Record<string, unknown> = Object.create(
    Object.getPrototypeOf(node)
  );
  for (const [name, value] of Object.entries(node)) defineField(copy, name, value);
  return copy;
}

/**
 * Enumerates the children of a container in a stable order.
 *
 * - sequence: `(index, element)`
 * - mapping:  `(key, value)` in insertion order
 * - record:   `(field, value)` for own enumerable fields
 * - anything else has no children
 */
export function entries(node: unknown): Entry[] {
  switch (kindOf(node)) {
    case 'sequence':
      return Array.isArray(node) ? node.map((v, i): Entry => [i, v]) : [];
    case 'mapping':
      if (node instanceof Map) return [...node.entries()];
      return isObjectLike(node) ? Object.entries(node) : [];
    case 'record':
      return isObjectLike(node) ? Object.entries(node) : [];
    default:
      return [];
  }
}

/**
 * Reads one child.
 *
 * @returns The child value, or {@link MISSING} when absent.
 */
export function lookup(node: unknown, key: unknown): unknown {
  if (Array.isArray(node)) {
    const index = resolveIndex(key, node.length);
    return index !== undefined && index < node.length ? node[index] : MISSING;
  }
  if (node instanceof Map) {
    return node.has(key) ? node.get(key) : MISSING;
  }
  const kind = kindOf(node);
  if ((kind === 'mapping' || kind === 'record') && isObjectLike(node)) {
    const name = propertyName(key);
    if (name === undefined || !Object.hasOwn(node, name)) return MISSING;
    return Reflect.get(node, name);
  }
  return MISSING;
}

/** Narrowing helper for callers of {@link lookup}. */
export function isMissing(value: unknown): value is Missing {
  return value === MISSING;
}

/**
 * Writes one child.
 *
 * Logic:
 * 1. Sequences: a negative index counts from the end; an index at or beyond
 *    the end pads with `null` before writing.
 * 2. Mappings and records: the key is written (numbers become property names
 *    on plain objects and records).
 * 3. Mutable containers are changed in place and returned; frozen ones are
 *    rebuilt with the change and returned frozen.
 *
 * @throws {StructuralTypeError} When `node` has no keyed, indexed or field
 *   capability.
 */
export function assign(node: unknown, key: unknown, value: unknown): unknown {
  if (Array.isArray(node)) {
    const index = resolveIndex(key, node.length);
    if (index === undefined) return node;
    const target = isMutable(node) ? node : [...node];
    while (target.length < index) target.push(null);
    target[index] = value;
    return target === node ? node : Object.freeze(target);
  }

  if (node instanceof Map) {
    if (isMutable(node)) {
      node.set(key, value);
      return node;
    }
    return Object.freeze(new Map(node).set(key, value));
  }

  const kind = kindOf(node);
  if ((kind === 'mapping' || kind === 'record') && isObjectLike(node)) {
    const name = propertyName(key);
    if (name === undefined) {
      throw new StructuralTypeError(
        String(key),
        `${describeKind(node)} with key ${typeof key}`
      );
    }
    if (isMutable(node)) {
      defineField(node, name, value);
      return node;
    }
    const copy = cloneFields(node);
    defineField(copy, name, value);
    return Object.freeze(copy);
  }

  throw new StructuralTypeError(String(key), describeKind(node));
}

/**
 * Deletes one child, following the same mutability rule as {@link assign}.
 * Absent keys leave the container untouched.
 */
export function discard(node: unknown, key: unknown): unknown {
  if (Array.isArray(node)) {
    const index = resolveIndex(key, node.length);
    if (index === undefined || index >= node.length) return node;
    if (isMutable(node)) {
      node.splice(index, 1);
      return node;
    }
    return Object.freeze(node.filter((_, i) => i !== index));
  }

  if (node instanceof Map) {
    if (!node.has(key)) return node;
    if (isMutable(node)) {
      node.delete(key);
      return node;
    }
    const copy = new Map(node);
    copy.delete(key);
    return Object.freeze(copy);
  }

  if (node instanceof Set) {
    if (!node.has(key)) return node;
    if (isMutable(node)) {
      node.delete(key);
      return node;
    }
    const copy = new Set(node);
    copy.delete(key);
    return Object.freeze(copy);
  }

  const kind = kindOf(node);
  if ((kind === 'mapping' || kind === 'record') && isObjectLike(node)) {
    const name = propertyName(key);
    if (name === undefined || !Object.hasOwn(node, name)) return node;
    if (isMutable(node)) {
      Reflect.deleteProperty(node, name);
      return node;
    }
    const copy = cloneFields(node);
    delete copy[name];
    return Object.freeze(copy);
  }

  return node;
}

/**
 * Appends to a sequence or adds to a set.
 *
 * @throws {StructuralTypeError} For any other kind.
 */
export function append(node: unknown, value: unknown): unknown {
  if (Array.isArray(node)) {
    if (isMutable(node)) {
      node.push(value);
      return node;
    }
    return Object.freeze([...node, value]);
  }
  if (node instanceof Set) {
    if (isMutable(node)) {
      node.add(value);
      return node;
    }
    return Object.freeze(new Set(node).add(value));
  }
  throw new StructuralTypeError('+', describeKind(node));
}

/**
 * Replaces the full contents of a sequence.
 *
 * A mutable array keeps its identity; a frozen one is replaced.
 */
export function replaceElements(node: unknown[], elements: unknown[]): unknown {
  if (isMutable(node)) {
    node.splice(0, node.length, ...elements);
    return node;
  }
  return Object.freeze([...elements]);
}
