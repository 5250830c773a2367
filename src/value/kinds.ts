import {
  isArray,
  isBigInt,
  isBoolean,
  isNullish,
  isNumber,
  isObjectLike,
  isPlainObject,
  isString
} from '../utils/type-guards';

/**
 * Classification of every runtime value the engine can meet.
 *
 * Navigation and mutation dispatch on this tag instead of probing for
 * methods: only `sequence`, `mapping`, `set` and `record` have children.
 */
export type ValueKind =
  | 'null'
  | 'boolean'
  | 'number'
  | 'bigint'
  | 'string'
  | 'bytes'
  | 'sequence'
  | 'mapping'
  | 'set'
  | 'record'
  | 'other';

/** A keyed container: either a `Map` or a plain object. */
export type Mapping = Map<unknown, unknown> | Record<string, unknown>;

/**
 * Sentinel returned by lookups when the key, index or field is absent.
 *
 * Distinct from `undefined` so that a field explicitly holding `undefined`
 * is still found.
 */
export const MISSING = Symbol('keypath.missing');
export type Missing = typeof MISSING;

/**
 * The record type synthesised when an attribute path has to be built from
 * nothing. Any class instance works as a record; this one has no behaviour.
 */
export class FieldRecord {
  [field: string]: unknown;

  constructor(fields: Record<string, unknown> = {}) {
    for (const [name, value] of Object.entries(fields)) defineField(this, name, value);
  }
}

/**
 * Writes an own, enumerable data property. Unlike assignment, a new
 * `__proto__` key becomes a field and never reaches the prototype setter.
 */
export function defineField(target: object, name: string, value: unknown): void {
  if (Object.hasOwn(target, name)) {
    Reflect.set(target, name, value);
    return;
  }
  Object.defineProperty(target, name, {
    value,
    writable: true,
    enumerable: true,
    configurable: true
  });
}

/**
 * Objects that are opaque leaves even though they are class instances.
 */
function isOpaqueObject(value: object): boolean {
  return (
    value instanceof Date ||
    value instanceof RegExp ||
    value instanceof Promise ||
    value instanceof WeakMap ||
    value instanceof WeakSet ||
    value instanceof Error ||
    ArrayBuffer.isView(value)
  );
}

/**
 * Classifies a runtime value.
 *
 * Logic:
 * 1. Primitives map to their own kind; `undefined` joins `null`.
 * 2. `Uint8Array` is bytes; other typed arrays and built-ins are `other`.
 * 3. Arrays, `Map`s, `Set`s and plain objects are the structural kinds.
 * 4. Any remaining non-callable object is a field record.
 */
export function kindOf(value: unknown): ValueKind {
  if (isNullish(value)) return 'null';
  if (isBoolean(value)) return 'boolean';
  if (isNumber(value)) return 'number';
  if (isBigInt(value)) return 'bigint';
  if (isString(value)) return 'string';
  if (!isObjectLike(value)) return 'other';

  if (value instanceof Uint8Array) return 'bytes';
  if (isArray(value)) return 'sequence';
  if (value instanceof Map) return 'mapping';
  if (value instanceof Set) return 'set';
  if (isPlainObject(value)) return 'mapping';
  if (isOpaqueObject(value)) return 'other';

  return 'record';
}

/** Guard verifying the value is a `Map` or a plain object. */
export function isMapping(value: unknown): value is Mapping {
  return value instanceof Map || isPlainObject(value);
}

/**
 * Guard verifying the value is one of the container kinds.
 */
export function isContainer(value: unknown): value is object {
  switch (kindOf(value)) {
    case 'sequence':
    case 'mapping':
    case 'set':
    case 'record':
      return true;
    default:
      return false;
  }
}

/**
 * Whether a container supports destructive update.
 *
 * Frozen containers are copy-on-write: every mutation builds a new, equally
 * frozen value that the caller must substitute into the parent.
 */
export function isMutable(value: object): boolean {
  return !Object.isFrozen(value);
}

/**
 * Human-readable kind name used in error messages.
 */
export function describeKind(value: unknown): string {
  const kind = kindOf(value);
  if (kind === 'record' && isObjectLike(value)) {
    const name = value.constructor?.name;
    return name ? `record ${name}` : 'record';
  }
  return kind;
}
