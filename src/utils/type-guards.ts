export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
};

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/**
 * Guard verifying the value is `null` or `undefined`.
 *
 * Both represent the null kind of the value model; `undefined` shows up for
 * holes and unset record fields.
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Guard verifying the value is an integral number usable as a sequence index.
 *
 * Semantics:
 * - true  for:  0, 1, -1, 2 ** 40
 * - false for:  1.5, NaN, Infinity, '1', 1n
 */
export function isIndex(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value);
}

/**
 * Guard verifying the value is a plain object (prototype is `Object.prototype`
 * or `null`).
 *
 * Class instances are excluded: they are treated as field records, not
 * mappings.
 */
export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/** Guard verifying the value is a non-null object (arrays included). */
export function isObjectLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/** Guard verifying the value is an array. */
export function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}
