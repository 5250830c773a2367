import { TransformError } from '../errors';
import { kindOf } from '../value/kinds';
import { isBoolean, isNumber, isString } from '../utils/type-guards';
import type { TransformFn } from './transforms';

/**
 * Trailing argument that turns a failed conversion into a thrown
 * {@link TransformError} instead of passing the input through.
 */
const RAISES = 'raises';

const INTEGER_TEXT = /^[-+]?[0-9]+$/;

const DIGITS = '0123456789abcdefghijklmnopqrstuvwxyz';

/**
 * Result of a conversion attempt; `ok: false` carries the reason.
 */
type Conversion = { ok: true; value: unknown } | { ok: false; reason: string };

const fail = (reason: string): Conversion => ({ ok: false, reason });
const done = (value: unknown): Conversion => ({ ok: true, value });

/**
 * Wraps a conversion so that failure returns the input unchanged, unless the
 * trailing modes contain `raises`.
 */
function conversion(
  name: string,
  convert: (value: unknown, args: readonly unknown[]) => Conversion
): TransformFn {
  return (value, ...args) => {
    const result = convert(value, args);
    if (result.ok) return result.value;
    if (args.includes(RAISES)) {
      throw new TransformError('TRANSFORM_FAILED', name, result.reason);
    }
    return value;
  };
}

/**
 * `%s`, `%d` and `%%` substitution.
 */
function formatValue(format: string, value: unknown): Conversion {
  let failed = false;
  const text = format.replace(/%([sdf%])/g, (_, spec: string) => {
    if (spec === '%') return '%';
    if (spec === 's') return String(value);
    if (!isNumber(value)) {
      failed = true;
      return '';
    }
    return spec === 'd' ? String(Math.trunc(value)) : String(value);
  });
  return failed ? fail(`cannot format ${kindOf(value)} with '${format}'`) : done(text);
}

function toInteger(value: unknown, base: unknown): Conversion {
  if (base !== undefined && base !== null && base !== '') {
    const radix = Number(base) || 10;
    const text = String(value).trim().toLowerCase();
    const body = text.replace(/^[-+]/, '');
    const allowed = DIGITS.slice(0, radix);
    if (body.length === 0 || [...body].some((c) => !allowed.includes(c))) {
      return fail(`invalid literal for base ${radix}: '${String(value)}'`);
    }
    return done(parseInt(text, radix));
  }
  if (isNumber(value)) {
    return Number.isFinite(value)
      ? done(Math.trunc(value))
      : fail(`cannot convert ${value} to integer`);
  }
  if (isBoolean(value)) return done(value ? 1 : 0);
  if (isString(value) && INTEGER_TEXT.test(value.trim())) {
    return done(Number(value.trim()));
  }
  return fail(`invalid literal for int: '${String(value)}'`);
}

function toFloat(value: unknown): Conversion {
  if (isNumber(value)) return done(value);
  if (isBoolean(value)) return done(value ? 1 : 0);
  if (isString(value)) {
    const text = value.trim().toLowerCase();
    if (text === 'inf' || text === '+inf' || text === 'infinity') return done(Infinity);
    if (text === '-inf' || text === '-infinity') return done(-Infinity);
    if (text === 'nan') return done(NaN);
    const parsed = Number(text);
    if (text.length > 0 && !Number.isNaN(parsed)) return done(parsed);
  }
  return fail(`could not convert to float: '${String(value)}'`);
}

function stripChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text.charAt(start))) start++;
  while (end > start && chars.includes(text.charAt(end - 1))) end--;
  return text.slice(start, end);
}

/**
 * Elements of an iterable value, the way a list conversion sees them:
 * mappings contribute their keys.
 */
function elementsOf(value: unknown): Conversion {
  if (isString(value)) return done([...value]);
  if (value instanceof Uint8Array) return done([...value]);
  if (Array.isArray(value)) return done([...value]);
  if (value instanceof Set) return done([...value]);
  if (value instanceof Map) return done([...value.keys()]);
  if (kindOf(value) === 'mapping' && typeof value === 'object' && value !== null) {
    return done(Object.keys(value));
  }
  return fail(`${kindOf(value)} is not iterable`);
}

function lengthOf(value: unknown): number | undefined {
  if (isString(value) || Array.isArray(value) || value instanceof Uint8Array) {
    return value.length;
  }
  if (value instanceof Map || value instanceof Set) return value.size;
  if (kindOf(value) === 'mapping' && typeof value === 'object' && value !== null) {
    return Object.keys(value).length;
  }
  return undefined;
}

function isFalsy(value: unknown): boolean {
  if (Array.isArray(value) || isString(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;
  return !value;
}

/**
 * The transforms every registry starts with.
 */
export const builtinTransforms: Readonly<Record<string, TransformFn>> = {
  str: conversion('str', (value, [format]) =>
    isString(format) && format.length > 0
      ? formatValue(format, value)
      : done(value instanceof Uint8Array ? new TextDecoder().decode(value) : String(value))
  ),

  int: conversion('int', (value, [base]) => toInteger(value, base)),

  float: conversion('float', (value) => toFloat(value)),

  none: (value, ...noneValues) => {
    if (noneValues.length === 0) return isFalsy(value) ? null : value;
    return noneValues.includes(value) ? null : value;
  },

  strip: conversion('strip', (value, [chars]) => {
    if (!isString(value)) return fail(`${kindOf(value)} has no strip`);
    return done(isString(chars) && chars.length > 0 ? stripChars(value, chars) : value.trim());
  }),

  len: (value, fallback) => {
    const length = lengthOf(value);
    if (length !== undefined) return length;
    if (fallback !== undefined && fallback !== null) return fallback;
    throw new TransformError('TRANSFORM_FAILED', 'len', `${kindOf(value)} has no length`);
  },

  lowercase: conversion('lowercase', (value) =>
    isString(value) ? done(value.toLowerCase()) : fail(`${kindOf(value)} has no lowercase`)
  ),

  uppercase: conversion('uppercase', (value) =>
    isString(value) ? done(value.toUpperCase()) : fail(`${kindOf(value)} has no uppercase`)
  ),

  add: (value, rhs) => {
    if (isNumber(value) && isNumber(rhs)) return value + rhs;
    if (isString(value) && isString(rhs)) return value + rhs;
    if (Array.isArray(value) && Array.isArray(rhs)) return [...value, ...rhs];
    throw new TransformError(
      'TRANSFORM_FAILED',
      'add',
      `cannot add ${kindOf(rhs)} to ${kindOf(value)}`
    );
  },

  list: conversion('list', (value) => elementsOf(value)),

  tuple: conversion('tuple', (value) => {
    const result = elementsOf(value);
    return result.ok && Array.isArray(result.value)
      ? done(Object.freeze(result.value))
      : result;
  }),

  set: conversion('set', (value) => {
    const result = elementsOf(value);
    return result.ok && Array.isArray(result.value) ? done(new Set(result.value)) : result;
  })
};
