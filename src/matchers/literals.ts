import { normalizeKey, quoteKey, quoteText } from '../utils/key-quoting';
import { isNullish, isNumber, isString } from '../utils/type-guards';
import { Matcher } from './base';

/**
 * Literal matcher: accepts candidates strictly equal to its value.
 */
export class Const extends Matcher {
  readonly value: unknown;

  constructor(value: unknown) {
    super();
    this.value = value;
  }

  /** Equality test for one candidate. */
  protected accepts(candidate: unknown): boolean {
    return candidate === this.value;
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    const out: unknown[] = [];
    for (const candidate of candidates) {
      if (this.accepts(candidate)) out.push(candidate);
    }
    return out;
  }

  matchable(other: Matcher): boolean {
    return other instanceof Const;
  }

  render(): string {
    return quoteKey(this.value, false);
  }
}

/**
 * Numeric literal.
 *
 * JavaScript numbers have one numeric domain, so `7` and `7.0` are the same
 * key. The quoted-float form only affects rendering: it renders as
 * `#'1.5'` so a rendered path reads back as a float key.
 */
export class Numeric extends Const {
  declare readonly value: number;
  readonly quoted: boolean;

  constructor(value: number, quoted = false) {
    super(value);
    this.quoted = quoted;
  }

  /**
   * Also accepts the canonical decimal property name, which is how plain
   * objects and records store numeric keys.
   */
  matchKeys(keys: Iterable<unknown>): unknown[] {
    const name = String(this.value);
    const out: unknown[] = [];
    for (const key of keys) {
      if (key === this.value || (isString(key) && key === name)) out.push(key);
    }
    return out;
  }

  render(): string {
    if (this.quoted) return `#'${this.value}'`;
    return quoteKey(this.value, true);
  }
}

/** Bare word literal (`hello`). */
export class Word extends Const {
  declare readonly value: string;

  constructor(value: string) {
    super(value);
  }

  render(): string {
    return normalizeKey(this.value);
  }
}

/** Quoted string literal (`'hello world'`). */
export class Str extends Const {
  declare readonly value: string;

  constructor(value: string) {
    super(value);
  }

  render(): string {
    return quoteText(this.value);
  }
}

/** Byte-string literal, compared element-wise. */
export class BytesMatcher extends Const {
  declare readonly value: Uint8Array;

  constructor(value: Uint8Array) {
    super(value);
  }

  protected accepts(candidate: unknown): boolean {
    if (!(candidate instanceof Uint8Array)) return false;
    if (candidate.length !== this.value.length) return false;
    return candidate.every((byte, i) => byte === this.value[i]);
  }

  render(): string {
    const text = Array.from(this.value, (byte) =>
      byte >= 0x20 && byte < 0x7f && byte !== 0x27 && byte !== 0x5c
        ? String.fromCharCode(byte)
        : `\\x${byte.toString(16).padStart(2, '0')}`
    ).join('');
    return `b'${text}'`;
  }
}

export class BooleanMatcher extends Const {
  declare readonly value: boolean;

  constructor(value: boolean) {
    super(value);
  }

  render(): string {
    return this.value ? 'true' : 'false';
  }
}

/** Accepts `null` and `undefined`. */
export class NullMatcher extends Const {
  declare readonly value: null;

  constructor() {
    super(null);
  }

  protected accepts(candidate: unknown): boolean {
    return isNullish(candidate);
  }

  render(): string {
    return 'null';
  }
}

/**
 * Builds the literal matcher for a plain value.
 *
 * - number   -> {@link Numeric}
 * - string   -> {@link Word}
 * - boolean  -> {@link BooleanMatcher}
 * - nullish  -> {@link NullMatcher}
 * - bytes    -> {@link BytesMatcher}
 * - other    -> {@link Const}
 */
export function literal(value: unknown): Const {
  if (isNumber(value)) return new Numeric(value);
  if (isString(value)) return new Word(value);
  if (typeof value === 'boolean') return new BooleanMatcher(value);
  if (isNullish(value)) return new NullMatcher();
  if (value instanceof Uint8Array) return new BytesMatcher(value);
  return new Const(value);
}
