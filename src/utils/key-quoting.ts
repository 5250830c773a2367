import { isBigInt, isBoolean, isNullish, isNumber, isString } from './type-guards';

/**
 * Rendering keys into path notation
 * ---------------------------------
 * Rendered paths (from `expand`, `pluck`, `walk` and `assemble`) must read
 * back as the same key. Keys are rendered bare when the notation can carry
 * them unambiguously and single-quoted otherwise.
 *
 * Examples:
 * - `'hello'`  -> `hello`
 * - `'a.b'`    -> `'a.b'`
 * - `7`        -> `7`
 * - `1.5`      -> `#'1.5'` as a key, `1.5` as a value
 * - `'7'`      -> `'7'` in normal form (keeps string vs number apart)
 */

/** Characters with meaning in the notation. */
const RESERVED = new Set('.[]*:|+?/=,@&()!~#{}');

/** Characters that force quoting in addition to {@link RESERVED}. */
const WHITESPACE = new Set(' \t\n\r');

/**
 * Numeric spellings the notation reads as numbers without quotes.
 */
const NUMERIC_FORMS = [
  /^-?0[xX][0-9a-fA-F]+$/,
  /^-?0[oO][0-7]+$/,
  /^-?0[bB][01]+$/,
  /^-?[0-9][0-9_]*[eE][+-]?[0-9]+$/,
  /^-?[0-9]+(?:_[0-9]+)+$/,
  /^-?[0-9]+$/
];

const INTEGER_TEXT = /^\s*[-+]?[0-9]+\s*$/;

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

/**
 * Whether a string key must be quoted to survive rendering.
 */
export function needsQuoting(text: string): boolean {
  if (text.length === 0) return true;
  if (isDigit(text[0]) || (text[0] === '-' && isDigit(text[1]))) {
    return !NUMERIC_FORMS.some((form) => form.test(text));
  }
  for (const char of text) {
    if (RESERVED.has(char) || WHITESPACE.has(char)) return true;
  }
  return false;
}

/** Wraps text in single quotes, escaping backslashes and single quotes. */
export function quoteText(text: string): string {
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Renders a key for a path.
 *
 * @param key    The raw key.
 * @param asKey  Whether the key sits in key position; non-integral numbers
 *               then take the quoted-float form.
 */
export function quoteKey(key: unknown, asKey = true): string {
  if (isString(key)) return needsQuoting(key) ? quoteText(key) : key;
  if (isNumber(key)) {
    const text = String(key);
    if (Number.isInteger(key) || !Number.isFinite(key)) return text;
    return asKey ? `#'${text}'` : text;
  }
  if (isBigInt(key)) return String(key);
  if (isBoolean(key)) return String(key);
  if (isNullish(key)) return 'null';
  return quoteText(String(key));
}

/**
 * Renders a key in normal form: like {@link quoteKey}, but string keys that
 * read as integers are quoted so they stay strings.
 */
export function normalizeKey(key: unknown, asKey = true): string {
  if (isString(key) && INTEGER_TEXT.test(key)) return quoteText(key);
  return quoteKey(key, asKey);
}
