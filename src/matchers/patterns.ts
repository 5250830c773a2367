import { isBigInt, isBoolean, isNumber, isString } from '../utils/type-guards';
import { Matcher } from './base';
import { Const } from './literals';

/** `*`: every candidate. */
export class Wildcard extends Matcher {
  readonly value: string = '*';

  isPattern(): boolean {
    return true;
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    return [...candidates];
  }

  matchable(other: Matcher, specials = false): boolean {
    return other instanceof Const || specials;
  }

  render(): string {
    return '*';
  }
}

/** `*?`: the first candidate only. */
export class WildcardFirst extends Wildcard {
  readonly value: string = '*?';

  matches(candidates: Iterable<unknown>): unknown[] {
    for (const candidate of candidates) return [candidate];
    return [];
  }

  matchable(other: Matcher, specials = false): boolean {
    if (other instanceof Const) return true;
    return (
      specials &&
      (other instanceof Special ||
        other instanceof WildcardFirst ||
        other instanceof RegexFirst)
    );
  }

  render(): string {
    return '*?';
  }
}

/**
 * Text a regex candidate is tested as; containers and other objects have
 * none and never match.
 */
function candidateText(candidate: unknown): string | undefined {
  if (isString(candidate)) return candidate;
  if (isNumber(candidate) || isBigInt(candidate) || isBoolean(candidate)) {
    return String(candidate);
  }
  return undefined;
}

/**
 * `/pattern/`: candidates whose text form the pattern matches in full.
 * Matched candidates are returned as they were, not as their text.
 */
export class RegexMatcher extends Matcher {
  readonly source: string;
  readonly flags: string;
  readonly value: string;
  private readonly compiled: RegExp;

  constructor(source: string, flags = '', marker = '') {
    super();
    this.source = source;
    this.flags = flags.replace(/[gy]/g, '');
    this.value = `/${source}/${marker}`;
    this.compiled = new RegExp(`^(?:${source})$`, this.flags);
  }

  isPattern(): boolean {
    return true;
  }

  /** Full-match test for one candidate. */
  test(candidate: unknown): boolean {
    const text = candidateText(candidate);
    return text !== undefined && this.compiled.test(text);
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    const out: unknown[] = [];
    for (const candidate of candidates) {
      if (this.test(candidate)) out.push(candidate);
    }
    return out;
  }

  matchable(other: Matcher, specials = false): boolean {
    if (other instanceof Const) return true;
    return specials && (other instanceof Special || other instanceof RegexMatcher);
  }

  render(): string {
    return this.value;
  }
}

/** `/pattern/?`: the first full match only. */
export class RegexFirst extends RegexMatcher {
  constructor(source: string, flags = '') {
    super(source, flags, '?');
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    for (const candidate of candidates) {
      if (this.test(candidate)) return [candidate];
    }
    return [];
  }

  matchable(other: Matcher, specials = false): boolean {
    if (other instanceof Const) return true;
    return specials && (other instanceof Special || other instanceof RegexFirst);
  }
}

/** Appender tokens: `+` appends, `+?` appends when absent. */
export type SpecialToken = '+' | '+?';

/**
 * A token with structural meaning rather than a key.
 */
export class Special extends Matcher {
  readonly value: SpecialToken;

  constructor(value: SpecialToken) {
    super();
    this.value = value;
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    const out: unknown[] = [];
    for (const candidate of candidates) {
      if (candidate === this.value) out.push(candidate);
    }
    return out;
  }

  matchable(other: Matcher): boolean {
    return other instanceof Special;
  }

  render(): string {
    return this.value;
  }
}
