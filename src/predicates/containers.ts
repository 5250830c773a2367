import type { Bindings } from '../engine/scope';
import { Matcher, type ValuePattern } from '../matchers/base';
import { RegexMatcher } from '../matchers/patterns';
import type { TransformRegistry } from '../path/transforms';
import { quoteText } from '../utils/key-quoting';
import { isString } from '../utils/type-guards';
import { entries } from '../value/containers';
import { isMapping } from '../value/kinds';

/**
 * Whether `value` satisfies an element pattern; `undefined` accepts
 * anything.
 */
function elementMatches(pattern: ValuePattern | undefined, value: unknown): boolean {
  return pattern === undefined || pattern.matches([value]).length > 0;
}

/** Key-side variant of {@link elementMatches}, honouring numeric property names. */
function keyMatches(pattern: ValuePattern | undefined, key: unknown): boolean {
  if (pattern instanceof Matcher) return pattern.matchKeys([key]).length > 0;
  return elementMatches(pattern, key);
}

/**
 * `...`: zero or more elements, each optionally constrained by a pattern,
 * with optional count bounds.
 */
export class Glob {
  readonly pattern: ValuePattern | undefined;
  readonly min: number;
  readonly max: number | undefined;

  constructor(pattern?: ValuePattern, min = 0, max?: number) {
    this.pattern = pattern;
    this.min = min;
    this.max = max;
  }

  accepts(value: unknown): boolean {
    return elementMatches(this.pattern, value);
  }

  /** Upper bound on how many of `available` elements this glob may take. */
  limit(available: number): number {
    return Math.min(this.max ?? available, available);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): Glob {
    if (this.pattern === undefined) return this;
    return new Glob(this.pattern.resolve(bindings, partial, registry), this.min, this.max);
  }

  render(): string {
    let text = '...';
    if (this.pattern !== undefined) text += this.pattern.render();
    if (this.min !== 0 || this.max !== undefined) {
      if (this.min === 0) text += String(this.max);
      else if (this.max === undefined) text += `${this.min}:`;
      else text += `${this.min}:${this.max}`;
    }
    return text;
  }
}

/** A mapping-pattern entry matched by exactly one actual entry. */
export type MappingEntry = {
  readonly key: ValuePattern;
  readonly value: ValuePattern;
};

/**
 * Glob entry of a mapping pattern: the key side is a {@link Glob}, the value
 * side an optional pattern every covered value must satisfy.
 */
export class MappingGlobEntry {
  readonly keys: Glob;
  readonly value: ValuePattern | undefined;

  constructor(keys: Glob, value?: ValuePattern) {
    this.keys = keys;
    this.value = value;
  }

  accepts(key: unknown, value: unknown): boolean {
    return this.keys.accepts(key) && elementMatches(this.value, value);
  }

  resolve(
    bindings: Bindings,
    partial: boolean,
    registry: TransformRegistry
  ): MappingGlobEntry {
    return new MappingGlobEntry(
      this.keys.resolve(bindings, partial, registry),
      this.value?.resolve(bindings, partial, registry)
    );
  }

  render(): string {
    const keys = this.keys.render();
    return this.value === undefined ? keys : `${keys}: ${this.value.render()}`;
  }
}

/**
 * Enumerates the `size`-element combinations of `items`, in order.
 */
function* combinations<T>(items: readonly T[], size: number, start = 0): Generator<T[]> {
  if (size === 0) {
    yield [];
    return;
  }
  for (let i = start; i <= items.length - size; i++) {
    for (const rest of combinations(items, size - 1, i + 1)) {
      yield [items[i], ...rest];
    }
  }
}

/**
 * Bounds and eligibility of one glob during partitioning.
 */
type PartitionGlob<T> = {
  readonly min: number;
  readonly max: number | undefined;
  readonly accepts: (item: T) => boolean;
};

/**
 * Checks the leftovers against one glob: all must be accepted and their
 * count must lie within bounds.
 */
function coversAll<T>(glob: PartitionGlob<T>, remaining: readonly T[]): boolean {
  if (!remaining.every(glob.accepts)) return false;
  if (remaining.length < glob.min) return false;
  return glob.max === undefined || remaining.length <= glob.max;
}

/**
 * Backtracking partition of `remaining` among `globs`: each glob takes an
 * admissible subset of the items it accepts, and nothing may be left over.
 */
function partition<T>(
  globs: readonly PartitionGlob<T>[],
  index: number,
  remaining: readonly T[]
): boolean {
  if (index === globs.length) return remaining.length === 0;

  const glob = globs[index];
  const eligible = remaining.filter(glob.accepts);
  if (eligible.length < glob.min) return false;

  const hi = Math.min(glob.max ?? remaining.length, remaining.length, eligible.length);
  for (let count = glob.min; count <= hi; count++) {
    for (const taken of combinations(eligible, count)) {
      const chosen = new Set(taken);
      const leftover = remaining.filter((item) => !chosen.has(item));
      if (partition(globs, index + 1, leftover)) return true;
    }
  }
  return false;
}

/**
 * Leftover handling shared by mapping and set patterns.
 *
 * - no globs:   nothing may be left over
 * - one glob:   every leftover must be accepted, count within bounds
 * - many globs: partitioned by {@link partition}
 */
function matchLeftovers<T>(globs: readonly PartitionGlob<T>[], remaining: readonly T[]): boolean {
  if (globs.length === 0) return remaining.length === 0;
  if (globs.length === 1) return coversAll(globs[0], remaining);
  return partition(globs, 0, remaining);
}

/**
 * Sequence pattern: `[1, ..., 3]`.
 *
 * Literal elements consume exactly one element; globs consume a run whose
 * length is chosen by backtracking.
 */
export class SequencePattern implements ValuePattern {
  readonly elements: readonly (ValuePattern | Glob)[];

  constructor(elements: readonly (ValuePattern | Glob)[]) {
    this.elements = elements;
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    const out: unknown[] = [];
    for (const candidate of candidates) {
      if (Array.isArray(candidate) && this.matchFrom(candidate, 0, 0)) {
        out.push(candidate);
      }
    }
    return out;
  }

  /**
   * Logic:
   * 1. Pattern exhausted: succeed only when the actual is exhausted too.
   * 2. Glob: measure the run of accepted elements, then try each length from
   *    the glob's minimum up to that run (capped by its maximum).
   * 3. Element: consume one actual element if it matches.
   */
  private matchFrom(actual: readonly unknown[], ei: number, ai: number): boolean {
    if (ei === this.elements.length) return ai === actual.length;

    const element = this.elements[ei];
    const available = actual.length - ai;

    if (element instanceof Glob) {
      if (element.min > available) return false;
      const hi = element.limit(available);
      let run = 0;
      while (run < hi && element.accepts(actual[ai + run])) run++;
      for (let count = element.min; count <= run; count++) {
        if (this.matchFrom(actual, ei + 1, ai + count)) return true;
      }
      return false;
    }

    if (available <= 0) return false;
    return (
      elementMatches(element, actual[ai]) && this.matchFrom(actual, ei + 1, ai + 1)
    );
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): SequencePattern {
    return new SequencePattern(
      this.elements.map((element) => element.resolve(bindings, partial, registry))
    );
  }

  render(): string {
    return `[${this.elements.map((element) => element.render()).join(', ')}]`;
  }
}

/**
 * Mapping pattern: `{key: value, ...: *}` over `Map`s and plain objects.
 */
export class MappingPattern implements ValuePattern {
  readonly entries: readonly (MappingEntry | MappingGlobEntry)[];

  constructor(entries: readonly (MappingEntry | MappingGlobEntry)[]) {
    this.entries = entries;
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    const out: unknown[] = [];
    for (const candidate of candidates) {
      if (isMapping(candidate) && this.matchMapping(candidate)) out.push(candidate);
    }
    return out;
  }

  /**
   * Logic:
   * 1. Each concrete entry claims the first unclaimed actual entry whose key
   *    and value both match; a concrete entry without a claim fails.
   * 2. The unclaimed entries go to {@link matchLeftovers}.
   */
  private matchMapping(candidate: unknown): boolean {
    const actual = entries(candidate);
    const claimed = new Set<number>();
    const globs: PartitionGlob<number>[] = [];

    for (const entry of this.entries) {
      if (entry instanceof MappingGlobEntry) {
        globs.push({
          min: entry.keys.min,
          max: entry.keys.max,
          accepts: (i) => entry.accepts(actual[i][0], actual[i][1])
        });
        continue;
      }
      const index = actual.findIndex(
        ([key, value], i) =>
          !claimed.has(i) && keyMatches(entry.key, key) && elementMatches(entry.value, value)
      );
      if (index < 0) return false;
      claimed.add(index);
    }

    const remaining = actual.map((_, i) => i).filter((i) => !claimed.has(i));
    return matchLeftovers(globs, remaining);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): MappingPattern {
    return new MappingPattern(
      this.entries.map((entry) =>
        entry instanceof MappingGlobEntry
          ? entry.resolve(bindings, partial, registry)
          : {
              key: entry.key.resolve(bindings, partial, registry),
              value: entry.value.resolve(bindings, partial, registry)
            }
      )
    );
  }

  render(): string {
    const parts = this.entries.map((entry) =>
      entry instanceof MappingGlobEntry
        ? entry.render()
        : `${entry.key.render()}: ${entry.value.render()}`
    );
    return `{${parts.join(', ')}}`;
  }
}

/**
 * Set pattern: `{1, 2, ...}` over `Set`s.
 */
export class SetPattern implements ValuePattern {
  readonly elements: readonly (ValuePattern | Glob)[];

  constructor(elements: readonly (ValuePattern | Glob)[]) {
    this.elements = elements;
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    const out: unknown[] = [];
    for (const candidate of candidates) {
      if (candidate instanceof Set && this.matchSet([...candidate])) out.push(candidate);
    }
    return out;
  }

  private matchSet(members: readonly unknown[]): boolean {
    const remaining = new Set(members.map((_, i) => i));
    const globs: PartitionGlob<number>[] = [];

    for (const element of this.elements) {
      if (element instanceof Glob) {
        globs.push({
          min: element.min,
          max: element.max,
          accepts: (i) => element.accepts(members[i])
        });
        continue;
      }
      const index = [...remaining].find((i) => elementMatches(element, members[i]));
      if (index === undefined) return false;
      remaining.delete(index);
    }

    return matchLeftovers(globs, [...remaining]);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): SetPattern {
    return new SetPattern(
      this.elements.map((element) => element.resolve(bindings, partial, registry))
    );
  }

  render(): string {
    return `{${this.elements.map((element) => element.render()).join(', ')}}`;
  }
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

/**
 * Regex fragment for one glob span: the inner regex (when the glob carries
 * one) as the unit, `.` otherwise, quantified by the glob's bounds.
 */
function globFragment(glob: Glob): string {
  const unit =
    glob.pattern instanceof RegexMatcher ? `(?:${glob.pattern.source})` : '.';
  if (glob.min === 0 && glob.max === undefined) return `${unit}*`;
  if (glob.min === 0) return `${unit}{0,${glob.max}}`;
  if (glob.max === undefined) return `${unit}{${glob.min},}`;
  return `${unit}{${glob.min},${glob.max}}`;
}

/** Reads bytes as a latin-1 string, one character per byte. */
function latin1(bytes: Uint8Array): string {
  let text = '';
  for (const byte of bytes) text += String.fromCharCode(byte);
  return text;
}

/**
 * String glob: `'hello'...'world'`. Literal fragments and glob spans compile
 * to one anchored regular expression; matching is full-string.
 */
export class StringGlob implements ValuePattern {
  readonly parts: readonly (string | Glob)[];
  private readonly compiled: RegExp;

  constructor(parts: readonly (string | Glob)[]) {
    this.parts = parts;
    const body = parts
      .map((part) => (isString(part) ? escapeRegex(part) : globFragment(part)))
      .join('');
    this.compiled = new RegExp(`^${body}$`);
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    const out: unknown[] = [];
    for (const candidate of candidates) {
      if (isString(candidate) && this.compiled.test(candidate)) out.push(candidate);
    }
    return out;
  }

  resolve(): StringGlob {
    return this;
  }

  render(): string {
    return this.parts
      .map((part) => (isString(part) ? quoteText(part) : part.render()))
      .join('');
  }
}

/**
 * Bytes glob: `b'GIF'...`. Same construction as {@link StringGlob}, over the
 * byte values.
 */
export class BytesGlob implements ValuePattern {
  readonly parts: readonly (Uint8Array | Glob)[];
  private readonly compiled: RegExp;

  constructor(parts: readonly (Uint8Array | Glob)[]) {
    this.parts = parts;
    const body = parts
      .map((part) => (part instanceof Glob ? globFragment(part) : escapeRegex(latin1(part))))
      .join('');
    this.compiled = new RegExp(`^${body}$`, 's');
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    const out: unknown[] = [];
    for (const candidate of candidates) {
      if (candidate instanceof Uint8Array && this.compiled.test(latin1(candidate))) {
        out.push(candidate);
      }
    }
    return out;
  }

  resolve(): BytesGlob {
    return this;
  }

  render(): string {
    return this.parts
      .map((part) => (part instanceof Glob ? part.render() : `b${quoteText(latin1(part))}`))
      .join('');
  }
}

/**
 * Ordered alternation: a candidate matches when any alternative accepts it.
 */
export class ValueGroup implements ValuePattern {
  readonly alternatives: readonly ValuePattern[];

  constructor(alternatives: readonly ValuePattern[]) {
    this.alternatives = alternatives;
  }

  matches(candidates: Iterable<unknown>): unknown[] {
    const out: unknown[] = [];
    for (const candidate of candidates) {
      if (this.alternatives.some((alternative) => elementMatches(alternative, candidate))) {
        out.push(candidate);
      }
    }
    return out;
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): ValueGroup {
    return new ValueGroup(
      this.alternatives.map((alternative) => alternative.resolve(bindings, partial, registry))
    );
  }

  render(): string {
    return `(${this.alternatives.map((alternative) => alternative.render()).join(', ')})`;
  }
}
