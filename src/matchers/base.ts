import type { Bindings, TraversalScope } from '../engine/scope';
import type { TransformRegistry } from '../path/transforms';

/**
 * Anything that can test candidate values: key/value matchers as well as the
 * container patterns used on the right-hand side of guards and filters.
 */
export interface ValuePattern {
  /**
   * Filters `candidates` down to those this pattern accepts, preserving
   * order.
   */
  matches(candidates: Iterable<unknown>): unknown[];

  /** Substitutes template placeholders; see {@link Matcher.resolve}. */
  resolve(
    bindings: Bindings,
    partial: boolean,
    registry: TransformRegistry
  ): ValuePattern;

  /** Notation form. */
  render(): string;
}

/**
 * Whether a write is being planned; decides how unresolved references fail.
 */
export type BindMode = 'read' | 'write';

/**
 * Base of every key/value matcher.
 *
 * A matcher is immutable. `value` is the candidate the matcher stands for
 * when the path it sits in is itself compared against a pattern path.
 */
export abstract class Matcher implements ValuePattern {
  abstract readonly value: unknown;

  /** Can select zero or more keys instead of exactly one. */
  isPattern(): boolean {
    return false;
  }

  /** Still carries an unresolved substitution placeholder. */
  isTemplate(): boolean {
    return false;
  }

  /**
   * Deepest ancestor level a reference inside this matcher reaches, or `-1`
   * when there is no reference.
   */
  referenceDepth(): number {
    return -1;
  }

  abstract matches(candidates: Iterable<unknown>): unknown[];

  /**
   * Matches container keys. Differs from {@link matches} only where a key's
   * storage form differs from its literal (numbers on plain objects).
   */
  matchKeys(keys: Iterable<unknown>): unknown[] {
    return this.matches(keys);
  }

  /**
   * Whether this matcher, as part of a pattern path, can be compared against
   * `other` from a concrete path. `specials` also admits pattern-to-pattern
   * comparisons.
   */
  matchable(_other: Matcher, _specials = false): boolean {
    return false;
  }

  /**
   * Returns the matcher to use against `node` during traversal. Literal and
   * pattern matchers return themselves; references resolve to a literal.
   */
  bind(_scope: TraversalScope, _node: unknown, _mode: BindMode): Matcher {
    return this;
  }

  /**
   * Substitutes template placeholders from `bindings`. In `partial` mode an
   * unresolvable placeholder is kept; otherwise it raises.
   */
  resolve(
    _bindings: Bindings,
    _partial: boolean,
    _registry: TransformRegistry
  ): Matcher {
    return this;
  }

  abstract render(): string;

  toString(): string {
    return this.render();
  }
}
