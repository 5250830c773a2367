import { Matcher, type ValuePattern } from '../matchers/base';
import { isBigInt, isNumber, isString } from '../utils/type-guards';

/**
 * Comparison operators shared by value guards and filter leaves.
 */
export type ComparisonOperator = '=' | '!=' | '<' | '>' | '<=' | '>=';

/**
 * Three-way comparison of two orderable values.
 *
 * @returns `undefined` when the pair has no ordering (different kinds, NaN,
 *   containers, ...).
 */
function order(actual: unknown, reference: unknown): number | undefined {
  if (
    (isBigInt(actual) || isNumber(actual)) &&
    (isBigInt(reference) || isNumber(reference))
  ) {
    if (Number.isNaN(actual) || Number.isNaN(reference)) return undefined;
    return actual < reference ? -1 : actual > reference ? 1 : 0;
  }
  if (isString(actual) && isString(reference)) {
    return actual < reference ? -1 : actual > reference ? 1 : 0;
  }
  return undefined;
}

/**
 * Tests one value against an ordering operator.
 * A pair without an ordering never satisfies it.
 */
export function ordered(
  operator: Exclude<ComparisonOperator, '=' | '!='>,
  actual: unknown,
  reference: unknown
): boolean {
  const sign = order(actual, reference);
  if (sign === undefined) return false;
  switch (operator) {
    case '<':
      return sign < 0;
    case '>':
      return sign > 0;
    case '<=':
      return sign <= 0;
    case '>=':
      return sign >= 0;
  }
}

/**
 * Filters `values` down to those satisfying `operator` against `pattern`,
 * preserving order.
 *
 * Logic:
 * 1. `=` delegates to the pattern's own `matches`, so wildcards, regexes and
 *    container patterns keep their semantics.
 * 2. `!=` keeps each value the pattern does not accept.
 * 3. Ordering operators compare against the matcher's literal value; a
 *    container pattern has none and accepts nothing.
 */
export function compare(
  values: readonly unknown[],
  operator: ComparisonOperator,
  pattern: ValuePattern
): unknown[] {
  switch (operator) {
    case '=':
      return pattern.matches(values);
    case '!=':
      return values.filter((value) => pattern.matches([value]).length === 0);
    default: {
      if (!(pattern instanceof Matcher)) return [];
      const reference = pattern.value;
      return values.filter((value) => ordered(operator, value, reference));
    }
  }
}

/** Whether a single value satisfies the comparison. */
export function satisfies(
  value: unknown,
  operator: ComparisonOperator,
  pattern: ValuePattern
): boolean {
  return compare([value], operator, pattern).length > 0;
}
