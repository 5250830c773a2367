import { assert } from 'vitest';

import type { ScenarioInput } from './types';

/**
 * Resolves a scenario input that may be a direct value or a builder function.
 *
 * Note: Use builders only when you need fresh references (cycles/aliasing).
 * Prefer named builders defined near the scenario table.
 */
export function resolveScenarioInput<T>(input: ScenarioInput<T>): T {
  if (typeof input === 'function') {
    return (input as () => T)();
  }
  return input;
}

/**
 * Asserts that a runtime value is an array.
 *
 * Provides TypeScript narrowing via `asserts`, without requiring casts.
 */
export function expectArray(
  value: unknown,
  message = 'Expected result to be an array'
): asserts value is readonly unknown[] {
  assert(Array.isArray(value), message);
}

/**
 * Runs `action` and returns what it threw.
 *
 * Fails the test when nothing is thrown, so callers can narrow the result
 * with `instanceof` and inspect the error's fields.
 */
export function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return assert.fail('Expected the action to throw');
}
