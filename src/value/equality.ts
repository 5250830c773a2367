import { entries, lookup, isMissing } from './containers';
import { kindOf } from './kinds';

/** Pairs of containers currently being compared on the recursion path. */
type ComparisonEntry = readonly [left: object, right: object];

/**
 * Checks if the pair of containers is already being compared further up the
 * current recursion path.
 */
function isCycleDetected(
  stack: readonly ComparisonEntry[],
  left: object,
  right: object
): boolean {
  for (const [seenLeft, seenRight] of stack) {
    if (seenLeft === left && seenRight === right) return true;
  }
  return false;
}

function bytesEqual(left: Uint8Array, right: Uint8Array): boolean {
  if (left.length !== right.length) return false;
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) return false;
  }
  return true;
}

function compare(
  left: unknown,
  right: unknown,
  stack: readonly ComparisonEntry[]
): boolean {
  if (left === right) return true;

  const kind = kindOf(left);
  if (kind !== kindOf(right)) return false;

  switch (kind) {
    case 'null':
      return true;
    case 'bytes':
      return (
        left instanceof Uint8Array &&
        right instanceof Uint8Array &&
        bytesEqual(left, right)
      );
    case 'sequence':
    case 'mapping':
    case 'record':
    case 'set':
      break;
    default:
      return false;
  }

  if (
    typeof left !== 'object' ||
    left === null ||
    typeof right !== 'object' ||
    right === null
  ) {
    return false;
  }
  // A pair already on the path compares equal; the rest of the walk decides.
  if (isCycleDetected(stack, left, right)) return true;
  const nextStack = stack.concat([[left, right]]);

  if (left instanceof Set && right instanceof Set) {
    if (left.size !== right.size) return false;
    const candidates = [...right];
    return [...left].every((member) =>
      candidates.some((other) => compare(member, other, nextStack))
    );
  }

  if (kind === 'record') {
    if (Object.getPrototypeOf(left) !== Object.getPrototypeOf(right)) {
      return false;
    }
  }

  const leftEntries = entries(left);
  if (leftEntries.length !== entries(right).length) return false;

  return leftEntries.every(([key, value]) => {
    const other = lookup(right, key);
    return !isMissing(other) && compare(value, other, nextStack);
  });
}

/**
 * Structural equality over the value model.
 *
 * Semantics:
 * - Primitives compare with `===`; `null` and `undefined` are equal.
 * - Bytes compare element-wise.
 * - Sequences, mappings and records compare entry-wise; records also require
 *   the same prototype. Frozen and mutable containers of equal content are
 *   equal.
 * - Sets compare member-wise, each member matching some structurally equal
 *   member of the other set.
 * - Cycles are tracked on a path-scoped stack, so self-referential values
 *   terminate.
 */
export function deepEqual(left: unknown, right: unknown): boolean {
  return compare(left, right, []);
}
