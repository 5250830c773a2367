import { pathsOverlap } from '../engine/traversal';
import { Recursive } from '../operators/recursive';
import type { Segment } from '../operators/segment';
import { assembleOps, type OperatorChain } from './chain';

/** A successful {@link matchPath}: the concrete path and its captures. */
export type PathMatch = {
  readonly path: string;
  readonly groups: readonly unknown[];
};

/**
 * Matches pattern operators against concrete ones, left to right.
 *
 * Logic:
 * 1. A non-recursive operator consumes exactly one segment and contributes
 *    the values its matcher captured.
 * 2. A recursive operator consumes one segment, then two, and so on, for as
 *    long as each consumed segment is a step it accepts; the first split the
 *    rest of the pattern matches wins. The consumed segments form one group.
 * 3. With `partial`, a pattern exhausted before the path succeeds and the last
 *    operator's group takes the whole remaining path.
 */
function matchOps(
  pattern: readonly Segment[],
  path: readonly Segment[],
  partial: boolean
): unknown[] | undefined {
  if (pattern.length === 0) {
    return path.length === 0 || partial ? [] : undefined;
  }
  const [head, ...rest] = pattern;

  if (head instanceof Recursive) {
    for (let n = 1; n <= path.length; n += 1) {
      if (!head.acceptsStep(path[n - 1])) break;
      const tail = matchOps(rest, path.slice(n), partial);
      if (tail !== undefined) return [assembleOps(path.slice(0, n)), ...tail];
    }
    return undefined;
  }

  if (path.length === 0) return undefined;
  const captured = head.matchSegment(path[0], true);
  if (captured === undefined) return undefined;

  if (rest.length === 0 && path.length > 1) {
    if (!partial) return undefined;
    return [...captured.slice(0, -1), assembleOps(path)];
  }
  const tail = matchOps(rest, path.slice(1), partial);
  return tail === undefined ? undefined : [...captured, ...tail];
}

/**
 * Matches a concrete path against a pattern path.
 *
 * @example
 * matchPath(chain(key(any()), key('there')), chain(key('hello'), key('there')))
 * // => { path: 'hello.there', groups: ['hello', 'there'] }
 *
 * @returns `undefined` when the pattern does not match.
 */
export function matchPath(
  pattern: OperatorChain,
  path: OperatorChain,
  partial = true
): PathMatch | undefined {
  const groups = matchOps(pattern.ops, path.ops, partial);
  return groups === undefined ? undefined : { path: path.render(), groups };
}

/**
 * Whether one path is a prefix of the other, under segment matching in either
 * direction.
 */
export function pathsOverlapping(a: OperatorChain, b: OperatorChain): boolean {
  return pathsOverlap([a.ops], b.ops);
}
