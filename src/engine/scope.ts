import type { OperatorChain } from '../path/chain';
import type { TransformRegistry } from '../path/transforms';

/**
 * Template bindings: positional (`$0`, `$1`) or named (`$(name)`).
 */
export type Bindings =
  | readonly unknown[]
  | Readonly<Record<string, unknown>>;

/**
 * Resolves a reference chain against a base value and returns every value it
 * selects, in traversal order.
 */
export type Dereference = (
  target: OperatorChain,
  base: unknown,
  scope: TraversalScope
) => readonly unknown[];

/**
 * Call-scoped context shared by every frame of one traversal.
 */
export interface TraversalScope {
  /** The root value the call started from. */
  readonly root: unknown;

  /** Disables the Key/Slot cross-kind fallbacks and blocks leaf creation. */
  readonly strict: boolean;

  /** Registry the chain's and guards' transforms are looked up in. */
  readonly registry: TransformRegistry;

  /**
   * Ancestors of the value being visited, nearest first. Only tracked when an
   * operator references an ancestor.
   */
  readonly parents: readonly unknown[] | undefined;

  /** Reference resolution callback, supplied by the API layer. */
  readonly dereference: Dereference;
}

/**
 * Returns the scope for the children of `node`.
 *
 * Without ancestor tracking the scope is shared as is.
 */
export function descend(
  scope: TraversalScope,
  node: unknown
): TraversalScope {
  if (scope.parents === undefined) return scope;
  return { ...scope, parents: [node, ...scope.parents] };
}
