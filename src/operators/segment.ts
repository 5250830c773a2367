import { type Bindings, descend, type TraversalScope } from '../engine/scope';
import {
  applyRemovals,
  applyUpdates,
  buildDefault,
  type DepthStack,
  type Frame,
  type MutationState,
  type WalkResult
} from '../engine/traversal';
import type { BindMode } from '../matchers/base';
import type { TransformRegistry } from '../path/transforms';
import { isNullish } from '../utils/type-guards';
import type { Entry } from '../value/containers';

/**
 * Removal payload meaning "whatever is there". Also stands for "no payload"
 * on updates, where the operator's default value is written instead.
 */
export const ANY = Symbol('keypath.any');
export type Any = typeof ANY;

/**
 * How a group branch ends:
 *
 * - none: later branches always run
 * - hard: a branch that matched stops the group (`#`)
 * - soft: later branches skip paths this branch already matched (`##`)
 */
export type CutKind = 'none' | 'hard' | 'soft';

/** One alternative of a group: an operator sequence plus its cut marker. */
export interface Branch {
  readonly ops: readonly Segment[];
  readonly cut: CutKind;
}

/**
 * Base of every path operator.
 *
 * An operator reads by pushing child frames onto the traversal stack and
 * writes by rebuilding the node it is applied to. Both directions receive the
 * operators that follow it (`tail`) and decide how far to hand them on.
 */
export abstract class Segment {
  /** Can select zero or more children instead of exactly one. */
  isPattern(): boolean {
    return false;
  }

  /** Matches without writing (`~`). */
  isNop(): boolean {
    return false;
  }

  /** Deepest ancestor level a reference inside reaches, `-1` for none. */
  referenceDepth(): number {
    return -1;
  }

  /** Whether an update through this operator needs a container to start. */
  requiresContainer(): boolean {
    return true;
  }

  /** The container this operator creates when a path has to be built. */
  abstract defaultValue(): unknown;

  /** Default for the last operator of a path being built. */
  leafDefault(): unknown {
    return this.defaultValue();
  }

  /** The underlying access operator negation enumerates through. */
  leaf(): AccessSegment | undefined {
    return undefined;
  }

  /** Keys this operator selects in `node`, for negation. */
  excludedKeys(_node: unknown, _scope: TraversalScope): unknown[] {
    return [];
  }

  /** Writes `value` wherever this operator points in `node`, creating it. */
  abstract upsert(node: unknown, value: unknown, scope: TraversalScope): unknown;

  /**
   * Expands `frame` (whose `ops` are this operator's tail): pushes child
   * frames onto `stack`, or returns finished results directly.
   */
  abstract pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult>;

  abstract applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown;

  abstract applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    nop: boolean,
    scope: TraversalScope
  ): unknown;

  /**
   * Compares this pattern operator with a concrete one.
   *
   * @returns The captured values, or `undefined` when `other` does not match.
   */
  abstract matchSegment(other: Segment, specials: boolean): unknown[] | undefined;

  resolve(
    _bindings: Bindings,
    _partial: boolean,
    _registry: TransformRegistry
  ): Segment {
    return this;
  }

  /** Notation form; `top` marks the first operator of a path. */
  abstract render(top: boolean): string;

  toString(): string {
    return this.render(true);
  }
}

/**
 * An operator that addresses children of a single node by key.
 *
 * The subclass supplies enumeration (`items`) and the four primitive writes;
 * reading and the recursive update and removal are shared.
 */
export abstract class AccessSegment extends Segment {
  /**
   * Children this operator selects in `node`. With `filtered` off, every
   * child the operator could address.
   */
  abstract items(
    node: unknown,
    scope: TraversalScope,
    filtered?: boolean,
    mode?: BindMode
  ): Entry[];

  /** The literal operator for one enumerated key. */
  abstract concrete(key: unknown): AccessSegment;

  /** Writes one existing or new child. */
  abstract update(
    node: unknown,
    key: unknown,
    value: unknown,
    scope: TraversalScope
  ): unknown;

  /** Deletes one child. */
  abstract pop(node: unknown, key: unknown): unknown;

  /** Deletes the selected children equal to `value` (all for {@link ANY}). */
  abstract remove(node: unknown, value: unknown, scope: TraversalScope): unknown;

  isEmpty(node: unknown, scope: TraversalScope): boolean {
    return this.items(node, scope).length === 0;
  }

  /** Strict mode writes only children that already exist. */
  blocksLeaf(node: unknown, scope: TraversalScope): boolean {
    return scope.strict && this.items(node, scope).length === 0;
  }

  leaf(): AccessSegment | undefined {
    return this;
  }

  resolve(
    _bindings: Bindings,
    _partial: boolean,
    _registry: TransformRegistry
  ): AccessSegment {
    return this;
  }

  excludedKeys(node: unknown, scope: TraversalScope): unknown[] {
    return this.items(node, scope).map(([key]) => key);
  }

  /** Selected children of `node` with their concrete paths. */
  matchesAt(
    node: unknown,
    prefix: readonly Segment[],
    scope: TraversalScope
  ): WalkResult[] {
    return this.items(node, scope).map(([key, value]) => ({
      path: [...prefix, this.concrete(key)],
      value
    }));
  }

  pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult> {
    pushMatches(stack, frame, this.matchesAt(frame.node, frame.prefix, frame.scope));
    return [];
  }

  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown {
    return updateEach(this, tail, node, payload, state, scope);
  }

  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    nop: boolean,
    scope: TraversalScope
  ): unknown {
    return removeEach(this, tail, node, payload, nop, scope);
  }
}

/**
 * Pushes one frame per match, in reverse so the first match is processed
 * first.
 */
export function pushMatches(
  stack: DepthStack,
  frame: Frame,
  matches: readonly WalkResult[]
): void {
  const scope = descend(frame.scope, frame.node);
  for (let i = matches.length - 1; i >= 0; i -= 1) {
    const { path, value } = matches[i];
    stack.push({ ops: frame.ops, node: value, prefix: path, scope });
  }
}

/**
 * Shared update of an access operator.
 *
 * Logic:
 * 1. Last operator: write the payload, unless `nop` or strict mode finds
 *    nothing to overwrite.
 * 2. Nothing selected and no default structure yet: build the rest of the
 *    path from defaults, update that, and write it in.
 * 3. Otherwise update each selected child through the tail (a `null` child
 *    is replaced by a built default first) and write it back.
 */
export function updateEach(
  segment: AccessSegment,
  tail: readonly Segment[],
  node: unknown,
  payload: unknown,
  state: MutationState,
  scope: TraversalScope
): unknown {
  if (tail.length === 0) {
    if (state.nop || segment.blocksLeaf(node, scope)) return node;
    return segment.upsert(node, payload, scope);
  }

  if (!state.hasDefaults && segment.isEmpty(node, scope)) {
    if (state.nop || tail[0].isNop()) return node;
    const built = applyUpdates(
      tail,
      buildDefault(tail, scope),
      payload,
      { ...state, hasDefaults: true },
      scope
    );
    return segment.upsert(node, built, scope);
  }

  const nop = state.nop && !state.nopFromUnwrap;
  const child = descend(scope, node);
  let current = node;
  for (const [key, value] of segment.items(node, scope, true, 'write')) {
    const base = isNullish(value) ? buildDefault(tail, child) : value;
    const next = applyUpdates(
      tail,
      base,
      payload,
      {
        hasDefaults: state.hasDefaults,
        path: [...state.path, { segment, key }],
        nop,
        nopFromUnwrap: false
      },
      child
    );
    current = segment.update(current, key, next, scope);
  }
  return current;
}

/**
 * Shared removal of an access operator: the last operator removes, earlier
 * ones rebuild each selected child from the tail's removal.
 */
export function removeEach(
  segment: AccessSegment,
  tail: readonly Segment[],
  node: unknown,
  payload: unknown,
  nop: boolean,
  scope: TraversalScope
): unknown {
  if (tail.length === 0) {
    if (nop || segment.blocksLeaf(node, scope)) return node;
    return segment.remove(node, payload, scope);
  }

  const child = descend(scope, node);
  let current = node;
  for (const [key, value] of segment.items(node, scope)) {
    current = segment.update(
      current,
      key,
      applyRemovals(tail, value, payload, false, child),
      scope
    );
  }
  return current;
}
