import { type Bindings, descend, type TraversalScope } from '../engine/scope';
import {
  applyRemovals,
  applyUpdates,
  type DepthStack,
  type Frame,
  type MutationState,
  pathsOverlap,
  process,
  selectsAny,
  walk,
  type WalkResult
} from '../engine/traversal';
import type { TransformRegistry } from '../path/transforms';
import type { Entry } from '../value/containers';
import { type AccessSegment, type Branch, Segment } from './segment';
import { FilterWrap } from './wrappers';

/** Renders one branch; only its first operator can sit at the top. */
function renderBranch(ops: readonly Segment[], top: boolean): string {
  return ops.map((op, i) => op.render(top && i === 0)).join('');
}

function cutMarker(branch: Branch): string {
  if (branch.cut === 'hard') return '#';
  if (branch.cut === 'soft') return '##';
  return '';
}

/** Whether every operator of `ops` addresses exactly one child. */
function isConcrete(ops: readonly Segment[]): boolean {
  return ops.every((op) => !op.isPattern());
}

/**
 * Base of the operator groups. Each branch is processed on a stack level of
 * its own, followed by the rest of the path.
 */
abstract class GroupSegment extends Segment {
  readonly branches: readonly Branch[];

  constructor(branches: readonly Branch[]) {
    super();
    this.branches = branches;
  }

  isPattern(): boolean {
    return true;
  }

  referenceDepth(): number {
    return Math.max(
      -1,
      ...this.branches.flatMap((branch) => branch.ops.map((op) => op.referenceDepth()))
    );
  }

  /** The branches with the rest of the path appended; empty ones dropped. */
  protected extended(tail: readonly Segment[]): Array<Branch & { readonly full: readonly Segment[] }> {
    return this.branches
      .map((branch) => ({ ...branch, full: [...branch.ops, ...tail] }))
      .filter((branch) => branch.full.length > 0);
  }

  /** Results of one branch, drained on a level of its own. */
  protected *branchResults(
    stack: DepthStack,
    frame: Frame,
    ops: readonly Segment[]
  ): Generator<WalkResult> {
    stack.pushLevel();
    try {
      stack.push({ ...frame, ops });
      yield* process(stack);
    } finally {
      stack.popLevel();
    }
  }

  /**
   * Update through the first branch that addresses a single path, used when
   * no branch matched.
   */
  protected fallback(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown {
    const target = this.extended(tail).find((branch) => isConcrete(branch.full));
    return target === undefined ? node : applyUpdates(target.full, node, payload, state, scope);
  }

  defaultValue(): unknown {
    const first = this.branches.find((branch) => branch.ops.length > 0);
    return first === undefined ? {} : first.ops[0].defaultValue();
  }

  /** Writes through the first branch. */
  upsert(node: unknown, value: unknown, scope: TraversalScope): unknown {
    const first = this.branches.find((branch) => branch.ops.length > 0);
    if (first === undefined) return node;
    return applyUpdates(
      first.ops,
      node,
      value,
      { hasDefaults: true, path: [], nop: false, nopFromUnwrap: false },
      scope
    );
  }

  leaf(): AccessSegment | undefined {
    return this.branches.find((branch) => branch.ops.length > 0)?.ops[0].leaf();
  }

  excludedKeys(node: unknown, scope: TraversalScope): unknown[] {
    return this.branches.flatMap((branch) =>
      branch.ops.length > 0 ? branch.ops[0].excludedKeys(node, scope) : []
    );
  }

  /** Groups compare by their rendered form. */
  matchSegment(other: Segment): unknown[] | undefined {
    return other.constructor === this.constructor && other.render(true) === this.render(true)
      ? [this.render(true)]
      : undefined;
  }

  protected resolvedBranches(
    bindings: Bindings,
    partial: boolean,
    registry: TransformRegistry
  ): Branch[] {
    return this.branches.map((branch) => ({
      ops: branch.ops.map((op) => op.resolve(bindings, partial, registry)),
      cut: branch.cut
    }));
  }

  protected renderBranches(separator: string, top: boolean): string {
    return this.branches
      .map((branch) => `${renderBranch(branch.ops, top)}${cutMarker(branch)}`)
      .join(separator);
  }
}

/**
 * `(a, b)`: the union of every branch's results, in branch order.
 *
 * Cuts:
 * - `a#`: when `a` yields anything, later branches are not tried.
 * - `a##`: later branches skip any path overlapping one `a` yielded.
 */
export class OrGroup extends GroupSegment {
  pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult> {
    const softPaths: Array<readonly Segment[]> = [];
    const results: WalkResult[] = [];
    for (const branch of this.extended(frame.ops)) {
      let found = false;
      for (const result of this.branchResults(stack, frame, branch.full)) {
        if (softPaths.length > 0 && pathsOverlap(softPaths, result.path)) continue;
        found = true;
        if (branch.cut === 'soft') softPaths.push(result.path);
        results.push(result);
      }
      if (found && branch.cut === 'hard') break;
    }
    return results;
  }

  /**
   * Logic:
   * 1. Each branch is walked first; paths overlapping a soft cut are skipped.
   * 2. A branch with paths is updated: path by path once soft cuts are in
   *    play, otherwise as a whole.
   * 3. A hard cut after a matching branch ends the group.
   * 4. When nothing matched, the first concrete branch is updated, creating
   *    its path.
   */
  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown {
    const softPaths: Array<readonly Segment[]> = [];
    let matched = false;
    let current = node;
    for (const branch of this.extended(tail)) {
      const paths = this.livePaths(branch.full, current, scope, softPaths);
      if (paths.length === 0) continue;
      matched = true;
      if (branch.cut === 'soft') softPaths.push(...paths.filter((path) => path.length > 0));
      if (softPaths.length > 0) {
        const nop = state.nop || branch.ops.some((op) => op.isNop());
        for (const path of paths) {
          current = applyUpdates(path, current, payload, { ...state, nop }, scope);
        }
      } else {
        current = applyUpdates(branch.full, current, payload, state, scope);
      }
      if (branch.cut === 'hard') return current;
    }
    return matched ? current : this.fallback(tail, node, payload, state, scope);
  }

  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    nop: boolean,
    scope: TraversalScope
  ): unknown {
    const softPaths: Array<readonly Segment[]> = [];
    let current = node;
    for (const branch of this.extended(tail)) {
      const paths = this.livePaths(branch.full, current, scope, softPaths);
      if (paths.length === 0) continue;
      if (branch.cut === 'soft') softPaths.push(...paths.filter((path) => path.length > 0));
      if (softPaths.length > 0) {
        for (const path of paths) current = applyRemovals(path, current, payload, nop, scope);
      } else {
        current = applyRemovals(branch.full, current, payload, nop, scope);
      }
      if (branch.cut === 'hard') return current;
    }
    return current;
  }

  private livePaths(
    ops: readonly Segment[],
    node: unknown,
    scope: TraversalScope,
    softPaths: ReadonlyArray<readonly Segment[]>
  ): Array<readonly Segment[]> {
    const paths: Array<readonly Segment[]> = [];
    for (const { path } of walk(ops, node, scope)) {
      if (softPaths.length > 0 && pathsOverlap(softPaths, path)) continue;
      paths.push(path);
    }
    return paths;
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): OrGroup {
    return new OrGroup(this.resolvedBranches(bindings, partial, registry));
  }

  render(top: boolean): string {
    return `(${this.renderBranches(', ', top)})`;
  }
}

/**
 * `(a, b)?`: the first result of the first branch that yields.
 */
export class FirstGroup extends GroupSegment {
  pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult> {
    for (const branch of this.extended(frame.ops)) {
      for (const result of this.branchResults(stack, frame, branch.full)) return [result];
    }
    return [];
  }

  /** Updates the first branch that matches, else creates the fallback. */
  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown {
    const target = this.extended(tail).find((branch) => selectsAny(branch.full, node, scope));
    if (target === undefined) return this.fallback(tail, node, payload, state, scope);
    return applyUpdates(target.full, node, payload, state, scope);
  }

  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    nop: boolean,
    scope: TraversalScope
  ): unknown {
    const target = this.extended(tail).find((branch) => selectsAny(branch.full, node, scope));
    return target === undefined ? node : applyRemovals(target.full, node, payload, nop, scope);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): FirstGroup {
    return new FirstGroup(this.resolvedBranches(bindings, partial, registry));
  }

  render(top: boolean): string {
    return `(${this.renderBranches(', ', top)})?`;
  }
}

/**
 * `(a & b)`: all branches must yield; the results are concatenated.
 */
export class AndGroup extends GroupSegment {
  pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult> {
    const results: WalkResult[] = [];
    for (const branch of this.extended(frame.ops)) {
      const found = [...this.branchResults(stack, frame, branch.full)];
      if (found.length === 0) return [];
      results.push(...found);
    }
    return results;
  }

  /**
   * A branch can take an update when it already matches, or when it is a
   * concrete path whose first step is not filtered.
   */
  private canUpdate(branch: Branch & { readonly full: readonly Segment[] }, node: unknown, scope: TraversalScope): boolean {
    if (selectsAny(branch.full, node, scope)) return true;
    return isConcrete(branch.full) && !(branch.full[0] instanceof FilterWrap);
  }

  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown {
    const branches = this.extended(tail);
    if (!branches.every((branch) => this.canUpdate(branch, node, scope))) return node;
    return branches.reduce<unknown>(
      (current, branch) => applyUpdates(branch.full, current, payload, state, scope),
      node
    );
  }

  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    nop: boolean,
    scope: TraversalScope
  ): unknown {
    const branches = this.extended(tail);
    if (!branches.every((branch) => selectsAny(branch.full, node, scope))) return node;
    return branches.reduce<unknown>(
      (current, branch) => applyRemovals(branch.full, current, payload, nop, scope),
      node
    );
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): AndGroup {
    return new AndGroup(this.resolvedBranches(bindings, partial, registry));
  }

  render(top: boolean): string {
    return `(${this.renderBranches(' & ', top)})`;
  }
}

/**
 * `(!a)`: every child the branch's access operator could address, except
 * the ones its matcher selects. Remaining children continue with the rest of
 * the path.
 */
export class NotGroup extends Segment {
  readonly inner: readonly Segment[];

  constructor(inner: readonly Segment[]) {
    super();
    this.inner = inner;
  }

  isPattern(): boolean {
    return true;
  }

  referenceDepth(): number {
    return Math.max(-1, ...this.inner.map((op) => op.referenceDepth()));
  }

  private children(node: unknown, scope: TraversalScope): { leaf: AccessSegment; items: Entry[] } | undefined {
    const head = this.inner[0];
    const leaf = head?.leaf();
    if (head === undefined || leaf === undefined) return undefined;
    const excluded = new Set(head.excludedKeys(node, scope));
    const items = leaf.items(node, scope, false).filter(([key]) => !excluded.has(key));
    return { leaf, items };
  }

  pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult> {
    const found = this.children(frame.node, frame.scope);
    if (found === undefined) return [];
    const scope = descend(frame.scope, frame.node);
    const { leaf, items } = found;
    for (let i = items.length - 1; i >= 0; i -= 1) {
      const [key, value] = items[i];
      stack.push({
        ops: frame.ops,
        node: value,
        prefix: [...frame.prefix, leaf.concrete(key)],
        scope
      });
    }
    return [];
  }

  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown {
    const found = this.children(node, scope);
    if (found === undefined) return node;
    const child = descend(scope, node);
    const { leaf, items } = found;
    let current = node;
    for (const [key, value] of items) {
      if (tail.length > 0) {
        const next = applyUpdates(
          tail,
          value,
          payload,
          { ...state, path: [...state.path, { segment: leaf, key }] },
          child
        );
        current = leaf.update(current, key, next, scope);
      } else if (!state.nop) {
        current = leaf.update(current, key, payload, scope);
      }
    }
    return current;
  }

  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    nop: boolean,
    scope: TraversalScope
  ): unknown {
    const found = this.children(node, scope);
    if (found === undefined) return node;
    const child = descend(scope, node);
    const { leaf, items } = found;
    if (tail.length > 0) {
      return items.reduce<unknown>(
        (current, [key, value]) =>
          leaf.update(current, key, applyRemovals(tail, value, payload, false, child), scope),
        node
      );
    }
    if (nop) return node;
    return [...items]
      .reverse()
      .reduce<unknown>((current, [key]) => leaf.pop(current, key), node);
  }

  defaultValue(): unknown {
    return this.inner[0]?.defaultValue() ?? {};
  }

  upsert(node: unknown): unknown {
    return node;
  }

  leaf(): AccessSegment | undefined {
    return this.inner[0]?.leaf();
  }

  matchSegment(other: Segment): unknown[] | undefined {
    return other instanceof NotGroup && other.render(true) === this.render(true)
      ? [this.render(true)]
      : undefined;
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): NotGroup {
    return new NotGroup(this.inner.map((op) => op.resolve(bindings, partial, registry)));
  }

  render(top: boolean): string {
    return `(!${renderBranch(this.inner, top)})`;
  }
}
