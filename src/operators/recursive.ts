import { type Bindings, descend, type TraversalScope } from '../engine/scope';
import {
  applyRemovals,
  applyUpdates,
  type DepthStack,
  type Frame,
  type MutationState,
  type WalkResult
} from '../engine/traversal';
import { Matcher, type ValuePattern } from '../matchers/base';
import { Const } from '../matchers/literals';
import { Wildcard } from '../matchers/patterns';
import { type ComparisonOperator, satisfies } from '../predicates/compare';
import type { Filter } from '../predicates/filters';
import {
  renderTransforms,
  type TransformRegistry,
  type TransformSpec
} from '../path/transforms';
import { normalizeKey } from '../utils/key-quoting';
import { isObjectLike } from '../utils/type-guards';
import { deepEqual } from '../value/equality';
import { Key } from './access';
import { ANY, type AccessSegment, type CutKind, pushMatches, Segment } from './segment';

/**
 * An accessor recursion steps through, with the cut that follows it.
 */
export interface Accessor {
  readonly segment: AccessSegment;
  readonly cut: CutKind;
}

/**
 * Depth selection, in the manner of a slice over depths. Depth 0 is the
 * first level of keys. Negative values count from the leaves: `-1` is a
 * leaf, `-2` the level above.
 */
export interface DepthRange {
  readonly start?: number;
  readonly stop?: number;
  readonly step?: number;
}

/** A value comparison every recursive match must satisfy. */
export interface RecursiveGuard {
  readonly operator: ComparisonOperator;
  readonly pattern: ValuePattern;
  readonly transforms: readonly TransformSpec[];
}

export interface RecursiveOptions {
  readonly depth?: DepthRange;
  readonly filter?: Filter;
  readonly guard?: RecursiveGuard;
}

/** A child reached through one accessor. */
type Step = {
  readonly accessor: AccessSegment;
  readonly key: unknown;
  readonly value: unknown;
};

/**
 * Checks if `node` already sits on the current recursion path.
 *
 * Only objects are tracked; scalars have no children to loop through.
 */
function isCycleDetected(seen: readonly object[], node: unknown): boolean {
  return isObjectLike(node) && seen.includes(node);
}

/**
 * Returns a new path history with `node` added. The history is path-scoped:
 * sibling branches never see each other's entries.
 */
function pushSeen(seen: readonly object[], node: unknown): readonly object[] {
  return isObjectLike(node) ? [...seen, node] : seen;
}

/**
 * Recursive descent: `**`, `*key`, `*(*, [*])`.
 *
 * Every child an accessor selects is a candidate; candidates are yielded
 * parent before children and recursion continues through each of them.
 * A value already on the current path is not entered again.
 */
export class Recursive extends Segment {
  readonly matcher: Matcher | undefined;
  readonly accessors: readonly Accessor[];
  readonly depth: DepthRange;
  readonly filter: Filter | undefined;
  readonly guard: RecursiveGuard | undefined;

  constructor(target: Matcher | readonly Accessor[], options: RecursiveOptions = {}) {
    super();
    if (target instanceof Matcher) {
      this.matcher = target;
      this.accessors = [{ segment: new Key(target), cut: 'none' }];
    } else {
      this.matcher = undefined;
      this.accessors = target;
    }
    this.depth = options.depth ?? {};
    this.filter = options.filter;
    this.guard = options.guard;
  }

  /** Same target, different options. */
  protected rebuild(target: Matcher | readonly Accessor[], options: RecursiveOptions): Recursive {
    return new Recursive(target, options);
  }

  private get options(): RecursiveOptions {
    return { depth: this.depth, filter: this.filter, guard: this.guard };
  }

  /** Returns a copy with `guard` added. */
  withGuard(guard: RecursiveGuard): Recursive {
    return this.rebuild(this.matcher ?? this.accessors, { ...this.options, guard });
  }

  isPattern(): boolean {
    return true;
  }

  referenceDepth(): number {
    const own = this.accessors.map(({ segment }) => segment.referenceDepth());
    return Math.max(-1, ...own);
  }

  defaultValue(): unknown {
    return {};
  }

  upsert(node: unknown): unknown {
    return node;
  }

  /**
   * Children selected by each accessor in order. An accessor that matched
   * and is followed by a hard cut ends the list.
   */
  private children(node: unknown, scope: TraversalScope): Step[] {
    const steps: Step[] = [];
    for (const { segment, cut } of this.accessors) {
      const found = segment.items(node, scope);
      for (const [key, value] of found) steps.push({ accessor: segment, key, value });
      if (found.length > 0 && cut === 'hard') break;
    }
    return steps;
  }

  private hasNegativeDepth(): boolean {
    const { start, stop } = this.depth;
    return (start !== undefined && start < 0) || (stop !== undefined && stop < 0);
  }

  /**
   * Whether `depth` is selected, `toLeaf` being the longest distance from the
   * value to a leaf (0 for a leaf).
   *
   * Logic:
   * 1. No bounds: every depth.
   * 2. Negative start: the distance to the leaf must be exactly `-start - 1`;
   *    alone it selects, otherwise it anchors the range at this depth.
   * 3. Negative stop: the distance to the leaf must be at least `-stop - 1`;
   *    the range then has no upper bound.
   * 4. Only a start: that exact depth.
   * 5. Otherwise an inclusive range, stepped from its start.
   */
  inDepthRange(depth: number, toLeaf = 0): boolean {
    let { start, stop } = this.depth;
    const { step } = this.depth;
    if (start === undefined && stop === undefined && step === undefined) return true;

    if (start !== undefined && start < 0) {
      if (toLeaf !== Math.abs(start) - 1) return false;
      if (stop === undefined && step === undefined) return true;
      start = depth;
    }

    const explicitStop = this.depth.stop;
    if (stop !== undefined && stop < 0) {
      if (toLeaf < Math.abs(stop) - 1) return false;
      stop = undefined;
    }

    if (stop === undefined && step === undefined && explicitStop === undefined) {
      return depth === start;
    }

    const from = start ?? 0;
    if (step !== undefined) {
      if (depth < from || (depth - from) % step !== 0) return false;
      return stop === undefined || depth <= stop;
    }
    if (stop !== undefined) return from <= depth && depth <= stop;
    return depth >= from;
  }

  /** Longest distance from `node` to a leaf along the accessors. */
  private distanceToLeaf(
    node: unknown,
    scope: TraversalScope,
    seen: readonly object[] = []
  ): number {
    if (isCycleDetected(seen, node)) return 0;
    const next = pushSeen(seen, node);
    const steps = this.children(node, scope);
    if (steps.length === 0) return 0;
    return 1 + Math.max(...steps.map((step) => this.distanceToLeaf(step.value, scope, next)));
  }

  /**
   * Whether a candidate is selected: it passes the filter and the guard and
   * its depth is in range.
   */
  private selects(value: unknown, depth: number, node: unknown, scope: TraversalScope): boolean {
    if (this.filter !== undefined && this.filter.select([value], (v) => v, scope).length === 0) {
      return false;
    }
    const toLeaf = this.hasNegativeDepth() ? this.distanceToLeaf(value, scope) : 0;
    if (!this.inDepthRange(depth, toLeaf)) return false;
    return this.guard === undefined || this.guardPasses(value, node, scope);
  }

  private guardPasses(value: unknown, node: unknown, scope: TraversalScope): boolean {
    if (this.guard === undefined) return true;
    const { operator, pattern, transforms } = this.guard;
    const bound = pattern instanceof Matcher ? pattern.bind(scope, node, 'read') : pattern;
    return satisfies(scope.registry.apply(value, transforms), operator, bound);
  }

  /**
   * Lazily yields every selected descendant with its concrete path, parent
   * before children.
   */
  *collect(
    node: unknown,
    prefix: readonly Segment[],
    scope: TraversalScope,
    depth = 0,
    seen: readonly object[] = []
  ): Generator<WalkResult> {
    if (isCycleDetected(seen, node)) return;
    const next = pushSeen(seen, node);
    const child = descend(scope, node);
    for (const { accessor, key, value } of this.children(node, scope)) {
      const path = [...prefix, accessor.concrete(key)];
      if (this.selects(value, depth, node, scope)) yield { path, value };
      yield* this.collect(value, path, child, depth + 1, next);
    }
  }

  /** Selected descendants of `node`. */
  matchesAt(node: unknown, prefix: readonly Segment[], scope: TraversalScope): WalkResult[] {
    return [...this.collect(node, prefix, scope)];
  }

  pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult> {
    pushMatches(stack, frame, this.matchesAt(frame.node, frame.prefix, frame.scope));
    return [];
  }

  /**
   * Bottom-up update: each child is first updated below, written back, and
   * then, when selected, updated itself through the tail (or replaced by the
   * payload when there is no tail).
   */
  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope,
    depth = 0,
    seen: readonly object[] = []
  ): unknown {
    if (isCycleDetected(seen, node)) return node;
    const next = pushSeen(seen, node);
    const child = descend(scope, node);
    let current = node;
    for (const { accessor, key, value } of this.children(node, scope)) {
      const updated = this.applyUpdate(tail, value, payload, state, child, depth + 1, next);
      current = accessor.update(current, key, updated, scope);
      if (!this.selects(updated, depth, current, scope)) continue;
      if (tail.length > 0) {
        const below = applyUpdates(
          tail,
          updated,
          payload,
          { ...state, path: [...state.path, { segment: accessor, key }] },
          child
        );
        current = accessor.update(current, key, below, scope);
      } else if (!state.nop) {
        current = accessor.update(current, key, payload, scope);
      }
    }
    return current;
  }

  /**
   * Bottom-up removal; selected children are deleted after the scan, last
   * first.
   */
  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    nop: boolean,
    scope: TraversalScope,
    depth = 0,
    seen: readonly object[] = []
  ): unknown {
    if (isCycleDetected(seen, node)) return node;
    const next = pushSeen(seen, node);
    const child = descend(scope, node);
    const doomed: Array<{ accessor: AccessSegment; key: unknown }> = [];
    let current = node;
    for (const { accessor, key, value } of this.children(node, scope)) {
      const pruned = this.applyRemove(tail, value, payload, nop, child, depth + 1, next);
      current = accessor.update(current, key, pruned, scope);
      if (!this.selects(pruned, depth, current, scope)) continue;
      if (tail.length > 0) {
        current = accessor.update(
          current,
          key,
          applyRemovals(tail, pruned, payload, false, child),
          scope
        );
      } else if (!nop && (payload === ANY || deepEqual(pruned, payload))) {
        doomed.push({ accessor, key });
      }
    }
    return doomed
      .reverse()
      .reduce<unknown>((acc, { accessor, key }) => accessor.pop(acc, key), current);
  }

  /**
   * Whether a concrete segment is a step this recursion could take.
   */
  acceptsStep(segment: Segment): boolean {
    return this.accessors.some(({ segment: accessor }) =>
      accessor.matchSegment(segment, false) !== undefined
    );
  }

  matchSegment(other: Segment): unknown[] | undefined {
    return other instanceof Recursive && other.render(true) === this.render(true)
      ? [this.render(true)]
      : undefined;
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): Recursive {
    const target =
      this.matcher?.resolve(bindings, partial, registry) ??
      this.accessors.map(({ segment, cut }) => ({
        segment: segment.resolve(bindings, partial, registry),
        cut
      }));
    const guard =
      this.guard === undefined
        ? undefined
        : { ...this.guard, pattern: this.guard.pattern.resolve(bindings, partial, registry) };
    return this.rebuild(target, {
      depth: this.depth,
      filter: this.filter?.resolve(bindings, partial, registry),
      guard
    });
  }

  private renderTarget(): string {
    if (this.matcher === undefined) {
      const parts = this.accessors.map(({ segment, cut }) => {
        const marker = cut === 'hard' ? '#' : cut === 'soft' ? '##' : '';
        return `${segment.render(true)}${marker}`;
      });
      return `*(${parts.join(', ')})`;
    }
    if (this.matcher instanceof Wildcard) return '**';
    const text =
      this.matcher instanceof Const ? normalizeKey(this.matcher.value) : this.matcher.render();
    return `*${text}`;
  }

  private renderDepth(): string {
    const { start, stop, step } = this.depth;
    if (start === undefined && stop === undefined && step === undefined) return '';
    let text = `:${start ?? ''}`;
    if (stop !== undefined || step !== undefined) text += `:${stop ?? ''}`;
    if (step !== undefined) text += `:${step}`;
    return text;
  }

  protected renderBody(): string {
    let text = this.renderTarget() + this.renderDepth();
    if (this.filter !== undefined) text += `&${this.filter.render()}`;
    if (this.guard !== undefined) {
      const { operator, pattern, transforms } = this.guard;
      text += `${renderTransforms(transforms)}${operator}${pattern.render()}`;
    }
    return text;
  }

  render(top: boolean): string {
    const text = this.renderBody();
    return top ? text : `.${text}`;
  }
}

/**
 * `**?`: the first selected descendant only.
 */
export class RecursiveFirst extends Recursive {
  protected rebuild(target: Matcher | readonly Accessor[], options: RecursiveOptions): Recursive {
    return new RecursiveFirst(target, options);
  }

  matchesAt(node: unknown, prefix: readonly Segment[], scope: TraversalScope): WalkResult[] {
    for (const found of this.collect(node, prefix, scope)) return [found];
    return [];
  }

  protected renderBody(): string {
    return `${super.renderBody()}?`;
  }
}
