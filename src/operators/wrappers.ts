import type { Bindings, TraversalScope } from '../engine/scope';
import type {
  DepthStack,
  Frame,
  MutationState,
  WalkResult
} from '../engine/traversal';
import { type BindMode, Matcher, type ValuePattern } from '../matchers/base';
import { type ComparisonOperator, satisfies } from '../predicates/compare';
import type { Filter } from '../predicates/filters';
import {
  renderTransforms,
  type TransformRegistry,
  type TransformSpec
} from '../path/transforms';
import { isIndex, isNumber } from '../utils/type-guards';
import type { Entry } from '../value/containers';
import { deepEqual } from '../value/equality';
import { kindOf } from '../value/kinds';
import { ANY, AccessSegment, Segment } from './segment';

/**
 * `~op`: the operator matches as usual but does not write itself. Children
 * below it are still updated.
 */
export class NopWrap extends Segment {
  readonly inner: Segment;

  constructor(inner: Segment) {
    super();
    this.inner = inner;
  }

  isNop(): boolean {
    return true;
  }

  isPattern(): boolean {
    return this.inner.isPattern();
  }

  referenceDepth(): number {
    return this.inner.referenceDepth();
  }

  requiresContainer(): boolean {
    return this.inner.requiresContainer();
  }

  defaultValue(): unknown {
    return this.inner.defaultValue();
  }

  leafDefault(): unknown {
    return this.inner.leafDefault();
  }

  leaf(): AccessSegment | undefined {
    return this.inner.leaf();
  }

  excludedKeys(node: unknown, scope: TraversalScope): unknown[] {
    return this.inner.excludedKeys(node, scope);
  }

  upsert(node: unknown, value: unknown, scope: TraversalScope): unknown {
    return this.inner.upsert(node, value, scope);
  }

  pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult> {
    return this.inner.pushChildren(stack, frame);
  }

  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown {
    return this.inner.applyUpdate(
      tail,
      node,
      payload,
      { ...state, nop: true, nopFromUnwrap: true },
      scope
    );
  }

  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    _nop: boolean,
    scope: TraversalScope
  ): unknown {
    return this.inner.applyRemove(tail, node, payload, true, scope);
  }

  matchSegment(other: Segment, specials: boolean): unknown[] | undefined {
    return this.inner.matchSegment(other, specials);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): NopWrap {
    return new NopWrap(this.inner.resolve(bindings, partial, registry));
  }

  /** The marker goes after the operator's own prefix: `.~a`, `[~*]`, `@~a`. */
  render(top: boolean): string {
    const text = this.inner.render(top);
    for (const lead of ['.', '[', '@']) {
      if (text.startsWith(lead)) return `${lead}~${text.slice(lead.length)}`;
    }
    return `~${text}`;
  }
}

/**
 * Base of the wrappers that narrow the children an access operator selects.
 */
abstract class NarrowedSegment extends AccessSegment {
  readonly inner: AccessSegment;

  constructor(inner: AccessSegment) {
    super();
    this.inner = inner;
  }

  protected abstract narrow(
    children: Entry[],
    node: unknown,
    scope: TraversalScope,
    filtered: boolean
  ): Entry[];

  items(
    node: unknown,
    scope: TraversalScope,
    filtered = true,
    mode: BindMode = 'read'
  ): Entry[] {
    return this.narrow(this.inner.items(node, scope, filtered, mode), node, scope, filtered);
  }

  isPattern(): boolean {
    return this.inner.isPattern();
  }

  referenceDepth(): number {
    return this.inner.referenceDepth();
  }

  concrete(key: unknown): AccessSegment {
    return this.inner.concrete(key);
  }

  update(node: unknown, key: unknown, value: unknown, scope: TraversalScope): unknown {
    return this.inner.update(node, key, value, scope);
  }

  /** Writes only the children that pass; nothing is created. */
  upsert(node: unknown, value: unknown, scope: TraversalScope): unknown {
    let current = node;
    for (const [key] of this.items(node, scope, true, 'write')) {
      current = this.inner.update(current, key, value, scope);
    }
    return current;
  }

  pop(node: unknown, key: unknown): unknown {
    return this.inner.pop(node, key);
  }

  remove(node: unknown, value: unknown, scope: TraversalScope): unknown {
    const doomed = this.items(node, scope)
      .filter(([, child]) => value === ANY || deepEqual(child, value))
      .reverse();
    return doomed.reduce<unknown>((current, [key]) => this.inner.pop(current, key), node);
  }

  defaultValue(): unknown {
    return this.inner.defaultValue();
  }

  leafDefault(): unknown {
    return this.inner.leafDefault();
  }

  leaf(): AccessSegment | undefined {
    return this.inner.leaf();
  }

  matchSegment(other: Segment, specials: boolean): unknown[] | undefined {
    return this.inner.matchSegment(other, specials);
  }
}

/**
 * `op<operator>value`: keeps the children whose value, after the transforms,
 * satisfies the comparison (`a=7`, `[*]>3`, `*|int=7`).
 */
export class ValueGuard extends NarrowedSegment {
  readonly operator: ComparisonOperator;
  readonly pattern: ValuePattern;
  readonly transforms: readonly TransformSpec[];

  constructor(
    inner: AccessSegment,
    operator: ComparisonOperator,
    pattern: ValuePattern,
    transforms: readonly TransformSpec[] = []
  ) {
    super(inner);
    this.operator = operator;
    this.pattern = pattern;
    this.transforms = transforms;
  }

  protected narrow(children: Entry[], node: unknown, scope: TraversalScope): Entry[] {
    const pattern =
      this.pattern instanceof Matcher ? this.pattern.bind(scope, node, 'read') : this.pattern;
    return children.filter(([, value]) =>
      satisfies(scope.registry.apply(value, this.transforms), this.operator, pattern)
    );
  }

  referenceDepth(): number {
    const own = this.pattern instanceof Matcher ? this.pattern.referenceDepth() : -1;
    return Math.max(this.inner.referenceDepth(), own);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): ValueGuard {
    return new ValueGuard(
      this.inner.resolve(bindings, partial, registry),
      this.operator,
      this.pattern.resolve(bindings, partial, registry),
      this.transforms
    );
  }

  render(top: boolean): string {
    return `${this.inner.render(top)}${renderTransforms(this.transforms)}${this.operator}${this.pattern.render()}`;
  }
}

/**
 * `op&filter`: keeps the children that are containers passing the filter.
 * Enumeration for negation ignores the filter.
 */
export class FilterWrap extends NarrowedSegment {
  readonly filter: Filter;

  constructor(inner: AccessSegment, filter: Filter) {
    super(inner);
    this.filter = filter;
  }

  protected narrow(
    children: Entry[],
    _node: unknown,
    scope: TraversalScope,
    filtered: boolean
  ): Entry[] {
    if (!filtered) return children;
    return this.filter.select(children, ([, value]) => value, scope);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): FilterWrap {
    return new FilterWrap(
      this.inner.resolve(bindings, partial, registry),
      this.filter.resolve(bindings, partial, registry)
    );
  }

  /** `.a&id=1`, `[*&id=1]` */
  render(top: boolean): string {
    const text = this.inner.render(top);
    const filter = `&${this.filter.render()}`;
    return text.endsWith(']') ? `${text.slice(0, -1)}${filter}]` : `${text}${filter}`;
  }
}

/**
 * Type names a restriction can test. `int` and `float` split the number
 * kind by integrality; the rest are value kinds.
 */
export const TYPE_NAMES = [
  'null',
  'boolean',
  'number',
  'int',
  'float',
  'bigint',
  'string',
  'bytes',
  'sequence',
  'mapping',
  'set',
  'record'
] as const;

export type TypeName = (typeof TYPE_NAMES)[number];

function hasType(value: unknown, type: TypeName): boolean {
  switch (type) {
    case 'int':
      return isIndex(value);
    case 'float':
      return isNumber(value) && !Number.isInteger(value);
    default:
      return kindOf(value) === type;
  }
}

/**
 * `op:type` / `op:!(a, b)`: the operator applies only to nodes of (or, when
 * negated, not of) the listed types. Other nodes pass through untouched.
 */
export class TypeRestriction extends Segment {
  readonly inner: Segment;
  readonly types: readonly TypeName[];
  readonly negate: boolean;

  constructor(inner: Segment, types: readonly TypeName[], negate = false) {
    super();
    this.inner = inner;
    this.types = types;
    this.negate = negate;
  }

  allows(node: unknown): boolean {
    const hit = this.types.some((type) => hasType(node, type));
    return this.negate ? !hit : hit;
  }

  isPattern(): boolean {
    return this.inner.isPattern();
  }

  referenceDepth(): number {
    return this.inner.referenceDepth();
  }

  requiresContainer(): boolean {
    return this.inner.requiresContainer();
  }

  defaultValue(): unknown {
    return this.inner.defaultValue();
  }

  leafDefault(): unknown {
    return this.inner.leafDefault();
  }

  leaf(): AccessSegment | undefined {
    return this.inner.leaf();
  }

  excludedKeys(node: unknown, scope: TraversalScope): unknown[] {
    return this.allows(node) ? this.inner.excludedKeys(node, scope) : [];
  }

  upsert(node: unknown, value: unknown, scope: TraversalScope): unknown {
    return this.allows(node) ? this.inner.upsert(node, value, scope) : node;
  }

  pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult> {
    return this.allows(frame.node) ? this.inner.pushChildren(stack, frame) : [];
  }

  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown {
    if (!this.allows(node)) return node;
    return this.inner.applyUpdate(tail, node, payload, state, scope);
  }

  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    nop: boolean,
    scope: TraversalScope
  ): unknown {
    if (!this.allows(node)) return node;
    return this.inner.applyRemove(tail, node, payload, nop, scope);
  }

  matchSegment(other: Segment, specials: boolean): unknown[] | undefined {
    return this.inner.matchSegment(other, specials);
  }

  resolve(
    bindings: Bindings,
    partial: boolean,
    registry: TransformRegistry
  ): TypeRestriction {
    return new TypeRestriction(
      this.inner.resolve(bindings, partial, registry),
      this.types,
      this.negate
    );
  }

  render(top: boolean): string {
    const names = this.types.length === 1 ? this.types[0] : `(${this.types.join(', ')})`;
    return `${this.inner.render(top)}:${this.negate ? '!' : ''}${names}`;
  }
}
