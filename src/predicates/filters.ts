import type { Bindings, TraversalScope } from '../engine/scope';
import { Matcher, type ValuePattern } from '../matchers/base';
import {
  renderTransforms,
  type TransformRegistry,
  type TransformSpec
} from '../path/transforms';
import { entries } from '../value/containers';
import { isContainer, kindOf } from '../value/kinds';
import { type ComparisonOperator, satisfies } from './compare';

/**
 * One step of a filter key path.
 *
 * - key:   mapping key or record field; the last step yields every match,
 *          earlier steps follow the first
 * - slot:  sequence elements whose index the matcher selects
 * - slice: a sub-sequence
 */
export type FilterKeyPart =
  | { readonly type: 'key'; readonly matcher: Matcher }
  | { readonly type: 'slot'; readonly matcher: Matcher }
  | {
      readonly type: 'slice';
      readonly start?: number;
      readonly stop?: number;
      readonly step?: number;
    };

/**
 * Selection over the start/stop/step of a sequence, negative bounds counting
 * from the end.
 */
export function sliceIndices(
  length: number,
  start?: number,
  stop?: number,
  step = 1
): number[] {
  if (step === 0) return [];
  const clamp = (bound: number, low: number, high: number): number => {
    const index = bound < 0 ? bound + length : bound;
    return Math.min(Math.max(index, low), high);
  };
  const out: number[] = [];
  if (step > 0) {
    const from = start === undefined ? 0 : clamp(start, 0, length);
    const to = stop === undefined ? length : clamp(stop, 0, length);
    for (let i = from; i < to; i += step) out.push(i);
  } else {
    const from = start === undefined ? length - 1 : clamp(start, -1, length - 1);
    const to = stop === undefined ? -1 : clamp(stop, -1, length - 1);
    for (let i = from; i > to; i += step) out.push(i);
  }
  return out;
}

/**
 * Values a key path reaches inside `node`, in traversal order.
 */
function valuesAt(
  node: unknown,
  parts: readonly FilterKeyPart[],
  scope: TraversalScope
): unknown[] {
  if (parts.length === 0) return [node];
  const [part, ...rest] = parts;

  if (part.type === 'slice') {
    if (!Array.isArray(node)) return [];
    const picked = sliceIndices(node.length, part.start, part.stop, part.step).map(
      (i) => node[i]
    );
    return valuesAt(picked, rest, scope);
  }

  const matcher = part.matcher.bind(scope, node, 'read');

  if (part.type === 'slot') {
    if (!Array.isArray(node)) return [];
    const indices = new Set(matcher.matches(node.map((_, i) => i)));
    return node
      .filter((_, i) => indices.has(i))
      .flatMap((child) => valuesAt(child, rest, scope));
  }

  const kind = kindOf(node);
  if (kind !== 'mapping' && kind !== 'record') return [];
  const children = entries(node);
  const chosen = new Set(matcher.matchKeys(children.map(([key]) => key)));
  const matched = children.filter(([key]) => chosen.has(key));
  const followed = rest.length === 0 ? matched : matched.slice(0, 1);
  return followed.flatMap(([, value]) => valuesAt(value, rest, scope));
}

function renderKeyParts(parts: readonly FilterKeyPart[]): string {
  let out = '';
  parts.forEach((part, i) => {
    if (part.type === 'key') {
      out += (i > 0 ? '.' : '') + part.matcher.render();
    } else if (part.type === 'slot') {
      out += `[${part.matcher.render()}]`;
    } else {
      const bound = (n: number | undefined): string => (n === undefined ? '' : String(n));
      const step = part.step === undefined ? '' : `:${part.step}`;
      out += `[${bound(part.start)}:${bound(part.stop)}${step}]`;
    }
  });
  return out;
}

/**
 * A filter expression over container items (`[key=value&...]`).
 *
 * `test` decides one item; `select` narrows a list of items and may differ
 * from element-wise `test` (see {@link FirstFilter} and {@link OrFilter}).
 */
export abstract class Filter {
  abstract test(node: unknown, scope: TraversalScope): boolean;

  /**
   * Indices of the values that pass, ascending within one filter.
   */
  selectIndices(values: readonly unknown[], scope: TraversalScope): number[] {
    const out: number[] = [];
    values.forEach((value, i) => {
      if (this.test(value, scope)) out.push(i);
    });
    return out;
  }

  /** Narrows `items`, judging each by `valueOf(item)`. */
  select<T>(
    items: readonly T[],
    valueOf: (item: T) => unknown,
    scope: TraversalScope
  ): T[] {
    return this.selectIndices(items.map(valueOf), scope).map((i) => items[i]);
  }

  abstract resolve(
    bindings: Bindings,
    partial: boolean,
    registry: TransformRegistry
  ): Filter;

  abstract render(): string;

  toString(): string {
    return this.render();
  }
}

/**
 * Leaf comparison: `key|transform<op>value`.
 *
 * Logic:
 * 1. Non-container items never pass a positive comparison.
 * 2. Collect the values the key path reaches.
 * 3. Run each through the transforms, then compare; any passing value makes
 *    the item pass.
 * 4. `!=` is the negation of `=`: an item passes when no value equals, which
 *    includes items without the key.
 */
export class KeyValueFilter extends Filter {
  readonly key: readonly FilterKeyPart[];
  readonly operator: ComparisonOperator;
  readonly pattern: ValuePattern;
  readonly transforms: readonly TransformSpec[];

  constructor(
    key: readonly FilterKeyPart[],
    operator: ComparisonOperator,
    pattern: ValuePattern,
    transforms: readonly TransformSpec[] = []
  ) {
    super();
    this.key = key;
    this.operator = operator;
    this.pattern = pattern;
    this.transforms = transforms;
  }

  test(node: unknown, scope: TraversalScope): boolean {
    if (this.operator === '!=') return !this.anyValue(node, '=', scope);
    return this.anyValue(node, this.operator, scope);
  }

  private anyValue(
    node: unknown,
    operator: ComparisonOperator,
    scope: TraversalScope
  ): boolean {
    if (!isContainer(node)) return false;
    const pattern =
      this.pattern instanceof Matcher
        ? this.pattern.bind(scope, node, 'read')
        : this.pattern;
    return valuesAt(node, this.key, scope).some((value) =>
      satisfies(scope.registry.apply(value, this.transforms), operator, pattern)
    );
  }

  resolve(
    bindings: Bindings,
    partial: boolean,
    registry: TransformRegistry
  ): KeyValueFilter {
    const key = this.key.map((part): FilterKeyPart =>
      part.type === 'slice'
        ? part
        : { type: part.type, matcher: part.matcher.resolve(bindings, partial, registry) }
    );
    return new KeyValueFilter(
      key,
      this.operator,
      this.pattern.resolve(bindings, partial, registry),
      this.transforms
    );
  }

  render(): string {
    return `${renderKeyParts(this.key)}${renderTransforms(this.transforms)}${this.operator}${this.pattern.render()}`;
  }
}

/** Conjunction; `select` narrows through each filter in turn. */
export class AndFilter extends Filter {
  readonly filters: readonly Filter[];

  constructor(filters: readonly Filter[]) {
    super();
    this.filters = filters;
  }

  test(node: unknown, scope: TraversalScope): boolean {
    return this.filters.every((filter) => filter.test(node, scope));
  }

  selectIndices(values: readonly unknown[], scope: TraversalScope): number[] {
    let indices = values.map((_, i) => i);
    for (const filter of this.filters) {
      const kept = filter.selectIndices(
        indices.map((i) => values[i]),
        scope
      );
      indices = kept.map((k) => indices[k]);
    }
    return indices;
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): AndFilter {
    return new AndFilter(this.filters.map((f) => f.resolve(bindings, partial, registry)));
  }

  render(): string {
    return this.filters.map((filter) => filter.render()).join('&');
  }
}

/**
 * Disjunction; `select` yields each filter's selection in turn, skipping
 * positions an earlier filter already yielded.
 */
export class OrFilter extends Filter {
  readonly filters: readonly Filter[];

  constructor(filters: readonly Filter[]) {
    super();
    this.filters = filters;
  }

  test(node: unknown, scope: TraversalScope): boolean {
    return this.filters.some((filter) => filter.test(node, scope));
  }

  selectIndices(values: readonly unknown[], scope: TraversalScope): number[] {
    const seen = new Set<number>();
    const out: number[] = [];
    for (const filter of this.filters) {
      for (const i of filter.selectIndices(values, scope)) {
        if (seen.has(i)) continue;
        seen.add(i);
        out.push(i);
      }
    }
    return out;
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): OrFilter {
    return new OrFilter(this.filters.map((f) => f.resolve(bindings, partial, registry)));
  }

  render(): string {
    return this.filters.map((filter) => filter.render()).join(',');
  }
}

/** Parenthesised sub-expression. */
export class GroupFilter extends Filter {
  readonly inner: Filter;

  constructor(inner: Filter) {
    super();
    this.inner = inner;
  }

  test(node: unknown, scope: TraversalScope): boolean {
    return this.inner.test(node, scope);
  }

  selectIndices(values: readonly unknown[], scope: TraversalScope): number[] {
    return this.inner.selectIndices(values, scope);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): GroupFilter {
    return new GroupFilter(this.inner.resolve(bindings, partial, registry));
  }

  render(): string {
    return `(${this.inner.render()})`;
  }
}

export class NotFilter extends Filter {
  readonly inner: Filter;

  constructor(inner: Filter) {
    super();
    this.inner = inner;
  }

  test(node: unknown, scope: TraversalScope): boolean {
    return !this.inner.test(node, scope);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): NotFilter {
    return new NotFilter(this.inner.resolve(bindings, partial, registry));
  }

  render(): string {
    return `!${this.inner.render()}`;
  }
}

/** First item the inner filter selects, if any. */
export class FirstFilter extends Filter {
  readonly inner: Filter;

  constructor(inner: Filter) {
    super();
    this.inner = inner;
  }

  test(node: unknown, scope: TraversalScope): boolean {
    return this.inner.test(node, scope);
  }

  selectIndices(values: readonly unknown[], scope: TraversalScope): number[] {
    return this.inner.selectIndices(values, scope).slice(0, 1);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): FirstFilter {
    return new FirstFilter(this.inner.resolve(bindings, partial, registry));
  }

  render(): string {
    return `${this.inner.render()}?`;
  }
}
