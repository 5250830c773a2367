import type { Bindings, TraversalScope } from '../engine/scope';
import {
  applyRemovals,
  applyUpdates,
  buildDefault,
  type DepthStack,
  INITIAL_STATE,
  type Frame,
  type MutationState,
  type WalkResult
} from '../engine/traversal';
import {
  MissingPayloadError,
  StructuralTypeError,
  UnsupportedMutationError
} from '../errors';
import type { BindMode, Matcher } from '../matchers/base';
import { Const, literal, Numeric, Str } from '../matchers/literals';
import type { SpecialToken } from '../matchers/patterns';
import { type Filter, sliceIndices } from '../predicates/filters';
import type { TransformRegistry } from '../path/transforms';
import { normalizeKey } from '../utils/key-quoting';
import { isIndex, isString } from '../utils/type-guards';
import {
  append,
  assign,
  discard,
  type Entry,
  entries,
  isMissing,
  lookup,
  propertyName,
  replaceElements,
  resolveIndex
} from '../value/containers';
import { deepEqual } from '../value/equality';
import { describeKind, FieldRecord, kindOf } from '../value/kinds';
import { ANY, AccessSegment, type Segment, updateEach } from './segment';

/** Entries of a keyed container whose keys the matcher accepts. */
function keyedItems(node: unknown, matcher: Matcher, filtered: boolean): Entry[] {
  const children = entries(node);
  if (!filtered) return children;
  const chosen = new Set(matcher.matchKeys(children.map(([key]) => key)));
  return children.filter(([key]) => chosen.has(key));
}

/** The single element a literal index addresses, if present. */
function indexedItem(node: unknown, matcher: Matcher): Entry[] {
  if (!(matcher instanceof Const) || !isIndex(matcher.value)) return [];
  const value = lookup(node, matcher.value);
  return isMissing(value) ? [] : [[matcher.value, value]];
}

/** Rendered key text; quoted strings use the normal form. */
function keyText(matcher: Matcher): string {
  return matcher instanceof Str ? normalizeKey(matcher.value) : matcher.render();
}

/** A one-entry mapping for a literal key, or an empty one. */
function seededMapping(matcher: Matcher): Record<string, unknown> {
  if (matcher.isPattern() || !(matcher instanceof Const)) return {};
  const name = propertyName(matcher.value);
  return name === undefined ? {} : { [name]: null };
}

/**
 * Base of the operators that select children through a key matcher.
 */
abstract class KeyedSegment extends AccessSegment {
  readonly matcher: Matcher;

  constructor(matcher: Matcher) {
    super();
    this.matcher = matcher;
  }

  isPattern(): boolean {
    return this.matcher.isPattern();
  }

  referenceDepth(): number {
    return this.matcher.referenceDepth();
  }

  protected bound(scope: TraversalScope, node: unknown, mode: BindMode): Matcher {
    return this.matcher.bind(scope, node, mode);
  }

  pop(node: unknown, key: unknown): unknown {
    return discard(node, key);
  }

  remove(node: unknown, value: unknown, scope: TraversalScope): unknown {
    let current = node;
    for (const [key, child] of this.items(node, scope)) {
      if (value === ANY || deepEqual(child, value)) current = discard(current, key);
    }
    return current;
  }

  /**
   * Same operator kind and a matcher that accepts the other's key.
   */
  matchSegment(other: Segment, specials: boolean): unknown[] | undefined {
    if (!(other instanceof KeyedSegment) || other.constructor !== this.constructor) {
      return undefined;
    }
    if (!this.matcher.matchable(other.matcher, specials)) return undefined;
    const found = this.matcher.matchKeys([other.matcher.value]);
    return found.length > 0 ? [found[0]] : undefined;
  }
}

/**
 * `.key`: mapping access. A literal integer also indexes a sequence unless
 * the call is strict.
 */
export class Key extends KeyedSegment {
  items(
    node: unknown,
    scope: TraversalScope,
    filtered = true,
    mode: BindMode = 'read'
  ): Entry[] {
    const kind = kindOf(node);
    if (kind === 'mapping') {
      return keyedItems(node, this.bound(scope, node, mode), filtered);
    }
    if (kind === 'sequence' && !scope.strict) {
      return filtered ? indexedItem(node, this.bound(scope, node, mode)) : entries(node);
    }
    return [];
  }

  concrete(key: unknown): Key {
    return new Key(literal(key));
  }

  update(node: unknown, key: unknown, value: unknown): unknown {
    return assign(node, key, value === ANY ? this.defaultValue() : value);
  }

  upsert(node: unknown, value: unknown, scope: TraversalScope): unknown {
    if (kindOf(node) === 'record') {
      throw new StructuralTypeError(this.render(true), describeKind(node));
    }
    const payload = value === ANY ? this.defaultValue() : value;
    const matcher = this.bound(scope, node, 'write');
    if (!matcher.isPattern()) return assign(node, matcher.value, payload);
    let current = node;
    for (const [key] of this.items(node, scope, true, 'write')) {
      current = assign(current, key, payload);
    }
    return current;
  }

  defaultValue(): unknown {
    return seededMapping(this.matcher);
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): Key {
    return new Key(this.matcher.resolve(bindings, partial, registry));
  }

  render(top: boolean): string {
    const text = keyText(this.matcher);
    return top ? text : `.${text}`;
  }
}

/** `@field`: field access on records (class instances). */
export class Attr extends KeyedSegment {
  items(
    node: unknown,
    scope: TraversalScope,
    filtered = true,
    mode: BindMode = 'read'
  ): Entry[] {
    if (kindOf(node) !== 'record') return [];
    return keyedItems(node, this.bound(scope, node, mode), filtered);
  }

  concrete(key: unknown): Attr {
    return new Attr(literal(key));
  }

  update(node: unknown, key: unknown, value: unknown): unknown {
    return assign(node, key, value === ANY ? this.defaultValue() : value);
  }

  upsert(node: unknown, value: unknown, scope: TraversalScope): unknown {
    if (kindOf(node) !== 'record') {
      throw new StructuralTypeError(this.render(), describeKind(node));
    }
    const payload = value === ANY ? this.defaultValue() : value;
    const matcher = this.bound(scope, node, 'write');
    if (!matcher.isPattern()) return assign(node, matcher.value, payload);
    let current = node;
    for (const [key] of this.items(node, scope, true, 'write')) {
      current = assign(current, key, payload);
    }
    return current;
  }

  defaultValue(): unknown {
    return new FieldRecord(seededMapping(this.matcher));
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): Attr {
    return new Attr(this.matcher.resolve(bindings, partial, registry));
  }

  render(): string {
    return `@${keyText(this.matcher)}`;
  }
}

/**
 * `[i]`: sequence index (negative counts from the end). Falls back to
 * mapping keys unless the call is strict. Sets have no positions; removal by
 * value deletes the equal member.
 */
export class Slot extends KeyedSegment {
  items(
    node: unknown,
    scope: TraversalScope,
    filtered = true,
    mode: BindMode = 'read'
  ): Entry[] {
    const kind = kindOf(node);
    if (kind === 'sequence' && Array.isArray(node)) {
      if (!filtered) return entries(node);
      const matcher = this.bound(scope, node, mode);
      if (!matcher.isPattern()) return indexedItem(node, matcher);
      const chosen = new Set(matcher.matches(node.map((_, i) => i)));
      return entries(node).filter(([i]) => chosen.has(i));
    }
    if (kind === 'mapping' && !scope.strict) {
      return keyedItems(node, this.bound(scope, node, mode), filtered);
    }
    return [];
  }

  concrete(key: unknown): Slot {
    return new Slot(literal(key));
  }

  update(node: unknown, key: unknown, value: unknown): unknown {
    return assign(node, key, value === ANY ? this.defaultValue() : value);
  }

  /**
   * A literal index past the end pads the sequence with `null`.
   */
  upsert(node: unknown, value: unknown, scope: TraversalScope): unknown {
    const kind = kindOf(node);
    if (kind === 'record' || kind === 'set') {
      throw new StructuralTypeError(this.render(), describeKind(node));
    }
    const payload = value === ANY ? this.defaultValue() : value;
    const matcher = this.bound(scope, node, 'write');
    if (!matcher.isPattern()) {
      if (Array.isArray(node) && !isIndex(matcher.value)) return node;
      return assign(node, matcher.value, payload);
    }
    let current = node;
    for (const [key] of this.items(node, scope, true, 'write')) {
      current = assign(current, key, payload);
    }
    return current;
  }

  remove(node: unknown, value: unknown, scope: TraversalScope): unknown {
    if (node instanceof Set) {
      if (value === ANY) return node;
      for (const member of node) {
        if (deepEqual(member, value)) return discard(node, member);
      }
      return node;
    }
    if (!Array.isArray(node)) return super.remove(node, value, scope);

    const doomed = this.items(node, scope)
      .filter(([, child]) => value === ANY || deepEqual(child, value))
      .map(([key]) => resolveIndex(key, node.length) ?? -1)
      .filter((index) => index >= 0)
      .sort((a, b) => b - a);
    return doomed.reduce<unknown>((current, index) => discard(current, index), node);
  }

  defaultValue(): unknown {
    const matcher = this.matcher;
    if (matcher instanceof Const && !matcher.isPattern() && isString(matcher.value)) {
      return seededMapping(matcher);
    }
    return [];
  }

  leafDefault(): unknown {
    const matcher = this.matcher;
    if (matcher instanceof Numeric && isIndex(matcher.value) && matcher.value >= 0) {
      return new Array<unknown>(matcher.value + 1).fill(null);
    }
    return this.defaultValue();
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): Slot {
    return new Slot(this.matcher.resolve(bindings, partial, registry));
  }

  render(): string {
    return `[${keyText(this.matcher)}]`;
  }
}

/**
 * Bounds of a step-1 slice as a `[from, to)` range.
 */
function contiguousRange(length: number, start?: number, stop?: number): [number, number] {
  const clamp = (bound: number): number =>
    Math.min(Math.max(bound < 0 ? bound + length : bound, 0), length);
  const from = start === undefined ? 0 : clamp(start);
  const to = stop === undefined ? length : clamp(stop);
  return [from, Math.max(from, to)];
}

/**
 * `[start:stop:step]`: a sub-sequence (or substring) selected as one value.
 */
export class Slice extends AccessSegment {
  readonly start: number | undefined;
  readonly stop: number | undefined;
  readonly step: number | undefined;

  constructor(start?: number, stop?: number, step?: number) {
    super();
    this.start = start;
    this.stop = stop;
    this.step = step;
  }

  private indices(length: number): number[] {
    return sliceIndices(length, this.start, this.stop, this.step);
  }

  private elementsOf(node: unknown): unknown[] | undefined {
    if (Array.isArray(node)) return node;
    if (isString(node)) return [...node];
    return undefined;
  }

  private selection(node: unknown): unknown {
    const elements = this.elementsOf(node);
    if (elements === undefined) return undefined;
    const picked = this.indices(elements.length).map((i) => elements[i]);
    return isString(node) ? picked.join('') : picked;
  }

  items(node: unknown): Entry[] {
    const picked = this.selection(node);
    return picked === undefined ? [] : [[this, picked]];
  }

  concrete(): Slice {
    return this;
  }

  isEmpty(node: unknown): boolean {
    const elements = this.elementsOf(node);
    return elements === undefined || this.indices(elements.length).length === 0;
  }

  /**
   * Replaces the selected elements.
   *
   * Logic:
   * 1. A step-1 slice is spliced: the selection becomes the value's
   *    elements, which may change the length.
   * 2. An extended slice needs exactly as many elements as it selects.
   * 3. A string node is rebuilt from its characters the same way.
   */
  update(node: unknown, _key: unknown, value: unknown): unknown {
    const elements = this.elementsOf(node);
    if (elements === undefined) {
      throw new StructuralTypeError(this.render(), describeKind(node));
    }
    if (deepEqual(this.selection(node), value)) return node;

    const incoming =
      value === ANY
        ? []
        : Array.isArray(value)
          ? value
          : isString(value) && isString(node)
            ? [...value]
            : [value];

    let next: unknown[];
    if (this.step === undefined || this.step === 1) {
      const [from, to] = contiguousRange(elements.length, this.start, this.stop);
      next = [...elements.slice(0, from), ...incoming, ...elements.slice(to)];
    } else {
      const indices = this.indices(elements.length);
      if (indices.length !== incoming.length) {
        throw new UnsupportedMutationError(
          `Cannot assign ${incoming.length} elements to ${this.render()} selecting ${indices.length}`
        );
      }
      next = [...elements];
      indices.forEach((index, i) => {
        next[index] = incoming[i];
      });
    }

    if (isString(node)) return next.join('');
    return Array.isArray(node) ? replaceElements(node, next) : node;
  }

  upsert(node: unknown, value: unknown): unknown {
    return this.update(node, this, value);
  }

  pop(node: unknown): unknown {
    const elements = this.elementsOf(node);
    if (elements === undefined) return node;
    const doomed = new Set(this.indices(elements.length));
    if (doomed.size === 0) return node;
    const kept = elements.filter((_, i) => !doomed.has(i));
    if (isString(node)) return kept.join('');
    return Array.isArray(node) ? replaceElements(node, kept) : node;
  }

  remove(node: unknown, value: unknown): unknown {
    if (value !== ANY && !deepEqual(this.selection(node), value)) return node;
    return this.pop(node);
  }

  defaultValue(): unknown {
    return [];
  }

  /** Number of elements the slice can select; unbounded is `Infinity`. */
  cardinality(): number {
    const start = this.start ?? 0;
    const stop = this.stop ?? Infinity;
    const step = this.step ?? 1;
    return Math.max(0, Math.floor((stop - start) / step));
  }

  matchSegment(other: Segment): unknown[] | undefined {
    if (!(other instanceof Slice)) return undefined;
    return this.cardinality() >= other.cardinality() ? [other.render()] : undefined;
  }

  render(): string {
    if (this.start === undefined && this.stop === undefined && this.step === undefined) {
      return '[]';
    }
    const bound = (n: number | undefined): string => (n === undefined ? '' : String(n));
    const step = this.step === undefined ? '' : `:${this.step}`;
    return `[${bound(this.start)}:${bound(this.stop)}${step}]`;
  }
}

/**
 * `[+]` appends; `[+?]` appends only when no equal element is present.
 * Selects nothing on reads and never removes.
 */
export class Appender extends AccessSegment {
  readonly token: SpecialToken;

  constructor(token: SpecialToken = '+') {
    super();
    this.token = token;
  }

  items(): Entry[] {
    return [];
  }

  concrete(): Appender {
    return this;
  }

  isEmpty(): boolean {
    return true;
  }

  blocksLeaf(): boolean {
    return false;
  }

  update(node: unknown, _key: unknown, value: unknown): unknown {
    return this.upsert(node, value);
  }

  upsert(node: unknown, value: unknown): unknown {
    const payload = value === ANY ? this.defaultValue() : value;
    if (this.token === '+?') {
      const members = Array.isArray(node) ? node : node instanceof Set ? [...node] : [];
      if (members.some((member) => deepEqual(member, payload))) return node;
    }
    return append(node, payload);
  }

  pop(node: unknown): unknown {
    return node;
  }

  remove(node: unknown): unknown {
    return node;
  }

  /**
   * Logic:
   * 1. Inside a freshly built default the element already exists as the
   *    last one; it is updated in place.
   * 2. Otherwise the tail is applied to a new default element, which is then
   *    appended.
   */
  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    state: MutationState,
    scope: TraversalScope
  ): unknown {
    if (tail.length === 0 || state.nop) {
      return updateEach(this, tail, node, payload, state, scope);
    }
    if (state.hasDefaults && Array.isArray(node) && node.length > 0) {
      const last = node.length - 1;
      return assign(node, last, applyUpdates(tail, node[last], payload, state, scope));
    }
    const element = applyUpdates(
      tail,
      buildDefault(tail, scope),
      payload,
      { ...state, hasDefaults: true },
      scope
    );
    return this.upsert(node, element);
  }

  defaultValue(): unknown {
    return [];
  }

  matchSegment(other: Segment): unknown[] | undefined {
    return other instanceof Appender && other.token === this.token ? [this.token] : undefined;
  }

  render(): string {
    return `[${this.token}]`;
  }
}

/**
 * `[filter]`: narrows a sequence (or set) to the elements that pass, selected
 * as one new value. The view is read-only: updates raise, and only a
 * terminal removal is supported, deleting the passing elements.
 */
export class SliceFilter extends AccessSegment {
  readonly filter: Filter;

  constructor(filter: Filter) {
    super();
    this.filter = filter;
  }

  items(node: unknown, scope: TraversalScope): Entry[] {
    if (Array.isArray(node)) {
      return this.filter.select(entries(node), ([, value]) => value, scope);
    }
    if (node instanceof Set) {
      const members = [...node].map((member): Entry => [member, member]);
      return this.filter.select(members, ([, value]) => value, scope);
    }
    return [];
  }

  concrete(key: unknown): Slot {
    return new Slot(literal(key));
  }

  pushChildren(stack: DepthStack, frame: Frame): Iterable<WalkResult> {
    const { node } = frame;
    if (!Array.isArray(node) && !(node instanceof Set)) return [];
    const kept = this.items(node, frame.scope).map(([, value]) => value);
    stack.push({
      ops: frame.ops,
      node: node instanceof Set ? new Set(kept) : kept,
      prefix: [...frame.prefix, new Slice()],
      scope: frame.scope
    });
    return [];
  }

  isEmpty(node: unknown, scope: TraversalScope): boolean {
    return this.items(node, scope).length === 0;
  }

  update(): never {
    throw new UnsupportedMutationError(
      `Updates are not supported through the filtered selection ${this.render()}`
    );
  }

  upsert(): never {
    return this.update();
  }

  applyUpdate(): never {
    return this.update();
  }

  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    nop: boolean,
    scope: TraversalScope
  ): unknown {
    if (tail.length > 0) {
      throw new UnsupportedMutationError(
        `Removal below the filtered selection ${this.render()} is not supported`
      );
    }
    return nop ? node : this.remove(node, payload, scope);
  }

  pop(node: unknown, key: unknown): unknown {
    return discard(node, key);
  }

  remove(node: unknown, value: unknown, scope: TraversalScope): unknown {
    const doomed = this.items(node, scope).filter(
      ([, child]) => value === ANY || deepEqual(child, value)
    );
    if (doomed.length === 0) return node;
    if (node instanceof Set) {
      return doomed.reduce<unknown>((current, [member]) => discard(current, member), node);
    }
    if (!Array.isArray(node)) return node;
    const indices = new Set(doomed.map(([key]) => key));
    const kept = node.filter((_, i) => !indices.has(i));
    return replaceElements(node, kept);
  }

  defaultValue(): unknown {
    return [];
  }

  matchSegment(other: Segment): unknown[] | undefined {
    if (!(other instanceof SliceFilter)) return undefined;
    return other.filter.render() === this.filter.render() ? [this.render()] : undefined;
  }

  resolve(bindings: Bindings, partial: boolean, registry: TransformRegistry): SliceFilter {
    return new SliceFilter(this.filter.resolve(bindings, partial, registry));
  }

  render(): string {
    return `[${this.filter.render()}]`;
  }
}

/**
 * `-`: swaps the direction of what follows. An update through it removes the
 * payload, a removal through it writes the payload.
 */
export class Invert extends AccessSegment {
  items(node: unknown): Entry[] {
    return [['-', node]];
  }

  concrete(): Invert {
    return this;
  }

  update(_node: unknown, _key: unknown, value: unknown): unknown {
    return value;
  }

  upsert(_node: unknown, value: unknown): unknown {
    return value;
  }

  pop(node: unknown): unknown {
    return node;
  }

  remove(node: unknown): unknown {
    return node;
  }

  applyUpdate(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    _state: MutationState,
    scope: TraversalScope
  ): unknown {
    return applyRemovals(tail, node, payload, false, scope);
  }

  /**
   * @throws {MissingPayloadError} When no payload is given: there is nothing
   *   to write.
   */
  applyRemove(
    tail: readonly Segment[],
    node: unknown,
    payload: unknown,
    _nop: boolean,
    scope: TraversalScope
  ): unknown {
    if (payload === ANY) {
      throw new MissingPayloadError(
        'Removal through an inverted path needs the value to write'
      );
    }
    return applyUpdates(
      tail,
      node,
      payload,
      INITIAL_STATE,
      scope
    );
  }

  defaultValue(): unknown {
    return null;
  }

  matchSegment(other: Segment): unknown[] | undefined {
    return other instanceof Invert ? ['-'] : undefined;
  }

  render(): string {
    return '-';
  }
}

/**
 * The empty path: selects the value itself. Updating replaces it; removing
 * yields `null`.
 */
export class Empty extends AccessSegment {
  items(node: unknown): Entry[] {
    return [['', node]];
  }

  concrete(): Empty {
    return this;
  }

  isEmpty(): boolean {
    return false;
  }

  requiresContainer(): boolean {
    return false;
  }

  update(_node: unknown, _key: unknown, value: unknown): unknown {
    return value;
  }

  upsert(_node: unknown, value: unknown): unknown {
    return value;
  }

  pop(): unknown {
    return null;
  }

  remove(node: unknown, value: unknown): unknown {
    return value === ANY || deepEqual(node, value) ? null : node;
  }

  defaultValue(): unknown {
    return null;
  }

  matchSegment(other: Segment): unknown[] | undefined {
    return other instanceof Empty ? [''] : undefined;
  }

  render(): string {
    return '';
  }
}
