import { Matcher, type ValuePattern } from './matchers/base';
import { literal } from './matchers/literals';
import { RegexFirst, RegexMatcher, Wildcard, WildcardFirst } from './matchers/patterns';
import { Reference, Subst } from './matchers/templates';
import {
  Appender,
  Attr,
  Empty,
  Invert,
  Key,
  Slice,
  SliceFilter,
  Slot
} from './operators/access';
import { AndGroup, FirstGroup, NotGroup, OrGroup } from './operators/groups';
import {
  type Accessor,
  Recursive,
  RecursiveFirst,
  type RecursiveOptions
} from './operators/recursive';
import { AccessSegment, type Branch, type CutKind, Segment } from './operators/segment';
import {
  FilterWrap,
  NopWrap,
  type TypeName,
  TypeRestriction,
  ValueGuard
} from './operators/wrappers';
import type { ComparisonOperator } from './predicates/compare';
import {
  BytesGlob,
  Glob,
  MappingGlobEntry,
  MappingPattern,
  SequencePattern,
  SetPattern,
  StringGlob,
  ValueGroup
} from './predicates/containers';
import {
  AndFilter,
  type Filter,
  type FilterKeyPart,
  FirstFilter,
  GroupFilter,
  KeyValueFilter,
  NotFilter,
  OrFilter
} from './predicates/filters';
import { OperatorChain } from './path/chain';
import type { TransformSpec } from './path/transforms';

/** A matcher, or a plain value standing for its literal matcher. */
export type KeyInput = Matcher | string | number | boolean | bigint | Uint8Array | null;

/** A recursion step: an access operator, optionally with a cut marker. */
export type AccessorInput = AccessSegment | Accessor;

/** A group branch, or a lone operator standing for a one-operator branch. */
export type BranchInput = Branch | Segment;

function toMatcher(key: KeyInput): Matcher {
  return key instanceof Matcher ? key : literal(key);
}

function isValuePattern(value: unknown): value is ValuePattern {
  return (
    value instanceof Matcher ||
    value instanceof SequencePattern ||
    value instanceof MappingPattern ||
    value instanceof SetPattern ||
    value instanceof StringGlob ||
    value instanceof BytesGlob ||
    value instanceof ValueGroup
  );
}

/** Patterns pass through; any other value becomes its literal matcher. */
export function toPattern(value: unknown): ValuePattern {
  return isValuePattern(value) ? value : literal(value);
}

// ---------------------------------------------------------------------------
// Chains and access operators
// ---------------------------------------------------------------------------

/**
 * Builds a chain from operators.
 *
 * @example
 * chain(key('hello'), key('there'), slot(1))  // hello.there[1]
 */
export function chain(...ops: Segment[]): OperatorChain {
  return new OperatorChain(ops);
}

/** `.name`: mapping key. */
export function key(name: KeyInput): Key {
  return new Key(toMatcher(name));
}

/** `@name`: record field. */
export function attr(name: KeyInput): Attr {
  return new Attr(toMatcher(name));
}

/** `[index]`: sequence index, falling back to a mapping key. */
export function slot(index: KeyInput): Slot {
  return new Slot(toMatcher(index));
}

/** `[start:stop:step]`; no bounds is `[]`. */
export function slice(start?: number, stop?: number, step?: number): Slice {
  return new Slice(start, stop, step);
}

/** `[+]` */
export function append(): Appender {
  return new Appender('+');
}

/** `[+?]` */
export function appendUnique(): Appender {
  return new Appender('+?');
}

/** `-` */
export function invert(): Invert {
  return new Invert();
}

/** The empty path: the value itself. */
export function root(): Empty {
  return new Empty();
}

/** `[filter]`: the passing elements as one read-only sequence. */
export function sliceFilter(filter: Filter): SliceFilter {
  return new SliceFilter(filter);
}

// ---------------------------------------------------------------------------
// Matchers
// ---------------------------------------------------------------------------

/** `*` */
export function any(): Wildcard {
  return new Wildcard();
}

/** `*?` */
export function anyFirst(): WildcardFirst {
  return new WildcardFirst();
}

/** `/source/`: keys the expression matches in full. */
export function regex(source: string, flags = ''): RegexMatcher {
  return new RegexMatcher(source, flags);
}

/** `/source/?` */
export function regexFirst(source: string, flags = ''): RegexFirst {
  return new RegexFirst(source, flags);
}

/** `$0` or `$(name)`, resolved from the call's bindings. */
export function subst(name: number | string, ...transforms: TransformSpec[]): Subst {
  return new Subst(name, transforms);
}

/**
 * `$$(path)`: the first value `target` selects, used as a literal. `depth` 0
 * starts at the root, 1 at the current node, 2 at its parent and so on.
 */
export function ref(target?: OperatorChain, depth = 0): Reference {
  return new Reference(target, depth);
}

// ---------------------------------------------------------------------------
// Recursion
// ---------------------------------------------------------------------------

function isList<T>(value: unknown): value is readonly T[] {
  return Array.isArray(value);
}

function toRecursionTarget(target: KeyInput | readonly AccessorInput[]): Matcher | Accessor[] {
  if (!isList<AccessorInput>(target)) return toMatcher(target);
  return target.map((item): Accessor =>
    item instanceof AccessSegment ? { segment: item, cut: 'none' } : item
  );
}

/**
 * `**` (no target), `*name` (chain of one key) or `*(a, b)` (any of the
 * given accessors at each step).
 */
export function recursive(
  target: KeyInput | readonly AccessorInput[] = any(),
  options: RecursiveOptions = {}
): Recursive {
  return new Recursive(toRecursionTarget(target), options);
}

/** `**?` and friends: only the first match is read. */
export function recursiveFirst(
  target: KeyInput | readonly AccessorInput[] = any(),
  options: RecursiveOptions = {}
): RecursiveFirst {
  return new RecursiveFirst(toRecursionTarget(target), options);
}

// ---------------------------------------------------------------------------
// Groups
// ---------------------------------------------------------------------------

function makeBranch(cutKind: CutKind, ops: Segment[]): Branch {
  return { ops, cut: cutKind };
}

export function branch(...ops: Segment[]): Branch {
  return makeBranch('none', ops);
}

/** A branch ending in `#`: when it matches, later branches are skipped. */
export function cut(...ops: Segment[]): Branch {
  return makeBranch('hard', ops);
}

/** A branch ending in `##`: later branches skip the paths it matched. */
export function softCut(...ops: Segment[]): Branch {
  return makeBranch('soft', ops);
}

function toBranches(inputs: readonly BranchInput[]): Branch[] {
  return inputs.map((input) => (input instanceof Segment ? branch(input) : input));
}

/** `(a, b)` */
export function or(...branches: BranchInput[]): OrGroup {
  return new OrGroup(toBranches(branches));
}

/** `(a & b)` */
export function and(...branches: BranchInput[]): AndGroup {
  return new AndGroup(toBranches(branches));
}

/** `(a, b)?` */
export function first(...branches: BranchInput[]): FirstGroup {
  return new FirstGroup(toBranches(branches));
}

/** `(!a)`: every child the operators do not select. */
export function not(...ops: Segment[]): NotGroup {
  return new NotGroup(ops);
}

// ---------------------------------------------------------------------------
// Wrappers
// ---------------------------------------------------------------------------

/** `~op` */
export function nop(op: Segment): NopWrap {
  return new NopWrap(op);
}

/**
 * `op<operator>value`: keeps the children whose (transformed) value satisfies
 * the comparison.
 */
export function guard(
  op: AccessSegment | Recursive,
  operator: ComparisonOperator,
  value: unknown,
  transforms: readonly TransformSpec[] = []
): AccessSegment | Recursive {
  const pattern = toPattern(value);
  if (op instanceof Recursive) return op.withGuard({ operator, pattern, transforms });
  return new ValueGuard(op, operator, pattern, transforms);
}

/** `op:type` or, negated, `op:!type`. */
export function only(
  op: Segment,
  types: TypeName | readonly TypeName[],
  negate = false
): TypeRestriction {
  return new TypeRestriction(op, typeof types === 'string' ? [types] : types, negate);
}

/** `op&filter` */
export function where(op: AccessSegment, filter: Filter): FilterWrap {
  return new FilterWrap(op, filter);
}

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

/** Filter key step: mapping key or record field. */
export function fkey(name: KeyInput): FilterKeyPart {
  return { type: 'key', matcher: toMatcher(name) };
}

/** Filter key step: sequence elements by index. */
export function fslot(index: KeyInput): FilterKeyPart {
  return { type: 'slot', matcher: toMatcher(index) };
}

/** Filter key step: a sub-sequence. */
export function fslice(start?: number, stop?: number, step?: number): FilterKeyPart {
  return { type: 'slice', start, stop, step };
}

/**
 * `key<operator>value`. A plain key is one `key` step; dotted filter paths
 * are step lists.
 *
 * @example
 * filter('id', '=', 1)                        // id=1
 * filter([fkey('user'), fkey('id')], '>', 3)  // user.id>3
 */
export function filter(
  path: KeyInput | readonly FilterKeyPart[],
  operator: ComparisonOperator,
  value: unknown,
  transforms: readonly TransformSpec[] = []
): KeyValueFilter {
  const parts = isList<FilterKeyPart>(path) ? path : [fkey(path)];
  return new KeyValueFilter(parts, operator, toPattern(value), transforms);
}

/** `a&b` */
export function allOf(...filters: Filter[]): AndFilter {
  return new AndFilter(filters);
}

/** `a,b` */
export function anyOf(...filters: Filter[]): OrFilter {
  return new OrFilter(filters);
}

/** `(f)` */
export function grouped(inner: Filter): GroupFilter {
  return new GroupFilter(inner);
}

/** `!f` */
export function negated(inner: Filter): NotFilter {
  return new NotFilter(inner);
}

/** `f?`: the first passing item only. */
export function firstOf(inner: Filter): FirstFilter {
  return new FirstFilter(inner);
}

// ---------------------------------------------------------------------------
// Container patterns
// ---------------------------------------------------------------------------

/** `...`, optionally constrained and bounded (`...int:1:3`). */
export function glob(pattern?: unknown, min = 0, max?: number): Glob {
  return new Glob(pattern === undefined ? undefined : toPattern(pattern), min, max);
}

function toElement(value: unknown): ValuePattern | Glob {
  return value instanceof Glob ? value : toPattern(value);
}

/** `[1, ..., 3]` */
export function seq(...elements: unknown[]): SequencePattern {
  return new SequencePattern(elements.map(toElement));
}

/** `{a: 1, ...: *}`; a glob entry is {@link globEntry}. */
export function mapping(
  ...entries: (readonly [key: unknown, value: unknown] | MappingGlobEntry)[]
): MappingPattern {
  return new MappingPattern(
    entries.map((entry) =>
      entry instanceof MappingGlobEntry
        ? entry
        : { key: toPattern(entry[0]), value: toPattern(entry[1]) }
    )
  );
}

/** `...keys: value` inside a mapping pattern. */
export function globEntry(keys: Glob = glob(), value?: unknown): MappingGlobEntry {
  return new MappingGlobEntry(keys, value === undefined ? undefined : toPattern(value));
}

/** `{1, ..., 3}` */
export function set(...elements: unknown[]): SetPattern {
  return new SetPattern(elements.map(toElement));
}

/** `'abc'...` */
export function strGlob(...parts: (string | Glob)[]): StringGlob {
  return new StringGlob(parts);
}

/** `b'GIF'...` */
export function bytesGlob(...parts: (Uint8Array | Glob)[]): BytesGlob {
  return new BytesGlob(parts);
}

/** `(a, b)` as a value: any alternative. */
export function oneOf(...alternatives: unknown[]): ValueGroup {
  return new ValueGroup(alternatives.map(toPattern));
}
