import { z } from 'zod';

import type { Dereference, TraversalScope } from './engine/scope';
import {
  applyRemovals,
  applyUpdates,
  INITIAL_STATE,
  walk as walkOps,
  type WalkResult
} from './engine/traversal';
import { any, chain as chainOf, key, or, recursive, slice, softCut } from './builders';
import { InvalidOptionsError } from './errors';
import { Empty, Invert, Slice } from './operators/access';
import { ANY, type Segment } from './operators/segment';
import { assembleOps, OperatorChain } from './path/chain';
import { matchPath, type PathMatch, pathsOverlapping } from './path/match';
import { TransformRegistry, transforms as defaultRegistry } from './path/transforms';
import { deepCopy } from './value/copy';
import { isContainer, isMutable } from './value/kinds';
import { isNullish } from './utils/type-guards';

/**
 * Options shared by every call.
 *
 * - strict:          no Key/Slot cross-kind fallbacks, no leaf creation
 * - mutable:         `false` works on a deep copy of the root
 * - partial:         keep unbound template placeholders instead of raising
 * - bindings:        values for `$0` / `$(name)` placeholders
 * - applyTransforms: run the chain's transforms on read and written values
 * - registry:        where transforms are looked up
 */
export const CallOptionsSchema = z
  .object({
    strict: z.boolean().default(false),
    mutable: z.boolean().default(true),
    partial: z.boolean().default(false),
    bindings: z
      .union([z.array(z.unknown()), z.record(z.string(), z.unknown())])
      .optional(),
    applyTransforms: z.boolean().default(true),
    registry: z.instanceof(TransformRegistry).default(defaultRegistry)
  })
  .strict();

export type CallOptions = z.input<typeof CallOptionsSchema>;
export type ResolvedOptions = z.output<typeof CallOptionsSchema>;

export type GetOptions = CallOptions & {
  /** Returned by a non-pattern chain that selects nothing. */
  readonly default?: unknown;
  /** Returned by a pattern chain that selects nothing. */
  readonly patternDefault?: readonly unknown[];
};

export type MatchOptions = {
  /** Lets a pattern match a longer path; the last group takes the rest. */
  readonly partial?: boolean;
};

/** A concrete path in notation form and the value found there. */
export type PathValue = readonly [path: string, value: unknown];

/** A concrete chain and the value found there; {@link updateMulti} replays these. */
export type ChainValue = readonly [chain: OperatorChain, value: unknown];

/** One item of {@link removeMulti}: a chain, or a chain and the value to remove. */
export type RemoveItem = OperatorChain | readonly [chain: OperatorChain, value: unknown];

/** Decides whether a value is written. */
export type ValuePredicate = (value: unknown) => boolean;

/** Decides whether a chain is removed; absent chains are passed as they are. */
export type ChainPredicate = (chain: OperatorChain | null | undefined) => boolean;

/** One item of {@link updateIfMulti}; its own predicate replaces the shared one. */
export type ConditionalUpdate = readonly [
  chain: OperatorChain,
  value: unknown,
  predicate?: ValuePredicate
];

/**
 * Validates call options and fills in the defaults.
 *
 * @throws {InvalidOptionsError} Listing every schema issue.
 */
export function normalizeOptions(options: CallOptions = {}): ResolvedOptions {
  const parsed = CallOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '<options>'}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}

type Prepared = {
  readonly chain: OperatorChain;
  readonly scope: TraversalScope;
};

/** Scope for a chain; ancestors are tracked only when a reference needs them. */
function scopeFor(chain: OperatorChain, root: unknown, settings: ResolvedOptions): TraversalScope {
  return {
    root,
    strict: settings.strict,
    registry: settings.registry,
    parents: chain.maxReferenceDepth() >= 2 ? [] : undefined,
    dereference
  };
}

/**
 * Reference targets walk from their base value; the target's own transforms
 * apply to what it finds.
 */
const dereference: Dereference = (target, base, scope) => {
  const inner: TraversalScope = {
    ...scope,
    parents: target.maxReferenceDepth() >= 2 ? [] : undefined
  };
  return selections(target, base, inner).map(({ value }) =>
    target.apply(value, scope.registry)
  );
};

/**
 * Logic:
 * 1. Substitute template placeholders when bindings are given.
 * 2. Build the call scope over `root`.
 */
function prepare(chain: OperatorChain, root: unknown, settings: ResolvedOptions): Prepared {
  const resolved =
    settings.bindings === undefined
      ? chain
      : chain.resolve(settings.bindings, {
          partial: settings.partial,
          registry: settings.registry
        });
  return { chain: resolved, scope: scopeFor(resolved, root, settings) };
}

/** Everything the chain selects that also passes its guard. */
function selections(chain: OperatorChain, node: unknown, scope: TraversalScope): WalkResult[] {
  const found: WalkResult[] = [];
  for (const result of walkOps(chain.ops, node, scope)) {
    if (chain.guardMatches(result.value, scope.registry)) found.push(result);
  }
  return found;
}

/** Notation form of a concrete path, carrying the chain's transforms. */
function concretePath(chain: OperatorChain, path: readonly Segment[]): string {
  return new OperatorChain(path, chain.transforms).render();
}

/** First selection per distinct concrete path, in traversal order. */
function uniqueSelections(chain: OperatorChain, results: readonly WalkResult[]): WalkResult[] {
  const seen = new Set<string>();
  return results.filter(({ path }) => {
    const text = concretePath(chain, path);
    if (seen.has(text)) return false;
    seen.add(text);
    return true;
  });
}

function transformed(chain: OperatorChain, value: unknown, settings: ResolvedOptions): unknown {
  return settings.applyTransforms ? chain.apply(value, settings.registry) : value;
}

/** The values a chain reads, and whether it reads them as a pattern. */
type Reading = {
  readonly pattern: boolean;
  readonly values: unknown[];
};

function readWith(root: unknown, chain: OperatorChain, settings: ResolvedOptions): Reading {
  const prepared = prepare(chain, root, settings);
  return {
    pattern: prepared.chain.isPattern(),
    values: selections(prepared.chain, root, prepared.scope).map(({ value }) =>
      transformed(prepared.chain, value, settings)
    )
  };
}

/** A pattern reads as every value, any other chain as its first one. */
function firstOrAll({ pattern, values }: Reading): unknown {
  return pattern ? values : values[0];
}

/** The resolved chain and its distinct concrete selections. */
type Located = {
  readonly chain: OperatorChain;
  readonly found: readonly WalkResult[];
};

function locate(root: unknown, chain: OperatorChain, settings: ResolvedOptions): Located {
  const prepared = prepare(chain, root, settings);
  return {
    chain: prepared.chain,
    found: uniqueSelections(prepared.chain, selections(prepared.chain, root, prepared.scope))
  };
}

const isPresent: ValuePredicate = (value) => !isNullish(value);

/**
 * Reads the value (or, for a pattern, the values) a chain selects.
 *
 * @example
 * get({ hello: { there: [1, '2', 3] } }, chain(key('hello'), key('there'), slot(1)).pipe('int'))
 * // => 2
 *
 * @returns For a non-pattern chain the first value or `default`; for a pattern
 *   chain every value, or `patternDefault` when there is none.
 */
export function get(root: unknown, chain: OperatorChain, options: GetOptions = {}): unknown {
  const { default: fallback, patternDefault = [], ...rest } = options;
  const reading = readWith(root, chain, normalizeOptions(rest));
  if (reading.values.length === 0) return reading.pattern ? patternDefault : fallback;
  return firstOrAll(reading);
}

/** {@link get} per chain, leaving out the chains that select nothing. */
export function getMulti(
  root: unknown,
  chains: Iterable<OperatorChain>,
  options: CallOptions = {}
): unknown[] {
  const settings = normalizeOptions(options);
  const out: unknown[] = [];
  for (const chain of chains) {
    const reading = readWith(root, chain, settings);
    if (reading.values.length > 0) out.push(firstOrAll(reading));
  }
  return out;
}

/** Whether the chain selects anything. */
export function has(root: unknown, chain: OperatorChain, options: CallOptions = {}): boolean {
  const settings = normalizeOptions(options);
  const prepared = prepare(chain, root, settings);
  return selections(prepared.chain, root, prepared.scope).length > 0;
}

/**
 * Whether {@link update} through the chain would change `root` in place:
 * some container on the way is mutable. The empty path never does, since
 * it replaces the root instead.
 *
 * @example
 * mutatesInPlace(Object.freeze([{ a: 1 }]), chain(slot(0), key('a')))
 * // => true
 */
export function mutatesInPlace(
  root: unknown,
  chain: OperatorChain,
  options: CallOptions = {}
): boolean {
  const settings = normalizeOptions(options);
  const prepared = prepare(chain, root, settings);
  const ops = prepared.chain.ops.filter((op) => !(op instanceof Invert));
  if (ops.length === 0 || (ops.length === 1 && ops[0] instanceof Empty)) return false;
  let current = root;
  for (const op of ops) {
    if (isContainer(current) && isMutable(current)) return true;
    const [reached] = walkOps([op], current, prepared.scope);
    if (reached === undefined) return false;
    current = reached.value;
  }
  return false;
}

/**
 * Logic:
 * 1. An unguarded chain updates through its operators, creating what is
 *    missing.
 * 2. A guarded chain updates only the concrete paths whose current value
 *    passes the guard.
 */
function updateWith(
  root: unknown,
  chain: OperatorChain,
  value: unknown,
  settings: ResolvedOptions
): unknown {
  const prepared = prepare(chain, root, settings);
  const payload = value === ANY ? value : transformed(prepared.chain, value, settings);
  if (prepared.chain.guard === undefined) {
    return applyUpdates(prepared.chain.ops, root, payload, INITIAL_STATE, prepared.scope);
  }
  const targets = uniqueSelections(
    prepared.chain,
    selections(prepared.chain, root, prepared.scope)
  );
  let current = root;
  for (const { path } of targets) {
    current = applyUpdates(path, current, payload, INITIAL_STATE, {
      ...prepared.scope,
      root: current
    });
  }
  return current;
}

function removeWith(
  root: unknown,
  chain: OperatorChain,
  value: unknown,
  settings: ResolvedOptions
): unknown {
  const prepared = prepare(chain, root, settings);
  if (prepared.chain.guard === undefined) {
    return applyRemovals(prepared.chain.ops, root, value, false, prepared.scope);
  }
  const targets = uniqueSelections(
    prepared.chain,
    selections(prepared.chain, root, prepared.scope)
  ).reverse();
  let current = root;
  for (const { path } of targets) {
    current = applyRemovals(path, current, value, false, { ...prepared.scope, root: current });
  }
  return current;
}

function workingRoot(root: unknown, settings: ResolvedOptions): unknown {
  return settings.mutable ? root : deepCopy(root);
}

/**
 * Writes `value` everywhere the chain points, creating missing structure.
 *
 * @returns The updated root. Frozen containers on the way are replaced by
 *   updated copies, so the returned root is the one to keep.
 * @throws {StructuralTypeError} When the path runs through a scalar.
 */
export function update(
  root: unknown,
  chain: OperatorChain,
  value: unknown,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  return updateWith(workingRoot(root, settings), chain, value, settings);
}

/**
 * {@link update} when `predicate(value)` holds; by default, when the value is
 * not `null` or `undefined`.
 */
export function updateIf(
  root: unknown,
  chain: OperatorChain,
  value: unknown,
  predicate: ValuePredicate = isPresent,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  const working = workingRoot(root, settings);
  return predicate(value) ? updateWith(working, chain, value, settings) : working;
}

/** {@link updateIf} per item, in order, over one working root. */
export function updateIfMulti(
  root: unknown,
  items: Iterable<ConditionalUpdate>,
  predicate: ValuePredicate = isPresent,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  let current = workingRoot(root, settings);
  for (const [chain, value, own = predicate] of items) {
    if (own(value)) current = updateWith(current, chain, value, settings);
  }
  return current;
}

/** Applies several updates in order, over one working root. */
export function updateMulti(
  root: unknown,
  pairs: Iterable<readonly [chain: OperatorChain, value: unknown]>,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  let current = workingRoot(root, settings);
  for (const [chain, value] of pairs) current = updateWith(current, chain, value, settings);
  return current;
}

/** Leaf written where a path is built: a sequence under a trailing slice, else `null`. */
function builtLeaf(chain: OperatorChain): unknown {
  return chain.ops[chain.ops.length - 1] instanceof Slice ? [] : null;
}

/**
 * Makes sure every chain leads somewhere: chains that select nothing are
 * built with a `null` leaf; present values are left as they are.
 *
 * @example
 * buildMulti({}, [chain(key('hello'), key('bye'), slice()), chain(key('hello'), key('there'))])
 * // => { hello: { bye: [], there: null } }
 */
export function buildMulti(
  root: unknown,
  chains: Iterable<OperatorChain>,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  const raw = { ...settings, applyTransforms: false };
  let current = workingRoot(root, settings);
  for (const chain of chains) {
    if (readWith(current, chain, raw).values.length > 0) continue;
    current = updateWith(current, chain, builtLeaf(chain), raw);
  }
  return current;
}

/** {@link buildMulti} for one chain. */
export function build(root: unknown, chain: OperatorChain, options: CallOptions = {}): unknown {
  return buildMulti(root, [chain], options);
}

/**
 * Removes what the chain selects; with `value`, only selections equal to it.
 * Missing paths are left alone.
 */
export function remove(
  root: unknown,
  chain: OperatorChain,
  value: unknown = ANY,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  return removeWith(workingRoot(root, settings), chain, value, settings);
}

/**
 * {@link remove} when `predicate(chain)` holds; by default, when a chain is
 * given at all. The predicate sees the chain, not the values it selects.
 */
export function removeIf(
  root: unknown,
  chain: OperatorChain | null | undefined,
  predicate: ChainPredicate = isPresent,
  value: unknown = ANY,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  const working = workingRoot(root, settings);
  if (isNullish(chain) || !predicate(chain)) return working;
  return removeWith(working, chain, value, settings);
}

/** {@link removeIf} per chain, in order, over one working root. */
export function removeIfMulti(
  root: unknown,
  chains: Iterable<OperatorChain | null | undefined>,
  predicate: ChainPredicate = isPresent,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  let current = workingRoot(root, settings);
  for (const chain of chains) {
    if (!isNullish(chain) && predicate(chain)) current = removeWith(current, chain, ANY, settings);
  }
  return current;
}

/** Applies several removals in order, over one working root. */
export function removeMulti(
  root: unknown,
  items: Iterable<RemoveItem>,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  let current = workingRoot(root, settings);
  for (const item of items) {
    current =
      item instanceof OperatorChain
        ? removeWith(current, item, ANY, settings)
        : removeWith(current, item[0], item[1], settings);
  }
  return current;
}

/** Reads the chain, writing `value` first when it selects nothing. */
function setdefaultWith(
  root: unknown,
  chain: OperatorChain,
  value: unknown,
  settings: ResolvedOptions
): readonly [root: unknown, value: unknown] {
  const present = readWith(root, chain, settings);
  if (present.values.length > 0) return [root, firstOrAll(present)];
  const updated = updateWith(root, chain, value, settings);
  return [updated, firstOrAll(readWith(updated, chain, { ...settings, applyTransforms: false }))];
}

/**
 * Returns the value at `chain` when present; otherwise writes `value` there
 * and returns what was written. The write lands in `root` unless the call is
 * `mutable: false`, which writes to a copy and returns only the value.
 */
export function setdefault(
  root: unknown,
  chain: OperatorChain,
  value: unknown,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  return setdefaultWith(workingRoot(root, settings), chain, value, settings)[1];
}

/** {@link setdefault} per pair over one working root; the values in order. */
export function setdefaultMulti(
  root: unknown,
  pairs: Iterable<readonly [chain: OperatorChain, value: unknown]>,
  options: CallOptions = {}
): unknown[] {
  const settings = normalizeOptions(options);
  let current = workingRoot(root, settings);
  const out: unknown[] = [];
  for (const [chain, value] of pairs) {
    const [next, found] = setdefaultWith(current, chain, value, settings);
    current = next;
    out.push(found);
  }
  return out;
}

/**
 * Every distinct concrete path the chain selects, in notation form.
 *
 * @example
 * expand({ hello: { there: [1, 2] } }, chain(key(any()), key(any()), slot(any())))
 * // => ['hello.there[0]', 'hello.there[1]']
 */
export function expand(root: unknown, chain: OperatorChain, options: CallOptions = {}): string[] {
  const { chain: resolved, found } = locate(root, chain, normalizeOptions(options));
  return found.map(({ path }) => concretePath(resolved, path));
}

/** {@link expand} over several chains; each path is listed once. */
export function expandMulti(
  root: unknown,
  chains: Iterable<OperatorChain>,
  options: CallOptions = {}
): string[] {
  const settings = normalizeOptions(options);
  const seen = new Set<string>();
  for (const chain of chains) {
    const { chain: resolved, found } = locate(root, chain, settings);
    for (const { path } of found) seen.add(concretePath(resolved, path));
  }
  return [...seen];
}

/**
 * Concrete path and raw value pairs. A non-pattern chain yields its single
 * pair, or `undefined`.
 */
export function pluck(
  root: unknown,
  chain: OperatorChain,
  options: CallOptions = {}
): PathValue[] | PathValue | undefined {
  const { chain: resolved, found } = locate(root, chain, normalizeOptions(options));
  const pairs = found.map(({ path, value }): PathValue => [concretePath(resolved, path), value]);
  return resolved.isPattern() ? pairs : pairs[0];
}

/** Pairs of every chain, in order; each path is listed once. */
export function pluckMulti(
  root: unknown,
  chains: Iterable<OperatorChain>,
  options: CallOptions = {}
): PathValue[] {
  const settings = normalizeOptions(options);
  const seen = new Set<string>();
  const out: PathValue[] = [];
  for (const chain of chains) {
    const { chain: resolved, found } = locate(root, chain, settings);
    for (const { path, value } of found) {
      const text = concretePath(resolved, path);
      if (seen.has(text)) continue;
      seen.add(text);
      out.push([text, value]);
    }
  }
  return out;
}

/**
 * The keyed containers closest to the leaves, each through one more key or
 * its whole sequence; then the top-level entries those did not cover.
 */
const NORMAL_FORM = chainOf(
  or(
    softCut(recursive(any(), { depth: { start: -2 } }), or(key(any()), slice())),
    key(any()),
    slice()
  )
);

/**
 * Flattens `root` into concrete chains and values. Replaying them with
 * {@link updateMulti} on an empty container of the same kind rebuilds it.
 *
 * @example
 * unpack({ a: { b: [1, 2] }, extra: 'x' }).map(([path, value]) => [assemble(path), value])
 * // => [['a.b', [1, 2]], ['extra', 'x']]
 */
export function unpack(root: unknown, options: CallOptions = {}): ChainValue[] {
  const { found } = locate(root, NORMAL_FORM, normalizeOptions(options));
  return found.map(({ path, value }): ChainValue => [new OperatorChain(path), value]);
}

/**
 * Lazily yields concrete path and raw value pairs as the traversal reaches
 * them.
 */
export function* walk(
  root: unknown,
  chain: OperatorChain,
  options: CallOptions = {}
): Generator<PathValue> {
  const settings = normalizeOptions(options);
  const prepared = prepare(chain, root, settings);
  for (const { path, value } of walkOps(prepared.chain.ops, root, prepared.scope)) {
    if (prepared.chain.guardMatches(value, settings.registry)) {
      yield [concretePath(prepared.chain, path), value];
    }
  }
}

/**
 * Matches a concrete path against a pattern path.
 *
 * @returns The concrete path in notation form with its captured groups, or
 *   `undefined`.
 */
export function match(
  pattern: OperatorChain,
  path: OperatorChain,
  options: MatchOptions = {}
): PathMatch | undefined {
  return matchPath(pattern, path, options.partial ?? true);
}

/** The paths the pattern matches, with their groups, in order. */
export function matchMulti(
  pattern: OperatorChain,
  paths: Iterable<OperatorChain>,
  options: MatchOptions = {}
): PathMatch[] {
  const out: PathMatch[] = [];
  for (const path of paths) {
    const found = match(pattern, path, options);
    if (found !== undefined) out.push(found);
  }
  return out;
}

/** Whether one path is a prefix of the other. */
export function overlaps(a: OperatorChain, b: OperatorChain): boolean {
  return pathsOverlapping(a, b);
}

/**
 * Replaces each selected value by its transformed form, chain by chain. A
 * concrete path is transformed once even when several chains reach it.
 *
 * @example
 * applyMulti({ hello: '7', there: '9' }, [chain(key(any())).pipe('int'), chain(key('hello')).pipe('add', 1)])
 * // => { hello: 8, there: 9 }
 */
export function applyMulti(
  root: unknown,
  chains: Iterable<OperatorChain>,
  options: CallOptions = {}
): unknown {
  const settings = normalizeOptions(options);
  const seen = new Set<string>();
  let current = workingRoot(root, settings);
  for (const chain of chains) {
    const { chain: resolved, found } = locate(current, chain, settings);
    for (const { path, value } of found) {
      const text = concretePath(resolved, path);
      if (seen.has(text)) continue;
      seen.add(text);
      current = applyUpdates(
        path,
        current,
        resolved.apply(value, settings.registry),
        INITIAL_STATE,
        scopeFor(resolved, current, settings)
      );
    }
  }
  return current;
}

/**
 * Replaces each selected value by its transformed form.
 *
 * @example
 * apply({ hello: 7 }, chain(key('hello')).pipe('str'))
 * // => { hello: '7' }
 */
export function apply(root: unknown, chain: OperatorChain, options: CallOptions = {}): unknown {
  return applyMulti(root, [chain], options);
}

/**
 * Notation form of a chain or of an operator sequence.
 *
 * @param pedantic - Keep a trailing `[]`.
 */
export function assemble(path: OperatorChain | readonly Segment[], pedantic = false): string {
  return path instanceof OperatorChain ? path.render(pedantic) : assembleOps(path, pedantic);
}
