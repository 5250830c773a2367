import type { Bindings } from '../engine/scope';
import type { ValuePattern } from '../matchers/base';
import { Invert } from '../operators/access';
import type { Segment } from '../operators/segment';
import { type ComparisonOperator, satisfies } from '../predicates/compare';
import {
  renderTransforms,
  transform,
  type TransformRegistry,
  type TransformSpec,
  transforms as defaultRegistry
} from './transforms';

/** A comparison the whole chain's resolved values must satisfy. */
export type ChainGuard = {
  readonly operator: ComparisonOperator;
  readonly pattern: ValuePattern;
};

export type ResolveOptions = {
  readonly partial?: boolean;
  readonly registry?: TransformRegistry;
};

/**
 * Renders an operator sequence.
 *
 * The first operator renders at the top (no leading separator), and so does
 * the operator right after an inversion. A trailing `[]` is dropped unless
 * `pedantic` is set or it follows another `[]`.
 */
export function assembleOps(ops: readonly Segment[], pedantic = false): string {
  const parts: string[] = [];
  let top = true;
  for (const op of ops) {
    parts.push(op.render(top));
    if (!(op instanceof Invert)) top = false;
  }
  const last = parts.length - 1;
  if (!pedantic && last > 0 && parts[last] === '[]' && parts[last - 1] !== '[]') {
    parts.pop();
  }
  return parts.join('');
}

/**
 * A parsed path: the operator sequence, the transforms applied to every
 * value it resolves to and an optional value guard on those values.
 *
 * Chains are immutable; {@link resolve} returns a new chain.
 */
export class OperatorChain {
  readonly ops: readonly Segment[];
  readonly transforms: readonly TransformSpec[];
  readonly guard: ChainGuard | undefined;

  constructor(
    ops: readonly Segment[],
    transforms: readonly TransformSpec[] = [],
    guard?: ChainGuard
  ) {
    this.ops = ops;
    this.transforms = transforms;
    this.guard = guard;
  }

  /** Whether the chain can resolve to more than one value. */
  isPattern(): boolean {
    return this.ops.some((op) => op.isPattern());
  }

  /**
   * Deepest ancestor level a reference in the chain reaches, `-1` when the
   * chain has none.
   */
  maxReferenceDepth(): number {
    return Math.max(-1, ...this.ops.map((op) => op.referenceDepth()));
  }

  /** Runs the chain's transforms over a resolved value. */
  apply(value: unknown, registry: TransformRegistry = defaultRegistry): unknown {
    return registry.apply(value, this.transforms);
  }

  /**
   * Tests the chain guard against a value, after transforms. A chain without
   * a guard accepts everything.
   */
  guardMatches(value: unknown, registry: TransformRegistry = defaultRegistry): boolean {
    if (this.guard === undefined) return true;
    return satisfies(this.apply(value, registry), this.guard.operator, this.guard.pattern);
  }

  /**
   * Substitutes template placeholders in every operator, filter and guard.
   *
   * @throws {UnresolvedTemplateError} Outside `partial` mode, when a
   *   placeholder has no binding.
   */
  resolve(bindings: Bindings, options: ResolveOptions = {}): OperatorChain {
    const partial = options.partial ?? false;
    const registry = options.registry ?? defaultRegistry;
    const ops = this.ops.map((op) => op.resolve(bindings, partial, registry));
    const guard =
      this.guard === undefined
        ? undefined
        : { ...this.guard, pattern: this.guard.pattern.resolve(bindings, partial, registry) };
    return new OperatorChain(ops, this.transforms, guard);
  }

  /** Appends a transform: `chain.pipe('str', '%s!')` is `...|str:'%s!'`. */
  pipe(name: string, ...args: unknown[]): OperatorChain {
    return new OperatorChain(this.ops, [...this.transforms, transform(name, ...args)], this.guard);
  }

  /** Sets the guard the chain's values must satisfy (`...=7`). */
  guarded(operator: ComparisonOperator, pattern: ValuePattern): OperatorChain {
    return new OperatorChain(this.ops, this.transforms, { operator, pattern });
  }

  /** Notation form, e.g. `hello.there[1]|int`. */
  render(pedantic = false): string {
    let text = assembleOps(this.ops, pedantic) + renderTransforms(this.transforms);
    if (this.guard !== undefined) {
      text += `${this.guard.operator}${this.guard.pattern.render()}`;
    }
    return text;
  }

  toString(): string {
    return this.render();
  }
}

