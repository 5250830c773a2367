import type { Bindings, TraversalScope } from '../engine/scope';
import { UnresolvedTemplateError } from '../errors';
import type { OperatorChain } from '../path/chain';
import {
  renderTransforms,
  type TransformRegistry,
  type TransformSpec
} from '../path/transforms';
import { isNumber } from '../utils/type-guards';
import { type BindMode, Matcher } from './base';
import { literal } from './literals';

/**
 * Looks up a positional or named binding.
 *
 * @returns `{ found: false }` when the binding is absent.
 */
function lookupBinding(
  bindings: Bindings,
  name: number | string
): { found: true; value: unknown } | { found: false } {
  if (Array.isArray(bindings)) {
    if (isNumber(name) && name >= 0 && name < bindings.length) {
      return { found: true, value: bindings[name] };
    }
    return { found: false };
  }
  const key = String(name);
  if (Object.hasOwn(bindings, key)) {
    return { found: true, value: Reflect.get(bindings, key) };
  }
  return { found: false };
}

/**
 * Substitution placeholder: `$0` (positional) or `$(name)` (named), with an
 * optional transform pipeline applied to the bound value.
 *
 * A chain carrying placeholders must be resolved before traversal.
 */
export class Subst extends Matcher {
  readonly name: number | string;
  readonly transforms: readonly TransformSpec[];
  readonly value: string;

  constructor(name: number | string, transforms: readonly TransformSpec[] = []) {
    super();
    this.name = name;
    this.transforms = transforms;
    this.value = this.render();
  }

  isTemplate(): boolean {
    return true;
  }

  matches(): unknown[] {
    throw new UnresolvedTemplateError(this.render(), 'no bindings supplied');
  }

  bind(): Matcher {
    throw new UnresolvedTemplateError(this.render(), 'no bindings supplied');
  }

  /**
   * Logic:
   * 1. Look the placeholder up by index (array bindings) or name.
   * 2. Missing: keep the placeholder in partial mode, raise otherwise.
   * 3. Found: run the placeholder's transforms, then return the literal
   *    matcher for the result.
   */
  resolve(
    bindings: Bindings,
    partial: boolean,
    registry: TransformRegistry
  ): Matcher {
    const binding = lookupBinding(bindings, this.name);
    if (!binding.found) {
      if (partial) return this;
      throw new UnresolvedTemplateError(this.render(), 'no such binding');
    }
    return literal(registry.apply(binding.value, this.transforms));
  }

  render(): string {
    const head = isNumber(this.name) ? `$${this.name}` : `$(${this.name})`;
    return head + renderTransforms(this.transforms);
  }
}

/**
 * Bound form of a reference that resolved to nothing: selects no key.
 */
class Unresolved extends Matcher {
  readonly value: string;

  constructor(rendered: string) {
    super();
    this.value = rendered;
  }

  matches(): unknown[] {
    return [];
  }

  render(): string {
    return this.value;
  }
}

/**
 * Document reference: `$$(path)` resolves against the root, `$$(^path)`
 * against the node being accessed, and each further `^` one ancestor up.
 *
 * The first value the path selects becomes a literal key for that position.
 */
export class Reference extends Matcher {
  /** Chain to resolve; `undefined` addresses the base value itself. */
  readonly target: OperatorChain | undefined;
  /** 0 = root, 1 = current node, 2 = parent, and so on. */
  readonly depth: number;
  readonly value: string;

  constructor(target: OperatorChain | undefined, depth = 0) {
    super();
    this.target = target;
    this.depth = depth;
    this.value = this.render();
  }

  referenceDepth(): number {
    return this.depth;
  }

  matches(): unknown[] {
    throw new UnresolvedTemplateError(
      this.render(),
      'references resolve only during traversal'
    );
  }

  /**
   * Logic:
   * 1. Pick the base: root, the current node or the ancestor `depth - 2`
   *    levels above it.
   * 2. Resolve the target chain from the base.
   * 3. The first value becomes a literal matcher. With nothing found a read
   *    selects nothing and a write raises.
   */
  bind(scope: TraversalScope, node: unknown, mode: BindMode): Matcher {
    const base = this.base(scope, node);
    if (base.found) {
      const values =
        this.target === undefined
          ? [base.value]
          : scope.dereference(this.target, base.value, scope);
      if (values.length > 0) return literal(values[0]);
    }
    if (mode === 'write') {
      throw new UnresolvedTemplateError(this.render(), 'not found');
    }
    return new Unresolved(this.render());
  }

  resolve(
    bindings: Bindings,
    partial: boolean,
    registry: TransformRegistry
  ): Matcher {
    if (this.target === undefined) return this;
    return new Reference(
      this.target.resolve(bindings, { partial, registry }),
      this.depth
    );
  }

  render(): string {
    const path = this.target === undefined ? '' : this.target.render();
    return `$$(${'^'.repeat(this.depth)}${path})`;
  }

  private base(
    scope: TraversalScope,
    node: unknown
  ): { found: true; value: unknown } | { found: false } {
    if (this.depth === 0) return { found: true, value: scope.root };
    if (this.depth === 1) return { found: true, value: node };
    const parents = scope.parents ?? [];
    const index = this.depth - 2;
    return index < parents.length
      ? { found: true, value: parents[index] }
      : { found: false };
  }
}
