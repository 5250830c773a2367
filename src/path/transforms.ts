import { TransformError } from '../errors';
import { quoteKey } from '../utils/key-quoting';
import { builtinTransforms } from './builtin-transforms';

/**
 * A value transform: pure `(value, ...args) -> value`.
 */
export type TransformFn = (value: unknown, ...args: unknown[]) => unknown;

/**
 * One step of a transform pipeline: the registered name plus its arguments.
 */
export type TransformSpec = {
  readonly name: string;
  readonly args: readonly unknown[];
};

/**
 * Builds a {@link TransformSpec}.
 *
 * @example
 * transform('int')            // |int
 * transform('str', '%s!')     // |str:'%s!'
 */
export function transform(name: string, ...args: unknown[]): TransformSpec {
  return { name, args };
}

/**
 * Renders a pipeline in notation form (`|int|str:'%s!'`).
 */
export function renderTransforms(specs: readonly TransformSpec[]): string {
  return specs
    .map(
      (spec) =>
        `|${spec.name}${spec.args.map((arg) => `:${quoteKey(arg, false)}`).join('')}`
    )
    .join('');
}

/**
 * Name to function table the transform pipelines are looked up in.
 *
 * Entries can be added or overwritten; there is no removal.
 */
export class TransformRegistry {
  private readonly table = new Map<string, TransformFn>();

  constructor(initial: Iterable<readonly [string, TransformFn]> = []) {
    for (const [name, fn] of initial) this.table.set(name, fn);
  }

  /** Inserts or overwrites `name`. */
  register(name: string, fn: TransformFn): this {
    this.table.set(name, fn);
    return this;
  }

  has(name: string): boolean {
    return this.table.has(name);
  }

  /** Registered names in registration order. */
  names(): string[] {
    return [...this.table.keys()];
  }

  /**
   * @throws {TransformError} `TRANSFORM_UNKNOWN` when nothing is registered
   *   under `name`.
   */
  lookup(name: string): TransformFn {
    const fn = this.table.get(name);
    if (fn === undefined) {
      throw new TransformError('TRANSFORM_UNKNOWN', name, 'not registered');
    }
    return fn;
  }

  /**
   * Runs a pipeline left to right.
   */
  apply(value: unknown, specs: readonly TransformSpec[]): unknown {
    let current = value;
    for (const spec of specs) {
      current = this.lookup(spec.name)(current, ...spec.args);
    }
    return current;
  }

  /** Independent copy, for tests and sandboxed registration. */
  clone(): TransformRegistry {
    return new TransformRegistry(this.table.entries());
  }
}

/**
 * The process-wide registry, populated with the built-in transforms.
 */
export const transforms = new TransformRegistry(
  Object.entries(builtinTransforms)
);

/**
 * Registers a transform in the process-wide registry.
 */
export function register(name: string, fn: TransformFn): void {
  transforms.register(name, fn);
}
