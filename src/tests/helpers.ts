import {
  type CallOptions,
  get,
  type GetOptions,
  type OperatorChain,
  remove,
  update
} from '../index';

/** A read: the data, the path and the call options. */
export type ReadInput = {
  data: unknown;
  path: OperatorChain;
  options?: GetOptions;
};

/** An update: the data, the path, the value to write and the call options. */
export type WriteInput = {
  data: unknown;
  path: OperatorChain;
  value: unknown;
  options?: CallOptions;
};

/**
 * A removal. Without `value` everything the path selects is removed.
 */
export type RemoveInput = {
  data: unknown;
  path: OperatorChain;
  value?: unknown;
  options?: CallOptions;
};

export function runGet({ data, path, options }: ReadInput): unknown {
  return get(data, path, options);
}

export function runUpdate({ data, path, value, options }: WriteInput): unknown {
  return update(data, path, value, options);
}

export function runRemove({ data, path, value, options }: RemoveInput): unknown {
  return remove(data, path, value, options);
}
