export {
  apply,
  applyMulti,
  assemble,
  build,
  buildMulti,
  type CallOptions,
  CallOptionsSchema,
  type ChainPredicate,
  type ChainValue,
  type ConditionalUpdate,
  expand,
  expandMulti,
  get,
  getMulti,
  type GetOptions,
  has,
  match,
  matchMulti,
  type MatchOptions,
  mutatesInPlace,
  normalizeOptions,
  overlaps,
  type PathValue,
  pluck,
  pluckMulti,
  remove,
  removeIf,
  removeIfMulti,
  type RemoveItem,
  removeMulti,
  type ResolvedOptions,
  setdefault,
  setdefaultMulti,
  unpack,
  update,
  updateIf,
  updateIfMulti,
  updateMulti,
  type ValuePredicate,
  walk
} from './api';
export * from './builders';
export * from './errors';
export type { Bindings, TraversalScope } from './engine/scope';
export * from './matchers';
export * from './operators';
export * from './predicates';
export { assembleOps, type ChainGuard, OperatorChain } from './path/chain';
export type { PathMatch } from './path/match';
export {
  register,
  transform,
  type TransformFn,
  TransformRegistry,
  transforms,
  type TransformSpec
} from './path/transforms';
export {
  deepCopy,
  deepEqual,
  FieldRecord,
  kindOf,
  MISSING,
  type Missing,
  type ValueKind
} from './value';
