export {
  Appender,
  Attr,
  Empty,
  Invert,
  Key,
  Slice,
  SliceFilter,
  Slot
} from './access';
export { AndGroup, FirstGroup, NotGroup, OrGroup } from './groups';
export {
  type Accessor,
  type DepthRange,
  Recursive,
  RecursiveFirst,
  type RecursiveGuard,
  type RecursiveOptions
} from './recursive';
export {
  ANY,
  AccessSegment,
  type Any,
  type Branch,
  type CutKind,
  Segment
} from './segment';
export {
  FilterWrap,
  NopWrap,
  TYPE_NAMES,
  type TypeName,
  TypeRestriction,
  ValueGuard
} from './wrappers';
