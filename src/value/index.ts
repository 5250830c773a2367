export {
  describeKind,
  FieldRecord,
  isContainer,
  isMapping,
  isMutable,
  kindOf,
  type Mapping,
  MISSING,
  type Missing,
  type ValueKind
} from './kinds';
export {
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
} from './containers';
export { deepEqual } from './equality';
export { deepCopy } from './copy';
