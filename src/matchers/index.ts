export { type BindMode, Matcher, type ValuePattern } from './base';
export {
  BooleanMatcher,
  BytesMatcher,
  Const,
  literal,
  NullMatcher,
  Numeric,
  Str,
  Word
} from './literals';
export {
  RegexFirst,
  RegexMatcher,
  Special,
  type SpecialToken,
  Wildcard,
  WildcardFirst
} from './patterns';
export { Reference, Subst } from './templates';
