/**
 * Pattern construction.
 * @packageDocumentation
 */

export {
  PatternNode,
  Quantified,
  Literal,
  Either,
  Sequence,
  Optional,
  OneOrMore,
  ZeroOrMore,
  Exactly,
  Range,
  AtLeast,
  AnyChar,
  Digit,
  WordChar,
  Whitespace,
  StartOfLine,
  EndOfLine,
  StartOfString,
  EndOfString,
  CharClass,
  NotCharClass,
  CharRange,
  MultiRange,
  Group,
  NamedGroup,
  NamedBackreference,
  type Pattern,
} from './nodes'

export {
  literal,
  either,
  sequence,
  optional,
  oneOrMore,
  zeroOrMore,
  exactly,
  range,
  atLeast,
  anyChar,
  digit,
  wordChar,
  whitespace,
  startOfLine,
  endOfLine,
  startOfString,
  endOfString,
  charClass,
  notCharClass,
  charRange,
  multiRange,
  group,
  namedGroup,
  namedBackreference,
} from './builders'

export { escapeRegex, escapeClassChar, escapeClassChars } from './escape'
export { needsGroupingForQuantifier, quantify } from './grouping'
