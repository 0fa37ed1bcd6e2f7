/**
 * Composable Regex Library
 *
 * Builds regular expressions from a tree of readable combinators (literals,
 * quantifiers, alternations, character classes, groups), and tests, matches,
 * extracts, explains and visualizes them.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Node contract
  PatternKind,
  RegexSource,
  InspectablePattern,
  // Matching types
  MatchOptions,
  ExtractResult,
  TestCases,
  TestCaseResult,
  PatternTestReport,
  // Error types
  PatternErrorCode,
} from './types'
export { InvalidPatternError, PatternCompileError } from './types'

// =============================================================================
// Pattern Nodes
// =============================================================================

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
} from './pattern'

// =============================================================================
// Factories
// =============================================================================

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
} from './pattern'

// =============================================================================
// Escaping and Grouping
// =============================================================================

export { escapeRegex, escapeClassChar, escapeClassChars } from './pattern'
export { needsGroupingForQuantifier, quantify } from './pattern'

// =============================================================================
// Matching
// =============================================================================

export { compileRegex, testPattern, matchesPattern, extractPattern, findGroupNames, findBackreferenceNames } from './match'
export { testAllPatterns, formatTestReport } from './match'
export { toEngineSource } from './match'

// =============================================================================
// Introspection
// =============================================================================

export { explainPattern, visualizePattern, PATTERN_TYPE_NAMES } from './explain'
