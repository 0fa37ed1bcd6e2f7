/**
 * Pattern nodes - the combinator tree that renders to regex text.
 * @packageDocumentation
 */

import type {
  PatternKind,
  InspectablePattern,
  MatchOptions,
  ExtractResult,
  TestCases,
  PatternTestReport,
} from '../types'
import { InvalidPatternError } from '../types'
import { compileRegex, testPattern, matchesPattern, extractPattern } from '../match/matcher'
import { testAllPatterns } from '../match/report'
import { explainPattern } from '../explain/explain'
import { visualizePattern } from '../explain/visualize'
import { escapeRegex, escapeClassChar, escapeClassChars } from './escape'
import { quantify } from './grouping'

/** Group names the engine accepts on every platform we target */
const GROUP_NAME = /^[A-Za-z][A-Za-z0-9]*$/

/** One range in a textual spec such as `'a'-'z', "0"-"9"` */
const RANGE_SPEC = /['"](.)['"]\s*-\s*['"](.)['"]/g

const MAX_CHAR_CODE = 0xffff

// =============================================================================
// BASE NODE
// =============================================================================

/**
 * Base class of every pattern node.
 *
 * Nodes are immutable. Every combinator returns a new node that holds the
 * existing ones by reference, so subtrees can be shared freely.
 *
 * @public
 */
export abstract class PatternNode implements InspectablePattern {
  abstract readonly kind: PatternKind

  /**
   * Render this node as regex text. Never throws for a constructed node.
   */
  abstract toRegex(): string

  /**
   * One-line human description of this node, used by `explain()` and
   * `visualize()`.
   */
  abstract describe(): string

  /**
   * Child nodes in order. Leaves have none.
   */
  children(): readonly PatternNode[] {
    return []
  }

  /**
   * Scalar items listed under this node in explanations.
   */
  details(): readonly string[] {
    return []
  }

  toString(): string {
    return this.toRegex()
  }

  // ---------------------------------------------------------------------------
  // Combinators
  // ---------------------------------------------------------------------------

  /**
   * Follow this pattern with another. Chained calls nest to the left:
   * `a.then(b).then(c)` is `Sequence([Sequence([a, b]), c])`.
   */
  then(other: PatternNode): Sequence {
    return new Sequence([this, other])
  }

  /** Zero or one occurrence of this pattern. */
  optional(): Optional {
    return new Optional(this)
  }

  /** One or more occurrences of this pattern. */
  oneOrMore(): OneOrMore {
    return new OneOrMore(this)
  }

  /** Zero or more occurrences of this pattern. */
  zeroOrMore(): ZeroOrMore {
    return new ZeroOrMore(this)
  }

  /**
   * Exactly `count` occurrences of this pattern.
   * @throws InvalidPatternError if `count` is negative or not an integer
   */
  exactly(count: number): Exactly {
    return new Exactly(this, count)
  }

  /**
   * Between `min` and `max` occurrences of this pattern, inclusive.
   * @throws InvalidPatternError if `min < 0` or `max < min`
   */
  range(min: number, max: number): Range {
    return new Range(this, min, max)
  }

  /**
   * At least `min` occurrences of this pattern.
   * @throws InvalidPatternError if `min` is negative or not an integer
   */
  atLeast(min: number): AtLeast {
    return new AtLeast(this, min)
  }

  /** Capture this pattern in a positional group. */
  group(): Group {
    return new Group(this)
  }

  /**
   * Capture this pattern in a named group.
   * @throws InvalidPatternError unless `name` is a letter followed by letters or digits
   */
  namedGroup(name: string): NamedGroup {
    return new NamedGroup(name, this)
  }

  // ---------------------------------------------------------------------------
  // Matching
  // ---------------------------------------------------------------------------

  /**
   * Compile this pattern into an engine regex.
   * @throws PatternCompileError if the engine rejects the regex text
   */
  toRegExp(options?: MatchOptions): RegExp {
    return compileRegex(this, options)
  }

  /**
   * Whether any part of `input` matches. Absent input never matches.
   */
  test(input: string | null | undefined, options?: MatchOptions): boolean {
    return testPattern(this, input, options)
  }

  /**
   * Whether the whole of `input` matches. Absent input never matches.
   */
  matches(input: string | null | undefined, options?: MatchOptions): boolean {
    return matchesPattern(this, input, options)
  }

  /**
   * Groups captured by the first match in `input`, or null if there is none.
   */
  extract(input: string | null | undefined, options?: MatchOptions): ExtractResult | null {
    return extractPattern(this, input, options)
  }

  /**
   * Run `test` on every case and report how many gave the expected result.
   */
  testAll(cases: TestCases, options?: MatchOptions): PatternTestReport {
    return testAllPatterns(this, cases, options)
  }

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------

  /** Regex text, type, and an indented breakdown of the tree. */
  explain(): string {
    return explainPattern(this)
  }

  /** The tree drawn with box-drawing connectors, followed by the regex text. */
  visualize(): string {
    return visualizePattern(this)
  }
}

// =============================================================================
// LITERALS AND ALTERNATION
// =============================================================================

/**
 * Literal text, with every metacharacter escaped.
 *
 * @example new Literal('a.b').toRegex() === 'a\\.b'
 *
 * @public
 */
export class Literal extends PatternNode {
  readonly kind = 'literal'

  constructor(readonly text: string) {
    super()
  }

  toRegex(): string {
    return escapeRegex(this.text)
  }

  describe(): string {
    return `Literal text: '${this.text}'`
  }
}

/**
 * Any one of a list of literal alternatives.
 *
 * Alternatives are text, not patterns: `'a|b'` matches the three characters
 * `a|b`.
 *
 * @example
 *   new Either(['foo']).toRegex() === 'foo'
 *   new Either(['foo', 'bar']).toRegex() === '(?:foo|bar)'
 *
 * @public
 */
export class Either extends PatternNode {
  readonly kind = 'either'
  readonly alternatives: readonly string[]

  /**
   * @throws InvalidPatternError if `alternatives` is empty
   */
  constructor(alternatives: readonly string[]) {
    super()
    if (alternatives.length === 0) {
      throw new InvalidPatternError('EMPTY_ALTERNATIVES', 'Either requires at least one alternative', 'alternatives')
    }
    this.alternatives = Object.freeze([...alternatives])
  }

  toRegex(): string {
    if (this.alternatives.length === 1) {
      return escapeRegex(this.alternatives[0])
    }
    return '(?:' + this.alternatives.map(escapeRegex).join('|') + ')'
  }

  describe(): string {
    return `One of: ${this.alternatives.join(', ')}`
  }

  details(): readonly string[] {
    return this.alternatives.map((alternative) => `'${alternative}'`)
  }
}

/**
 * Patterns matched one after another.
 *
 * The output is a bare concatenation; wrap the sequence in a group before
 * quantifying it as a whole.
 *
 * @public
 */
export class Sequence extends PatternNode {
  readonly kind = 'sequence'
  readonly patterns: readonly PatternNode[]

  /**
   * @throws InvalidPatternError if `patterns` is empty
   */
  constructor(patterns: readonly PatternNode[]) {
    super()
    if (patterns.length === 0) {
      throw new InvalidPatternError('EMPTY_SEQUENCE', 'Sequence requires at least one pattern', 'patterns')
    }
    this.patterns = Object.freeze([...patterns])
  }

  toRegex(): string {
    return this.patterns.map((pattern) => pattern.toRegex()).join('')
  }

  describe(): string {
    return 'Sequence of patterns:'
  }

  children(): readonly PatternNode[] {
    return this.patterns
  }
}

// =============================================================================
// QUANTIFIERS
// =============================================================================

/**
 * Check a repetition count: a non-negative integer.
 */
function assertCount(value: number, argument: string, owner: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidPatternError(
      'INVALID_COUNT',
      `${owner} ${argument} must be a non-negative integer, got ${value}`,
      argument,
    )
  }
}

/**
 * Base of the nodes that repeat a single child.
 * @public
 */
export abstract class Quantified extends PatternNode {
  constructor(readonly pattern: PatternNode) {
    super()
  }

  children(): readonly PatternNode[] {
    return [this.pattern]
  }
}

/**
 * Zero or one occurrence. Always renders as `(?:child)?`.
 * @public
 */
export class Optional extends Quantified {
  readonly kind = 'optional'

  toRegex(): string {
    return '(?:' + this.pattern.toRegex() + ')?'
  }

  describe(): string {
    return 'Optional:'
  }
}

/**
 * One or more occurrences. Always renders as `(?:child)+`.
 * @public
 */
export class OneOrMore extends Quantified {
  readonly kind = 'oneOrMore'

  toRegex(): string {
    return '(?:' + this.pattern.toRegex() + ')+'
  }

  describe(): string {
    return 'One or more times:'
  }
}

/**
 * Zero or more occurrences. Always renders as `(?:child)*`.
 * @public
 */
export class ZeroOrMore extends Quantified {
  readonly kind = 'zeroOrMore'

  toRegex(): string {
    return '(?:' + this.pattern.toRegex() + ')*'
  }

  describe(): string {
    return 'Zero or more times:'
  }
}

/**
 * Exactly `count` occurrences.
 *
 * @example
 *   new Exactly(new Digit(), 3).toRegex() === '\\d{3}'
 *   new Exactly(new Literal('ab'), 3).toRegex() === '(?:ab){3}'
 *
 * @public
 */
export class Exactly extends Quantified {
  readonly kind = 'exactly'

  /**
   * @throws InvalidPatternError if `count` is negative or not an integer
   */
  constructor(
    pattern: PatternNode,
    readonly count: number,
  ) {
    super(pattern)
    assertCount(count, 'count', 'Exactly')
  }

  toRegex(): string {
    return quantify(this.pattern.toRegex(), `{${this.count}}`)
  }

  describe(): string {
    return `Exactly ${this.count} times:`
  }
}

/**
 * Between `min` and `max` occurrences, inclusive.
 * @public
 */
export class Range extends Quantified {
  readonly kind = 'range'

  /**
   * @throws InvalidPatternError if `min < 0`, `max < min`, or either is not an integer
   */
  constructor(
    pattern: PatternNode,
    readonly min: number,
    readonly max: number,
  ) {
    super(pattern)
    if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max < min) {
      throw new InvalidPatternError('INVALID_BOUNDS', `Invalid range: min=${min}, max=${max}`)
    }
  }

  toRegex(): string {
    return quantify(this.pattern.toRegex(), `{${this.min},${this.max}}`)
  }

  describe(): string {
    return `Between ${this.min} and ${this.max} times:`
  }
}

/**
 * At least `min` occurrences.
 * @public
 */
export class AtLeast extends Quantified {
  readonly kind = 'atLeast'

  /**
   * @throws InvalidPatternError if `min` is negative or not an integer
   */
  constructor(
    pattern: PatternNode,
    readonly min: number,
  ) {
    super(pattern)
    assertCount(min, 'min', 'AtLeast')
  }

  toRegex(): string {
    return quantify(this.pattern.toRegex(), `{${this.min},}`)
  }

  describe(): string {
    return `At least ${this.min} times:`
  }
}

// =============================================================================
// CHARACTER PRIMITIVES AND ANCHORS
// =============================================================================

/**
 * Any single character except line terminators.
 * @public
 */
export class AnyChar extends PatternNode {
  readonly kind = 'anyChar'

  toRegex(): string {
    return '.'
  }

  describe(): string {
    return 'Any character'
  }
}

/**
 * Any digit (0-9).
 * @public
 */
export class Digit extends PatternNode {
  readonly kind = 'digit'

  toRegex(): string {
    return '\\d'
  }

  describe(): string {
    return 'Any digit (0-9)'
  }
}

/**
 * Any word character (a-z, A-Z, 0-9, _).
 * @public
 */
export class WordChar extends PatternNode {
  readonly kind = 'wordChar'

  toRegex(): string {
    return '\\w'
  }

  describe(): string {
    return 'Any word character (a-z, A-Z, 0-9, _)'
  }
}

/**
 * Any whitespace character.
 * @public
 */
export class Whitespace extends PatternNode {
  readonly kind = 'whitespace'

  toRegex(): string {
    return '\\s'
  }

  describe(): string {
    return 'Any whitespace character'
  }
}

/**
 * Start of a line (`^`). Anchors to the start of the input unless matching
 * with `multiline`.
 * @public
 */
export class StartOfLine extends PatternNode {
  readonly kind = 'startOfLine'

  toRegex(): string {
    return '^'
  }

  describe(): string {
    return 'Start of line'
  }
}

/**
 * End of a line (`$`). Anchors to the end of the input unless matching with
 * `multiline`.
 * @public
 */
export class EndOfLine extends PatternNode {
  readonly kind = 'endOfLine'

  toRegex(): string {
    return '$'
  }

  describe(): string {
    return 'End of line'
  }
}

/**
 * Start of the input (`\A`).
 * @public
 */
export class StartOfString extends PatternNode {
  readonly kind = 'startOfString'

  toRegex(): string {
    return '\\A'
  }

  describe(): string {
    return 'Start of string'
  }
}

/**
 * End of the input (`\z`).
 * @public
 */
export class EndOfString extends PatternNode {
  readonly kind = 'endOfString'

  toRegex(): string {
    return '\\z'
  }

  describe(): string {
    return 'End of string'
  }
}

// =============================================================================
// CHARACTER CLASSES
// =============================================================================

/**
 * A bracket expression over a set of characters.
 *
 * `]`, `\`, `^` and `-` in the set are escaped, so every character in
 * `chars` is taken literally.
 *
 * @example
 *   new CharClass('abc').toRegex() === '[abc]'
 *   new CharClass('abc', true).toRegex() === '[^abc]'
 *
 * @public
 */
export class CharClass extends PatternNode {
  readonly kind: 'charClass' | 'notCharClass'

  constructor(
    readonly chars: string,
    readonly negated: boolean = false,
  ) {
    super()
    this.kind = negated ? 'notCharClass' : 'charClass'
  }

  toRegex(): string {
    const escaped = escapeClassChars(this.chars)
    return this.negated ? `[^${escaped}]` : `[${escaped}]`
  }

  describe(): string {
    return this.negated ? `None of: '${this.chars}'` : `Any of: '${this.chars}'`
  }
}

/**
 * A negated bracket expression: any character not in `chars`.
 * @public
 */
export class NotCharClass extends CharClass {
  constructor(chars: string) {
    super(chars, true)
  }
}

/**
 * Normalize a range bound to a single UTF-16 character.
 */
function toBound(value: string | number, argument: string): string {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0 || value > MAX_CHAR_CODE) {
      throw new InvalidPatternError(
        'INVALID_CHAR_RANGE',
        `${argument} must be a character code between 0 and ${MAX_CHAR_CODE}, got ${value}`,
        argument,
      )
    }
    return String.fromCharCode(value)
  }

  if (value.length !== 1) {
    throw new InvalidPatternError('INVALID_CHAR_RANGE', `${argument} must be a single character string`, argument)
  }
  return value
}

/**
 * An inclusive range of characters, such as `[a-z]`.
 *
 * Bounds are given as single characters or as character codes.
 *
 * @public
 */
export class CharRange extends PatternNode {
  readonly kind = 'charRange'
  readonly start: string
  readonly end: string

  /**
   * @throws InvalidPatternError if a bound is not a single character or `start > end`
   */
  constructor(start: string, end: string)
  constructor(start: number, end: number)
  constructor(start: string | number, end: string | number) {
    super()
    this.start = toBound(start, 'start')
    this.end = toBound(end, 'end')

    if (this.start.charCodeAt(0) > this.end.charCodeAt(0)) {
      throw new InvalidPatternError(
        'INVALID_CHAR_RANGE',
        `Start character '${this.start}' must be less than or equal to end character '${this.end}'`,
      )
    }
  }

  /**
   * The range without its surrounding brackets, e.g. `a-z`.
   */
  classBody(): string {
    return escapeClassChar(this.start) + '-' + escapeClassChar(this.end)
  }

  toRegex(): string {
    return `[${this.classBody()}]`
  }

  describe(): string {
    return `Character range: '${this.start}' to '${this.end}'`
  }
}

/**
 * Parse a textual range list such as `'a'-'z', 'A'-'Z'`.
 */
function parseRangeSpec(spec: string): CharRange[] {
  const ranges: CharRange[] = []
  for (const match of spec.matchAll(RANGE_SPEC)) {
    ranges.push(new CharRange(match[1], match[2]))
  }
  return ranges
}

/**
 * Several character ranges merged into one bracket expression.
 *
 * @example
 *   new MultiRange([new CharRange('a', 'z'), new CharRange('0', '9')]).toRegex() === '[a-z0-9]'
 *   new MultiRange("'a'-'f', 'A'-'F'").toRegex() === '[a-fA-F]'
 *
 * @public
 */
export class MultiRange extends PatternNode {
  readonly kind = 'multiRange'
  readonly ranges: readonly CharRange[]

  /**
   * @param ranges - Ranges in order, or a spec of quoted ranges separated by commas
   * @throws InvalidPatternError if there are no ranges or the spec yields none
   */
  constructor(ranges: readonly CharRange[] | string) {
    super()

    if (typeof ranges === 'string') {
      if (ranges === '') {
        throw new InvalidPatternError('INVALID_RANGE_SPEC', 'Range specification cannot be empty', 'ranges')
      }
      const parsed = parseRangeSpec(ranges)
      if (parsed.length === 0) {
        throw new InvalidPatternError(
          'INVALID_RANGE_SPEC',
          `No valid range in specification "${ranges}" (expected 'a'-'z', ...)`,
          'ranges',
        )
      }
      this.ranges = Object.freeze(parsed)
      return
    }

    if (ranges.length === 0) {
      throw new InvalidPatternError('EMPTY_RANGES', 'At least one CharRange is required', 'ranges')
    }
    this.ranges = Object.freeze([...ranges])
  }

  toRegex(): string {
    if (this.ranges.length === 1) {
      return this.ranges[0].toRegex()
    }
    return '[' + this.ranges.map((range) => range.classBody()).join('') + ']'
  }

  describe(): string {
    return 'Any character in ranges:'
  }

  children(): readonly PatternNode[] {
    return this.ranges
  }
}

// =============================================================================
// GROUPS
// =============================================================================

/**
 * A positional capturing group. Always renders as `(child)`.
 * @public
 */
export class Group extends PatternNode {
  readonly kind = 'group'

  constructor(readonly pattern: PatternNode) {
    super()
  }

  toRegex(): string {
    return '(' + this.pattern.toRegex() + ')'
  }

  describe(): string {
    return 'Capturing group:'
  }

  children(): readonly PatternNode[] {
    return [this.pattern]
  }
}

/**
 * A named capturing group, `(?<name>child)`.
 *
 * Names start with a letter and contain only letters and digits.
 *
 * @public
 */
export class NamedGroup extends PatternNode {
  readonly kind = 'namedGroup'

  /**
   * @throws InvalidPatternError if `name` is not a valid group name
   */
  constructor(
    readonly name: string,
    readonly pattern: PatternNode,
  ) {
    super()
    if (!GROUP_NAME.test(name)) {
      throw new InvalidPatternError(
        'INVALID_GROUP_NAME',
        `Invalid group name '${name}': must start with a letter and contain only letters and digits (no underscores)`,
        'name',
      )
    }
  }

  toRegex(): string {
    return '(?<' + this.name + '>' + this.pattern.toRegex() + ')'
  }

  describe(): string {
    return `Named group '${this.name}':`
  }

  children(): readonly PatternNode[] {
    return [this.pattern]
  }
}

/**
 * A backreference to a named group, `\k<name>`.
 * @public
 */
export class NamedBackreference extends PatternNode {
  readonly kind = 'namedBackreference'

  /**
   * @throws InvalidPatternError if `name` is empty
   */
  constructor(readonly name: string) {
    super()
    if (name === '') {
      throw new InvalidPatternError('EMPTY_BACKREFERENCE', 'Group name cannot be empty', 'name')
    }
  }

  toRegex(): string {
    return '\\k<' + this.name + '>'
  }

  describe(): string {
    return `Backreference to group '${this.name}'`
  }
}

// =============================================================================
// CLOSED UNION
// =============================================================================

/**
 * Every concrete node variant. Switch on `kind` to handle them exhaustively.
 * @public
 */
export type Pattern =
  | Literal
  | Either
  | Sequence
  | Optional
  | OneOrMore
  | ZeroOrMore
  | Exactly
  | Range
  | AtLeast
  | AnyChar
  | Digit
  | WordChar
  | Whitespace
  | StartOfLine
  | EndOfLine
  | StartOfString
  | EndOfString
  | CharClass
  | CharRange
  | MultiRange
  | Group
  | NamedGroup
  | NamedBackreference
