/**
 * Factory functions - one per node variant.
 *
 * These mirror the constructors for callers that prefer plain calls to `new`:
 *
 * ```ts
 * const phone = sequence([group('area', exactly(digit(), 3)), literal('-'), group('line', exactly(digit(), 4))])
 * ```
 *
 * @packageDocumentation
 */

import type { PatternNode } from './nodes'
import {
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
} from './nodes'

/** @public */
export function literal(text: string): Literal {
  return new Literal(text)
}

/** @public */
export function either(alternatives: readonly string[]): Either {
  return new Either(alternatives)
}

/** @public */
export function sequence(patterns: readonly PatternNode[]): Sequence {
  return new Sequence(patterns)
}

/** @public */
export function optional(pattern: PatternNode): Optional {
  return new Optional(pattern)
}

/** @public */
export function oneOrMore(pattern: PatternNode): OneOrMore {
  return new OneOrMore(pattern)
}

/** @public */
export function zeroOrMore(pattern: PatternNode): ZeroOrMore {
  return new ZeroOrMore(pattern)
}

/** @public */
export function exactly(pattern: PatternNode, count: number): Exactly {
  return new Exactly(pattern, count)
}

/** @public */
export function range(pattern: PatternNode, min: number, max: number): Range {
  return new Range(pattern, min, max)
}

/** @public */
export function atLeast(pattern: PatternNode, min: number): AtLeast {
  return new AtLeast(pattern, min)
}

/** @public */
export function anyChar(): AnyChar {
  return new AnyChar()
}

/** @public */
export function digit(): Digit {
  return new Digit()
}

/** @public */
export function wordChar(): WordChar {
  return new WordChar()
}

/** @public */
export function whitespace(): Whitespace {
  return new Whitespace()
}

/** @public */
export function startOfLine(): StartOfLine {
  return new StartOfLine()
}

/** @public */
export function endOfLine(): EndOfLine {
  return new EndOfLine()
}

/** @public */
export function startOfString(): StartOfString {
  return new StartOfString()
}

/** @public */
export function endOfString(): EndOfString {
  return new EndOfString()
}

/** @public */
export function charClass(chars: string): CharClass {
  return new CharClass(chars)
}

/** @public */
export function notCharClass(chars: string): NotCharClass {
  return new NotCharClass(chars)
}

/**
 * @example charRange('a', 'z'), charRange(0x30, 0x39)
 * @public
 */
export function charRange(start: string, end: string): CharRange
export function charRange(start: number, end: number): CharRange
export function charRange(start: string | number, end: string | number): CharRange {
  if (typeof start === 'number' && typeof end === 'number') {
    return new CharRange(start, end)
  }
  return new CharRange(String(start), String(end))
}

/**
 * @example multiRange("'a'-'z', 'A'-'Z', '0'-'9'")
 * @public
 */
export function multiRange(ranges: readonly CharRange[] | string): MultiRange {
  return new MultiRange(ranges)
}

/**
 * Capturing group; named when a name is given first.
 *
 * @example
 *   group(digit()).toRegex() === '(\\d)'
 *   group('id', digit()).toRegex() === '(?<id>\\d)'
 *
 * @public
 */
export function group(pattern: PatternNode): Group
export function group(name: string, pattern: PatternNode): NamedGroup
export function group(nameOrPattern: string | PatternNode, pattern?: PatternNode): Group | NamedGroup {
  if (typeof nameOrPattern !== 'string') {
    return new Group(nameOrPattern)
  }
  if (pattern === undefined) {
    throw new TypeError(`group('${nameOrPattern}') requires a pattern to capture`)
  }
  return new NamedGroup(nameOrPattern, pattern)
}

/** @public */
export function namedGroup(name: string, pattern: PatternNode): NamedGroup {
  return new NamedGroup(name, pattern)
}

/** @public */
export function namedBackreference(name: string): NamedBackreference {
  return new NamedBackreference(name)
}
