/**
 * Matching façade - runs patterns against input through the engine regex.
 * @packageDocumentation
 */

import type { RegexSource, MatchOptions, ExtractResult } from '../types'
import { PatternCompileError } from '../types'
import { toEngineSource, INPUT_START, INPUT_END } from './dialect'

/** Named groups as they appear in regex text */
const NAMED_GROUP = /\(\?<([A-Za-z][A-Za-z0-9]*)>/g

/** `\k<name>` not itself preceded by an escaping backslash */
const BACKREFERENCE = /(?<!\\)(?:\\\\)*\\k<([^>]*)>/g

/**
 * Compiled regexes per pattern, keyed by anchoring and flags.
 */
const cache = new WeakMap<RegexSource, Map<string, RegExp>>()

/**
 * Build the engine flag string for a set of options.
 */
function toFlags(options: MatchOptions): string {
  let flags = ''
  if (options.ignoreCase) {
    flags += 'i'
  }
  if (options.multiline) {
    flags += 'm'
  }
  return flags
}

/**
 * Compile a pattern's regex text into an engine regex.
 *
 * `anchored` wraps the text so it must span the whole input.
 *
 * @throws PatternCompileError if the engine rejects the text
 */
function compile(pattern: RegexSource, options: MatchOptions, anchored: boolean): RegExp {
  const flags = toFlags(options)
  const key = (anchored ? 'full:' : 'find:') + flags

  let compiled = cache.get(pattern)
  if (compiled === undefined) {
    compiled = new Map()
    cache.set(pattern, compiled)
  }

  const existing = compiled.get(key)
  if (existing !== undefined) {
    return existing
  }

  const source = pattern.toRegex()
  const body = toEngineSource(source)

  // Without the u flag the engine reads an unmatched \k<name> as the text "k<name>"
  const declared = findGroupNames(source)
  for (const name of findBackreferenceNames(source)) {
    if (!declared.includes(name)) {
      const reason = new SyntaxError(`Backreference \\k<${name}> refers to no named group`)
      throw new PatternCompileError(source, reason)
    }
  }

  let regex: RegExp
  try {
    regex = new RegExp(anchored ? `${INPUT_START}(?:${body})${INPUT_END}` : body, flags)
  } catch (error) {
    throw new PatternCompileError(source, error)
  }

  compiled.set(key, regex)
  return regex
}

/**
 * Compile a pattern into an engine regex for use outside this library.
 *
 * The returned regex carries no `g` or `y` flag and so holds no match state.
 *
 * @param pattern - Pattern to compile
 * @param options - Engine flags
 * @returns Unanchored regex equivalent to the pattern
 * @throws PatternCompileError if the engine rejects the pattern text
 *
 * @public
 */
export function compileRegex(pattern: RegexSource, options: MatchOptions = {}): RegExp {
  return compile(pattern, options, false)
}

/**
 * Test if any part of the input matches a pattern.
 *
 * @param pattern - Pattern to search for
 * @param input - Text to search; absent input never matches
 * @param options - Engine flags
 * @returns true if a match is found anywhere in the input
 *
 * @public
 */
export function testPattern(
  pattern: RegexSource,
  input: string | null | undefined,
  options: MatchOptions = {},
): boolean {
  if (input === null || input === undefined) {
    return false
  }
  return compile(pattern, options, false).test(input)
}

/**
 * Test if the whole input matches a pattern.
 *
 * @param pattern - Pattern the input must match in full
 * @param input - Text to check; absent input never matches
 * @param options - Engine flags
 * @returns true if the pattern spans the entire input
 *
 * @public
 */
export function matchesPattern(
  pattern: RegexSource,
  input: string | null | undefined,
  options: MatchOptions = {},
): boolean {
  if (input === null || input === undefined) {
    return false
  }
  return compile(pattern, options, true).test(input)
}

/**
 * Extract the groups captured by the first match of a pattern.
 *
 * Named groups are discovered by scanning the regex text for `(?<name>`. A
 * name the engine does not report (text inside a character class, say) is
 * skipped.
 *
 * @param pattern - Pattern to search for
 * @param input - Text to search
 * @param options - Engine flags
 * @returns Captured groups, or null if nothing matches
 *
 * @public
 */
export function extractPattern(
  pattern: RegexSource,
  input: string | null | undefined,
  options: MatchOptions = {},
): ExtractResult | null {
  if (input === null || input === undefined) {
    return null
  }

  const match = compile(pattern, options, false).exec(input)
  if (match === null) {
    return null
  }

  const result: Record<string, string> = {}

  const groups = match.groups
  if (groups !== undefined) {
    for (const name of findGroupNames(pattern.toRegex())) {
      if (!Object.hasOwn(groups, name)) {
        continue
      }
      const value = groups[name]
      if (value !== undefined) {
        result[name] = value
      }
    }
  }

  for (let i = 1; i < match.length; i++) {
    const value = match[i]
    if (value !== undefined) {
      result[String(i)] = value
    }
  }

  // Written last so a group named "match" cannot shadow the full match
  result['0'] = match[0]
  result['match'] = match[0]

  return result
}

/**
 * List the named groups declared in regex text, in order of appearance.
 *
 * @param source - Regex text
 * @returns Group names, without duplicates
 *
 * @public
 */
export function findGroupNames(source: string): readonly string[] {
  const names: string[] = []
  for (const match of source.matchAll(NAMED_GROUP)) {
    const name = match[1]
    if (!names.includes(name)) {
      names.push(name)
    }
  }
  return names
}

/**
 * List the group names referenced by `\k<name>` in regex text.
 *
 * @param source - Regex text
 * @returns Referenced names, without duplicates
 *
 * @public
 */
export function findBackreferenceNames(source: string): readonly string[] {
  const names: string[] = []
  for (const match of source.matchAll(BACKREFERENCE)) {
    const name = match[1]
    if (!names.includes(name)) {
      names.push(name)
    }
  }
  return names
}
