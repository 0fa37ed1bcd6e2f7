/**
 * Human-readable breakdown of a pattern tree.
 * @packageDocumentation
 */

import type { InspectablePattern, PatternKind } from '../types'

const INDENT = '  '

/**
 * Display names for each node kind.
 * @public
 */
export const PATTERN_TYPE_NAMES: Readonly<Record<PatternKind, string>> = {
  literal: 'Literal',
  either: 'Either',
  sequence: 'Sequence',
  optional: 'Optional',
  oneOrMore: 'OneOrMore',
  zeroOrMore: 'ZeroOrMore',
  exactly: 'Exactly',
  range: 'Range',
  atLeast: 'AtLeast',
  anyChar: 'AnyChar',
  digit: 'Digit',
  wordChar: 'WordChar',
  whitespace: 'Whitespace',
  startOfLine: 'StartOfLine',
  endOfLine: 'EndOfLine',
  startOfString: 'StartOfString',
  endOfString: 'EndOfString',
  charClass: 'CharClass',
  notCharClass: 'NotCharClass',
  charRange: 'CharRange',
  multiRange: 'MultiRange',
  group: 'Group',
  namedGroup: 'NamedGroup',
  namedBackreference: 'NamedBackreference',
}

/**
 * Explain a pattern: its regex text, its type, and an indented breakdown of
 * every node beneath it.
 *
 * @example
 * ```
 * Pattern: user\-(?:\d)+
 * Type: Sequence
 * Breakdown:
 *   Sequence of patterns:
 *     Literal text: 'user-'
 *     One or more times:
 *       Any digit (0-9)
 * ```
 *
 * @param pattern - Root of the tree to explain
 * @returns Multi-line explanation
 *
 * @public
 */
export function explainPattern(pattern: InspectablePattern): string {
  const lines = [`Pattern: ${pattern.toRegex()}`, `Type: ${PATTERN_TYPE_NAMES[pattern.kind]}`, 'Breakdown:']
  appendBreakdown(pattern, 1, lines)
  return lines.join('\n')
}

/**
 * Append one line per node, indenting children one level deeper.
 */
function appendBreakdown(node: InspectablePattern, depth: number, lines: string[]): void {
  const indent = INDENT.repeat(depth)
  lines.push(indent + node.describe())

  for (const detail of node.details()) {
    lines.push(`${indent}${INDENT}- ${detail}`)
  }

  for (const child of node.children()) {
    appendBreakdown(child, depth + 1, lines)
  }
}
