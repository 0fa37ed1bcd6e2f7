/**
 * Quantifier grouping policy.
 * @packageDocumentation
 */

const ESCAPE_CLASS = /^\\[dwsDWS]$/
const BRACKET_EXPRESSION = /^\[.+\]$/
const ESCAPED_CHAR = /^\\.$/

/**
 * Decide whether regex text must be wrapped in `(?:...)` before a
 * `{n}`-style quantifier is appended.
 *
 * Only text that is certainly one atom skips the group: an escape class
 * (`\d`, `\W`, ...), a lone `.`, a bracket expression, or a backslash escape
 * of one character. Everything else is grouped, since `ab{3}` repeats only
 * the `b`.
 *
 * The bracket check is textual: `[a][b]` is also treated as one atom.
 *
 * @param text - Regex text of the sub-pattern
 * @returns true if the text needs a non-capturing group
 *
 * @public
 */
export function needsGroupingForQuantifier(text: string): boolean {
  if (ESCAPE_CLASS.test(text)) {
    return false
  }
  if (text === '.') {
    return false
  }
  if (BRACKET_EXPRESSION.test(text)) {
    return false
  }
  if (ESCAPED_CHAR.test(text)) {
    return false
  }
  return true
}

/**
 * Append a quantifier to regex text, grouping it first when needed.
 * @public
 */
export function quantify(text: string, quantifier: string): string {
  if (needsGroupingForQuantifier(text)) {
    return '(?:' + text + ')' + quantifier
  }
  return text + quantifier
}
