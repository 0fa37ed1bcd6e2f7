/**
 * Escaping of literal text for inclusion in regex syntax.
 * @packageDocumentation
 */

const METACHARACTERS = /[\\.*+?^${}()[\]|-]/g

const CLASS_METACHARACTERS = '\\^]-'

/**
 * Escape every regex metacharacter in a string so it matches literally.
 *
 * Escapes `\ . * + ? ^ $ { } ( ) [ ] | -` with a backslash and leaves every
 * other character as it is.
 *
 * @example
 * escapeRegex('a.b') === 'a\\.b'
 *
 * @public
 */
export function escapeRegex(text: string): string {
  return text.replace(METACHARACTERS, '\\$&')
}

/**
 * Escape a single character for use inside a bracket expression.
 * @public
 */
export function escapeClassChar(char: string): string {
  if (CLASS_METACHARACTERS.includes(char)) {
    return '\\' + char
  }
  return char
}

/**
 * Escape a set of characters for use inside a bracket expression.
 * @public
 */
export function escapeClassChars(chars: string): string {
  let escaped = ''
  for (let i = 0; i < chars.length; i++) {
    escaped += escapeClassChar(chars[i])
  }
  return escaped
}
