/**
 * Lowering of regex text to the JavaScript engine's dialect.
 * @packageDocumentation
 */

/**
 * Assertion that only succeeds at the very start of the input. Grouped so a
 * quantifier appended to `\A` still applies to an atom.
 * @public
 */
export const INPUT_START = '(?:(?<![\\s\\S]))'

/**
 * Assertion that only succeeds at the very end of the input.
 * @public
 */
export const INPUT_END = '(?:(?![\\s\\S]))'

/**
 * Rewrite string anchors the JavaScript engine does not support.
 *
 * `\A` and `\z` become zero-width assertions on the input boundaries, which
 * hold whatever flags the regex is compiled with. Escaped backslashes are
 * skipped as pairs, so `\\A` (a literal backslash before `A`) is left alone.
 *
 * @param source - Regex text produced by `toRegex()`
 * @returns Equivalent text for `new RegExp`
 *
 * @public
 */
export function toEngineSource(source: string): string {
  let result = ''

  for (let i = 0; i < source.length; i++) {
    const char = source[i]

    if (char !== '\\' || i + 1 >= source.length) {
      result += char
      continue
    }

    const next = source[i + 1]
    i++

    switch (next) {
      case 'A':
        result += INPUT_START
        break
      case 'z':
        result += INPUT_END
        break
      default:
        result += char + next
    }
  }

  return result
}
