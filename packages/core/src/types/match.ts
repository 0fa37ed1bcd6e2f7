// =============================================================================
// MATCHING
// =============================================================================

/**
 * Options for compiling a pattern into an engine regex.
 * @public
 */
export interface MatchOptions {
  /**
   * Match letters regardless of case.
   * @defaultValue false
   */
  readonly ignoreCase?: boolean

  /**
   * Make StartOfLine and EndOfLine match at line breaks, not only at the
   * input boundaries. StartOfString and EndOfString are unaffected.
   * @defaultValue false
   */
  readonly multiline?: boolean
}

/**
 * Groups captured by the first match of a pattern.
 *
 * Keys `"0"` and `"match"` hold the full match, `"1"`, `"2"`, ... the
 * positional groups, and each named group appears under its own name.
 * Groups that did not take part in the match are omitted.
 *
 * @public
 */
export type ExtractResult = Readonly<Record<string, string>>

/**
 * Test cases keyed by input, valued by whether the input should match.
 * @public
 */
export type TestCases = Readonly<Record<string, boolean>> | Iterable<readonly [string, boolean]>

/**
 * Outcome of one test case.
 * @public
 */
export interface TestCaseResult {
  readonly input: string
  readonly expected: boolean
  readonly actual: boolean

  /** Whether `actual` equals `expected` */
  readonly passed: boolean
}

/**
 * Aggregate outcome of running a set of test cases against a pattern.
 * @public
 */
export interface PatternTestReport {
  /** Regex text the cases were run against */
  readonly pattern: string
  readonly total: number
  readonly passed: number
  readonly failed: number
  readonly allPassed: boolean

  /** Per-case results, in input order */
  readonly results: readonly TestCaseResult[]

  /** Formatted textual report */
  readonly summary: string
}
