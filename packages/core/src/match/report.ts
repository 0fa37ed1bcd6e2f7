/**
 * Batch testing of a pattern against expected outcomes.
 * @packageDocumentation
 */

import type { RegexSource, MatchOptions, TestCases, TestCaseResult, PatternTestReport } from '../types'
import { testPattern } from './matcher'

const PASS_ICON = '✓'
const FAIL_ICON = '✗'

/**
 * Run `test` for every case and compare against the expected outcome.
 *
 * @param pattern - Pattern under test
 * @param cases - Inputs mapped to whether they should match
 * @param options - Engine flags
 * @returns Report with counts, per-case results and a formatted summary
 *
 * @public
 */
export function testAllPatterns(
  pattern: RegexSource,
  cases: TestCases,
  options: MatchOptions = {},
): PatternTestReport {
  const results: TestCaseResult[] = []

  for (const [input, expected] of toEntries(cases)) {
    const actual = testPattern(pattern, input, options)
    results.push({ input, expected, actual, passed: actual === expected })
  }

  const passed = results.filter((r) => r.passed).length
  const source = pattern.toRegex()

  return {
    pattern: source,
    total: results.length,
    passed,
    failed: results.length - passed,
    allPassed: passed === results.length,
    results,
    summary: formatTestReport(source, results),
  }
}

/**
 * Render test results as a plain-text report.
 *
 * @example
 * ```
 * Test Report
 * ===========
 * Pattern: \d{3}
 *
 *   ✓ "123" expected match, got match
 *   ✗ "12" expected match, got no match
 *
 * Results: 2 total, 1 passed, 1 failed
 * ✗ 1 test(s) failed
 * ```
 *
 * @public
 */
export function formatTestReport(pattern: string, results: readonly TestCaseResult[]): string {
  const lines = ['Test Report', '===========', `Pattern: ${pattern}`, '']

  for (const result of results) {
    const icon = result.passed ? PASS_ICON : FAIL_ICON
    lines.push(`  ${icon} "${result.input}" expected ${label(result.expected)}, got ${label(result.actual)}`)
  }

  const passed = results.filter((r) => r.passed).length
  const failed = results.length - passed

  lines.push('')
  lines.push(`Results: ${results.length} total, ${passed} passed, ${failed} failed`)
  lines.push(failed === 0 ? `${PASS_ICON} All tests passed` : `${FAIL_ICON} ${failed} test(s) failed`)

  return lines.join('\n')
}

function label(matched: boolean): string {
  return matched ? 'match' : 'no match'
}

function toEntries(cases: TestCases): Iterable<readonly [string, boolean]> {
  if (isIterable(cases)) {
    return cases
  }
  return Object.entries(cases)
}

function isIterable(cases: TestCases): cases is Iterable<readonly [string, boolean]> {
  return Symbol.iterator in cases
}
