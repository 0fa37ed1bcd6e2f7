/**
 * Type definitions for composable regex patterns.
 * @packageDocumentation
 */

// Node contract
export type { PatternKind, RegexSource, InspectablePattern } from './pattern'

// Matching types
export type { MatchOptions, ExtractResult, TestCases, TestCaseResult, PatternTestReport } from './match'

// Error types
export type { PatternErrorCode } from './errors'
export { InvalidPatternError, PatternCompileError } from './errors'
