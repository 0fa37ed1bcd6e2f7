/**
 * Pattern matching utilities.
 * @packageDocumentation
 */

export { compileRegex, testPattern, matchesPattern, extractPattern, findGroupNames, findBackreferenceNames } from './matcher'

export { testAllPatterns, formatTestReport } from './report'

export { toEngineSource } from './dialect'
