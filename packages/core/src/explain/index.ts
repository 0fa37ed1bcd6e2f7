/**
 * Pattern introspection.
 * @packageDocumentation
 */

export { explainPattern, PATTERN_TYPE_NAMES } from './explain'
export { visualizePattern } from './visualize'
