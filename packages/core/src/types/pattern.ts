// =============================================================================
// PATTERN NODE CONTRACT
// =============================================================================

/**
 * Discriminant carried by every pattern node.
 * @public
 */
export type PatternKind =
  | 'literal'
  | 'either'
  | 'sequence'
  | 'optional'
  | 'oneOrMore'
  | 'zeroOrMore'
  | 'exactly'
  | 'range'
  | 'atLeast'
  | 'anyChar'
  | 'digit'
  | 'wordChar'
  | 'whitespace'
  | 'startOfLine'
  | 'endOfLine'
  | 'startOfString'
  | 'endOfString'
  | 'charClass'
  | 'notCharClass'
  | 'charRange'
  | 'multiRange'
  | 'group'
  | 'namedGroup'
  | 'namedBackreference'

/**
 * Anything that renders to regex text. The matching façade only needs this.
 * @public
 */
export interface RegexSource {
  /** Regex text for the pattern, without delimiters or flags */
  toRegex(): string
}

/**
 * The read-only view of a node used by `explain()` and `visualize()`.
 *
 * Every node exposes its structure through these accessors, so traversal is
 * plain polymorphic dispatch rather than field inspection.
 *
 * @public
 */
export interface InspectablePattern extends RegexSource {
  readonly kind: PatternKind

  /** One-line human description of this node alone */
  describe(): string

  /** Child nodes in order (empty for leaves) */
  children(): readonly InspectablePattern[]

  /** Scalar line items listed under the node, such as alternatives */
  details(): readonly string[]
}
