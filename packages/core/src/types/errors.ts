/**
 * Error codes for pattern construction and compilation failures.
 * @public
 */
export type PatternErrorCode =
  | 'EMPTY_ALTERNATIVES' // Either([])
  | 'EMPTY_SEQUENCE' // Sequence([])
  | 'INVALID_COUNT' // exactly(-1), atLeast(1.5)
  | 'INVALID_BOUNDS' // range(5, 2)
  | 'INVALID_GROUP_NAME' // namedGroup('1st'), namedGroup('my_name')
  | 'INVALID_CHAR_RANGE' // CharRange('z', 'a'), CharRange('ab', 'c')
  | 'EMPTY_RANGES' // MultiRange([])
  | 'INVALID_RANGE_SPEC' // MultiRange('a to z')
  | 'EMPTY_BACKREFERENCE' // NamedBackreference('')
  | 'INVALID_REGEX' // Produced text rejected by the regex engine

/**
 * Error thrown when a pattern node is constructed from invalid arguments.
 *
 * Nodes validate everything at construction, so a node that exists can always
 * be rendered with `toRegex()`.
 *
 * @public
 */
export class InvalidPatternError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Name of the offending constructor argument, when there is a single one */
  readonly argument?: string

  constructor(code: PatternErrorCode, message: string, argument?: string) {
    super(message)
    this.name = 'InvalidPatternError'
    this.code = code
    this.argument = argument
  }
}

/**
 * Error thrown when the regex engine rejects the text a pattern produced.
 *
 * This happens for trees that are individually valid but inconsistent as a
 * whole, such as two named groups sharing a name.
 *
 * @public
 */
export class PatternCompileError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** The regex text handed to the engine */
  readonly source: string

  constructor(source: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Cannot compile pattern /${source}/: ${reason}`, { cause })
    this.name = 'PatternCompileError'
    this.code = 'INVALID_REGEX'
    this.source = source
  }
}
