import { describe, it, expect } from 'vitest'

import {
  PatternNode,
  Literal,
  Either,
  Sequence,
  Optional,
  OneOrMore,
  Exactly,
  Range,
  AtLeast,
  AnyChar,
  Digit,
  WordChar,
  Whitespace,
  StartOfLine,
  EndOfLine,
  StartOfString,
  EndOfString,
  CharClass,
  NotCharClass,
  CharRange,
  MultiRange,
  Group,
  NamedGroup,
  NamedBackreference,
  type Pattern,
} from './nodes'
import { InvalidPatternError, type PatternErrorCode } from '../types'

/**
 * Run a constructor and return the code of the InvalidPatternError it throws.
 */
function errorCode(build: () => unknown): PatternErrorCode | undefined {
  try {
    build()
  } catch (error) {
    if (error instanceof InvalidPatternError) {
      return error.code
    }
    throw error
  }
  return undefined
}

describe('Literal', () => {
  it('renders plain text unchanged', () => {
    expect(new Literal('hello world').toRegex()).toBe('hello world')
  })

  it('escapes metacharacters', () => {
    expect(new Literal('a.b').toRegex()).toBe('a\\.b')
    expect(new Literal('a.b*c+d?').toRegex()).toBe('a\\.b\\*c\\+d\\?')
  })

  it('renders empty text as empty regex', () => {
    expect(new Literal('').toRegex()).toBe('')
  })
})

describe('Either', () => {
  it('omits the group for a single alternative', () => {
    expect(new Either(['foo']).toRegex()).toBe('foo')
  })

  it('joins several alternatives in a non-capturing group', () => {
    expect(new Either(['foo', 'bar']).toRegex()).toBe('(?:foo|bar)')
    expect(new Either(['foo', 'bar', 'baz']).toRegex()).toBe('(?:foo|bar|baz)')
  })

  it('escapes each alternative', () => {
    expect(new Either(['a.b', 'c*d']).toRegex()).toBe('(?:a\\.b|c\\*d)')
  })

  it('treats a pipe inside an alternative as text', () => {
    expect(new Either(['a|b']).toRegex()).toBe('a\\|b')
  })

  it('rejects an empty list', () => {
    expect(errorCode(() => new Either([]))).toBe('EMPTY_ALTERNATIVES')
  })

  it('copies the alternatives', () => {
    const alternatives = ['cat', 'dog']
    const pattern = new Either(alternatives)
    alternatives.push('bird')

    expect(pattern.toRegex()).toBe('(?:cat|dog)')
    expect(Object.isFrozen(pattern.alternatives)).toBe(true)
  })
})

describe('Sequence', () => {
  it('concatenates children in order', () => {
    const pattern = new Sequence([new Literal('hello'), new Literal(' '), new Literal('world')])

    expect(pattern.toRegex()).toBe('hello world')
  })

  it('rejects an empty list', () => {
    expect(errorCode(() => new Sequence([]))).toBe('EMPTY_SEQUENCE')
  })

  it('builds nested sequences from chained then calls', () => {
    const pattern = new Literal('a').then(new Digit()).then(new Literal('b'))

    expect(pattern.patterns).toHaveLength(2)
    expect(pattern.patterns[0]).toBeInstanceOf(Sequence)
    expect(pattern.patterns[1]).toBeInstanceOf(Literal)
    expect(pattern.toRegex()).toBe('a\\db')
  })

  it('does not group itself', () => {
    const pattern = new Sequence([new Digit(), new Digit()])

    expect(pattern.toRegex()).toBe('\\d\\d')
    expect(pattern.exactly(3).toRegex()).toBe('(?:\\d\\d){3}')
  })
})

describe('quantifiers', () => {
  it('always groups optional, one-or-more and zero-or-more', () => {
    expect(new Literal('test').optional().toRegex()).toBe('(?:test)?')
    expect(new Literal('a').oneOrMore().toRegex()).toBe('(?:a)+')
    expect(new Literal('a').zeroOrMore().toRegex()).toBe('(?:a)*')
    expect(new Digit().oneOrMore().toRegex()).toBe('(?:\\d)+')
  })

  it('appends counted quantifiers directly to atoms', () => {
    expect(new Digit().exactly(3).toRegex()).toBe('\\d{3}')
    expect(new AnyChar().range(1, 3).toRegex()).toBe('.{1,3}')
    expect(new CharClass('abc').atLeast(2).toRegex()).toBe('[abc]{2,}')
    expect(new Literal('.').atLeast(1).toRegex()).toBe('\\.{1,}')
  })

  it('groups counted quantifiers on other patterns', () => {
    expect(new Literal('a').exactly(3).toRegex()).toBe('(?:a){3}')
    expect(new Literal('ab').range(2, 5).toRegex()).toBe('(?:ab){2,5}')
    expect(new Literal('a').atLeast(2).toRegex()).toBe('(?:a){2,}')
  })

  it('accepts zero and equal bounds', () => {
    expect(new Exactly(new Digit(), 0).toRegex()).toBe('\\d{0}')
    expect(new Range(new Digit(), 2, 2).toRegex()).toBe('\\d{2,2}')
    expect(new AtLeast(new Digit(), 0).toRegex()).toBe('\\d{0,}')
  })

  it('rejects negative and fractional counts', () => {
    expect(errorCode(() => new Exactly(new Digit(), -1))).toBe('INVALID_COUNT')
    expect(errorCode(() => new Digit().exactly(1.5))).toBe('INVALID_COUNT')
    expect(errorCode(() => new AtLeast(new Digit(), -1))).toBe('INVALID_COUNT')
  })

  it('rejects inconsistent range bounds', () => {
    expect(errorCode(() => new Range(new Digit(), 5, 2))).toBe('INVALID_BOUNDS')
    expect(errorCode(() => new Range(new Digit(), -1, 2))).toBe('INVALID_BOUNDS')
  })

  it('names the offending argument', () => {
    try {
      new AtLeast(new Digit(), -3)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPatternError)
      if (error instanceof InvalidPatternError) {
        expect(error.argument).toBe('min')
        expect(error.message).toBe('AtLeast min must be a non-negative integer, got -3')
      }
    }
  })

  it('keeps the wrapped pattern as its only child', () => {
    const digit = new Digit()
    const pattern = new OneOrMore(digit)

    expect(pattern.children()).toEqual([digit])
    expect(pattern.pattern).toBe(digit)
  })
})

describe('character primitives and anchors', () => {
  it('render fixed regex text', () => {
    expect(new AnyChar().toRegex()).toBe('.')
    expect(new Digit().toRegex()).toBe('\\d')
    expect(new WordChar().toRegex()).toBe('\\w')
    expect(new Whitespace().toRegex()).toBe('\\s')
    expect(new StartOfLine().toRegex()).toBe('^')
    expect(new EndOfLine().toRegex()).toBe('$')
    expect(new StartOfString().toRegex()).toBe('\\A')
    expect(new EndOfString().toRegex()).toBe('\\z')
  })
})

describe('CharClass', () => {
  it('renders a bracket expression', () => {
    expect(new CharClass('abc').toRegex()).toBe('[abc]')
  })

  it('renders a negated bracket expression', () => {
    const pattern = new NotCharClass('abc')

    expect(pattern.toRegex()).toBe('[^abc]')
    expect(pattern.negated).toBe(true)
    expect(pattern.kind).toBe('notCharClass')
    expect(new CharClass('abc', true).toRegex()).toBe('[^abc]')
  })

  it('escapes bracket metacharacters', () => {
    expect(new CharClass('^a-z]').toRegex()).toBe('[\\^a\\-z\\]]')
    expect(new CharClass('a\\b').toRegex()).toBe('[a\\\\b]')
  })
})

describe('CharRange', () => {
  it('renders a range from characters', () => {
    expect(new CharRange('a', 'z').toRegex()).toBe('[a-z]')
    expect(new CharRange('0', '9').toRegex()).toBe('[0-9]')
    expect(new CharRange('!', '~').toRegex()).toBe('[!-~]')
  })

  it('renders a range from character codes', () => {
    const pattern = new CharRange(97, 122)

    expect(pattern.start).toBe('a')
    expect(pattern.end).toBe('z')
    expect(pattern.toRegex()).toBe('[a-z]')
  })

  it('accepts a single-character range', () => {
    expect(new CharRange('a', 'a').toRegex()).toBe('[a-a]')
  })

  it('escapes bounds that are bracket metacharacters', () => {
    expect(new CharRange('-', '^').toRegex()).toBe('[\\--\\^]')
  })

  it('rejects reversed bounds', () => {
    expect(errorCode(() => new CharRange('z', 'a'))).toBe('INVALID_CHAR_RANGE')
    expect(errorCode(() => new CharRange(122, 97))).toBe('INVALID_CHAR_RANGE')
  })

  it('rejects bounds that are not single characters', () => {
    expect(errorCode(() => new CharRange('ab', 'c'))).toBe('INVALID_CHAR_RANGE')
    expect(errorCode(() => new CharRange('a', ''))).toBe('INVALID_CHAR_RANGE')
    expect(errorCode(() => new CharRange(-1, 5))).toBe('INVALID_CHAR_RANGE')
    expect(errorCode(() => new CharRange(0, 0x10000))).toBe('INVALID_CHAR_RANGE')
  })
})

describe('MultiRange', () => {
  it('merges several ranges into one bracket expression', () => {
    const pattern = new MultiRange([new CharRange('a', 'z'), new CharRange('A', 'Z'), new CharRange('0', '9')])

    expect(pattern.toRegex()).toBe('[a-zA-Z0-9]')
  })

  it('renders a single range as that range', () => {
    expect(new MultiRange([new CharRange('a', 'z')]).toRegex()).toBe('[a-z]')
  })

  it('parses a textual specification', () => {
    expect(new MultiRange("'a'-'f', 'A'-'F', '0'-'9'").toRegex()).toBe('[a-fA-F0-9]')
    expect(new MultiRange('"a"-"z"').toRegex()).toBe('[a-z]')
    expect(new MultiRange("'a' - 'z'").ranges).toHaveLength(1)
  })

  it('rejects an empty list', () => {
    expect(errorCode(() => new MultiRange([]))).toBe('EMPTY_RANGES')
  })

  it('rejects specifications without ranges', () => {
    expect(errorCode(() => new MultiRange(''))).toBe('INVALID_RANGE_SPEC')
    expect(errorCode(() => new MultiRange('a-z'))).toBe('INVALID_RANGE_SPEC')
  })

  it('rejects reversed ranges in a specification', () => {
    expect(errorCode(() => new MultiRange("'z'-'a'"))).toBe('INVALID_CHAR_RANGE')
  })
})

describe('groups', () => {
  it('wraps a pattern in a capturing group', () => {
    expect(new Literal('test').group().toRegex()).toBe('(test)')
    expect(new Group(new Digit().exactly(3)).toRegex()).toBe('(\\d{3})')
  })

  it('wraps a pattern in a named group', () => {
    expect(new Digit().namedGroup('id').toRegex()).toBe('(?<id>\\d)')
    expect(new NamedGroup('abc123', new Literal('x')).toRegex()).toBe('(?<abc123>x)')
  })

  it('rejects invalid group names', () => {
    for (const name of ['', '1abc', 'my_name', 'a-b', 'has space']) {
      expect(errorCode(() => new Digit().namedGroup(name)), `Expected '${name}' to be rejected`).toBe(
        'INVALID_GROUP_NAME',
      )
    }
  })

  it('renders a named backreference', () => {
    expect(new NamedBackreference('word').toRegex()).toBe('\\k<word>')
  })

  it('rejects an empty backreference name', () => {
    expect(errorCode(() => new NamedBackreference(''))).toBe('EMPTY_BACKREFERENCE')
  })
})

describe('composition', () => {
  it('renders an email-like pattern', () => {
    const pattern = new WordChar()
      .oneOrMore()
      .then(new Literal('@'))
      .then(new WordChar().oneOrMore())
      .then(new Literal('.'))
      .then(new WordChar().range(2, 3))

    expect(pattern.toRegex()).toBe('(?:\\w)+@(?:\\w)+\\.\\w{2,3}')
  })

  it('uses the regex text as its string form', () => {
    const pattern = new Literal('test')

    expect(pattern.toString()).toBe('test')
    expect(`${new Digit().exactly(2)}`).toBe('\\d{2}')
  })

  it('leaves the original node unchanged', () => {
    const digit = new Digit()
    const optional = digit.optional()

    expect(optional).toBeInstanceOf(Optional)
    expect(digit.toRegex()).toBe('\\d')
  })

  it('shares subtrees between patterns', () => {
    const year = new Digit().exactly(4)
    const a = year.then(new Literal('-'))
    const b = new Literal('-').then(year)

    expect(a.toRegex()).toBe('\\d{4}\\-')
    expect(b.toRegex()).toBe('\\-\\d{4}')
  })
})

describe('Pattern union', () => {
  /** Count leaves by switching exhaustively on the node kind. */
  function countLeaves(node: Pattern): number {
    switch (node.kind) {
      case 'literal':
      case 'either':
      case 'anyChar':
      case 'digit':
      case 'wordChar':
      case 'whitespace':
      case 'startOfLine':
      case 'endOfLine':
      case 'startOfString':
      case 'endOfString':
      case 'charClass':
      case 'notCharClass':
      case 'charRange':
      case 'namedBackreference':
        return 1
      case 'sequence':
      case 'optional':
      case 'oneOrMore':
      case 'zeroOrMore':
      case 'exactly':
      case 'range':
      case 'atLeast':
      case 'multiRange':
      case 'group':
      case 'namedGroup':
        return node.children().reduce((sum, child) => sum + countChildLeaves(child), 0)
    }
  }

  function countChildLeaves(node: PatternNode): number {
    return node.children().length === 0 ? 1 : node.children().reduce((sum, child) => sum + countChildLeaves(child), 0)
  }

  it('narrows every variant by kind', () => {
    const pattern = new Literal('id-').then(new Digit().oneOrMore().namedGroup('id'))

    expect(countLeaves(pattern)).toBe(2)
    expect(countLeaves(new MultiRange("'a'-'z', '0'-'9'"))).toBe(2)
    expect(countLeaves(new Either(['a', 'b']))).toBe(1)
  })
})
