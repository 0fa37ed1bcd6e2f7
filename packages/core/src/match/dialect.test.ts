import { describe, it, expect } from 'vitest'

import { toEngineSource } from './dialect'

describe('toEngineSource', () => {
  it('rewrites string anchors', () => {
    expect(toEngineSource('\\A')).toBe('(?:(?<![\\s\\S]))')
    expect(toEngineSource('\\z')).toBe('(?:(?![\\s\\S]))')
    expect(toEngineSource('\\Aabc\\z')).toBe('(?:(?<![\\s\\S]))abc(?:(?![\\s\\S]))')
  })

  it('keeps quantified string anchors compilable', () => {
    const lowered = toEngineSource('\\A{1}a\\z{1,2}')

    expect(lowered).toBe('(?:(?<![\\s\\S])){1}a(?:(?![\\s\\S])){1,2}')
    expect(new RegExp(lowered).test('a')).toBe(true)
    expect(new RegExp(lowered).test('ba')).toBe(false)
  })

  it('leaves other escapes unchanged', () => {
    expect(toEngineSource('\\d\\w\\.\\-')).toBe('\\d\\w\\.\\-')
    expect(toEngineSource('^a$')).toBe('^a$')
  })

  it('does not rewrite an escaped backslash followed by A', () => {
    expect(toEngineSource('\\\\A')).toBe('\\\\A')
    expect(toEngineSource('[\\\\z]')).toBe('[\\\\z]')
  })

  it('keeps a trailing backslash', () => {
    expect(toEngineSource('a\\')).toBe('a\\')
  })
})
