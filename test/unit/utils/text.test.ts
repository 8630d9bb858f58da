import { truncate } from '@utils/text.js'
import { describe, expect, it } from 'vitest'

describe('truncate', () => {
  it('should keep text within the limit', () => {
    expect(truncate('short', 5)).toBe('short')
  })

  it('should cut and mark longer text', () => {
    expect(truncate('abcdefgh', 5)).toBe('abcd…')
  })

  it('should not add an ellipsis when the limit is one character', () => {
    expect(truncate('abc', 1)).toBe('a')
  })

  it('should not split an emoji at the cut', () => {
    const text = `${'a'.repeat(30)}🚀🚀🚀`

    expect(truncate(text, 32)).toBe(`${'a'.repeat(30)}🚀…`)
  })

  it('should count emoji as single characters', () => {
    expect(truncate('🚀🚀', 2)).toBe('🚀🚀')
  })
})
