import { describe, expect, it } from 'vitest'
import { parseNumber } from '../parse-number.ts'

describe('parseNumber', () => {
  it('should parse numeric strings', () => {
    expect(parseNumber('42', 0)).toBe(42)
    expect(parseNumber('2.5', 0)).toBe(2.5)
  })

  it.each([undefined, '', '  ', 'abc', 'Infinity'])(
    'should fall back for %j',
    (value) => {
      expect(parseNumber(value, 7)).toBe(7)
    },
  )

  it('should reject fractions when an integer is required', () => {
    expect(parseNumber('2.5', 3, { integer: true })).toBe(3)
  })

  it('should clamp to the given bounds', () => {
    expect(parseNumber('0', 10, { min: 1 })).toBe(1)
    expect(parseNumber('5000', 10, { max: 1000 })).toBe(1000)
  })
})
