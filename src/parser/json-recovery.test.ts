import { describe, expect, it } from 'vitest'
import { cleanJson, decodeJsonSpan, findBraceSpan, repairTruncatedStrings, truncateRaw } from './json-recovery'

describe('JSON recovery', () => {
  describe('findBraceSpan', () => {
    it('returns the balanced object span', () => {
      expect(findBraceSpan('x {a{b}c} y', 0)).toEqual({ start: 2, end: 9 })
    })

    it('returns null when the object closes past the limit', () => {
      expect(findBraceSpan('x {a{b}c} y', 0, 7)).toBeNull()
    })

    it('returns null without an opening brace', () => {
      expect(findBraceSpan('no object here', 0)).toBeNull()
    })

    it('counts braces inside strings', () => {
      expect(findBraceSpan('{"a": "}"}', 0)).toEqual({ start: 0, end: 8 })
    })
  })

  describe('cleanJson', () => {
    it('removes trailing commas and control characters', () => {
      expect(cleanJson('{"a": [1, 2,], "b": "x\u0007",}')).toBe('{"a": [1, 2], "b": "x"}')
    })

    it('keeps tabs and newlines', () => {
      expect(cleanJson('{\n\t"a": 1\n}')).toBe('{\n\t"a": 1\n}')
    })
  })

  describe('repairTruncatedStrings', () => {
    it('closes a truncated id value', () => {
      expect(repairTruncatedStrings('  "id" : "12,')).toBe('  "id" : "12",')
    })

    it('closes other truncated values', () => {
      expect(repairTruncatedStrings('  "text" : "cut,')).toBe('  "text" : "cut",')
    })

    it('leaves balanced lines alone', () => {
      expect(repairTruncatedStrings('  "text" : "a,b",')).toBe('  "text" : "a,b",')
    })
  })

  describe('decodeJsonSpan', () => {
    it('decodes after cleaning', () => {
      expect(decodeJsonSpan('{"a": [1, 2,],}')).toEqual({ ok: true, value: { a: [1, 2] }, repaired: false })
    })

    it('retries with the truncation repair', () => {
      expect(decodeJsonSpan('{\n"id" : "9,\n"x": 1\n}')).toEqual({
        ok: true,
        value: { id: '9', x: 1 },
        repaired: true
      })
    })

    it('reports the decode error', () => {
      const result = decodeJsonSpan('{ oops }')
      expect(result.ok).toBe(false)
    })
  })

  describe('truncateRaw', () => {
    it('bounds long content', () => {
      expect(truncateRaw('abcdef', 3)).toBe('abc...')
      expect(truncateRaw('abc', 3)).toBe('abc')
    })
  })
})
