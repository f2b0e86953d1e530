import { describe, it, expect } from 'vitest'
import {
  ALL_CORRECT,
  decodePattern,
  encodeTrits,
  isTrit,
  parseFeedback,
  patternToString,
} from '../pattern'
import { MalformedFeedbackError } from '../errors'

describe('pattern encoding', () => {
  it('packs position 0 as the least-significant trit', () => {
    expect(encodeTrits([1, 0, 0, 0, 0])).toBe(1)
    expect(encodeTrits([0, 0, 0, 0, 1])).toBe(81)
    expect(encodeTrits([0, 1, 0, 0, 2])).toBe(165)
  })

  it('all greens is the top code', () => {
    expect(encodeTrits([2, 2, 2, 2, 2])).toBe(ALL_CORRECT)
    expect(ALL_CORRECT).toBe(242)
  })

  it('decodes and renders digit strings', () => {
    expect(decodePattern(22)).toEqual([1, 1, 2, 0, 0])
    expect(patternToString(22)).toBe('11200')
    expect(patternToString(0)).toBe('00000')
  })

  it('isTrit accepts only 0, 1, 2', () => {
    expect([0, 1, 2].every(isTrit)).toBe(true)
    expect(isTrit(3)).toBe(false)
    expect(isTrit('1')).toBe(false)
  })
})

describe('parseFeedback', () => {
  it('parses five digits and ignores surrounding whitespace', () => {
    expect(parseFeedback(' 01002\n')).toEqual([0, 1, 0, 0, 2])
  })

  it('rejects wrong length', () => {
    expect(() => parseFeedback('0100')).toThrow(MalformedFeedbackError)
    expect(() => parseFeedback('010021')).toThrow(MalformedFeedbackError)
  })

  it('rejects symbols outside 0/1/2', () => {
    expect(() => parseFeedback('01302')).toThrow("invalid symbol '3'")
    expect(() => parseFeedback('gybbb')).toThrow(MalformedFeedbackError)
  })

  it('keeps the raw input on the error', () => {
    try {
      parseFeedback('12')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedFeedbackError)
      if (err instanceof MalformedFeedbackError) expect(err.input).toBe('12')
    }
  })
})
