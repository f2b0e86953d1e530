import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { feedbackPattern, feedbackTrits } from '@/solver/feedback'
import { filterCandidatesArray, CandidateSet } from '@/solver/filter'
import { ALL_CORRECT, PATTERN_COUNT, decodePattern } from '@/solver/pattern'

// Small alphabet so repeated letters are frequent
const letters = 'ABCDE'

function genWord() {
  return fc
    .array(fc.constantFrom(...letters.split('')), { minLength: 5, maxLength: 5 })
    .map((a) => a.join(''))
}

const RUNS = process.env.FAST_CHECK_RUNS ? Number(process.env.FAST_CHECK_RUNS) : 500

function countOf(word: string, ch: string): number {
  let n = 0
  for (const c of word) if (c === ch) n++
  return n
}

describe('feedback invariants', () => {
  it('greens equal position matches; marks per letter never exceed the answer count', () => {
    fc.assert(
      fc.property(genWord(), genWord(), (g, s) => {
        const trits = feedbackTrits(g, s)
        let posMatches = 0
        for (let i = 0; i < 5; i++) if (g[i] === s[i]) posMatches++
        expect(trits.filter((t) => t === 2).length).toBe(posMatches)
        for (const ch of new Set(g)) {
          let marked = 0
          for (let i = 0; i < 5; i++) if (g[i] === ch && trits[i] !== 0) marked++
          expect(marked).toBe(Math.min(countOf(g, ch), countOf(s, ch)))
        }
      }),
      { numRuns: RUNS },
    )
  })

  it('pattern code stays in range and round-trips', () => {
    fc.assert(
      fc.property(genWord(), genWord(), (g, s) => {
        const pat = feedbackPattern(g, s)
        expect(pat).toBeGreaterThanOrEqual(0)
        expect(pat).toBeLessThan(PATTERN_COUNT)
        expect(decodePattern(pat)).toEqual(feedbackTrits(g, s))
      }),
      { numRuns: RUNS },
    )
  })

  it('evaluate(w, w) is all correct', () => {
    fc.assert(
      fc.property(genWord(), (w) => {
        expect(feedbackPattern(w, w)).toBe(ALL_CORRECT)
      }),
      { numRuns: RUNS },
    )
  })

  it('the answer survives its own feedback and filtering never grows the set', () => {
    fc.assert(
      fc.property(fc.array(genWord(), { minLength: 1, maxLength: 30 }), genWord(), (words, g) => {
        const answer = words[0]!
        const pat = feedbackPattern(g, answer)
        const kept = filterCandidatesArray(words, g, pat)
        expect(kept).toContain(answer)
        expect(kept.length).toBeLessThanOrEqual(words.length)
        expect(new CandidateSet(words).applyFeedback(g, pat).getAliveWords()).toEqual(kept)
      }),
      { numRuns: 200 },
    )
  })
})
