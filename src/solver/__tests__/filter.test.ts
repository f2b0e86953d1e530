import { describe, it, expect } from 'vitest'
import { filterCandidatesArray, CandidateSet } from '../filter'
import { feedbackPattern } from '../feedback'
import { encodeTrits, parseFeedback } from '../pattern'
import { RAISE_01002, fixtureWords } from './fixtures'

describe('filterCandidatesArray', () => {
  it('all greens scenario reduces to exact word', () => {
    const list = ['APPLE', 'APPLY', 'AMPLY']
    expect(filterCandidatesArray(list, 'APPLE', feedbackPattern('APPLE', 'APPLE'))).toEqual(['APPLE'])
  })

  it('RAISE 01002 round on the fixture list', () => {
    const words = fixtureWords()
    const kept = filterCandidatesArray(words, 'RAISE', encodeTrits(parseFeedback('01002')))
    expect(kept).toEqual(RAISE_01002)
    expect(kept.length).toBeLessThan(words.length)
    for (const w of kept) expect(feedbackPattern('RAISE', w)).toBe(encodeTrits([0, 1, 0, 0, 2]))
  })

  it('duplicate-letter feedback keeps only exact pattern matches', () => {
    // ERASE answers SPEED with 10110; a single-E word cannot reproduce it
    const list = ['ERASE', 'STEED', 'SPREE', 'EASEL']
    const kept = filterCandidatesArray(list, 'SPEED', feedbackPattern('SPEED', 'ERASE'))
    expect(kept).toContain('ERASE')
    expect(kept).not.toContain('SPREE')
  })

  it('skips words of another length', () => {
    expect(filterCandidatesArray(['ABCD', 'ABCDE'], 'ABCDE', 242)).toEqual(['ABCDE'])
  })
})

describe('CandidateSet', () => {
  it('applyFeedback returns a new set and leaves the receiver alone', () => {
    const words = fixtureWords()
    const all = new CandidateSet(words)
    const next = all.applyFeedback('RAISE', encodeTrits([0, 1, 0, 0, 2]))
    expect(all.aliveCount()).toBe(92)
    expect(next.aliveCount()).toBe(12)
    expect(next.size()).toBe(92)
    expect(next.getAliveWords()).toEqual(RAISE_01002)
  })

  it('indices follow list order', () => {
    const cs = new CandidateSet(['CRANE', 'SLATE', 'TRACE']).applyFeedback('CRANE', 242)
    expect([...cs.indices()]).toEqual([0])
  })
})
