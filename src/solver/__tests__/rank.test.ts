import { describe, it, expect, vi } from 'vitest'
import { compareByAverage, compareByWorst, rankCandidates, type CandidateScore } from '../rank'
import { FIVE, RAISE_01002, fixtureWords } from './fixtures'

function score(word: string, sumSquares: number, worst: number, n = 10): CandidateScore {
  return { word, sumSquares, worst, average: sumSquares / n, groups: 0 }
}

describe('orderings', () => {
  const x = score('XENON', 10, 4)
  const y = score('YACHT', 12, 3)
  const z = score('ZEBRA', 10, 3)

  it('average ordering: average, then worst, then word', () => {
    expect([y, x, z].sort(compareByAverage).map((s) => s.word)).toEqual(['ZEBRA', 'XENON', 'YACHT'])
  })

  it('minimax ordering: worst, then average, then word', () => {
    expect([x, y, z].sort(compareByWorst).map((s) => s.word)).toEqual(['ZEBRA', 'YACHT', 'XENON'])
  })

  it('full ties fall back to code-unit word order', () => {
    const a = score('ADOBE', 5, 2)
    const b = score('ABODE', 5, 2)
    expect([a, b].sort(compareByAverage)[0]!.word).toBe('ABODE')
    expect([a, b].sort(compareByWorst)[0]!.word).toBe('ABODE')
  })
})

describe('rankCandidates', () => {
  it('five-word list: ties on both scores resolve alphabetically', () => {
    const r = rankCandidates(FIVE, FIVE, { topK: 3 })
    expect(r.average.map((s) => s.word)).toEqual(['WHITE', 'WRITE', 'LATER'])
    expect(r.worst.map((s) => s.word)).toEqual(['WHITE', 'WRITE', 'LATER'])
    expect(r.average[0]).toEqual({ word: 'WHITE', average: 1, worst: 1, sumSquares: 5, groups: 5 })
  })

  it('the two orderings disagree on the fixture list', () => {
    const words = fixtureWords()
    const r = rankCandidates(words, words, { topK: 3 })
    expect(r.average.map((s) => [s.word, s.sumSquares, s.worst])).toEqual([
      ['SLATE', 402, 12],
      ['TABLE', 406, 11],
      ['ALERT', 408, 11],
    ])
    expect(r.worst.map((s) => [s.word, s.worst, s.sumSquares])).toEqual([
      ['ABODE', 10, 526],
      ['ADOBE', 10, 526],
      ['TABLE', 11, 406],
    ])
  })

  it('guessing from the full list can beat guessing only possible words', () => {
    const words = fixtureWords()
    const fromPossible = rankCandidates(RAISE_01002, RAISE_01002, { topK: 1 })
    const fromAll = rankCandidates(words, RAISE_01002, { topK: 1 })
    expect(fromPossible.average[0]!.word).toBe('AMBLE')
    expect(fromAll.average[0]).toMatchObject({ word: 'PLUMB', sumSquares: 16, worst: 2 })
  })

  it('is deterministic across repeated calls and input order', () => {
    const words = fixtureWords()
    const a = rankCandidates(words, words, { topK: 10 })
    const b = rankCandidates([...words].reverse(), words, { topK: 10 })
    expect(JSON.stringify(b)).toBe(JSON.stringify(a))
    expect(JSON.stringify(rankCandidates(words, words, { topK: 10 }))).toBe(JSON.stringify(a))
  })

  it('defaults to three and caps at the candidate count', () => {
    expect(rankCandidates(RAISE_01002, RAISE_01002).average).toHaveLength(3)
    expect(rankCandidates(FIVE, FIVE, { topK: 50 }).worst).toHaveLength(5)
  })

  it('rejects a non-positive topK', () => {
    expect(() => rankCandidates(FIVE, FIVE, { topK: 0 })).toThrow(RangeError)
    expect(() => rankCandidates(FIVE, FIVE, { topK: 1.5 })).toThrow(RangeError)
  })

  it('reports progress once per candidate', () => {
    const onProgress = vi.fn()
    rankCandidates(FIVE, FIVE, { onProgress })
    expect(onProgress).toHaveBeenCalledTimes(5)
    expect(onProgress).toHaveBeenLastCalledWith(5, 5)
  })
})
