import { PATTERN_COUNT } from './pattern'
import { scoreGuess, type GuessScore } from './scoring'

export interface CandidateScore extends GuessScore {
  word: string
}

export interface RankOpts {
  topK?: number // default 3
  onProgress?: (done: number, total: number) => void // after each scored candidate
}

export interface Ranking {
  /** ascending average, then worst, then word */
  average: CandidateScore[]
  /** ascending worst, then average, then word (minimax) */
  worst: CandidateScore[]
}

export const DEFAULT_TOP_K = 3

function compareWords(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

// sumSquares shares the |S| denominator across one ranking, so it orders
// averages exactly without float comparison.
export function compareByAverage(a: CandidateScore, b: CandidateScore): number {
  return a.sumSquares - b.sumSquares || a.worst - b.worst || compareWords(a.word, b.word)
}

export function compareByWorst(a: CandidateScore, b: CandidateScore): number {
  return a.worst - b.worst || a.sumSquares - b.sumSquares || compareWords(a.word, b.word)
}

export function scoreCandidates(
  candidates: readonly string[],
  possibleAnswers: readonly string[],
  onProgress?: RankOpts['onProgress'],
): CandidateScore[] {
  const counts = new Uint32Array(PATTERN_COUNT)
  const total = candidates.length
  const scores: CandidateScore[] = []
  for (let i = 0; i < total; i++) {
    const word = candidates[i]!
    scores.push({ word, ...scoreGuess(word, possibleAnswers, counts) })
    if (onProgress) onProgress(i + 1, total)
  }
  return scores
}

/** One scoring pass, two total orders, first topK of each. */
export function rankCandidates(
  candidates: readonly string[],
  possibleAnswers: readonly string[],
  opts: RankOpts = {},
): Ranking {
  const topK = opts.topK ?? DEFAULT_TOP_K
  if (!Number.isInteger(topK) || topK < 1) {
    throw new RangeError(`topK must be a positive integer, got ${topK}`)
  }
  const scores = scoreCandidates(candidates, possibleAnswers, opts.onProgress)
  return {
    average: scores.slice().sort(compareByAverage).slice(0, topK),
    worst: scores.slice().sort(compareByWorst).slice(0, topK),
  }
}
