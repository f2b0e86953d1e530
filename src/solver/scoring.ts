import { feedbackPattern } from './feedback'
import { PATTERN_COUNT, patternToString } from './pattern'

export interface GuessScore {
  /** E[|S'|] when the answer is uniform over S: Σ size² / |S| */
  average: number
  /** size of the largest pattern group */
  worst: number
  /** Σ size²; exact integer used for ordering */
  sumSquares: number
  /** number of distinct patterns the guess can produce */
  groups: number
}

const EMPTY_SCORE: GuessScore = { average: 0, worst: 0, sumSquares: 0, groups: 0 }

/**
 * Score one guess against every possible answer. Group counts live in a
 * pattern-indexed array; `counts` may be passed in to reuse the buffer across
 * guesses (it is zeroed here).
 */
export function scoreGuess(
  guess: string,
  possibleAnswers: readonly string[],
  counts: Uint32Array = new Uint32Array(PATTERN_COUNT),
): GuessScore {
  const N = possibleAnswers.length
  if (N === 0) return { ...EMPTY_SCORE }
  counts.fill(0)
  for (let i = 0; i < N; i++) {
    counts[feedbackPattern(guess, possibleAnswers[i]!)]!++
  }
  let sumSquares = 0
  let worst = 0
  let groups = 0
  for (let p = 0; p < counts.length; p++) {
    const n = counts[p]!
    if (n === 0) continue
    groups++
    sumSquares += n * n
    if (n > worst) worst = n
  }
  return { average: sumSquares / N, worst, sumSquares, groups }
}

/** Answers grouped by the digit-string pattern `guess` would show, in first-seen order. */
export function groupByPattern(
  guess: string,
  possibleAnswers: readonly string[],
): Map<string, string[]> {
  const groups = new Map<string, string[]>()
  for (const answer of possibleAnswers) {
    const key = patternToString(feedbackPattern(guess, answer))
    const bucket = groups.get(key)
    if (bucket) bucket.push(answer)
    else groups.set(key, [answer])
  }
  return groups
}
