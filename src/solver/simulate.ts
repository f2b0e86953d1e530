import { feedbackPattern } from './feedback'
import { filterCandidatesArray } from './filter'
import { ALL_CORRECT } from './pattern'
import { mulberry32, sampleIndices } from './random'
import { rankCandidates } from './rank'

/** Which ordering picks the next guess */
export type Strategy = 'average' | 'worst'

/** 'possible': guess only from words still alive; 'all': any word in the list */
export type GuessPool = 'possible' | 'all'

export interface PlayOpts {
  strategy: Strategy
  maxAttempts?: number // default 6
  guessPool?: GuessPool // default 'possible'
  opening?: string // precomputed first guess (same for every game on a list)
}

export interface GameResult {
  secret: string
  solved: boolean
  attempts: number
  guesses: string[]
}

export const DEFAULT_MAX_ATTEMPTS = 6

export function bestGuess(
  words: readonly string[],
  possible: readonly string[],
  strategy: Strategy,
  guessPool: GuessPool,
): string | undefined {
  if (possible.length <= 1) return possible[0]
  const pool = guessPool === 'all' ? words : possible
  return rankCandidates(pool, possible, { topK: 1 })[strategy][0]?.word
}

/** Self-play against a known secret following the top suggestion every turn. */
export function playGame(words: readonly string[], secret: string, opts: PlayOpts): GameResult {
  const maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  const guessPool = opts.guessPool ?? 'possible'
  const guesses: string[] = []
  let possible: readonly string[] = words
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const guess =
      attempt === 1 && opts.opening ? opts.opening : bestGuess(words, possible, opts.strategy, guessPool)
    if (guess === undefined) break // secret missing from the list
    guesses.push(guess)
    const pat = feedbackPattern(guess, secret)
    if (pat === ALL_CORRECT) return { secret, solved: true, attempts: attempt, guesses }
    possible = filterCandidatesArray(possible, guess, pat)
  }
  return { secret, solved: false, attempts: guesses.length, guesses }
}

export interface BenchmarkOpts {
  strategy: Strategy
  trials: number
  seed?: number
  maxAttempts?: number
  guessPool?: GuessPool
  onGame?: (result: GameResult, index: number, total: number) => void
}

export interface BenchmarkSummary {
  strategy: Strategy
  opening: string
  trials: number
  solved: number
  failed: number
  /** mean attempts over solved games (0 when none solved) */
  meanAttempts: number
  /** histogram[i] = games solved in i+1 attempts */
  histogram: number[]
  failures: string[]
}

export function runBenchmark(words: readonly string[], opts: BenchmarkOpts): BenchmarkSummary {
  if (words.length === 0) throw new RangeError('word list is empty')
  const maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  const guessPool = opts.guessPool ?? 'possible'
  const opening = bestGuess(words, words, opts.strategy, guessPool) ?? words[0]!
  const rand = mulberry32(opts.seed ?? 123456789)
  const secrets = sampleIndices(words.length, Math.max(0, opts.trials), rand).map((i) => words[i]!)

  const histogram = new Array<number>(maxAttempts).fill(0)
  const failures: string[] = []
  let solved = 0
  let attemptsTotal = 0
  secrets.forEach((secret, i) => {
    const result = playGame(words, secret, { strategy: opts.strategy, maxAttempts, guessPool, opening })
    if (result.solved) {
      solved++
      attemptsTotal += result.attempts
      histogram[result.attempts - 1]!++
    } else {
      failures.push(secret)
    }
    if (opts.onGame) opts.onGame(result, i, secrets.length)
  })
  return {
    strategy: opts.strategy,
    opening,
    trials: secrets.length,
    solved,
    failed: failures.length,
    meanAttempts: solved > 0 ? attemptsTotal / solved : 0,
    histogram,
    failures,
  }
}
