import { CandidateSet } from '@/solver/filter'
import { encodeTrits } from '@/solver/pattern'
import type { GuessEntry, Trit } from '@/app/state/session'

/** Build a CandidateSet from an initial word list and prior guess history. */
export function buildCandidates(words: readonly string[], history: readonly GuessEntry[]): CandidateSet {
  let cs = new CandidateSet(words)
  for (const { guess, trits } of history) {
    cs = cs.applyFeedback(guess, encodeTrits(trits))
  }
  return cs
}

/**
 * Return true if applying the (nextGuess,nextTrits) feedback would eliminate all candidates.
 * Useful to warn user that a pattern combination is inconsistent with remaining possibility space.
 */
export function wouldEliminateAll(
  words: readonly string[],
  history: readonly GuessEntry[],
  nextGuess: string,
  nextTrits: Trit[],
): boolean {
  if (nextGuess.length !== nextTrits.length) return false // inconsistent input can't be evaluated meaningfully
  const cs = buildCandidates(words, history).applyFeedback(nextGuess, encodeTrits(nextTrits))
  return cs.aliveCount() === 0
}

export interface ConstraintState {
  fixedPositions: Map<number, string> // index -> letter, ascending index
  presentElsewhere: string[] // sorted
  excluded: string[] // sorted
}

/**
 * Human-readable summary of the history. Advisory only: narrowing always goes
 * through the feedback filter, never through these sets.
 */
export function summarize(history: readonly GuessEntry[]): ConstraintState {
  const fixed: (string | undefined)[] = []
  const present = new Set<string>()
  const absent = new Set<string>()
  const confirmed = new Set<string>() // letters marked 1 or 2 anywhere

  for (const { guess, trits } of history) {
    for (let i = 0; i < trits.length; i++) {
      const letter = guess[i]
      if (letter === undefined) continue
      const t = trits[i]
      if (t === 2) {
        fixed[i] = letter // last round wins
        confirmed.add(letter)
      } else if (t === 1) {
        present.add(letter)
        confirmed.add(letter)
      } else {
        absent.add(letter)
      }
    }
  }

  const fixedPositions = new Map<number, string>()
  fixed.forEach((letter, i) => {
    if (letter !== undefined) fixedPositions.set(i, letter)
  })
  const fixedLetters = new Set(fixedPositions.values())
  return {
    fixedPositions,
    presentElsewhere: [...present].filter((l) => !fixedLetters.has(l)).sort(),
    excluded: [...absent].filter((l) => !confirmed.has(l)).sort(),
  }
}
