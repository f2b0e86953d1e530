import { feedbackPattern } from './feedback'
import type { PatternValue } from './pattern'
import { Bitset } from './bitset'

/**
 * Keep exactly the words that would have produced `pat` had they been the
 * answer to `guess`. Order is preserved.
 */
export function filterCandidatesArray(
  words: readonly string[],
  guess: string,
  pat: PatternValue,
): string[] {
  const L = guess.length
  const out: string[] = []
  for (const w of words) {
    if (w.length !== L) continue // length mismatch can't match pattern
    if (feedbackPattern(guess, w) === pat) out.push(w)
  }
  return out
}

/** Full word list plus the alive subset. applyFeedback never mutates the receiver. */
export class CandidateSet {
  private readonly words: readonly string[]
  private readonly alive: Bitset

  constructor(words: readonly string[], alive?: Bitset) {
    this.words = words
    if (alive) {
      if (alive.size !== words.length) throw new Error('Bitset size mismatch')
      this.alive = alive
    } else {
      this.alive = new Bitset(words.length)
      this.alive.fillAll()
    }
  }

  size(): number {
    return this.words.length
  }

  aliveCount(): number {
    return this.alive.count()
  }

  *indices(): Iterable<number> {
    for (const i of this.alive.indices()) {
      yield i
    }
  }

  applyFeedback(guess: string, pat: PatternValue): CandidateSet {
    const L = guess.length
    const next = this.alive.clone()
    for (const i of this.alive.indices()) {
      const w = this.words[i]!
      if (w.length !== L || feedbackPattern(guess, w) !== pat) next.clear(i)
    }
    return new CandidateSet(this.words, next)
  }

  getAliveWords(): string[] {
    const out: string[] = []
    for (const i of this.alive.indices()) {
      out.push(this.words[i]!)
    }
    return out
  }
}
