import { MalformedGuessError } from './errors'
import { WORD_LENGTH } from './pattern'

const WORD_RE = new RegExp(`^[A-Z]{${WORD_LENGTH}}$`)

export function isWord(token: string): boolean {
  return WORD_RE.test(token)
}

/** Trim + uppercase a typed guess; throws MalformedGuessError unless five letters remain. */
export function normalizeGuess(raw: string): string {
  const guess = raw.trim().toUpperCase()
  if (!isWord(guess)) throw new MalformedGuessError(raw)
  return guess
}

/**
 * Split a whitespace-separated word list, uppercase every token and drop the
 * ones that are not five ASCII letters. First occurrence wins on duplicates.
 */
export function parseWordList(text: string): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const token of text.split(/\s+/)) {
    if (!token) continue
    const w = token.toUpperCase()
    if (!isWord(w) || seen.has(w)) continue
    seen.add(w)
    out.push(w)
  }
  return out
}
