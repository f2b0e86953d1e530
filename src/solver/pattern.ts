import { MalformedFeedbackError } from './errors'

// Trit meanings: 0=gray (absent), 1=yellow (present), 2=green (correct)
export type Trit = 0 | 1 | 2

/** Base-3 packed feedback; position 0 is the least-significant trit. */
export type PatternValue = number

export const WORD_LENGTH = 5

/** 3^5 distinct patterns for five-letter words */
export const PATTERN_COUNT = 243

export const ALL_CORRECT: PatternValue = PATTERN_COUNT - 1

export function isTrit(v: unknown): v is Trit {
  return v === 0 || v === 1 || v === 2
}

/**
 * Encode an array of trits (values 0|1|2) into a little-endian base-3 number.
 * Lowest index (position 0) becomes the least-significant trit.
 */
export function encodeTrits(trits: readonly Trit[]): PatternValue {
  let value = 0
  let mul = 1
  for (let i = 0; i < trits.length; i++) {
    value += trits[i]! * mul
    mul *= 3
  }
  return value
}

/** Decode a pattern value back into its trit array of given length */
export function decodePattern(p: PatternValue, length: number = WORD_LENGTH): Trit[] {
  const out: Trit[] = []
  let v = p
  for (let i = 0; i < length; i++) {
    const t = v % 3
    out.push(t === 2 ? 2 : t === 1 ? 1 : 0)
    v = Math.trunc(v / 3)
  }
  return out
}

/** Position-aligned digit string, e.g. 25 -> "11200" */
export function patternToString(p: PatternValue, length: number = WORD_LENGTH): string {
  return decodePattern(p, length).join('')
}

/**
 * Parse user feedback ("01002"). Surrounding whitespace is ignored; anything
 * other than exactly five characters from {0,1,2} is rejected.
 */
export function parseFeedback(raw: string): Trit[] {
  const s = raw.trim()
  if (s.length !== WORD_LENGTH) {
    throw new MalformedFeedbackError(raw, `expected ${WORD_LENGTH} digits, got ${s.length}`)
  }
  const trits: Trit[] = []
  for (const ch of s) {
    const t = ch.charCodeAt(0) - 48 // '0' => 0
    if (!isTrit(t)) throw new MalformedFeedbackError(raw, `invalid symbol '${ch}'`)
    trits.push(t)
  }
  return trits
}
