import { encodeTrits, type PatternValue, type Trit } from './pattern'

const CODE_A = 65

export function feedbackTrits(guess: string, answer: string): Trit[] {
  if (guess.length !== answer.length) {
    throw new Error('Guess and answer must have same length')
  }
  const L = guess.length
  const result = new Array<Trit>(L).fill(0)

  // Letter counts for answer (uppercase A-Z)
  const counts = new Array<number>(26).fill(0)
  for (let i = 0; i < L; i++) {
    const c = answer.charCodeAt(i) - CODE_A
    if (c >= 0 && c < 26) counts[c]!++
  }

  // First pass: greens consume their letter
  for (let i = 0; i < L; i++) {
    if (guess[i] === answer[i]) {
      result[i] = 2
      const c = guess.charCodeAt(i) - CODE_A
      if (c >= 0 && c < 26) counts[c]!--
    }
  }

  // Second pass: yellows only while the letter has unconsumed occurrences
  for (let i = 0; i < L; i++) {
    if (result[i] === 2) continue
    const c = guess.charCodeAt(i) - CODE_A
    if (c >= 0 && c < 26 && counts[c]! > 0) {
      result[i] = 1
      counts[c]!--
    }
  }

  return result
}

export function feedbackPattern(guess: string, answer: string): PatternValue {
  return encodeTrits(feedbackTrits(guess, answer))
}
