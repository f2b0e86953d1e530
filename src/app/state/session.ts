// Session state & reducer for the interactive solver.
// Every transition returns a fresh state; the possible-answer list is
// recomputed or filtered wholesale, never edited in place.

import { EmptyCandidateSetError } from '@/solver/errors'
import { filterCandidatesArray } from '@/solver/filter'
import { encodeTrits, parseFeedback, type Trit } from '@/solver/pattern'
import { DEFAULT_TOP_K, rankCandidates, type Ranking, type RankOpts } from '@/solver/rank'
import type { GuessPool } from '@/solver/simulate'
import { normalizeGuess } from '@/solver/words'
import { buildCandidates } from '@/app/logic/constraints'

export type { Trit }

export interface GuessEntry {
  guess: string
  trits: Trit[]
}

export interface Settings {
  topK: number
  guessPool: GuessPool
}

export interface SessionState {
  settings: Settings
  words: readonly string[] // full list, owned for the session lifetime
  history: GuessEntry[]
  possible: readonly string[]
}

export type SessionStatus = 'init' | 'playing' | 'solved'

export type Action =
  | { type: 'addGuess'; payload: { guess: string; feedback: string } }
  | { type: 'undo' }
  | { type: 'reset' }
  | { type: 'setTopK'; value: number }
  | { type: 'setGuessPool'; value: GuessPool }

export const MAX_TOP_K = 20

export function initialState(words: readonly string[], settings: Partial<Settings> = {}): SessionState {
  return {
    settings: {
      topK: clampTopK(settings.topK ?? DEFAULT_TOP_K),
      guessPool: settings.guessPool ?? 'possible',
    },
    words,
    history: [],
    possible: words,
  }
}

function clampTopK(value: number): number {
  return Math.max(1, Math.min(MAX_TOP_K, Math.floor(value)))
}

/**
 * Validate and apply one round. Throws MalformedGuessError,
 * MalformedFeedbackError or EmptyCandidateSetError; `state` is left as is.
 */
export function applyRound(state: SessionState, rawGuess: string, rawFeedback: string): SessionState {
  const guess = normalizeGuess(rawGuess)
  const trits = parseFeedback(rawFeedback)
  const possible = filterCandidatesArray(state.possible, guess, encodeTrits(trits))
  if (possible.length === 0) throw new EmptyCandidateSetError(guess, trits.join(''))
  return {
    ...state,
    history: [...state.history, { guess, trits }],
    possible,
  }
}

export function reducer(state: SessionState, action: Action): SessionState {
  switch (action.type) {
    case 'addGuess':
      return applyRound(state, action.payload.guess, action.payload.feedback)
    case 'undo': {
      if (state.history.length === 0) return state
      const history = state.history.slice(0, -1)
      return {
        ...state,
        history,
        possible: buildCandidates(state.words, history).getAliveWords(),
      }
    }
    case 'reset':
      return { ...state, history: [], possible: state.words }
    case 'setTopK': {
      const topK = clampTopK(action.value)
      if (topK === state.settings.topK) return state
      return { ...state, settings: { ...state.settings, topK } }
    }
    case 'setGuessPool': {
      if (state.settings.guessPool === action.value) return state
      return { ...state, settings: { ...state.settings, guessPool: action.value } }
    }
    default:
      return state
  }
}

export function sessionStatus(state: SessionState): SessionStatus {
  if (state.possible.length === 1) return 'solved'
  return state.history.length === 0 ? 'init' : 'playing'
}

/**
 * Rank the configured guess pool against the possible answers. Once a single
 * word remains it is returned directly with a zero score.
 */
export function suggest(state: SessionState, onProgress?: RankOpts['onProgress']): Ranking {
  if (state.possible.length === 1) {
    const only = { word: state.possible[0]!, average: 0, worst: 0, sumSquares: 0, groups: 0 }
    return { average: [only], worst: [only] }
  }
  const pool = state.settings.guessPool === 'all' ? state.words : state.possible
  return rankCandidates(pool, state.possible, { topK: state.settings.topK, onProgress })
}
