import { reducer, sessionStatus, type SessionState } from '@/app/state/session'
import { SolverError } from '@/solver/errors'
import { parseFeedback } from '@/solver/pattern'
import { normalizeGuess } from '@/solver/words'
import type { GuessPool } from '@/solver/simulate'
import { formatStats, formatWordListing } from './format'

export type Command =
  | { kind: 'empty' }
  | { kind: 'quit' }
  | { kind: 'help' }
  | { kind: 'reset' }
  | { kind: 'show' }
  | { kind: 'undo' }
  | { kind: 'stats' }
  | { kind: 'top'; value: number }
  | { kind: 'pool'; value: GuessPool }
  | { kind: 'guess'; guess: string; feedback?: string }
  | { kind: 'invalid'; message: string }

export const HELP_TEXT = [
  'Enter a round as "GUESS FEEDBACK" (e.g. "STARE 01002"), or just the guess',
  'to be asked for the feedback: 0 = not in word, 1 = wrong position, 2 = correct.',
  'Commands: show, undo, reset, stats, top <n>, pool <possible|all>, help, quit',
].join('\n')

export function parseCommand(line: string): Command {
  const parts = line.trim().split(/\s+/).filter(Boolean)
  const [head, arg, extra] = parts
  if (head === undefined) return { kind: 'empty' }
  switch (head.toLowerCase()) {
    case 'quit':
    case 'exit':
      return { kind: 'quit' }
    case 'help':
    case '?':
      return { kind: 'help' }
    case 'reset':
      return { kind: 'reset' }
    case 'show':
      return { kind: 'show' }
    case 'undo':
      return { kind: 'undo' }
    case 'stats':
      return { kind: 'stats' }
    case 'top': {
      const n = Number(arg)
      if (!Number.isInteger(n) || n < 1) return { kind: 'invalid', message: 'usage: top <positive integer>' }
      return { kind: 'top', value: n }
    }
    case 'pool':
      if (arg === 'possible' || arg === 'all') return { kind: 'pool', value: arg }
      return { kind: 'invalid', message: 'usage: pool <possible|all>' }
  }
  if (extra !== undefined) return { kind: 'invalid', message: 'expected "GUESS FEEDBACK"' }
  return arg === undefined ? { kind: 'guess', guess: head } : { kind: 'guess', guess: head, feedback: arg }
}

export interface StepResult {
  state: SessionState
  lines: string[]
  quit: boolean
  /** true when the suggestions should be recomputed */
  changed: boolean
}

/**
 * Apply one parsed command. Solver errors are reported as lines and leave the
 * state untouched; a 'guess' without feedback must be completed by the caller.
 */
export function runCommand(state: SessionState, cmd: Command): StepResult {
  const done = (next: SessionState, lines: string[], changed = next !== state): StepResult => ({
    state: next,
    lines,
    quit: false,
    changed,
  })
  switch (cmd.kind) {
    case 'empty':
      return done(state, [])
    case 'quit':
      return { state, lines: ['Thanks for playing!'], quit: true, changed: false }
    case 'help':
      return done(state, [HELP_TEXT])
    case 'stats':
      return done(state, [formatStats(state)])
    case 'show':
      return done(state, [formatWordListing(state.possible)])
    case 'invalid':
      return done(state, [`[error] ${cmd.message}`])
    case 'reset':
      return done(reducer(state, { type: 'reset' }), ['Solver reset! Starting fresh...'], true)
    case 'undo': {
      const last = state.history.at(-1)
      if (!last) return done(state, ['Nothing to undo'])
      return done(reducer(state, { type: 'undo' }), [`Undid ${last.guess}`])
    }
    case 'top':
      return done(reducer(state, { type: 'setTopK', value: cmd.value }), [])
    case 'pool':
      return done(reducer(state, { type: 'setGuessPool', value: cmd.value }), [])
    case 'guess': {
      if (cmd.feedback === undefined) return done(state, ['[error] missing feedback'])
      let next: SessionState
      try {
        const guess = normalizeGuess(cmd.guess)
        if (parseFeedback(cmd.feedback).every((t) => t === 2)) {
          const n = state.history.length + 1
          return done(reducer(state, { type: 'reset' }), [
            `Solved with ${guess} in ${n} guess${n === 1 ? '' : 'es'}! Starting a new puzzle...`,
          ], true)
        }
        next = reducer(state, { type: 'addGuess', payload: { guess, feedback: cmd.feedback } })
      } catch (err) {
        if (err instanceof SolverError) return done(state, [`[error] ${err.message}`])
        throw err
      }
      const lines = sessionStatus(next) === 'solved' ? [`The answer is ${next.possible[0]}`] : []
      return done(next, lines)
    }
  }
}
