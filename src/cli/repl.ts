/* eslint-env node */
/* eslint-disable no-console */
import { createInterface } from 'node:readline/promises'
import { performance } from 'node:perf_hooks'
import { sessionStatus, suggest, type SessionState } from '@/app/state/session'
import type { Ranking } from '@/solver/rank'
import { HELP_TEXT, parseCommand, runCommand } from './commands'
import { formatStats, formatSuggestions } from './format'

const PROGRESS_EVERY = 50

/** Carriage-return progress line on stdout; silent for small pools. */
export function progressReporter(label: string): (done: number, total: number) => void {
  return (done, total) => {
    if (total < PROGRESS_EVERY * 4) return
    if (done === total) {
      process.stdout.write(`\r${' '.repeat(label.length + 32)}\r`)
    } else if (done % PROGRESS_EVERY === 0) {
      process.stdout.write(`\r${label} ${total} candidates... (${done}/${total})`)
    }
  }
}

export function timedSuggest(state: SessionState, verbose: boolean): Ranking {
  const t0 = performance.now()
  const ranking = suggest(state, progressReporter('Analyzing'))
  if (verbose) {
    const pool = state.settings.guessPool === 'all' ? state.words.length : state.possible.length
    console.debug(
      `[debug] scored ${pool} guesses x ${state.possible.length} answers in ${(performance.now() - t0).toFixed(1)}ms`,
    )
  }
  return ranking
}

/** Interactive loop: print stats + suggestions, read one line, apply it, repeat. */
export async function runInteractive(initial: SessionState, verbose = false): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  let state = initial
  let fresh = true
  console.log(HELP_TEXT)
  try {
    for (;;) {
      if (fresh) {
        console.log('\n' + '-'.repeat(60))
        console.log(formatStats(state))
        if (sessionStatus(state) !== 'solved') console.log('\n' + formatSuggestions(timedSuggest(state, verbose)))
        console.log('-'.repeat(60))
        fresh = false
      }
      let cmd = parseCommand(await rl.question('\nEnter your guess (or command): '))
      if (cmd.kind === 'guess' && cmd.feedback === undefined) {
        const feedback = await rl.question('Enter the result (5 digits, 0/1/2): ')
        cmd = { ...cmd, feedback }
      }
      const step = runCommand(state, cmd)
      for (const line of step.lines) console.log(line)
      state = step.state
      if (step.quit) return
      fresh = step.changed
    }
  } finally {
    rl.close()
  }
}
