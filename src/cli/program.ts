/* eslint-env node */
/* eslint-disable no-console */
import { Command, InvalidArgumentError, Option } from 'commander'
import { performance } from 'node:perf_hooks'
import { applyRound, initialState, suggest, type SessionState } from '@/app/state/session'
import { DEFAULT_WORDS_FILE, loadWordList } from '@/solver/data/loader'
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TOP_K,
  SolverError,
  runBenchmark,
  type GuessPool,
  type Strategy,
} from '@/solver'
import { formatBenchmark, formatStats, formatSuggestions } from './format'
import { progressReporter, runInteractive } from './repl'

type CommonOpts = {
  words: string
  pool: GuessPool
  verbose?: boolean
}

type PlayOpts = CommonOpts & {
  top: number
}

type SuggestOpts = CommonOpts & {
  top: number
  round: string[]
  json?: boolean
}

type BenchOpts = CommonOpts & {
  strategy: Strategy
  trials: number
  seed?: number
  attempts: number
}

export function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Not a positive integer.')
  return n
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

async function loadWords(opts: CommonOpts): Promise<string[]> {
  const list = await loadWordList(opts.words)
  if (list.dropped > 0) console.warn(`[warn] dropped ${list.dropped} malformed or duplicate token(s)`)
  if (opts.verbose) console.debug(`[debug] loaded ${list.words.length} words from ${list.path}`)
  return list.words
}

/** Replay "GUESS:FEEDBACK" rounds onto a fresh session. */
export function replayRounds(state: SessionState, rounds: readonly string[]): SessionState {
  let next = state
  for (const round of rounds) {
    const [guess = '', feedback = ''] = round.split(/[:=,]/)
    next = applyRound(next, guess, feedback)
  }
  return next
}

function withCommon(cmd: Command): Command {
  return cmd
    .option('-w, --words <file>', 'Whitespace-separated word list', process.env.SOLVER_WORDS ?? DEFAULT_WORDS_FILE)
    .addOption(
      new Option('--pool <pool>', 'Guess candidates: words still possible or the whole list')
        .choices(['possible', 'all'])
        .default('possible'),
    )
}

export function buildProgram(): Command {
  const program = new Command()
  program
    .name('wordle-minimax')
    .description('Rank five-letter guesses by expected and worst-case remaining answers')
    .option('-v, --verbose', 'Print timing and load diagnostics')

  withCommon(program.command('play', { isDefault: true }).description('Interactive solver loop'))
    .option('-t, --top <n>', 'Suggestions per strategy', parsePositiveInt, DEFAULT_TOP_K)
    .action(async (_opts: PlayOpts, cmd: Command) => {
      const opts = cmd.optsWithGlobals<PlayOpts>()
      const words = await loadWords(opts)
      console.log(`Loaded ${words.length} words`)
      await runInteractive(initialState(words, { topK: opts.top, guessPool: opts.pool }), !!opts.verbose)
    })

  withCommon(program.command('suggest').description('Suggest the next guess after the given rounds'))
    .option('-t, --top <n>', 'Suggestions per strategy', parsePositiveInt, 1)
    .option('-r, --round <guess:feedback>', 'Played round, e.g. RAISE:01002 (repeatable)', collect, [])
    .option('--json', 'Print the ranking as JSON')
    .action(async (_opts: SuggestOpts, cmd: Command) => {
      const opts = cmd.optsWithGlobals<SuggestOpts>()
      const words = await loadWords(opts)
      let state: SessionState
      try {
        state = replayRounds(initialState(words, { topK: opts.top, guessPool: opts.pool }), opts.round)
      } catch (err) {
        if (!(err instanceof SolverError)) throw err
        console.error(`[error] ${err.message}`)
        process.exitCode = 1
        return
      }
      const t0 = performance.now()
      const ranking = suggest(state, opts.json ? undefined : progressReporter('Analyzing'))
      if (opts.verbose) console.debug(`[debug] ranking took ${(performance.now() - t0).toFixed(1)}ms`)
      if (opts.json) {
        console.log(JSON.stringify({ remaining: state.possible.length, ...ranking }, null, 2))
        return
      }
      console.log(formatStats(state))
      console.log('\n' + formatSuggestions(ranking))
    })

  withCommon(program.command('bench').description('Self-play games and report attempt statistics'))
    .addOption(
      new Option('-s, --strategy <strategy>', 'Ordering that picks each guess')
        .choices(['average', 'worst'])
        .default('worst'),
    )
    .option('--trials <n>', 'Games to play (sampled secrets)', parsePositiveInt, 200)
    .option('--seed <n>', 'RNG seed for secret sampling', parsePositiveInt)
    .option('--attempts <n>', 'Max attempts per game', parsePositiveInt, DEFAULT_MAX_ATTEMPTS)
    .action(async (_opts: BenchOpts, cmd: Command) => {
      const opts = cmd.optsWithGlobals<BenchOpts>()
      const words = await loadWords(opts)
      const t0 = performance.now()
      const summary = runBenchmark(words, {
        strategy: opts.strategy,
        trials: opts.trials,
        seed: opts.seed,
        maxAttempts: opts.attempts,
        guessPool: opts.pool,
        onGame: (_r, i, total) => {
          if ((i + 1) % 10 === 0 || i + 1 === total) process.stdout.write(`\rPlayed ${i + 1}/${total}`)
        },
      })
      process.stdout.write('\n')
      console.log(formatBenchmark(summary))
      if (opts.verbose) console.debug(`[debug] bench took ${(performance.now() - t0).toFixed(0)}ms`)
    })

  return program
}
