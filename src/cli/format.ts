import { summarize } from '@/app/logic/constraints'
import type { SessionState } from '@/app/state/session'
import type { CandidateScore, Ranking } from '@/solver/rank'
import type { BenchmarkSummary } from '@/solver/simulate'
import { WORD_LENGTH } from '@/solver/pattern'

export const SHOW_ALL_LIMIT = 50
export const SHOW_PREVIEW = 20

const listOrNone = (letters: string[]) => (letters.length ? letters.join(' ') : 'none')

export function formatStats(state: SessionState): string {
  const c = summarize(state.history)
  const slots: string[] = []
  for (let i = 0; i < WORD_LENGTH; i++) slots.push(c.fixedPositions.get(i) ?? '_')
  return [
    `Possible words remaining: ${state.possible.length}`,
    `Known positions: ${slots.join(' ')}`,
    `Present elsewhere: ${listOrNone(c.presentElsewhere)}`,
    `Excluded letters: ${listOrNone(c.excluded)}`,
  ].join('\n')
}

function formatScore(s: CandidateScore, rank: number): string {
  return `  ${rank}. ${s.word}  avg ${s.average.toFixed(2)} | worst ${s.worst}`
}

export function formatSuggestions(ranking: Ranking): string {
  const out: string[] = ['BEST FOR AVERAGE CASE:']
  ranking.average.forEach((s, i) => out.push(formatScore(s, i + 1)))
  out.push('BEST FOR WORST CASE (minimax, ties broken by average):')
  ranking.worst.forEach((s, i) => out.push(formatScore(s, i + 1)))
  const a = ranking.average[0]
  const w = ranking.worst[0]
  if (a && w && a.word === w.word) out.push('Both strategies agree!')
  return out.join('\n')
}

/** Every word (numbered, sorted) up to SHOW_ALL_LIMIT; otherwise a sorted preview. */
export function formatWordListing(words: readonly string[]): string {
  const sorted = [...words].sort()
  if (sorted.length <= SHOW_ALL_LIMIT) {
    const width = String(sorted.length).length
    return ['All possible words:', ...sorted.map((w, i) => `  ${String(i + 1).padStart(width)}. ${w}`)].join(
      '\n',
    )
  }
  return [
    `Too many words to display (${sorted.length})`,
    `First ${SHOW_PREVIEW}: ${sorted.slice(0, SHOW_PREVIEW).join(', ')}`,
  ].join('\n')
}

export function formatBenchmark(s: BenchmarkSummary): string {
  const pct = s.trials > 0 ? ((s.solved / s.trials) * 100).toFixed(2) : '0.00'
  const out = [
    `Strategy: ${s.strategy}  opening: ${s.opening}`,
    `Games: ${s.trials}  solved: ${s.solved} (${pct}%)  failed: ${s.failed}`,
    `Average attempts (solved): ${s.meanAttempts.toFixed(3)}`,
  ]
  s.histogram.forEach((n, i) => out.push(`  ${i + 1}: ${n}`))
  if (s.failures.length) out.push(`Failed: ${s.failures.join(', ')}`)
  return out.join('\n')
}
