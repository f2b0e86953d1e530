export { feedbackPattern, feedbackTrits } from './feedback'
export {
  encodeTrits,
  decodePattern,
  patternToString,
  parseFeedback,
  isTrit,
  ALL_CORRECT,
  PATTERN_COUNT,
  WORD_LENGTH,
  type PatternValue,
  type Trit,
} from './pattern'
export { filterCandidatesArray, CandidateSet } from './filter'
export { Bitset } from './bitset'
export { scoreGuess, groupByPattern, type GuessScore } from './scoring'
export {
  rankCandidates,
  scoreCandidates,
  compareByAverage,
  compareByWorst,
  DEFAULT_TOP_K,
  type CandidateScore,
  type Ranking,
  type RankOpts,
} from './rank'
export { normalizeGuess, parseWordList, isWord } from './words'
export {
  SolverError,
  MalformedFeedbackError,
  MalformedGuessError,
  EmptyCandidateSetError,
} from './errors'
export {
  playGame,
  runBenchmark,
  bestGuess,
  DEFAULT_MAX_ATTEMPTS,
  type Strategy,
  type GuessPool,
  type GameResult,
  type BenchmarkSummary,
} from './simulate'
