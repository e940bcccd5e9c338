export { Word, parseWord, parseWords, DEFAULT_WORD_LENGTH, MAX_WORD_LENGTH } from './word'
export {
  encodeTrits,
  decodePattern,
  parsePattern,
  formatPattern,
  setTrit,
  tritAt,
  allGreen,
  patternCount,
  BLACK,
  YELLOW,
  GREEN,
  type Trit,
  type PatternValue,
} from './pattern'
export { score, feedbackTrits, createScorer, type Scorer } from './feedback'
export { entropy, evaluate, patternHistogram, entropyOfHistogram, type Evaluation } from './entropy'
export { evaluateAll, bestGuess, formatEvaluation, type RankingOpts } from './scoring'
export { filterWords, SolutionSpace } from './filter'
export { Bitset } from './bitset'
export { mulberry32, seededRandom, pickOne, type RandomSource } from './random'
export { MalformedWordError, MalformedPatternError, type ParseError } from './errors'
