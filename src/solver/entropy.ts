import { createScorer } from './feedback'
import { patternCount } from './pattern'
import type { Word } from './word'

export interface Evaluation {
  word: Word
  entropy: number // bits
  expectedRemaining: number // E[|S'|] under a uniform prior on S
}

/** Count how many members of `space` produce each pattern when `word` is guessed. */
export function patternHistogram(word: Word, space: readonly Word[]): Uint32Array {
  const hist = new Uint32Array(patternCount(word.length))
  const scoreOf = createScorer()
  for (const solution of space) hist[scoreOf(word, solution)]++
  return hist
}

/** Shannon entropy (bits) of a histogram holding `n` observations in total. */
export function entropyOfHistogram(hist: Uint32Array, n: number): number {
  if (n === 0) return 0
  let h = 0
  for (let i = 0; i < hist.length; i++) {
    const c = hist[i]
    if (c === 0) continue
    const p = c / n
    h -= p * Math.log2(p)
  }
  return h > 0 ? h : 0
}

export function evaluate(word: Word, space: readonly Word[]): Evaluation {
  const n = space.length
  const hist = patternHistogram(word, space)
  let sumSq = 0
  for (let i = 0; i < hist.length; i++) sumSq += hist[i] * hist[i]
  return {
    word,
    entropy: entropyOfHistogram(hist, n),
    expectedRemaining: n > 0 ? sumSq / n : 0,
  }
}

/**
 * Expected information (bits) revealed by guessing `word` when the solution is
 * uniformly distributed over `space`. Always within [0, log2(|space|)].
 */
export function entropy(word: Word, space: readonly Word[]): number {
  return entropyOfHistogram(patternHistogram(word, space), space.length)
}
