import { evaluate, type Evaluation } from './entropy'
import type { Word } from './word'

export interface RankingOpts {
  topK?: number // default: every word
}

/**
 * Rank every guessable word by entropy against the current space. Ties keep
 * the order of `words`. Nothing is cached: the space changes every round.
 */
export function evaluateAll(
  words: readonly Word[],
  space: readonly Word[],
  opts: RankingOpts = {},
): Evaluation[] {
  const results: { idx: number; evaluation: Evaluation }[] = []
  for (let idx = 0; idx < words.length; idx++) {
    results.push({ idx, evaluation: evaluate(words[idx], space) })
  }
  results.sort((a, b) => b.evaluation.entropy - a.evaluation.entropy || a.idx - b.idx)
  const ranked = results.map((r) => r.evaluation)
  return opts.topK != null ? ranked.slice(0, Math.max(0, opts.topK)) : ranked
}

export function bestGuess(words: readonly Word[], space: readonly Word[]): Evaluation | null {
  let best: Evaluation | null = null
  for (const w of words) {
    const e = evaluate(w, space)
    if (!best || e.entropy > best.entropy) best = e
  }
  return best
}

export function formatEvaluation(e: Evaluation): string {
  return `${e.word.text} (${e.entropy.toFixed(3)})`
}
