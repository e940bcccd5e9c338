import { BLACK, GREEN, YELLOW, decodePattern, type PatternValue, type Trit } from './pattern'
import type { Word } from './word'

export type Scorer = (guess: Word, solution: Word) => PatternValue

/**
 * Build a scorer that owns its own 26-slot letter counter table, so hot loops
 * (one histogram, one filter pass) do not allocate per pair.
 */
export function createScorer(): Scorer {
  const counts = new Uint8Array(26)
  return (guess, solution) => {
    const L = guess.length
    if (L !== solution.length) {
      throw new Error('Guess and solution must have same length')
    }
    const g = guess.codes
    const s = solution.codes
    counts.fill(0)

    // First pass: greens, counting the unmatched solution letters
    let green = 0
    for (let i = 0; i < L; i++) {
      if (g[i] === s[i]) green |= 1 << i
      else counts[s[i]]++
    }

    // Second pass: yellows left to right while the letter has unmatched copies
    let value = 0
    let mul = 1
    for (let i = 0; i < L; i++) {
      if (green & (1 << i)) {
        value += GREEN * mul
      } else if (counts[g[i]] > 0) {
        counts[g[i]]--
        value += YELLOW * mul
      } else {
        value += BLACK * mul
      }
      mul *= 3
    }
    return value
  }
}

const shared = createScorer()

/** Feedback pattern for `guess` when the hidden word is `solution`. */
export function score(guess: Word, solution: Word): PatternValue {
  return shared(guess, solution)
}

export function feedbackTrits(guess: Word, solution: Word): Trit[] {
  return decodePattern(score(guess, solution), guess.length)
}
