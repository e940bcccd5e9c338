import { createScorer } from './feedback'
import type { PatternValue } from './pattern'
import type { Word } from './word'
import { Bitset } from './bitset'

/** Members of `space` that would have produced `observed` for `guess`, order preserved. */
export function filterWords(space: readonly Word[], guess: Word, observed: PatternValue): Word[] {
  const scoreOf = createScorer()
  const out: Word[] = []
  for (const w of space) {
    if (w.length !== guess.length) continue // length mismatch can't match pattern
    if (scoreOf(guess, w) === observed) out.push(w)
  }
  return out
}

/**
 * Words still consistent with every observation so far, held as handles into an
 * immutable master list. Filtering returns a new space and leaves this one as is.
 */
export class SolutionSpace {
  private readonly master: readonly Word[]
  private readonly alive: Bitset
  private readonly cachedSize: number

  private constructor(master: readonly Word[], alive: Bitset, size: number) {
    this.master = master
    this.alive = alive
    this.cachedSize = size
  }

  static full(master: readonly Word[]): SolutionSpace {
    return new SolutionSpace(master, new Bitset(master.length, true), master.length)
  }

  size(): number {
    return this.cachedSize
  }

  isEmpty(): boolean {
    return this.cachedSize === 0
  }

  /** The single remaining word, or null when zero or several remain. */
  only(): Word | null {
    if (this.cachedSize !== 1) return null
    for (const i of this.alive.indices()) return this.master[i]
    return null
  }

  *indices(): IterableIterator<number> {
    yield* this.alive.indices()
  }

  words(): Word[] {
    const out: Word[] = []
    for (const i of this.alive.indices()) out.push(this.master[i])
    return out
  }

  filter(guess: Word, observed: PatternValue): SolutionSpace {
    const scoreOf = createScorer()
    const next = this.alive.clone()
    let size = this.cachedSize
    for (const i of this.alive.indices()) {
      const w = this.master[i]
      if (w.length !== guess.length || scoreOf(guess, w) !== observed) {
        next.delete(i)
        size--
      }
    }
    return new SolutionSpace(this.master, next, size)
  }
}
