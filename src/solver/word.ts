import { MalformedWordError } from './errors'

export const DEFAULT_WORD_LENGTH = 5
// 3^10 pattern buckets is the largest histogram the evaluator allocates per word
export const MAX_WORD_LENGTH = 10

const LETTER_A = 97

/**
 * A fixed-length lowercase word. Letters are also kept as indices 0..25 so the
 * scorer can count them in a flat 26-slot table.
 */
export class Word {
  readonly text: string
  readonly codes: Uint8Array

  private constructor(text: string) {
    this.text = text
    this.codes = new Uint8Array(text.length)
    for (let i = 0; i < text.length; i++) this.codes[i] = text.charCodeAt(i) - LETTER_A
  }

  static parse(text: string, length: number = DEFAULT_WORD_LENGTH): Word {
    const trimmed = text.trim()
    if (trimmed.length !== length) {
      throw new MalformedWordError(trimmed, `expected ${length} letters, got ${trimmed.length}`)
    }
    const lower = trimmed.toLowerCase()
    if (!/^[a-z]+$/.test(lower)) {
      throw new MalformedWordError(trimmed, 'only the letters a-z are allowed')
    }
    return new Word(lower)
  }

  get length(): number {
    return this.text.length
  }

  equals(other: Word): boolean {
    return this.text === other.text
  }

  toString(): string {
    return this.text
  }
}

export function parseWord(text: string, length: number = DEFAULT_WORD_LENGTH): Word {
  return Word.parse(text, length)
}

/** Parse many words at once; the first malformed entry throws. */
export function parseWords(texts: readonly string[], length: number = DEFAULT_WORD_LENGTH): Word[] {
  return texts.map((t) => Word.parse(t, length))
}
