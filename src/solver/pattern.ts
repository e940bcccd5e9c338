import { MalformedPatternError } from './errors'

// Trit meanings: 0=black,1=yellow,2=green
export type Trit = 0 | 1 | 2
export type PatternValue = number

export const BLACK: Trit = 0
export const YELLOW: Trit = 1
export const GREEN: Trit = 2

const SYMBOLS: readonly string[] = ['b', 'y', 'g']

function toTrit(n: number): Trit {
  return n === 2 ? GREEN : n === 1 ? YELLOW : BLACK
}

/** Number of distinct patterns for words of the given length (3^L). */
export function patternCount(length: number): number {
  return 3 ** length
}

/**
 * Encode trits into a little-endian base-3 integer.
 * Position 0 becomes the least-significant trit.
 */
export function encodeTrits(trits: readonly Trit[]): PatternValue {
  let value = 0
  let mul = 1
  for (const t of trits) {
    value += t * mul
    mul *= 3
  }
  return value
}

export function decodePattern(p: PatternValue, length: number): Trit[] {
  const out = new Array<Trit>(length)
  let v = p
  for (let i = 0; i < length; i++) {
    out[i] = toTrit(v % 3)
    v = Math.trunc(v / 3)
  }
  return out
}

export function tritAt(p: PatternValue, i: number): Trit {
  return toTrit(Math.trunc(p / 3 ** i) % 3)
}

/** Replace the trit at position i, returning the new pattern value. */
export function setTrit(p: PatternValue, i: number, t: Trit): PatternValue {
  const base = 3 ** i
  const lower = p % base
  const higher = Math.trunc(p / (base * 3)) * base * 3
  return higher + t * base + lower
}

export function allGreen(length: number): PatternValue {
  return patternCount(length) - 1
}

export function parsePattern(text: string, length: number): PatternValue {
  const line = text.trim()
  if (line.length !== length) {
    throw new MalformedPatternError(line, `expected ${length} symbols, got ${line.length}`)
  }
  let p = 0
  for (let i = 0; i < length; i++) {
    const ch = line.charAt(i)
    const t = SYMBOLS.indexOf(ch)
    if (t < 0) throw new MalformedPatternError(line, `unknown symbol "${ch}" at position ${i + 1}`)
    p = setTrit(p, i, toTrit(t))
  }
  return p
}

export function formatPattern(p: PatternValue, length: number): string {
  return decodePattern(p, length)
    .map((t) => SYMBOLS[t])
    .join('')
}
