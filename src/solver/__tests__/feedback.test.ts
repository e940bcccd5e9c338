import { describe, it, expect } from 'vitest'
import { feedbackTrits, score } from '../feedback'
import { formatPattern } from '../pattern'
import { Word } from '../word'

const w = (s: string) => Word.parse(s, s.trim().length)

function pattern(guess: string, solution: string): string {
  return formatPattern(score(w(guess), w(solution)), guess.length)
}

describe('score', () => {
  it('marks the shared suffix green and the absent letter black', () => {
    expect(pattern('tears', 'bears')).toBe('bgggg')
  })

  it('marks every letter yellow for an anagram with no fixed positions', () => {
    expect(pattern('tears', 'stear')).toBe('yyyyy')
  })

  it('gives a letter present once in the solution a single yellow', () => {
    expect(pattern('atttt', 'xaaaa')).toBe('ybbbb')
    expect(pattern('xaaaa', 'atttt')).toBe('bybbb')
  })

  it('assigns yellows left to right when the guess repeats a letter', () => {
    expect(pattern('aattt', 'txxxx')).toBe('bbybb')
    expect(pattern('txxxx', 'aattt')).toBe('ybbbb')
  })

  it('all greens when guess == solution', () => {
    expect(pattern('crane', 'crane')).toBe('ggggg')
  })

  it('all blacks when no overlap', () => {
    expect(pattern('aaaaa', 'bcdfg')).toBe('bbbbb')
  })

  it('rejects words of different lengths', () => {
    expect(() => score(w('cat'), w('crane'))).toThrow('same length')
  })
})

describe('duplicate handling cases', () => {
  it('secret cigar, guess civic', () => {
    // the only i and c are used by greens
    expect(feedbackTrits(w('civic'), w('cigar'))).toEqual([2, 2, 0, 0, 0])
  })

  it('secret allee, guess eagle', () => {
    // green e at 4, then e, a and one l are still unmatched
    expect(feedbackTrits(w('eagle'), w('allee'))).toEqual([1, 1, 0, 1, 2])
  })

  it('secret abbey, guess cabal', () => {
    expect(feedbackTrits(w('cabal'), w('abbey'))).toEqual([0, 1, 2, 0, 0])
  })
})
