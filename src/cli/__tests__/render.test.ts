import { describe, it, expect } from 'vitest'
import { advance, newGame } from '../../game/state'
import { evaluate } from '../../solver/entropy'
import { parsePattern } from '../../solver/pattern'
import { parseWords, Word } from '../../solver/word'
import { colorPattern, formatOutcome, formatSuggestion, printStart } from '../render'

const words = parseWords(['bears', 'fears', 'tears', 'tiles'])

describe('render', () => {
  it('prints patterns plain or colored', () => {
    const p = parsePattern('gybbg', 5)
    expect(colorPattern(p, 5, false)).toBe('gybbg')
    expect(colorPattern(parsePattern('gy', 2), 2, true)).toBe('\x1b[32mg\x1b[0m\x1b[33my\x1b[0m')
  })

  it('lists at most max items', () => {
    expect(printStart('Solution Space', ['a', 'b', 'c'], 2, false)).toBe(
      'Solution Space (3 entries): a, b, ...',
    )
    expect(printStart('Solution Space', ['a', 'b'], 5, false)).toBe('Solution Space (2 entries): a, b')
    expect(printStart('Suggested Guesses', ['a'], 0, false)).toBe('Suggested Guesses (1 entries): ...')
    expect(printStart('Solution Space', ['a'], 1, true)).toBe(
      '\x1b[1mSolution Space (1 entries):\x1b[0m a',
    )
  })

  it('formats a suggestion with bits and expected survivors', () => {
    expect(formatSuggestion(evaluate(Word.parse('tears'), words))).toBe(
      'tears (1.500 bits, ~1.5 left)',
    )
  })

  it('formats outcomes', () => {
    const won = advance(newGame(words), Word.parse('tears'), {
      kind: 'feedback',
      pattern: parsePattern('gybbg', 5),
    })
    expect(formatOutcome(won, false)).toBe('Success!   → tiles.\nScore 1')

    const empty = advance(newGame(words), Word.parse('tears'), {
      kind: 'feedback',
      pattern: parsePattern('yyyyy', 5),
    })
    expect(formatOutcome(empty, false)).toBe('Failure!   No fitting word in the list!\nScore 1')

    const secret = { kind: 'secret' as const, secret: Word.parse('tears') }
    const one = advance(newGame(words, { maxRounds: 1 }), Word.parse('bears'), secret)
    const spent = advance(one, Word.parse('bears'), secret)
    expect(formatOutcome(spent, false, 'tears')).toBe(
      'Failure!   Rounds exhausted!\nThe word was tears.\nScore 2',
    )
    expect(formatOutcome(newGame(words), false)).toBe('Aborted.\nScore 0')
  })
})
