import { describe, it, expect } from 'vitest'
import { resolveConfig } from '../../config'
import { parseWords } from '../../solver/word'
import { runAssist } from '../assist'
import { bufferOutput, scriptedPrompter } from './helpers'

const words = parseWords(['bears', 'fears', 'tears', 'tiles'])

describe('runAssist', () => {
  it('suggests guesses and narrows the space from reported feedback', async () => {
    const out = bufferOutput()
    const prompter = scriptedPrompter(['tears', 'bgggg', 'bears', 'bgggg'])
    const state = await runAssist({
      words,
      config: resolveConfig({ suggestions: 2 }),
      prompter,
      out,
      color: false,
    })
    expect(state.status).toBe('won')
    expect(prompter.questions).toEqual([
      'Enter guessed word: ',
      'Enter resulting pattern: ',
      'Enter guessed word: ',
      'Enter resulting pattern: ',
    ])
    expect(out.text().split('\n')).toEqual([
      'Solution Space (4 entries): bears, fears, tears, tiles',
      'Suggested Guesses (2 entries): bears (1.500 bits, ~1.5 left), fears (1.500 bits, ~1.5 left)',
      'You have guessed tears with result bgggg',
      'Solution Space (2 entries): bears, fears',
      'Suggested Guesses (2 entries): bears (1.000 bits, ~1.0 left), fears (1.000 bits, ~1.0 left)',
      'You have guessed bears with result bgggg',
      'Success!   → fears.',
      'Score 2',
      '',
    ])
  })

  it('reprompts on malformed input and stops when nothing fits', async () => {
    const out = bufferOutput()
    const state = await runAssist({
      words,
      config: resolveConfig({ suggestions: 0 }),
      prompter: scriptedPrompter(['tear', 'tears', 'bgggx', 'yyyyy']),
      out,
      color: false,
    })
    expect(state.status).toBe('lost-empty')
    expect(out.text().split('\n')).toEqual([
      'Solution Space (4 entries): bears, fears, tears, tiles',
      'malformed word "tear": expected 5 letters, got 4',
      'malformed pattern "bgggx": unknown symbol "x" at position 5 (use g = green, y = yellow, b = black)',
      'You have guessed tears with result yyyyy',
      'Failure!   No fitting word in the list!',
      'Score 1',
      '',
    ])
  })

  it('aborts when input ends mid-round', async () => {
    const out = bufferOutput()
    const state = await runAssist({
      words,
      config: resolveConfig({ suggestions: 0 }),
      prompter: scriptedPrompter(['tears']),
      out,
      color: false,
    })
    expect(state.status).toBe('in-progress')
    expect(out.text().endsWith('Aborted.\nScore 0\n')).toBe(true)
  })
})
