import { describe, it, expect } from 'vitest'
import { ConfigError, DEFAULT_CONFIG, configFromEnv, resolveConfig } from '@/config'

describe('configFromEnv', () => {
  it('reads WORDLE_* variables', () => {
    expect(
      configFromEnv({
        WORDLE_LENGTH: '6',
        WORDLE_MAX_ROUNDS: '8',
        WORDLE_OPENING: 'Crates',
        WORDLE_SUGGESTIONS: '0',
        WORDLE_CONCURRENCY: '2',
        WORDLE_EVENTS: 'events.jsonl',
      }),
    ).toEqual({
      wordLength: 6,
      maxRounds: 8,
      opening: 'Crates',
      suggestions: 0,
      concurrency: 2,
      eventsFile: 'events.jsonl',
    })
  })

  it('ignores unset and blank values', () => {
    expect(configFromEnv({ WORDLE_LENGTH: ' ' })).toEqual({})
  })

  it('rejects non-integers', () => {
    expect(() => configFromEnv({ WORDLE_MAX_ROUNDS: 'six' })).toThrow(
      'WORDLE_MAX_ROUNDS must be an integer, got "six"',
    )
  })
})

describe('resolveConfig', () => {
  it('returns the defaults without layers', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG)
    expect(DEFAULT_CONFIG.opening).toBe('tears')
    expect(DEFAULT_CONFIG.maxRounds).toBe(6)
  })

  it('lets later layers win and skips undefined values', () => {
    const cfg = resolveConfig({ maxRounds: 8, suggestions: 3 }, { maxRounds: 4, suggestions: undefined })
    expect(cfg.maxRounds).toBe(4)
    expect(cfg.suggestions).toBe(3)
  })

  it('normalizes the opening word', () => {
    expect(resolveConfig({ opening: ' SLATE ' }).opening).toBe('slate')
  })

  it('checks the opening against the word length', () => {
    expect(() => resolveConfig({ wordLength: 6 })).toThrow(ConfigError)
    expect(() => resolveConfig({ wordLength: 6 })).toThrow(
      'opening: malformed word "tears": expected 6 letters, got 5',
    )
    expect(resolveConfig({ wordLength: 6, opening: 'crates' }).opening).toBe('crates')
  })

  it('range-checks numbers', () => {
    expect(() => resolveConfig({ wordLength: 11 })).toThrow(
      'wordLength must be an integer in [1, 10], got 11',
    )
    expect(() => resolveConfig({ maxRounds: 0 })).toThrow(
      'maxRounds must be an integer in [1, 100], got 0',
    )
    expect(() => resolveConfig({ concurrency: 1.5 })).toThrow(ConfigError)
  })
})
