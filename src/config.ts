import os from 'node:os'
import { MalformedWordError } from './solver/errors'
import { MAX_WORD_LENGTH, Word } from './solver/word'

export interface SolverConfig {
  wordLength: number
  maxRounds: number
  opening: string // first guess of the self-playing modes
  suggestions: number // how many ranked guesses assist mode prints
  concurrency: number // batch worker threads
  eventsFile: string | null // telemetry JSONL destination; null disables telemetry
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export const DEFAULT_CONFIG: SolverConfig = {
  wordLength: 5,
  maxRounds: 6,
  opening: 'tears',
  suggestions: 5,
  concurrency: Math.min(8, os.cpus().length || 1),
  eventsFile: null,
}

function intFrom(name: string, raw: string | undefined): number | undefined {
  if (raw == null || raw.trim() === '') return undefined
  const n = Number(raw)
  if (!Number.isInteger(n)) throw new ConfigError(`${name} must be an integer, got "${raw}"`)
  return n
}

/** Config overrides read from WORDLE_* environment variables. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SolverConfig> {
  const out: Partial<SolverConfig> = {}
  const wordLength = intFrom('WORDLE_LENGTH', env.WORDLE_LENGTH)
  const maxRounds = intFrom('WORDLE_MAX_ROUNDS', env.WORDLE_MAX_ROUNDS)
  const suggestions = intFrom('WORDLE_SUGGESTIONS', env.WORDLE_SUGGESTIONS)
  const concurrency = intFrom('WORDLE_CONCURRENCY', env.WORDLE_CONCURRENCY)
  if (wordLength !== undefined) out.wordLength = wordLength
  if (maxRounds !== undefined) out.maxRounds = maxRounds
  if (suggestions !== undefined) out.suggestions = suggestions
  if (concurrency !== undefined) out.concurrency = concurrency
  if (env.WORDLE_OPENING) out.opening = env.WORDLE_OPENING
  if (env.WORDLE_EVENTS) out.eventsFile = env.WORDLE_EVENTS
  return out
}

function checkRange(name: string, v: number, min: number, max: number): void {
  if (!Number.isInteger(v) || v < min || v > max) {
    throw new ConfigError(`${name} must be an integer in [${min}, ${max}], got ${v}`)
  }
}

/** Merge layers over the defaults (later layers win) and validate the result. */
export function resolveConfig(...layers: Partial<SolverConfig>[]): SolverConfig {
  const cfg: SolverConfig = { ...DEFAULT_CONFIG }
  for (const layer of layers) {
    for (const [k, v] of Object.entries(layer)) {
      if (v === undefined) continue
      Object.assign(cfg, { [k]: v })
    }
  }
  checkRange('wordLength', cfg.wordLength, 1, MAX_WORD_LENGTH)
  checkRange('maxRounds', cfg.maxRounds, 1, 100)
  checkRange('suggestions', cfg.suggestions, 0, 1000)
  checkRange('concurrency', cfg.concurrency, 1, 256)
  try {
    cfg.opening = Word.parse(cfg.opening, cfg.wordLength).text
  } catch (err) {
    if (err instanceof MalformedWordError) throw new ConfigError(`opening: ${err.message}`)
    throw err
  }
  return cfg
}
