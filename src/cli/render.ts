import type { Evaluation } from '../solver/entropy'
import { decodePattern, type PatternValue } from '../solver/pattern'
import type { GameState } from '../game/state'
import { solvedWord } from '../game/state'

/** Anything text can be written to (process.stdout, a test buffer). */
export interface Output {
  write(chunk: string): unknown
}

const RESET = '\x1b[0m'
const TRIT_STYLE = ['\x1b[90m', '\x1b[33m', '\x1b[32m'] // black, yellow, green
const TRIT_CHAR = ['b', 'y', 'g']

export function bold(text: string, color: boolean): string {
  return color ? `\x1b[1m${text}${RESET}` : text
}

export function colorPattern(p: PatternValue, length: number, color: boolean): string {
  return decodePattern(p, length)
    .map((t) => (color ? `${TRIT_STYLE[t]}${TRIT_CHAR[t]}${RESET}` : TRIT_CHAR[t]))
    .join('')
}

/** "Name (N entries): a, b, c, ..." listing at most `max` items. */
export function printStart(name: string, items: readonly string[], max: number, color: boolean) {
  const shown = items.slice(0, Math.max(0, max))
  const more = items.length > shown.length ? (shown.length ? ', ...' : '...') : ''
  return `${bold(`${name} (${items.length} entries):`, color)} ${shown.join(', ')}${more}`
}

export function formatSuggestion(e: Evaluation): string {
  return `${e.word.text} (${e.entropy.toFixed(3)} bits, ~${e.expectedRemaining.toFixed(1)} left)`
}

/** Closing lines of an interactive game. */
export function formatOutcome(state: GameState, color: boolean, secret?: string): string {
  const lines: string[] = []
  switch (state.status) {
    case 'won':
      lines.push(`${bold('Success!', color)}   → ${solvedWord(state)?.text ?? '?'}.`)
      break
    case 'lost-empty':
      lines.push(`${bold('Failure!', color)}   No fitting word in the list!`)
      break
    case 'lost-rounds':
      lines.push(`${bold('Failure!', color)}   Rounds exhausted!`)
      if (secret) lines.push(`The word was ${bold(secret, color)}.`)
      break
    case 'in-progress':
      lines.push('Aborted.')
      break
  }
  lines.push(`Score ${state.round}`)
  return lines.join('\n')
}
