import type { SolverConfig } from '../config'
import { advance, newGame, type GameState } from '../game/state'
import { formatPattern, parsePattern } from '../solver/pattern'
import { evaluateAll } from '../solver/scoring'
import { Word } from '../solver/word'
import { track } from '../telemetry'
import { askParsed, type Prompter } from './prompt'
import {
  bold,
  colorPattern,
  formatOutcome,
  formatSuggestion,
  printStart,
  type Output,
} from './render'

export interface InteractiveDeps {
  words: readonly Word[]
  config: SolverConfig
  prompter: Prompter
  out: Output
  color: boolean
}

/**
 * Help a human playing elsewhere: show the remaining space and the best guesses,
 * then read back the guess they made and the feedback they saw.
 */
export async function runAssist(deps: InteractiveDeps): Promise<GameState> {
  const { words, config, prompter, out, color } = deps
  const L = config.wordLength
  track({ name: 'game_started', props: { mode: 'assist', words: words.length, length: L } })
  let state = newGame(words, { maxRounds: config.maxRounds })
  while (state.status === 'in-progress') {
    const space = state.space.words()
    out.write(printStart('Solution Space', space.map((w) => w.text), 5, color) + '\n')
    if (config.suggestions > 0) {
      const ranked = evaluateAll(words, space, { topK: config.suggestions })
      out.write(
        printStart('Suggested Guesses', ranked.map(formatSuggestion), config.suggestions, color) +
          '\n',
      )
    }
    const guess = await askParsed(prompter, out, bold('Enter guessed word: ', color), (s) =>
      Word.parse(s, L),
    )
    if (!guess) break
    const pattern = await askParsed(prompter, out, bold('Enter resulting pattern: ', color), (s) =>
      parsePattern(s, L),
    )
    if (pattern === null) break
    out.write(
      `You have guessed ${bold(guess.text, color)} with result ${colorPattern(pattern, L, color)}\n`,
    )
    state = advance(state, guess, { kind: 'feedback', pattern })
    track({
      name: 'round_played',
      props: {
        mode: 'assist',
        round: state.round,
        guess: guess.text,
        pattern: formatPattern(pattern, L),
        remaining: state.space.size(),
      },
    })
  }
  out.write(formatOutcome(state, color) + '\n')
  track({ name: 'game_finished', props: { mode: 'assist', status: state.status, rounds: state.round } })
  return state
}
