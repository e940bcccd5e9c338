import type { SolverConfig } from '../config'
import { simulateGame, type SimulationResult } from '../game/simulate'
import { formatPattern } from '../solver/pattern'
import { Word } from '../solver/word'
import { track } from '../telemetry'
import { bold, colorPattern, type Output } from './render'

export interface SolveDeps {
  words: readonly Word[]
  secret: Word
  config: SolverConfig
  out: Output
  color: boolean
}

/** Self-play: the engine guesses a secret it knows, printing each round. */
export function runSolve(deps: SolveDeps): SimulationResult {
  const { words, secret, config, out, color } = deps
  const L = config.wordLength
  track({ name: 'game_started', props: { mode: 'solve', words: words.length, length: L } })
  const result = simulateGame(words, secret, {
    opening: Word.parse(config.opening, L),
    maxRounds: config.maxRounds,
    onRound: (state) => {
      const last = state.history[state.history.length - 1]
      const remaining = state.space.size()
      out.write(
        `Round ${state.round}: ${bold(last.guess.text, color)} ${colorPattern(last.pattern, L, color)} (${remaining} left)\n`,
      )
      track({
        name: 'round_played',
        props: {
          mode: 'solve',
          round: state.round,
          guess: last.guess.text,
          pattern: formatPattern(last.pattern, L),
          remaining,
        },
      })
    },
  })
  if (result.status === 'won') {
    out.write(`${bold('Success!', color)}   → ${secret.text} in ${result.rounds} rounds.\n`)
  } else if (result.status === 'lost-empty') {
    out.write(`${bold('Failure!', color)}   ${secret.text} is not in the word list!\n`)
  } else {
    out.write(`${bold('Failure!', color)}   Rounds exhausted!\n`)
  }
  track({
    name: 'game_finished',
    props: { mode: 'solve', status: result.status, rounds: result.rounds },
  })
  return result
}
