import { pickOne, type RandomSource } from '../solver/random'
import type { Word } from '../solver/word'
import { chooseGuess } from './policy'
import { advance, newGame, type GameState, type GameStatus } from './state'

export interface SimulationOpts {
  opening: Word
  maxRounds?: number
  /** Called after every round with the new state */
  onRound?: (state: GameState) => void
}

export interface SimulationResult {
  solution: Word
  guesses: Word[]
  rounds: number // winning round, or maxRounds + 1 when the game was lost
  status: GameStatus
}

export function roundsExhausted(maxRounds: number): number {
  return maxRounds + 1
}

/** Let the engine play against a known secret until the game ends. */
export function simulateGame(
  words: readonly Word[],
  solution: Word,
  opts: SimulationOpts,
): SimulationResult {
  let state = newGame(words, { maxRounds: opts.maxRounds })
  while (state.status === 'in-progress') {
    const guess = chooseGuess(state, opts.opening)
    state = advance(state, guess, { kind: 'secret', secret: solution })
    opts.onRound?.(state)
  }
  return {
    solution,
    guesses: state.history.map((h) => h.guess),
    rounds: state.status === 'won' ? state.round : roundsExhausted(state.maxRounds),
    status: state.status,
  }
}

/** Self-play against a secret drawn from the word list with the given random source. */
export function selfPlay(
  words: readonly Word[],
  opts: SimulationOpts & { random: RandomSource },
): SimulationResult {
  return simulateGame(words, pickOne(words, opts.random), opts)
}
