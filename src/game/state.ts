// Round state machine shared by the assist, play and self-play modes.
// Every transition returns a new state; a game's state is never shared.

import { score } from '../solver/feedback'
import { SolutionSpace } from '../solver/filter'
import { allGreen, type PatternValue } from '../solver/pattern'
import type { Word } from '../solver/word'

// The game is lost once the round counter passes this budget
export const DEFAULT_MAX_ROUNDS = 6

export type GameStatus = 'in-progress' | 'won' | 'lost-empty' | 'lost-rounds'

export interface RoundRecord {
  guess: Word
  pattern: PatternValue
}

export interface GameState {
  readonly words: readonly Word[] // master list, also the guessable words
  readonly space: SolutionSpace
  readonly round: number
  readonly maxRounds: number
  readonly history: readonly RoundRecord[]
  readonly status: GameStatus
}

/**
 * What is learned in a round: the feedback a human reports (assist), or the
 * secret the engine scores against (play, self-play).
 */
export type Observation =
  | { kind: 'feedback'; pattern: PatternValue }
  | { kind: 'secret'; secret: Word }

export interface NewGameOpts {
  maxRounds?: number
}

export function newGame(words: readonly Word[], opts: NewGameOpts = {}): GameState {
  const maxRounds = opts.maxRounds ?? DEFAULT_MAX_ROUNDS
  if (!Number.isInteger(maxRounds) || maxRounds < 1) {
    throw new RangeError(`maxRounds must be a positive integer, got ${maxRounds}`)
  }
  return {
    words,
    space: SolutionSpace.full(words),
    round: 0,
    maxRounds,
    history: [],
    status: words.length === 0 ? 'lost-empty' : 'in-progress',
  }
}

export function isTerminal(state: GameState): boolean {
  return state.status !== 'in-progress'
}

export function advance(state: GameState, guess: Word, observation: Observation): GameState {
  if (isTerminal(state)) return state
  const round = state.round + 1
  const pattern =
    observation.kind === 'feedback' ? observation.pattern : score(guess, observation.secret)
  const space = state.space.filter(guess, pattern)

  let status: GameStatus = 'in-progress'
  const won =
    observation.kind === 'feedback' ? space.size() === 1 : guess.equals(observation.secret)
  if (won) status = 'won'
  else if (space.isEmpty()) status = 'lost-empty'
  else if (round > state.maxRounds) status = 'lost-rounds'

  return {
    ...state,
    space,
    round,
    history: [...state.history, { guess, pattern }],
    status,
  }
}

/** The word the game ended on: the secret's match, or the last survivor in assist mode. */
export function solvedWord(state: GameState): Word | null {
  if (state.status !== 'won') return null
  const last = state.history[state.history.length - 1]
  if (last && last.pattern === allGreen(last.guess.length)) return last.guess
  return state.space.only()
}
