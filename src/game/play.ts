import { pickOne, type RandomSource } from '../solver/random'
import type { PatternValue } from '../solver/pattern'
import type { Word } from '../solver/word'
import { advance, newGame, type GameState } from './state'

/** A human guessing against a secret the program picked. */
export interface PlaySession {
  readonly secret: Word
  readonly game: GameState
}

export interface PlayOpts {
  random: RandomSource
  maxRounds?: number
}

export function startPlay(words: readonly Word[], opts: PlayOpts): PlaySession {
  return {
    secret: pickOne(words, opts.random),
    game: newGame(words, { maxRounds: opts.maxRounds }),
  }
}

export function playGuess(session: PlaySession, guess: Word): PlaySession {
  return {
    secret: session.secret,
    game: advance(session.game, guess, { kind: 'secret', secret: session.secret }),
  }
}

export function lastPattern(session: PlaySession): PatternValue | null {
  const h = session.game.history
  return h.length ? h[h.length - 1].pattern : null
}
