import { bestGuess } from '../solver/scoring'
import type { Word } from '../solver/word'
import type { GameState } from './state'

/**
 * Next guess for the self-playing engine: the fixed opening word on round 1,
 * the last candidate once only one is left, otherwise the master-list word
 * with the highest entropy against the current space.
 */
export function chooseGuess(state: GameState, opening: Word): Word {
  if (state.round === 0) return opening
  const only = state.space.only()
  if (only) return only
  const best = bestGuess(state.words, state.space.words())
  return best ? best.word : opening
}
