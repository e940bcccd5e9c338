import { lastPattern, playGuess, startPlay, type PlaySession } from '../game/play'
import { MalformedWordError } from '../solver/errors'
import { formatPattern } from '../solver/pattern'
import type { RandomSource } from '../solver/random'
import { Word } from '../solver/word'
import { track } from '../telemetry'
import type { InteractiveDeps } from './assist'
import { askParsed } from './prompt'
import { bold, colorPattern, formatOutcome } from './render'

/** A normal game: the human guesses a secret picked from the word list. */
export async function runPlay(deps: InteractiveDeps & { random: RandomSource }): Promise<PlaySession> {
  const { words, config, prompter, out, color } = deps
  const L = config.wordLength
  const known = new Set(words.map((w) => w.text))
  track({ name: 'game_started', props: { mode: 'play', words: words.length, length: L } })
  let session = startPlay(words, { random: deps.random, maxRounds: config.maxRounds })
  while (session.game.status === 'in-progress') {
    const guess = await askParsed(prompter, out, bold('Guess a word: ', color), (s) => {
      const w = Word.parse(s, L)
      if (!known.has(w.text)) throw new MalformedWordError(w.text, 'not in the word list')
      return w
    })
    if (!guess) break
    session = playGuess(session, guess)
    const p = lastPattern(session)
    if (p !== null) {
      out.write(`${bold('→', color)} ${colorPattern(p, L, color)}\n`)
      track({
        name: 'round_played',
        props: {
          mode: 'play',
          round: session.game.round,
          guess: guess.text,
          pattern: formatPattern(p, L),
          remaining: session.game.space.size(),
        },
      })
    }
  }
  out.write(formatOutcome(session.game, color, session.secret.text) + '\n')
  track({
    name: 'game_finished',
    props: { mode: 'play', status: session.game.status, rounds: session.game.round },
  })
  return session
}
