#!/usr/bin/env tsx
/* eslint-disable no-console */
/**
 * Wordle entropy solver CLI
 *   assist <words>              suggest guesses for a game played elsewhere
 *   play <words>                guess a secret picked from the list
 *   solve <words> [secret]      watch the engine solve a secret
 *   batch <words> <solutions>   self-play every solution and report statistics
 */

import { Command, InvalidArgumentError } from 'commander'
import fs from 'node:fs'
import { configFromEnv, resolveConfig, type SolverConfig } from '../config'
import { checkStdinUse, loadWordList } from '../solver/data/loader'
import { pickOne, seededRandom } from '../solver/random'
import { Word } from '../solver/word'
import { fileSink, initTelemetry } from '../telemetry'
import { runAssist } from './assist'
import { runBatchCommand } from './batch'
import { runPlay } from './play'
import { createPrompter } from './prompt'
import { runSolve } from './solve'

interface GlobalOpts {
  length?: number
  rounds?: number
  opening?: string
  suggestions?: number
  events?: string
  color: boolean
}

function parseInteger(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.')
  return n
}

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8'),
    )
    if (raw && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string') {
      return raw.version
    }
  } catch (err) {
    console.warn('[warn] cannot read package version:', err instanceof Error ? err.message : err)
  }
  return '0.0.0'
}

function buildProgram(): Command {
  const program = new Command()
  program
    .name('wordle-entropy')
    .description('A program to solve Wordle for you, by expected information gain.')
    .version(packageVersion())
    .option('--length <n>', 'word length', parseInteger)
    .option('--rounds <n>', 'maximum number of guesses per game', parseInteger)
    .option('--opening <word>', 'first guess of the self-playing modes')
    .option('--suggestions <n>', 'number of suggested guesses shown by assist', parseInteger)
    .option('--events <file>', 'append telemetry events (JSON lines) to file')
    .option('--no-color', 'disable ANSI colors')

  const setup = () => {
    const opts = program.opts<GlobalOpts>()
    const config = resolveConfig(configFromEnv(), {
      wordLength: opts.length,
      maxRounds: opts.rounds,
      opening: opts.opening,
      suggestions: opts.suggestions,
      eventsFile: opts.events,
    })
    if (config.eventsFile) initTelemetry({ enabled: true, sink: fileSink(config.eventsFile) })
    const color = opts.color && !!process.stdout.isTTY
    return { config, color }
  }

  program
    .command('assist')
    .description(
      'Help with a game you are playing: enter your guesses and the results you got, ' +
        'and the program suggests what to guess next.',
    )
    .argument('<words>', 'list of all allowed words ("-" for stdin)')
    .action(async (wordsFile: string) => {
      const { config, color } = setup()
      const words = await loadWordList(wordsFile, config.wordLength)
      const prompter = createPrompter()
      try {
        await runAssist({ words, config, prompter, out: process.stdout, color })
      } finally {
        prompter.close()
      }
    })

  program
    .command('play')
    .description('Play a normal game of Wordle against this program.')
    .argument('<words>', 'list of all allowed words ("-" for stdin)')
    .option('--seed <n>', 'seed for picking the secret word', parseInteger)
    .action(async (wordsFile: string, cmdOpts: { seed?: number }) => {
      const { config, color } = setup()
      const words = await loadWordList(wordsFile, config.wordLength)
      const prompter = createPrompter()
      try {
        await runPlay({
          words,
          config,
          prompter,
          out: process.stdout,
          color,
          random: seededRandom(cmdOpts.seed),
        })
      } finally {
        prompter.close()
      }
    })

  program
    .command('solve')
    .description('Watch the engine solve a secret word (picked at random when omitted).')
    .argument('<words>', 'list of all allowed words ("-" for stdin)')
    .argument('[secret]', 'the word to solve')
    .option('--seed <n>', 'seed for picking the secret word', parseInteger)
    .action(async (wordsFile: string, secretText: string | undefined, cmdOpts: { seed?: number }) => {
      const { config, color } = setup()
      const words = await loadWordList(wordsFile, config.wordLength)
      const secret =
        secretText != null
          ? Word.parse(secretText, config.wordLength)
          : pickOne(words, seededRandom(cmdOpts.seed))
      runSolve({ words, secret, config, out: process.stdout, color })
    })

  program
    .command('batch')
    .description("Run a batch of games to gather data about the algorithm's performance.")
    .argument('<words>', 'list of all allowed words ("-" for stdin)')
    .argument('<solutions>', 'list of words to use as solutions ("-" for stdin)')
    .option('--concurrency <n>', 'maximum parallel worker threads', parseInteger)
    .option('--out <file>', 'write a JSON report to file')
    .action(
      async (
        wordsFile: string,
        solutionsFile: string,
        cmdOpts: { concurrency?: number; out?: string },
      ) => {
        const { config: base } = setup()
        const config: SolverConfig = resolveConfig(base, { concurrency: cmdOpts.concurrency })
        checkStdinUse([wordsFile, solutionsFile])
        const words = await loadWordList(wordsFile, config.wordLength)
        const solutions = await loadWordList(solutionsFile, config.wordLength)
        console.log(
          `Running ${solutions.length} game(s) over ${words.length} words, opening "${config.opening}"`,
        )
        await runBatchCommand({
          words,
          solutions,
          config,
          out: process.stdout,
          reportFile: cmdOpts.out,
        })
      },
    )

  return program
}

async function main() {
  await buildProgram().parseAsync(process.argv)
}

main().catch((err) => {
  console.error('[fatal]', err instanceof Error ? err.message : err)
  process.exit(1)
})
