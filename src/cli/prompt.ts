import readline from 'node:readline'
import { MalformedPatternError, MalformedWordError } from '../solver/errors'
import type { Output } from './render'

export interface Prompter {
  /** Resolves with the next input line, or null once input has ended. */
  ask(question: string): Promise<string | null>
  close(): void
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: Output = process.stdout,
): Prompter {
  const rl = readline.createInterface({ input, terminal: false })
  const lines = rl[Symbol.asyncIterator]()
  let ended = false
  return {
    async ask(question) {
      if (ended) return null
      output.write(question)
      const next = await lines.next()
      if (next.done) {
        ended = true
        return null
      }
      return next.value
    },
    close() {
      ended = true
      rl.close()
    },
  }
}

/**
 * Ask until `parse` accepts the answer. Malformed input is reported and asked
 * again; null means input ended.
 */
export async function askParsed<T>(
  prompter: Prompter,
  out: Output,
  question: string,
  parse: (line: string) => T,
): Promise<T | null> {
  for (;;) {
    const line = await prompter.ask(question)
    if (line === null) return null
    try {
      return parse(line)
    } catch (err) {
      if (err instanceof MalformedWordError || err instanceof MalformedPatternError) {
        out.write(`${err.message}\n`)
        continue
      }
      throw err
    }
  }
}
