import type { Prompter } from '../prompt'
import type { Output } from '../render'

/** Output that collects everything written to it. */
export function bufferOutput(): Output & { text(): string } {
  const chunks: string[] = []
  return {
    write(chunk: string) {
      chunks.push(chunk)
      return true
    },
    text: () => chunks.join(''),
  }
}

/** Prompter answering from a fixed script, then reporting end of input. */
export function scriptedPrompter(answers: readonly string[]): Prompter & { questions: string[] } {
  const queue = [...answers]
  const questions: string[] = []
  return {
    questions,
    async ask(question) {
      questions.push(question)
      return queue.shift() ?? null
    },
    close() {
      queue.length = 0
    },
  }
}
