// Word list loading for newline-delimited lists (one word per line).
// Sources are files, standard input ("-") or any async byte stream.

import fs from 'node:fs'
import { MalformedWordError } from '../errors'
import { Word } from '../word'

export const STDIN_PATH = '-'

/**
 * Parse list text into words of the given length. Blank lines are skipped and
 * repeated words keep their first occurrence; a malformed line throws with its
 * line number.
 */
export function parseWordList(text: string, length: number, source = 'input'): Word[] {
  const seen = new Set<string>()
  const out: Word[] = []
  const lines = text.split(/\r?\n/)
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i]
    if (!raw.trim()) continue
    let word: Word
    try {
      word = Word.parse(raw, length)
    } catch (err) {
      if (err instanceof MalformedWordError) throw err.at(source, i + 1)
      throw err
    }
    if (seen.has(word.text)) continue
    seen.add(word.text)
    out.push(word)
  }
  return out
}

export async function readStreamText(stream: AsyncIterable<string | Uint8Array>): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk))
  }
  return Buffer.concat(chunks).toString('utf8')
}

export async function readWordStream(
  stream: AsyncIterable<string | Uint8Array>,
  length: number,
  source = 'stream',
): Promise<Word[]> {
  return parseWordList(await readStreamText(stream), length, source)
}

/** Standard input can feed at most one of the lists a command reads. */
export function checkStdinUse(files: readonly string[]): void {
  if (files.filter((f) => f === STDIN_PATH).length > 1) {
    throw new Error(`Standard input ("${STDIN_PATH}") can supply only one word list`)
  }
}

/** Load a word list from a file path, or from standard input when the path is "-". */
export async function loadWordList(file: string, length: number): Promise<Word[]> {
  if (file === STDIN_PATH) return readWordStream(process.stdin, length, 'stdin')
  if (!fs.existsSync(file)) throw new Error(`Word list not found: ${file}`)
  return readWordStream(fs.createReadStream(file), length, file)
}
