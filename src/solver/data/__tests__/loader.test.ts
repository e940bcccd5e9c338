import { describe, it, expect } from 'vitest'
import { Readable } from 'node:stream'
import { fileURLToPath } from 'node:url'
import { MalformedWordError } from '../../errors'
import { checkStdinUse, loadWordList, parseWordList, readWordStream } from '../loader'

const fixture = fileURLToPath(new URL('./fixtures/words.txt', import.meta.url))

describe('parseWordList', () => {
  it('skips blank lines and keeps the first of repeated words', () => {
    const words = parseWordList('crane\n\n  slate \nCRANE\n', 5)
    expect(words.map((w) => w.text)).toEqual(['crane', 'slate'])
  })

  it('reports the line of a malformed word', () => {
    let caught: unknown
    try {
      parseWordList('crane\nab\n', 5, 'list.txt')
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(MalformedWordError)
    expect(caught instanceof Error && caught.message).toBe(
      'list.txt:2: malformed word "ab": expected 5 letters, got 2',
    )
  })

  it('accepts other word lengths', () => {
    expect(parseWordList('cat\ndog', 3).map((w) => w.text)).toEqual(['cat', 'dog'])
  })
})

describe('readWordStream', () => {
  it('joins chunks split mid-word', async () => {
    const stream = Readable.from(['cra', 'ne\nsla', 'te\n'])
    const words = await readWordStream(stream, 5)
    expect(words.map((w) => w.text)).toEqual(['crane', 'slate'])
  })
})

describe('loadWordList', () => {
  it('reads a file with CRLF endings and duplicates', async () => {
    const words = await loadWordList(fixture, 5)
    expect(words.map((w) => w.text)).toEqual(['crane', 'slate', 'tears', 'bears'])
  })

  it('fails for a missing file', async () => {
    await expect(loadWordList('/nonexistent/words.txt', 5)).rejects.toThrow(
      'Word list not found: /nonexistent/words.txt',
    )
  })
})

describe('checkStdinUse', () => {
  it('allows standard input for one list', () => {
    expect(() => checkStdinUse(['-', 'solutions.txt'])).not.toThrow()
    expect(() => checkStdinUse(['words.txt', 'solutions.txt'])).not.toThrow()
  })

  it('rejects reading standard input twice', () => {
    expect(() => checkStdinUse(['-', '-'])).toThrow(
      'Standard input ("-") can supply only one word list',
    )
  })
})
