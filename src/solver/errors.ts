export class MalformedWordError extends Error {
  readonly input: string
  readonly reason: string
  readonly source?: string
  readonly line?: number

  constructor(input: string, reason: string, where?: { source?: string; line?: number }) {
    const at = where?.line != null ? `${where.source ?? 'input'}:${where.line}: ` : ''
    super(`${at}malformed word "${input}": ${reason}`)
    this.name = 'MalformedWordError'
    this.input = input
    this.reason = reason
    this.source = where?.source
    this.line = where?.line
  }

  /** Same error, located at a line of a word list */
  at(source: string, line: number): MalformedWordError {
    return new MalformedWordError(this.input, this.reason, { source, line })
  }
}

export class MalformedPatternError extends Error {
  readonly input: string
  readonly reason: string

  constructor(input: string, reason: string) {
    super(`malformed pattern "${input}": ${reason} (use g = green, y = yellow, b = black)`)
    this.name = 'MalformedPatternError'
    this.input = input
    this.reason = reason
  }
}

export type ParseError = MalformedWordError | MalformedPatternError
