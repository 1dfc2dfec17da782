/**
 * Raised when a date token in a schedule line is not a calendar date.
 */
export class ParseError extends Error {
  readonly token: string
  /** 1-based line number in the original text */
  readonly line: number

  constructor(token: string, line: number, reason?: string) {
    const detail = reason ? ` (${reason})` : ''
    super(`Line ${line}: "${token}" is not a valid date${detail}. Use YYYY-MM-DD.`)
    this.name = 'ParseError'
    this.token = token
    this.line = line
  }
}
