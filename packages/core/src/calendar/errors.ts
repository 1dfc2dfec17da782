/**
 * Raised when a schedule spans more months than one figure may hold.
 */
export class CalendarSpanError extends Error {
  readonly months: number
  readonly maxMonths: number

  constructor(months: number, maxMonths: number) {
    super(`Schedule spans ${months} months; at most ${maxMonths} can be drawn. Split it into shorter ranges.`)
    this.name = 'CalendarSpanError'
    this.months = months
    this.maxMonths = maxMonths
  }
}
