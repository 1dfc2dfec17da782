/**
 * Month arithmetic for the wall calendar.
 *
 * Months are (year, month) pairs with month in 1..12, stepped with modular
 * arithmetic on the pair.
 */

import { DateTime } from 'luxon'
import { isIsoDate } from '../schedule/parser.js'
import type { IsoDate } from '../types.js'

export interface YearMonth {
  year: number
  /** 1..12 */
  month: number
}

export const WEEKDAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const

/** Column indexes of Saturday and Sunday in a Monday-first week */
export const WEEKEND_COLUMNS: ReadonlySet<number> = new Set([5, 6])

export function yearMonthOf(date: IsoDate): YearMonth {
  const [year, month] = date.split('-').map((part) => parseInt(part, 10))
  return { year, month }
}

export function nextMonth({ year, month }: YearMonth): YearMonth {
  return month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 }
}

function compareYearMonth(a: YearMonth, b: YearMonth): number {
  return a.year !== b.year ? a.year - b.year : a.month - b.month
}

/** Number of months `enumerateMonths(from, to)` yields, without building them */
export function monthSpan(from: IsoDate, to: IsoDate): number {
  const first = yearMonthOf(from)
  const last = yearMonthOf(to)
  return Math.max(0, (last.year - first.year) * 12 + (last.month - first.month) + 1)
}

/**
 * Every month from the month of `from` through the month of `to`, inclusive.
 * Empty when `to` falls in an earlier month than `from`.
 */
export function enumerateMonths(from: IsoDate, to: IsoDate): YearMonth[] {
  const last = yearMonthOf(to)
  const months: YearMonth[] = []
  for (let current = yearMonthOf(from); compareYearMonth(current, last) <= 0; current = nextMonth(current)) {
    months.push(current)
  }
  return months
}

/**
 * Week-major matrix of day numbers for one month, Monday first.
 * Days outside the month are null.
 */
export function monthCalendar({ year, month }: YearMonth): (number | null)[][] {
  const first = DateTime.utc(year, month, 1)
  const daysInMonth = first.daysInMonth ?? 0
  // luxon weekday: 1 = Monday .. 7 = Sunday
  const leading = first.weekday - 1

  const weeks: (number | null)[][] = []
  let week: (number | null)[] = Array.from({ length: leading }, () => null)
  for (let day = 1; day <= daysInMonth; day++) {
    week.push(day)
    if (week.length === 7) {
      weeks.push(week)
      week = []
    }
  }
  if (week.length > 0) {
    while (week.length < 7) week.push(null)
    weeks.push(week)
  }
  return weeks
}

export function monthTitle({ year, month }: YearMonth): string {
  return DateTime.utc(year, month, 1).setLocale('en-US').toFormat('LLLL yyyy')
}

export function isoDateOf({ year, month }: YearMonth, day: number): IsoDate {
  const iso = `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`
  if (!isIsoDate(iso)) throw new RangeError(`Year ${year} cannot be written as YYYY`)
  return iso
}
