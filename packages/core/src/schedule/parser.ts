/**
 * Schedule Parser
 *
 * Turns the pasted schedule text into sprint records:
 *
 *   Sprint Name Start Date End Date     <- header, always discarded
 *   0 2025-03-10 2025-03-21
 *   1 2025-03-24 2025-04-11
 */

import { DateTime } from 'luxon'
import { ParseError } from './errors.js'
import type { IsoDate, ScheduleSet, SprintRecord } from '../types.js'

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export const SAMPLE_SCHEDULE = `Sprint Name Start Date End Date
0 2025-03-10 2025-03-21
1 2025-03-24 2025-04-11
2 2025-04-14 2025-05-02`

export function isIsoDate(value: string): value is IsoDate {
  return ISO_DATE_PATTERN.test(value)
}

/**
 * Parse one date token. Date-times are reduced to the date as written,
 * without converting between offsets.
 */
export function parseDate(token: string, line: number): IsoDate {
  const parsed = DateTime.fromISO(token, { zone: 'utc', setZone: true })
  if (!parsed.isValid) {
    throw new ParseError(token, line, parsed.invalidExplanation ?? undefined)
  }

  const iso = parsed.toISODate()
  if (iso === null || !isIsoDate(iso)) {
    throw new ParseError(token, line, 'year out of range')
  }
  return iso
}

interface SourceLine {
  text: string
  number: number
}

function nonEmptyLines(text: string): SourceLine[] {
  const lines: SourceLine[] = []
  text.split(/\r?\n/).forEach((raw, index) => {
    const trimmed = raw.trim()
    if (trimmed) lines.push({ text: trimmed, number: index + 1 })
  })
  return lines
}

/**
 * Parse a schedule. The first non-empty line is treated as a header whatever
 * it contains; lines with fewer than three tokens are skipped.
 *
 * @throws ParseError when a start or end token is not a calendar date
 */
export function parseSchedule(text: string): ScheduleSet {
  const sprints: SprintRecord[] = []

  for (const line of nonEmptyLines(text).slice(1)) {
    const parts = line.text.split(/\s+/)
    if (parts.length < 3) continue

    const [name, start, end] = parts
    sprints.push({
      name,
      startDate: parseDate(start, line.number),
      endDate: parseDate(end, line.number),
    })
  }

  return sprints
}
