/**
 * Unit Tests: Schedule Parser
 *
 * - Header handling, short lines, extra tokens
 * - Date validation and ParseError details
 * - Table formatting used by the CLI
 */

import { describe, it, expect } from 'vitest'
import { parseSchedule, parseDate, SAMPLE_SCHEDULE } from '../src/schedule/parser.js'
import { formatSchedule } from '../src/schedule/format.js'
import { ParseError } from '../src/schedule/errors.js'

function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('Expected function to throw')
}

// -------------------------------------------------------------------
// parseSchedule
// -------------------------------------------------------------------

describe('parseSchedule', () => {
  it('parses the sample schedule in line order', () => {
    const schedule = parseSchedule(SAMPLE_SCHEDULE)

    expect(schedule).toEqual([
      { name: '0', startDate: '2025-03-10', endDate: '2025-03-21' },
      { name: '1', startDate: '2025-03-24', endDate: '2025-04-11' },
      { name: '2', startDate: '2025-04-14', endDate: '2025-05-02' },
    ])
  })

  it('discards the first non-empty line even when it looks like data', () => {
    const schedule = parseSchedule('\n\n0 2025-01-01 2025-01-05\n1 2025-02-01 2025-02-03')

    expect(schedule.map((s) => s.name)).toEqual(['1'])
  })

  it('skips lines with fewer than three tokens without raising', () => {
    const text = ['Sprint Start End', 'only two', 'A 2025-01-01 2025-01-02', '   ', 'B 2025-01-03'].join('\n')

    expect(parseSchedule(text)).toEqual([{ name: 'A', startDate: '2025-01-01', endDate: '2025-01-02' }])
  })

  it('ignores tokens after the end date', () => {
    const schedule = parseSchedule('header\nA 2025-01-01 2025-01-02 extra words here')

    expect(schedule).toEqual([{ name: 'A', startDate: '2025-01-01', endDate: '2025-01-02' }])
  })

  it('accepts CRLF line endings and mixed whitespace', () => {
    const schedule = parseSchedule('header\r\n  A\t2025-01-01    2025-01-02  \r\n')

    expect(schedule).toEqual([{ name: 'A', startDate: '2025-01-01', endDate: '2025-01-02' }])
  })

  it('keeps duplicates, overlaps and inverted ranges as written', () => {
    const text = 'h\nA 2025-01-10 2025-01-01\nA 2025-01-05 2025-01-20\nB 2025-01-06 2025-01-07'
    const schedule = parseSchedule(text)

    expect(schedule).toHaveLength(3)
    expect(schedule[0]).toEqual({ name: 'A', startDate: '2025-01-10', endDate: '2025-01-01' })
    expect(schedule.map((s) => s.name)).toEqual(['A', 'A', 'B'])
  })

  it('returns an empty schedule for empty input or a lone header', () => {
    expect(parseSchedule('')).toEqual([])
    expect(parseSchedule('Sprint Name Start Date End Date')).toEqual([])
    expect(parseSchedule('header\nno dates\n')).toEqual([])
  })

  it('raises ParseError naming the token and line of a bad date', () => {
    const text = 'header\nA 2025-01-01 2025-01-02\nB 2025-13-01 2025-01-05'
    const err = catchError(() => parseSchedule(text))

    expect(err).toBeInstanceOf(ParseError)
    if (!(err instanceof ParseError)) return
    expect(err.token).toBe('2025-13-01')
    expect(err.line).toBe(3)
    expect(err.message.startsWith('Line 3: "2025-13-01" is not a valid date')).toBe(true)
  })

  it('counts blank lines when reporting the line number', () => {
    const err = catchError(() => parseSchedule('header\n\nB 2025-01-01 someday'))

    expect(err).toBeInstanceOf(ParseError)
    if (!(err instanceof ParseError)) return
    expect(err.token).toBe('someday')
    expect(err.line).toBe(3)
  })
})

// -------------------------------------------------------------------
// parseDate
// -------------------------------------------------------------------

describe('parseDate', () => {
  it('accepts leap days', () => {
    expect(parseDate('2024-02-29', 1)).toBe('2024-02-29')
  })

  it('rejects impossible dates', () => {
    expect(() => parseDate('2025-02-30', 1)).toThrow(ParseError)
    expect(() => parseDate('2023-02-29', 1)).toThrow(ParseError)
    expect(() => parseDate('03/10/2025', 1)).toThrow(ParseError)
  })

  it('reduces a date-time to the date as written', () => {
    expect(parseDate('2025-03-10T23:30:00+05:00', 1)).toBe('2025-03-10')
    expect(parseDate('2025-03-10T08:00', 1)).toBe('2025-03-10')
  })
})

// -------------------------------------------------------------------
// formatSchedule
// -------------------------------------------------------------------

describe('formatSchedule', () => {
  it('aligns columns to the widest value', () => {
    const table = formatSchedule(parseSchedule(SAMPLE_SCHEDULE))

    expect(table.split('\n')).toEqual([
      'Sprint  Start Date  End Date',
      '0       2025-03-10  2025-03-21',
      '1       2025-03-24  2025-04-11',
      '2       2025-04-14  2025-05-02',
    ])
  })

  it('widens the name column for long sprint names', () => {
    const table = formatSchedule([{ name: 'Discovery', startDate: '2025-01-01', endDate: '2025-01-02' }])

    expect(table.split('\n')).toEqual(['Sprint     Start Date  End Date', 'Discovery  2025-01-01  2025-01-02'])
  })
})
