import type { ScheduleSet } from '../types.js'

const HEADERS = ['Sprint', 'Start Date', 'End Date'] as const

/**
 * Plain-text table of parsed sprints, one row per record.
 */
export function formatSchedule(schedule: ScheduleSet): string {
  const rows = schedule.map((s) => [s.name, s.startDate, s.endDate])
  const widths = HEADERS.map((header, col) => Math.max(header.length, ...rows.map((row) => row[col].length)))
  const format = (cells: readonly string[]) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join('  ')
      .trimEnd()
  return [format(HEADERS), ...rows.map(format)].join('\n')
}
