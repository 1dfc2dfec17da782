/**
 * Calendar Renderer
 *
 * Maps a schedule onto month grids. The result is a CalendarFigure: every
 * cell already carries its final fill and text color, so painting it (see
 * painter.ts) is a straight walk over the model.
 */

import { DEFAULT_RENDER_CONFIG } from '../config.js'
import { assignColors, type ColorAssignment } from './palette.js'
import { contrastText } from './color.js'
import { CalendarSpanError } from './errors.js'
import {
  WEEKDAY_NAMES,
  WEEKEND_COLUMNS,
  enumerateMonths,
  isoDateOf,
  monthCalendar,
  monthSpan,
  monthTitle,
  type YearMonth,
} from './months.js'
import type { IsoDate, RenderConfig, ScheduleSet } from '../types.js'

export const NO_CALENDAR_MESSAGE = 'Could not generate calendar. Please check your input format.'

export const LEGEND_TITLE = 'Sprints'

export interface DayCell {
  /** Day of month, null for padding cells */
  day: number | null
  date: IsoDate | null
  /** 0 = Monday .. 6 = Sunday */
  weekday: number
  /** Hex fill, null when the cell is unfilled */
  fill: string | null
  textColor: string
  /** Sprint whose color the cell shows */
  sprint: string | null
}

export interface MonthGrid extends YearMonth {
  title: string
  header: readonly string[]
  weeks: DayCell[][]
}

export interface LegendEntry {
  name: string
  color: string
}

export interface Legend {
  title: string
  /** Entries per row */
  columns: number
  entries: LegendEntry[]
}

export interface CalendarFigure {
  months: MonthGrid[]
  /** Month grids per row */
  columns: number
  rows: number
  legend: Legend
  style: RenderConfig
}

export type RenderOptions = Partial<RenderConfig>

function buildMonth(
  yearMonth: YearMonth,
  schedule: ScheduleSet,
  colors: ColorAssignment,
  style: RenderConfig,
): MonthGrid {
  const weeks = monthCalendar(yearMonth).map((week) =>
    week.map((day, weekday): DayCell => {
      const hasDay = day !== null
      return {
        day,
        date: hasDay ? isoDateOf(yearMonth, day) : null,
        weekday,
        fill: hasDay && WEEKEND_COLUMNS.has(weekday) ? style.weekendFill : null,
        textColor: style.darkText,
        sprint: null,
      }
    }),
  )

  // Later sprints overwrite earlier ones on shared days
  for (const sprint of schedule) {
    const color = colors.get(sprint.name) ?? style.darkText
    for (const week of weeks) {
      for (const cell of week) {
        if (cell.date === null) continue
        if (sprint.startDate <= cell.date && cell.date <= sprint.endDate) {
          cell.fill = color
          cell.sprint = sprint.name
        }
      }
    }
  }

  for (const week of weeks) {
    for (const cell of week) {
      if (cell.sprint !== null && cell.fill !== null) {
        cell.textColor = contrastText(cell.fill, style.darkText, style.lightText)
      }
    }
  }

  return {
    ...yearMonth,
    title: monthTitle(yearMonth),
    header: WEEKDAY_NAMES,
    weeks,
  }
}

/**
 * Lay out the schedule as one grid per spanned month plus a shared legend.
 * Returns null when there is nothing to draw: an empty schedule, or one whose
 * latest end date falls in a month before its earliest start date.
 *
 * @throws CalendarSpanError when more than `maxMonths` months would be drawn
 */
export function renderCalendar(schedule: ScheduleSet, options: RenderOptions = {}): CalendarFigure | null {
  if (schedule.length === 0) return null

  const style: RenderConfig = { ...DEFAULT_RENDER_CONFIG, ...options }

  let minDate = schedule[0].startDate
  let maxDate = schedule[0].endDate
  for (const sprint of schedule) {
    if (sprint.startDate < minDate) minDate = sprint.startDate
    if (sprint.endDate > maxDate) maxDate = sprint.endDate
  }

  const span = monthSpan(minDate, maxDate)
  if (span > style.maxMonths) {
    throw new CalendarSpanError(span, style.maxMonths)
  }

  const colors = assignColors(schedule, style.palette)
  const months = enumerateMonths(minDate, maxDate).map((ym) => buildMonth(ym, schedule, colors, style))
  // Only inverted ranges get here with no month to show
  if (months.length === 0) return null

  const columns = Math.max(1, Math.min(style.maxColumns, months.length))
  const entries = [...colors].map(([name, color]) => ({ name, color }))

  return {
    months,
    columns,
    rows: Math.ceil(months.length / columns),
    legend: {
      title: LEGEND_TITLE,
      columns: Math.max(1, Math.min(style.legendColumns, entries.length)),
      entries,
    },
    style,
  }
}
