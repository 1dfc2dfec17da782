/**
 * Calendar Rendering
 *
 * Schedule → month grids (renderer) → PNG bytes (painter).
 */

export {
  renderCalendar,
  NO_CALENDAR_MESSAGE,
  LEGEND_TITLE,
} from './renderer.js'
export type {
  CalendarFigure,
  MonthGrid,
  DayCell,
  Legend,
  LegendEntry,
  RenderOptions,
} from './renderer.js'
export { CalendarSpanError } from './errors.js'
export { exportPng, PNG_MIME_TYPE, DEFAULT_DPI } from './painter.js'
export type { ExportOptions } from './painter.js'
export { layoutFigure, pixelSize } from './geometry.js'
export type { FigureGeometry } from './geometry.js'
export { TAB10, assignColors, categoricalColor, paletteSlot } from './palette.js'
export type { ColorAssignment } from './palette.js'
export { hexToRgb, isDarkColor, isHexColor, contrastText } from './color.js'
export type { Rgb } from './color.js'
export {
  enumerateMonths,
  monthCalendar,
  monthSpan,
  monthTitle,
  nextMonth,
  yearMonthOf,
  WEEKDAY_NAMES,
} from './months.js'
export type { YearMonth } from './months.js'
