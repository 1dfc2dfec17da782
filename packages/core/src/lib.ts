// Public API for consumption by other packages (dashboard)

export type {
  IsoDate,
  SprintRecord,
  ScheduleSet,
  AppConfig,
  ServerConfig,
  RenderConfig,
  ExportConfig,
} from './types.js'

// Schedule parsing
export {
  parseSchedule,
  parseDate,
  isIsoDate,
  formatSchedule,
  ParseError,
  SAMPLE_SCHEDULE,
} from './schedule/index.js'

// Calendar rendering + PNG export
export {
  renderCalendar,
  CalendarSpanError,
  exportPng,
  layoutFigure,
  pixelSize,
  assignColors,
  categoricalColor,
  isDarkColor,
  enumerateMonths,
  monthCalendar,
  NO_CALENDAR_MESSAGE,
  LEGEND_TITLE,
  PNG_MIME_TYPE,
  DEFAULT_DPI,
  TAB10,
  WEEKDAY_NAMES,
} from './calendar/index.js'
export type {
  CalendarFigure,
  MonthGrid,
  DayCell,
  Legend,
  LegendEntry,
  RenderOptions,
  ExportOptions,
  ColorAssignment,
  YearMonth,
} from './calendar/index.js'

// Configuration
export {
  loadConfig,
  findConfigFile,
  ConfigError,
  CONFIG_FILENAME,
  DEFAULT_RENDER_CONFIG,
  DEFAULT_EXPORT_CONFIG,
  DEFAULT_SERVER_CONFIG,
} from './config.js'
