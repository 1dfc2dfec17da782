/** Calendar date without a time component, written YYYY-MM-DD */
export type IsoDate = `${number}-${number}-${number}`

/**
 * One named, inclusive date interval.
 * An end date before the start date is kept as-is and covers no day.
 */
export interface SprintRecord {
  name: string
  startDate: IsoDate
  endDate: IsoDate
}

/** Sprint records in input line order */
export type ScheduleSet = readonly SprintRecord[]

export interface ServerConfig {
  host: string
  port: number
}

export interface RenderConfig {
  /** Maximum month grids per row */
  maxColumns: number
  /** Largest number of months one figure may span */
  maxMonths: number
  /** Maximum legend entries per row */
  legendColumns: number
  /** Categorical palette the sprint colors are sampled from (#rrggbb) */
  palette: readonly string[]
  headerFill: string
  weekendFill: string
  darkText: string
  lightText: string
  gridColor: string
  fontFamily: string
}

export interface ExportConfig {
  /** Resolution of downloaded and CLI-written PNGs */
  dpi: number
  /** Resolution of the inline preview in the dashboard */
  previewDpi: number
  fileName: string
}

export interface AppConfig {
  server: ServerConfig
  render: RenderConfig
  export: ExportConfig
}
