/**
 * Figure geometry, in points (1/72 in). Painting scales by dpi / 72.
 */

import type { CalendarFigure } from './renderer.js'

export const POINTS_PER_INCH = 72

/** Month panel: 5 × 4 in */
export const PANEL_WIDTH = 360
export const PANEL_HEIGHT = 288

/** Outer pad around the content box (0.1 in) */
export const FIGURE_PAD = 7.2

const TITLE_BAND = 36
const TABLE_INSET = 12

const LEGEND_GAP = 8
const LEGEND_PAD = 10
const LEGEND_TITLE_HEIGHT = 18
const LEGEND_ROW_HEIGHT = 18
export const LEGEND_ENTRY_WIDTH = 96
export const LEGEND_SWATCH_WIDTH = 20
export const LEGEND_SWATCH_HEIGHT = 10

export interface Rect {
  x: number
  y: number
  width: number
  height: number
}

export interface PanelGeometry {
  panel: Rect
  /** Center of the month title */
  titleX: number
  titleY: number
  /** Header row + week rows */
  table: Rect
  rowHeight: number
  columnWidth: number
}

export interface LegendGeometry {
  box: Rect
  titleY: number
  /** Top-left corner of each entry, in entry order */
  entries: { x: number; y: number }[]
}

export interface FigureGeometry {
  width: number
  height: number
  panels: PanelGeometry[]
  legend: LegendGeometry
}

function legendSize(figure: CalendarFigure): { width: number; height: number } {
  const rows = Math.ceil(figure.legend.entries.length / figure.legend.columns)
  return {
    width: figure.legend.columns * LEGEND_ENTRY_WIDTH + 2 * LEGEND_PAD,
    height: LEGEND_PAD + LEGEND_TITLE_HEIGHT + rows * LEGEND_ROW_HEIGHT + LEGEND_PAD,
  }
}

export function layoutFigure(figure: CalendarFigure): FigureGeometry {
  const gridWidth = figure.columns * PANEL_WIDTH
  const gridHeight = figure.rows * PANEL_HEIGHT
  const legend = legendSize(figure)

  const contentWidth = Math.max(gridWidth, legend.width)
  const width = contentWidth + 2 * FIGURE_PAD
  const height = gridHeight + LEGEND_GAP + legend.height + 2 * FIGURE_PAD

  const gridLeft = FIGURE_PAD + (contentWidth - gridWidth) / 2
  const panels = figure.months.map((month, i): PanelGeometry => {
    const panel: Rect = {
      x: gridLeft + (i % figure.columns) * PANEL_WIDTH,
      y: FIGURE_PAD + Math.floor(i / figure.columns) * PANEL_HEIGHT,
      width: PANEL_WIDTH,
      height: PANEL_HEIGHT,
    }
    const table: Rect = {
      x: panel.x + TABLE_INSET,
      y: panel.y + TITLE_BAND,
      width: PANEL_WIDTH - 2 * TABLE_INSET,
      height: PANEL_HEIGHT - TITLE_BAND - TABLE_INSET,
    }
    return {
      panel,
      titleX: panel.x + PANEL_WIDTH / 2,
      titleY: panel.y + TITLE_BAND / 2,
      table,
      rowHeight: table.height / (month.weeks.length + 1),
      columnWidth: table.width / 7,
    }
  })

  const box: Rect = {
    x: FIGURE_PAD + (contentWidth - legend.width) / 2,
    y: FIGURE_PAD + gridHeight + LEGEND_GAP,
    width: legend.width,
    height: legend.height,
  }
  const entries = figure.legend.entries.map((_, i) => ({
    x: box.x + LEGEND_PAD + (i % figure.legend.columns) * LEGEND_ENTRY_WIDTH,
    y: box.y + LEGEND_PAD + LEGEND_TITLE_HEIGHT + Math.floor(i / figure.legend.columns) * LEGEND_ROW_HEIGHT,
  }))

  return {
    width,
    height,
    panels,
    legend: {
      box,
      titleY: box.y + LEGEND_PAD + LEGEND_TITLE_HEIGHT / 2,
      entries,
    },
  }
}

/** Canvas size in pixels at the given resolution */
export function pixelSize(geometry: FigureGeometry, dpi: number): { width: number; height: number } {
  const scale = dpi / POINTS_PER_INCH
  return {
    width: Math.ceil(geometry.width * scale),
    height: Math.ceil(geometry.height * scale),
  }
}
