/**
 * Calendar Painter
 *
 * Paints a CalendarFigure onto a canvas and encodes it as PNG, all in memory.
 * Drawing happens in points; the context is scaled once by dpi / 72.
 */

import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas'
import {
  LEGEND_ENTRY_WIDTH,
  LEGEND_SWATCH_HEIGHT,
  LEGEND_SWATCH_WIDTH,
  POINTS_PER_INCH,
  layoutFigure,
  pixelSize,
  type PanelGeometry,
  type LegendGeometry,
} from './geometry.js'
import type { CalendarFigure, Legend, MonthGrid } from './renderer.js'

export const PNG_MIME_TYPE = 'image/png'

export const DEFAULT_DPI = 300

export interface ExportOptions {
  dpi?: number
}

const BACKGROUND = '#ffffff'

function font(weight: 'normal' | 'bold', size: number, family: string): string {
  return `${weight} ${size}px ${family}`
}

function drawClippedText(ctx: SKRSContext2D, text: string, x: number, midY: number, boxWidth: number): void {
  if (boxWidth <= 0) return

  ctx.textAlign = 'left'
  ctx.textBaseline = 'middle'
  if (ctx.measureText(text).width <= boxWidth) {
    ctx.fillText(text, x, midY)
    return
  }

  const ell = '…'
  let s = text
  while (s.length > 0) {
    s = s.slice(0, -1)
    if (ctx.measureText(s + ell).width <= boxWidth) {
      ctx.fillText(s + ell, x, midY)
      return
    }
  }
}

function paintMonth(ctx: SKRSContext2D, month: MonthGrid, g: PanelGeometry, figure: CalendarFigure): void {
  const { style } = figure

  ctx.fillStyle = style.darkText
  ctx.font = font('bold', 14, style.fontFamily)
  ctx.textAlign = 'center'
  ctx.textBaseline = 'middle'
  ctx.fillText(month.title, g.titleX, g.titleY)

  const { table, rowHeight, columnWidth } = g
  ctx.lineWidth = 1
  ctx.strokeStyle = style.gridColor

  // Header row
  ctx.font = font('bold', 10, style.fontFamily)
  month.header.forEach((label, col) => {
    const x = table.x + col * columnWidth
    ctx.fillStyle = style.headerFill
    ctx.fillRect(x, table.y, columnWidth, rowHeight)
    ctx.strokeRect(x, table.y, columnWidth, rowHeight)
    ctx.fillStyle = style.darkText
    ctx.fillText(label, x + columnWidth / 2, table.y + rowHeight / 2)
  })

  // Day cells
  ctx.font = font('normal', 10, style.fontFamily)
  month.weeks.forEach((week, w) => {
    const y = table.y + (w + 1) * rowHeight
    week.forEach((cell, col) => {
      const x = table.x + col * columnWidth
      if (cell.fill !== null) {
        ctx.fillStyle = cell.fill
        ctx.fillRect(x, y, columnWidth, rowHeight)
      }
      ctx.strokeRect(x, y, columnWidth, rowHeight)
      if (cell.day !== null) {
        ctx.fillStyle = cell.textColor
        ctx.fillText(String(cell.day), x + columnWidth / 2, y + rowHeight / 2)
      }
    })
  })
}

function paintLegend(ctx: SKRSContext2D, legend: Legend, g: LegendGeometry, figure: CalendarFigure): void {
  const { style } = figure

  ctx.fillStyle = BACKGROUND
  ctx.fillRect(g.box.x, g.box.y, g.box.width, g.box.height)
  ctx.strokeStyle = '#cccccc'
  ctx.lineWidth = 0.8
  ctx.strokeRect(g.box.x, g.box.y, g.box.width, g.box.height)

  ctx.fillStyle = style.darkText
  ctx.font = font('normal', 11, style.fontFamily)
  ctx.textAlign = 'center'
  ctx.textBaseline = 'middle'
  ctx.fillText(legend.title, g.box.x + g.box.width / 2, g.titleY)

  ctx.font = font('normal', 10, style.fontFamily)
  legend.entries.forEach((entry, i) => {
    const { x, y } = g.entries[i]
    const midY = y + 9
    ctx.fillStyle = entry.color
    ctx.fillRect(x, midY - LEGEND_SWATCH_HEIGHT / 2, LEGEND_SWATCH_WIDTH, LEGEND_SWATCH_HEIGHT)
    ctx.fillStyle = style.darkText
    const labelX = x + LEGEND_SWATCH_WIDTH + 6
    drawClippedText(ctx, entry.name, labelX, midY, LEGEND_ENTRY_WIDTH - (labelX - x) - 4)
  })
}

/**
 * Encode the figure as PNG. The canvas is the content's bounding box plus a
 * 0.1 in pad, at `dpi` pixels per inch (300 by default).
 */
export function exportPng(figure: CalendarFigure, options: ExportOptions = {}): Buffer {
  const dpi = options.dpi ?? DEFAULT_DPI
  if (!Number.isFinite(dpi) || dpi <= 0) {
    throw new RangeError(`dpi must be a positive number, got ${dpi}`)
  }

  const geometry = layoutFigure(figure)
  const size = pixelSize(geometry, dpi)
  const canvas = createCanvas(size.width, size.height)
  const ctx = canvas.getContext('2d')

  ctx.fillStyle = BACKGROUND
  ctx.fillRect(0, 0, size.width, size.height)
  ctx.scale(dpi / POINTS_PER_INCH, dpi / POINTS_PER_INCH)

  figure.months.forEach((month, i) => paintMonth(ctx, month, geometry.panels[i], figure))
  paintLegend(ctx, figure.legend, geometry.legend, figure)

  return canvas.toBuffer(PNG_MIME_TYPE)
}
