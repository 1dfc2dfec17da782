/**
 * Sprint colors.
 *
 * Colors are a pure function of (sprint index, sprint count): the palette is
 * sampled evenly from its first to its last slot, so three sprints on the
 * ten-color palette take slots 0, 5 and 9.
 */

import type { ScheduleSet } from '../types.js'

/** Ten-color categorical palette ("tab10") */
export const TAB10: readonly string[] = [
  '#1f77b4',
  '#ff7f0e',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#7f7f7f',
  '#bcbd22',
  '#17becf',
]

/** Sprint name → color for one render */
export type ColorAssignment = Map<string, string>

/** Position of `index` on an evenly spaced 0..1 scale of `count` points */
function samplePosition(index: number, count: number): number {
  if (count <= 1) return 0
  if (index === count - 1) return 1
  // index / (count - 1) can round up across a slot edge; index * step does not
  const step = 1 / (count - 1)
  return index * step
}

export function paletteSlot(index: number, count: number, paletteSize: number): number {
  const position = samplePosition(index, count)
  return Math.max(0, Math.min(Math.floor(position * paletteSize), paletteSize - 1))
}

export function categoricalColor(index: number, count: number, palette: readonly string[] = TAB10): string {
  if (palette.length === 0) {
    throw new RangeError('Palette must contain at least one color')
  }
  return palette[paletteSlot(index, count, palette.length)]
}

/**
 * Assign colors in schedule order. The palette is sized to the number of
 * records; a repeated name takes its last record's color but keeps the
 * position of its first appearance.
 */
export function assignColors(schedule: ScheduleSet, palette: readonly string[] = TAB10): ColorAssignment {
  const colors: ColorAssignment = new Map()
  schedule.forEach((sprint, index) => {
    colors.set(sprint.name, categoricalColor(index, schedule.length, palette))
  })
  return colors
}
