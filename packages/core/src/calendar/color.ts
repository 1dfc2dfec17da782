/** Channels in [0, 1] */
export interface Rgb {
  r: number
  g: number
  b: number
}

const HEX_PATTERN = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i

export function isHexColor(value: string): boolean {
  return HEX_PATTERN.test(value)
}

/** #RRGGBB → channels in [0, 1]; null when the string is not a hex color */
export function hexToRgb(hex: string): Rgb | null {
  const m = HEX_PATTERN.exec(hex)
  if (!m) return null
  return {
    r: parseInt(m[1], 16) / 255,
    g: parseInt(m[2], 16) / 255,
    b: parseInt(m[3], 16) / 255,
  }
}

/** Dark when the mean of the three channels is below 0.5 */
export function isDarkColor(hex: string): boolean {
  const rgb = hexToRgb(hex)
  if (!rgb) return false
  return (rgb.r + rgb.g + rgb.b) / 3 < 0.5
}

/** Day-number color that stays legible on the given fill */
export function contrastText(fill: string, darkText: string, lightText: string): string {
  return isDarkColor(fill) ? lightText : darkText
}
