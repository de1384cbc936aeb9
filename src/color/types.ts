/**
 * A color in canonical form: uppercase `#RRGGBB` or `#RRGGBBAA`.
 * Only values produced by {@link normalizeColor} are ColorValues.
 */
export type ColorValue = string

export interface Rgba {
  r: number
  g: number
  b: number
  /** 0-255, absent for opaque six-digit colors */
  a?: number
}

export type BrightnessFormula = 'perceived' | 'wcag'
