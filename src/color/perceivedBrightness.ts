import { toRgba } from './channels'

/**
 * Weighted brightness in [0, 255]. Cheaper than {@link relativeLuminance} and
 * disagrees with it for colors close to the light/dark threshold.
 */
export function perceivedBrightness(color: string): number {
  const { r, g, b } = toRgba(color)
  return (r * 299 + g * 587 + b * 114) / 1000
}
