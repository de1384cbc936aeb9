import { fromRgba, toRgba } from './channels'
import { normalizeColor } from './normalizeColor'
import type { ColorValue } from './types'

/**
 * Moves each channel toward (factor < 1) or away from (factor > 1) the midpoint of
 * the brightest and darkest channel. 0 gives a gray, 1 leaves the color unchanged.
 */
export function adjustSaturation(color: string, factor: number): ColorValue {
  const { r, g, b, a } = toRgba(color)
  const max = Math.max(r, g, b)
  const min = Math.min(r, g, b)
  if (max === min) {
    return normalizeColor(color)
  }

  const mid = (max + min) / 2 / 255
  const blend = (channel: number) => {
    const value = mid + (channel / 255 - mid) * factor
    return Math.max(0, Math.min(1, value)) * 255
  }

  return fromRgba({ r: blend(r), g: blend(g), b: blend(b), a })
}
