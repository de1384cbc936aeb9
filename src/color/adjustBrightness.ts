import { mapChannels } from './channels'
import type { ColorValue } from './types'

/**
 * Scales every channel by `factor`: below 1 darkens, above 1 lightens.
 */
export function adjustBrightness(color: string, factor: number): ColorValue {
  return mapChannels(color, (channel) => channel * factor)
}
