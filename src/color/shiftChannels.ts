import { mapChannels } from './channels'
import type { ColorValue } from './types'

export function shiftChannels(color: string, delta: number): ColorValue {
  return mapChannels(color, (channel) => channel + delta)
}
