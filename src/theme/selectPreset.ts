import type { PolarityPresets, ThemePolarity } from './types'

export function selectPreset<T>(presets: PolarityPresets<T>, polarity: ThemePolarity): T {
  return presets[polarity]
}
