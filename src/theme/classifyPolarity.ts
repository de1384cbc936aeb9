import { isPlainHexColor, perceivedBrightness, relativeLuminance } from '@/color'
import type { BrightnessFormula } from '@/color'
import { ThemePolarity } from './types'

/**
 * Light iff the background is bright enough under the given formula.
 * Anything other than a plain `#RRGGBB` background counts as dark.
 */
export function classifyPolarity(
  background: string | undefined,
  formula: BrightnessFormula = 'perceived',
): ThemePolarity {
  const trimmed = background?.trim()
  if (!trimmed || !isPlainHexColor(trimmed)) {
    return ThemePolarity.Dark
  }

  if (formula === 'wcag') {
    return relativeLuminance(trimmed) > 0.5 ? ThemePolarity.Light : ThemePolarity.Dark
  }
  return perceivedBrightness(trimmed) > 128 ? ThemePolarity.Light : ThemePolarity.Dark
}
