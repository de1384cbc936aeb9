import { adjustBrightness } from './adjustBrightness'
import { adjustSaturation } from './adjustSaturation'
import { normalizeColor } from './normalizeColor'
import type { ColorValue } from './types'

export interface ColorVariants {
  base: ColorValue
  darker2: ColorValue
  darker5: ColorValue
  darker10: ColorValue
  darker15: ColorValue
  darker20: ColorValue
  lighter2: ColorValue
  lighter5: ColorValue
  lighter10: ColorValue
  lighter15: ColorValue
  lighter20: ColorValue
  hover: ColorValue
  active: ColorValue
  disabled: ColorValue
  muted: ColorValue
}

export function generateColorVariants(color: string): ColorVariants {
  const base = normalizeColor(color)

  return {
    base,
    darker2: adjustBrightness(base, 0.98),
    darker5: adjustBrightness(base, 0.95),
    darker10: adjustBrightness(base, 0.9),
    darker15: adjustBrightness(base, 0.85),
    darker20: adjustBrightness(base, 0.8),
    lighter2: adjustBrightness(base, 1.02),
    lighter5: adjustBrightness(base, 1.05),
    lighter10: adjustBrightness(base, 1.1),
    lighter15: adjustBrightness(base, 1.15),
    lighter20: adjustBrightness(base, 1.2),
    hover: adjustBrightness(base, 1.1),
    active: adjustBrightness(base, 0.9),
    disabled: adjustSaturation(adjustBrightness(base, 0.7), 0.5),
    muted: adjustSaturation(base, 0.6),
  }
}
