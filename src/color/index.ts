export type { BrightnessFormula, ColorValue, Rgba } from './types'
export { InvalidColorError } from './errors'
export { normalizeColor, tryNormalizeColor, isHexColor, isPlainHexColor } from './normalizeColor'
export { toRgba, fromRgba } from './channels'
export { relativeLuminance } from './relativeLuminance'
export { perceivedBrightness } from './perceivedBrightness'
export { adjustBrightness } from './adjustBrightness'
export { adjustSaturation } from './adjustSaturation'
export { shiftChannels } from './shiftChannels'
export { withAlpha, withoutAlpha } from './alpha'
export { generateColorVariants } from './generateColorVariants'
export type { ColorVariants } from './generateColorVariants'
