export type { Palette, SlotFallbackChain } from './types'
export { TRANSPARENT_COLOR, TRANSPARENT_NAME } from './types'
export { synthesizePalette } from './synthesizePalette'
export { pickPaletteName } from './pickPaletteName'
export { findPaletteNameByColor } from './findPaletteNameByColor'
