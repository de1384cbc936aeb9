export { IntellijToZedConverter } from './IntellijToZedConverter'
export { zedPresets, zedTables } from './tables'
export type { ZedPreset } from './tables'
export type { ZedPlayer, ZedStyle, ZedSyntaxStyle, ZedTheme } from './types'
