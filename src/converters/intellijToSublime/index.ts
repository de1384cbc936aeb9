export { IntellijToSublimeConverter } from './IntellijToSublimeConverter'
export { sublimePresets, sublimeTables } from './tables'
export type { SublimePreset } from './tables'
export type { SublimeTheme } from './types'
