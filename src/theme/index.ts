export { ThemePolarity } from './types'
export type { PolarityPresets } from './types'
export { classifyPolarity } from './classifyPolarity'
export { selectPreset } from './selectPreset'
