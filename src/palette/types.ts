import type { ColorValue } from '@/color'

export type Palette = ReadonlyMap<string, ColorValue>

/** Ordered palette-name preferences for a single output slot. */
export interface SlotFallbackChain {
  preferred: readonly string[]
  fallback: string
}

export const TRANSPARENT_NAME = 'Transparent'
export const TRANSPARENT_COLOR = '#FFFFFF00'
