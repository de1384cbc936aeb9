import { tryNormalizeColor } from '@/color'
import type { Palette } from './types'

export function findPaletteNameByColor(color: string | undefined, palette: Palette, fallback: string): string {
  const normalized = tryNormalizeColor(color)
  if (!normalized) {
    return fallback
  }
  for (const [name, value] of palette) {
    if (value === normalized) {
      return name
    }
  }
  return fallback
}
