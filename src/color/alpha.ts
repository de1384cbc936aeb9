import { toRgba, fromRgba } from './channels'
import type { ColorValue } from './types'

export function withAlpha(color: string, fraction: number): ColorValue {
  const { r, g, b } = toRgba(color)
  const clamped = Math.max(0, Math.min(1, fraction))
  return fromRgba({ r, g, b, a: Math.round(clamped * 255) })
}

export function withoutAlpha(color: string): ColorValue {
  const { r, g, b } = toRgba(color)
  return fromRgba({ r, g, b })
}
