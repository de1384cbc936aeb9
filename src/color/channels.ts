import { normalizeColor } from './normalizeColor'
import type { ColorValue, Rgba } from './types'

function clampChannel(value: number) {
  return Math.max(0, Math.min(255, value))
}

function toHex(value: number) {
  return clampChannel(Math.trunc(value)).toString(16).padStart(2, '0').toUpperCase()
}

export function toRgba(color: string): Rgba {
  const hex = normalizeColor(color).slice(1)
  const rgba: Rgba = {
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16),
  }
  if (hex.length === 8) {
    rgba.a = parseInt(hex.slice(6, 8), 16)
  }
  return rgba
}

export function fromRgba({ r, g, b, a }: Rgba): ColorValue {
  const alpha = a === undefined ? '' : toHex(a)
  return `#${toHex(r)}${toHex(g)}${toHex(b)}${alpha}`
}

/** Applies `fn` to the red, green and blue channels, keeping alpha untouched. */
export function mapChannels(color: string, fn: (channel: number) => number): ColorValue {
  const { r, g, b, a } = toRgba(color)
  return fromRgba({ r: fn(r), g: fn(g), b: fn(b), a })
}
