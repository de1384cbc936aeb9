import { InvalidColorError } from './errors'
import type { ColorValue } from './types'

const HEX_DIGITS = /^[0-9A-F]+$/
const VALID_LENGTHS = new Set([3, 4, 6, 8])

export function normalizeColor(raw: string): ColorValue {
  const trimmed = raw.trim().toUpperCase()
  const digits = trimmed.startsWith('#') ? trimmed.slice(1) : trimmed

  if (!VALID_LENGTHS.has(digits.length) || !HEX_DIGITS.test(digits)) {
    throw new InvalidColorError(raw)
  }

  // #RGB and #RGBA shorthand
  if (digits.length <= 4) {
    return `#${[...digits].map((digit) => digit + digit).join('')}`
  }
  return `#${digits}`
}

export function tryNormalizeColor(raw: string | undefined): ColorValue | undefined {
  if (raw === undefined) {
    return undefined
  }
  try {
    return normalizeColor(raw)
  } catch (error) {
    if (error instanceof InvalidColorError) {
      return undefined
    }
    throw error
  }
}

export function isHexColor(raw: string): boolean {
  return tryNormalizeColor(raw) !== undefined
}

const PLAIN_HEX_PATTERN = /^#?[0-9a-fA-F]{6}$/

/** `#RRGGBB` without shorthand or alpha. */
export function isPlainHexColor(raw: string): boolean {
  return PLAIN_HEX_PATTERN.test(raw.trim())
}
