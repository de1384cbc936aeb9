import { toRgba } from './channels'

function linearize(channel: number) {
  const c = channel / 255
  return c <= 0.03928 ? c / 12.92 : ((c + 0.055) / 1.055) ** 2.4
}

/**
 * WCAG relative luminance in [0, 1].
 */
export function relativeLuminance(color: string): number {
  const { r, g, b } = toRgba(color)
  return 0.2126 * linearize(r) + 0.7152 * linearize(g) + 0.0722 * linearize(b)
}
