import { FontTypeFlag } from './types'

export function isBold(fontType: number | undefined) {
  return fontType !== undefined && (fontType & FontTypeFlag.Bold) !== 0
}

export function isItalic(fontType: number | undefined) {
  return fontType !== undefined && (fontType & FontTypeFlag.Italic) !== 0
}

/** Sublime `font_style` for an IntelliJ FONT_TYPE bit set. */
export function toFontStyle(fontType: number | undefined): string | undefined {
  const styles: string[] = []
  if (isBold(fontType)) {
    styles.push('bold')
  }
  if (isItalic(fontType)) {
    styles.push('italic')
  }
  return styles.length > 0 ? styles.join(' ') : undefined
}
