export interface FontFlags {
  bold?: boolean
  italic?: boolean
}

/** Reads `bold` and `italic` out of a space separated `font_style`. */
export function parseFontStyle(fontStyle: string | undefined): FontFlags | undefined {
  const words = new Set(fontStyle?.split(/\s+/))
  const flags: FontFlags = {}
  if (words.has('bold')) {
    flags.bold = true
  }
  if (words.has('italic')) {
    flags.italic = true
  }
  return flags.bold || flags.italic ? flags : undefined
}
