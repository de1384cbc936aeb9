export { ThemeParseError } from './errors'
export { FontTypeFlag } from './intellij/types'
export type { IntellijAttribute, IntellijScheme } from './intellij/types'
export { isBold, isItalic, toFontStyle } from './intellij/fontType'
export { parseIntellijScheme } from './intellij/parseIntellijScheme'
export type { SublimeColorScheme, SublimeRule } from './sublime/types'
export { parseSublimeColorScheme } from './sublime/parseSublimeColorScheme'
export { parseTmTheme } from './sublime/parseTmTheme'
