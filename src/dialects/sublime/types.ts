export interface SublimeRule {
  name?: string
  scope: string
  foreground?: string
  background?: string
  font_style?: string
}

/** A `.sublime-color-scheme` document, or a `.tmTheme` read into the same shape. */
export interface SublimeColorScheme {
  name?: string
  author?: string
  variables: Record<string, string>
  globals: Record<string, string>
  rules: SublimeRule[]
}
