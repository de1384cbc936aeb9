import { parse } from 'fast-plist'
import { ThemeParseError } from '../errors'
import { tmThemeSchema } from './schema'
import type { SublimeColorScheme, SublimeRule } from './types'

function toSnakeCase(key: string) {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`)
}

function readPlist(text: string): unknown {
  try {
    return parse(text)
  } catch (error) {
    throw new ThemeParseError('tmTheme', error instanceof Error ? error.message : String(error))
  }
}

/**
 * Reads a TextMate `.tmTheme` plist. The first scope-less settings entry holds
 * the globals (`lineHighlight` becomes `line_highlight`); every other entry
 * becomes a rule.
 */
export function parseTmTheme(text: string): SublimeColorScheme {
  const result = tmThemeSchema.safeParse(readPlist(text))
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ThemeParseError('tmTheme', `${issue.path.join('.')}: ${issue.message}`)
  }

  const globals: Record<string, string> = {}
  const rules: SublimeRule[] = []
  let globalsSeen = false

  for (const entry of result.data.settings) {
    if (entry.scope === undefined && !globalsSeen) {
      globalsSeen = true
      for (const [key, value] of Object.entries(entry.settings)) {
        globals[toSnakeCase(key)] = value
      }
      continue
    }
    if (entry.scope === undefined) {
      continue
    }

    const { foreground, background, fontStyle } = entry.settings
    const rule: SublimeRule = { scope: entry.scope }
    if (entry.name) {
      rule.name = entry.name
    }
    if (foreground) {
      rule.foreground = foreground
    }
    if (background) {
      rule.background = background
    }
    if (fontStyle) {
      rule.font_style = fontStyle
    }
    rules.push(rule)
  }

  return { name: result.data.name, author: result.data.author, variables: {}, globals, rules }
}
