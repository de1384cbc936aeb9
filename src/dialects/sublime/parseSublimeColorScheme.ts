import { parse, printParseErrorCode } from 'jsonc-parser'
import type { ParseError } from 'jsonc-parser'
import { ThemeParseError } from '../errors'
import { sublimeColorSchemeSchema } from './schema'
import type { SublimeColorScheme, SublimeRule } from './types'

export function parseSublimeColorScheme(text: string): SublimeColorScheme {
  const errors: ParseError[] = []
  const raw: unknown = parse(text, errors, { allowTrailingComma: true })
  if (errors.length > 0) {
    const [{ error, offset }] = errors
    throw new ThemeParseError('Sublime color scheme', `${printParseErrorCode(error)} at offset ${offset}`)
  }

  const result = sublimeColorSchemeSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ThemeParseError('Sublime color scheme', `${issue.path.join('.')}: ${issue.message}`)
  }

  const { name, author, variables, globals } = result.data
  const rules = result.data.rules.map(({ foreground, ...rest }) => {
    const rule: SublimeRule = { ...rest }
    if (foreground !== undefined) {
      rule.foreground = foreground
    }
    return rule
  })
  return { name, author, variables, globals, rules }
}
