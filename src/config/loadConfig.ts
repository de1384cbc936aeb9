import { readFile } from 'node:fs/promises'
import { parse, printParseErrorCode } from 'jsonc-parser'
import type { ParseError } from 'jsonc-parser'
import { InvalidConfigError } from './errors'
import { configSchema } from './schema'
import type { Config } from './schema'

export function defaultConfig(): Config {
  return configSchema.parse({})
}

export function parseConfig(text: string, path: string): Config {
  const errors: ParseError[] = []
  const raw: unknown = parse(text, errors, { allowTrailingComma: true })
  if (errors.length > 0) {
    const [{ error, offset }] = errors
    throw new InvalidConfigError(path, `${printParseErrorCode(error)} at offset ${offset}`)
  }

  const result = configSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new InvalidConfigError(path, `${issue.path.join('.') || '(root)'}: ${issue.message}`)
  }
  return result.data
}

export async function loadConfig(path: string | undefined): Promise<Config> {
  if (!path) {
    return defaultConfig()
  }
  const text = await readFile(path, 'utf-8')
  return parseConfig(text, path)
}
