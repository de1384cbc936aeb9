import type { SublimeRule } from '@/dialects'

export interface SublimeTheme {
  name: string
  author: string
  variables: Record<string, string>
  globals: Record<string, string>
  rules: SublimeRule[]
}
