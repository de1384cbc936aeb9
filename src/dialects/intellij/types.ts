import type { ColorValue } from '@/color'

export enum FontTypeFlag {
  Bold = 1,
  Italic = 2,
}

export interface IntellijAttribute {
  foreground?: ColorValue
  background?: ColorValue
  fontType?: number
  /** Name of the attribute this one inherits from. Relayed, never resolved. */
  baseAttributes?: string
}

export interface IntellijScheme {
  name: string
  colors: ReadonlyMap<string, ColorValue>
  attributes: ReadonlyMap<string, IntellijAttribute>
}
