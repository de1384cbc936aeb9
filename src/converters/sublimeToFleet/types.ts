import type { FontModifier } from './tables'

export interface FleetTextAttribute {
  foregroundColor?: string
  backgroundColor?: string
  fontModifier?: FontModifier
}

export interface FleetTheme {
  meta: {
    'theme.name': string
    'theme.kind': 'Light' | 'Dark'
    'theme.version': number
  }
  colors: Record<string, string>
  textAttributes: Record<string, FleetTextAttribute>
  palette: Record<string, string>
}
