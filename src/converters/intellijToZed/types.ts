import type { ThemePolarity } from '@/theme'

export interface ZedPlayer {
  cursor: string
  background: string
  selection: string
}

export interface ZedSyntaxStyle {
  color?: string
  font_style: 'italic' | null
  font_weight: number | null
}

export interface ZedStyle {
  [key: string]: string | ZedPlayer[] | Record<string, ZedSyntaxStyle>
  players: ZedPlayer[]
  syntax: Record<string, ZedSyntaxStyle>
}

export interface ZedTheme {
  $schema: string
  name: string
  author: string
  themes: {
    name: string
    appearance: ThemePolarity
    style: ZedStyle
  }[]
}
