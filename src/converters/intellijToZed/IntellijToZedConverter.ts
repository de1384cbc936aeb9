import { inject, injectable } from 'inversify'
import { generateColorVariants, normalizeColor, withAlpha, withoutAlpha } from '@/color'
import type { ColorValue } from '@/color'
import { resolveOverrides } from '@/config'
import { isBold, isItalic, parseIntellijScheme } from '@/dialects'
import type { IntellijAttribute, IntellijScheme } from '@/dialects'
import { TOKENS } from '@/di/tokens'
import { TaxonomyMatcher } from '@/taxonomy'
import { classifyPolarity, selectPreset } from '@/theme'
import type { PolarityPresets } from '@/theme'
import { stem } from '../stem'
import { BaseThemeConverter, ConversionDirection } from '../types'
import type { ConversionOptions, ConvertedTheme } from '../types'
import { zedTables } from './tables'
import type { ZedPreset } from './tables'
import type { ZedPlayer, ZedSyntaxStyle, ZedTheme } from './types'

const SCHEMA_URL = 'https://zed.dev/schema/themes/v0.1.0.json'
const FALLBACK_FOREGROUND = '#BBBBBB'
const BOLD_WEIGHT = 700
const SELECTION_ALPHA = 0.24

/** Attributes prefixed with this establish base syntax colors before any others. */
const DEFAULT_ATTRIBUTE_PREFIX = 'DEFAULT_'

function toSyntaxStyle(attribute: IntellijAttribute): ZedSyntaxStyle | undefined {
  const style: ZedSyntaxStyle = {
    font_style: isItalic(attribute.fontType) ? 'italic' : null,
    font_weight: isBold(attribute.fontType) ? BOLD_WEIGHT : null,
  }
  if (attribute.foreground) {
    style.color = withoutAlpha(attribute.foreground)
  }
  return style.color || style.font_style || style.font_weight ? style : undefined
}

function toPlayer(color: string): ZedPlayer {
  return {
    cursor: withAlpha(color, 1),
    background: withAlpha(color, 1),
    selection: withAlpha(color, SELECTION_ALPHA),
  }
}

@injectable()
export class IntellijToZedConverter extends BaseThemeConverter<IntellijScheme, ZedTheme> {
  readonly direction = ConversionDirection.IntellijToZed
  readonly outputSuffix = '_zed.json'
  readonly indent = 2

  private readonly uiTaxonomy = TaxonomyMatcher.fromPairs(zedTables.ui)
  private readonly syntaxTaxonomy = TaxonomyMatcher.fromPairs(zedTables.syntax)

  constructor(@inject(TOKENS.ZedPresets) private readonly presets: PolarityPresets<ZedPreset>) {
    super()
  }

  protected parse(text: string, fileName: string): IntellijScheme {
    return parseIntellijScheme(text, stem(fileName))
  }

  protected build(scheme: IntellijScheme, options: ConversionOptions): ConvertedTheme<ZedTheme> {
    const { name } = scheme
    const flatColors = this.flattenColors(scheme)
    for (const [key, value] of resolveOverrides(options.overrides, name)) {
      flatColors.set(key, withoutAlpha(normalizeColor(value)))
    }

    const ui = this.mapUiColors(flatColors)
    const foreground = ui.get('editor.foreground') ?? FALLBACK_FOREGROUND
    const syntax = this.mapSyntax(scheme, foreground)
    this.applyDerived(ui)

    const polarity = classifyPolarity(ui.get('background'))
    const preset = selectPreset(this.presets, polarity)
    for (const [status, color] of Object.entries(preset.status)) {
      ui.set(status, foreground)
      ui.set(`${status}.background`, color)
      ui.set(`${status}.border`, color)
    }
    for (const [key, color] of [...Object.entries(preset.terminal), ...Object.entries(preset.vcs)]) {
      ui.set(key, color)
    }

    const borderSource = flatColors.get('CARET_ROW_COLOR') ?? ui.get('background')
    if (borderSource) {
      ui.set('border', generateColorVariants(borderSource)[preset.borderVariant])
    }

    const players = zedTables.players.map(toPlayer)
    this.logger.debug(`'${name}' mapped ${ui.size} UI keys and ${Object.keys(syntax).length} syntax keys as ${polarity}`)

    return {
      name,
      document: {
        $schema: SCHEMA_URL,
        name,
        author: options.author ?? `Converted from IntelliJ (${name})`,
        themes: [
          {
            name,
            appearance: polarity,
            style: { ...Object.fromEntries(ui), players, syntax },
          },
        ],
      },
      stats: {
        ui: ui.size,
        syntax: Object.keys(syntax).length,
        players: players.length,
      },
    }
  }

  /**
   * Colors section entries, then `TEXT.*`, then `<ATTRIBUTE>.BACKGROUND` and
   * `<ATTRIBUTE>.FOREGROUND` for every attribute, all without alpha.
   */
  private flattenColors(scheme: IntellijScheme) {
    const flatColors = new Map<string, ColorValue>()
    for (const [key, color] of scheme.colors) {
      flatColors.set(key, withoutAlpha(color))
    }

    const text = scheme.attributes.get('TEXT')
    if (text?.foreground) {
      flatColors.set('TEXT.FOREGROUND', withoutAlpha(text.foreground))
    }
    if (text?.background) {
      flatColors.set('TEXT.BACKGROUND', withoutAlpha(text.background))
    }

    for (const [attributeName, attribute] of scheme.attributes) {
      if (attribute.background) {
        flatColors.set(`${attributeName}.BACKGROUND`, withoutAlpha(attribute.background))
      }
      if (attribute.foreground) {
        flatColors.set(`${attributeName}.FOREGROUND`, withoutAlpha(attribute.foreground))
      }
    }
    return flatColors
  }

  private mapUiColors(flatColors: ReadonlyMap<string, ColorValue>) {
    const ui = new Map<string, string>()
    for (const [key, color] of flatColors) {
      for (const target of this.uiTaxonomy.classifyAll(key)) {
        if (!ui.has(target)) {
          ui.set(target, color)
        }
      }
    }

    const textForeground = flatColors.get('TEXT.FOREGROUND')
    const textBackground = flatColors.get('TEXT.BACKGROUND')
    if (textBackground) {
      for (const key of ['background', 'editor.background']) {
        if (!ui.has(key)) {
          ui.set(key, textBackground)
        }
      }
    }
    if (textForeground) {
      for (const key of ['text', 'editor.foreground']) {
        if (!ui.has(key)) {
          ui.set(key, textForeground)
        }
      }
    }

    if (textBackground) {
      const surface = generateColorVariants(textBackground).darker2
      for (const key of zedTables.surfaces) {
        if (!ui.has(key)) {
          ui.set(key, surface)
        }
      }
    }
    return ui
  }

  private mapSyntax(scheme: IntellijScheme, foreground: string) {
    const syntax: Record<string, ZedSyntaxStyle> = {}
    const entries = [...scheme.attributes]
    const isDefault = ([attributeName]: [string, IntellijAttribute]) => attributeName.startsWith(DEFAULT_ATTRIBUTE_PREFIX)

    for (const [attributeName, attribute] of entries.filter(isDefault)) {
      const targets = this.syntaxTaxonomy.classifyAll(attributeName)
      const style = targets.length > 0 ? toSyntaxStyle(attribute) : undefined
      if (style) {
        for (const target of targets) {
          syntax[target] = { ...style }
        }
      }
    }

    // others only fill keys no base attribute claimed
    for (const [attributeName, attribute] of entries.filter((entry) => !isDefault(entry))) {
      const targets = this.syntaxTaxonomy.classifyAll(attributeName)
      if (targets.length === 0 || targets.some((target) => target in syntax)) {
        continue
      }
      const style = toSyntaxStyle(attribute)
      if (style) {
        for (const target of targets) {
          syntax[target] = { ...style }
        }
      }
    }

    for (const key of zedTables.essentialSyntax) {
      const style = syntax[key]
      if (!style) {
        syntax[key] = { color: foreground, font_style: null, font_weight: null }
      } else if (!style.color) {
        style.color = foreground
      }
    }
    return syntax
  }

  private applyDerived(ui: Map<string, string>) {
    for (const [target, source] of Object.entries(zedTables.derived)) {
      if (ui.has(target)) {
        continue
      }
      const color = Array.isArray(source) ? source.map((key) => ui.get(key)).find(Boolean) : source.color
      if (color) {
        ui.set(target, color)
      }
    }
  }
}
