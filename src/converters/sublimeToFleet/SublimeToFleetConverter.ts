import { inject, injectable } from 'inversify'
import { shiftChannels, tryNormalizeColor } from '@/color'
import { resolveOverrides } from '@/config'
import { parseSublimeColorScheme, parseTmTheme } from '@/dialects'
import type { SublimeColorScheme } from '@/dialects'
import { TOKENS } from '@/di/tokens'
import { findPaletteNameByColor, pickPaletteName, synthesizePalette } from '@/palette'
import type { Palette } from '@/palette'
import { assertTableResolvable, createVariableTable, resolveColorExpression } from '@/reference'
import type { VariableTable } from '@/reference'
import { TaxonomyMatcher } from '@/taxonomy'
import { ThemePolarity, classifyPolarity, selectPreset } from '@/theme'
import type { PolarityPresets } from '@/theme'
import { parseFontStyle } from '../shared/fontStyle'
import { stem } from '../stem'
import { BaseThemeConverter, ConversionDirection } from '../types'
import type { ConversionOptions, ConvertedTheme } from '../types'
import { fleetTables } from './tables'
import type { FleetPreset, PaletteSlot } from './tables'
import type { FleetTextAttribute, FleetTheme } from './types'

const TEXT_FALLBACK = 'Text'

interface SlotContext {
  palette: Palette
  globals: ReadonlyMap<string, string>
  table: VariableTable
  depthBudget: number
}

@injectable()
export class SublimeToFleetConverter extends BaseThemeConverter<SublimeColorScheme, FleetTheme> {
  readonly direction = ConversionDirection.SublimeToFleet
  readonly outputSuffix = '_fleet.json'
  readonly indent = 2

  private readonly globalsTaxonomy = TaxonomyMatcher.fromPairs(fleetTables.globals)
  private readonly variablesTaxonomy = TaxonomyMatcher.fromPairs(fleetTables.variables)
  private readonly scopeTaxonomy = TaxonomyMatcher.fromPairs(fleetTables.scopes)
  private readonly paletteNames = new Map(Object.entries(fleetTables.paletteNames))

  constructor(@inject(TOKENS.FleetPresets) private readonly presets: PolarityPresets<FleetPreset>) {
    super()
  }

  protected parse(text: string, fileName: string): SublimeColorScheme {
    const scheme = /\.(tmTheme|plist)$/i.test(fileName) ? parseTmTheme(text) : parseSublimeColorScheme(text)
    return { ...scheme, name: scheme.name ?? stem(fileName) }
  }

  protected build(source: SublimeColorScheme, options: ConversionOptions): ConvertedTheme<FleetTheme> {
    const name = source.name ?? 'Converted Theme'
    const { depthBudget } = options
    const variables = { ...source.variables, ...Object.fromEntries(resolveOverrides(options.overrides, name)) }
    const table = createVariableTable(variables)
    assertTableResolvable(table, depthBudget)
    const globals = new Map(Object.entries(source.globals))
    this.assertReferencesResolve(source, table, depthBudget)

    const categorized = new Map<string, string>()
    const categorize = (taxonomy: TaxonomyMatcher, key: string, raw: string) => {
      const category = taxonomy.classify(key)
      if (category && !categorized.has(category)) {
        categorized.set(category, raw)
      }
    }
    for (const [key, raw] of globals) {
      categorize(this.globalsTaxonomy, key, raw)
    }
    for (const [key, raw] of Object.entries(variables)) {
      categorize(this.variablesTaxonomy, key, raw)
    }
    for (const rule of source.rules) {
      if (rule.foreground) {
        categorize(this.scopeTaxonomy, rule.scope, rule.foreground)
      }
    }

    const rawBackground = globals.get('background')
    const background = rawBackground === undefined ? undefined : resolveColorExpression(rawBackground, table, depthBudget)
    const polarity = classifyPolarity(background)
    const preset = selectPreset(this.presets, polarity)

    const base = tryNormalizeColor(background)
    if (!categorized.has('popup') && base) {
      categorized.set('popup', shiftChannels(base, preset.popupShift))
    }

    const palette = synthesizePalette(categorized, table, this.paletteNames, depthBudget)
    const context: SlotContext = { palette, globals, table, depthBudget }

    const colors: Record<string, string> = {}
    for (const [slot, chain] of Object.entries(fleetTables.colors)) {
      colors[slot] = this.resolveSlot(chain, context)
    }

    const textAttributes = this.buildTextAttributes(source, context)
    this.logger.debug(`'${name}' resolved ${palette.size} palette entries, ${categorized.size} categories`)

    return {
      name,
      document: {
        meta: {
          'theme.name': name,
          'theme.kind': polarity === ThemePolarity.Light ? 'Light' : 'Dark',
          'theme.version': 1,
        },
        colors,
        textAttributes,
        palette: Object.fromEntries(palette),
      },
      stats: {
        palette: palette.size,
        colors: Object.keys(colors).length,
        textAttributes: Object.keys(textAttributes).length,
      },
    }
  }

  /** Globals and rule colors must resolve whether or not they reach the palette. */
  private assertReferencesResolve(source: SublimeColorScheme, table: VariableTable, depthBudget: number) {
    const values = [
      ...Object.values(source.globals),
      ...source.rules.flatMap((rule) => [rule.foreground, rule.background]),
    ]
    for (const value of values) {
      if (value !== undefined) {
        resolveColorExpression(value, table, depthBudget)
      }
    }
  }

  private buildTextAttributes(source: SublimeColorScheme, context: SlotContext) {
    const textAttributes: Record<string, FleetTextAttribute> = {}
    for (const [key, mapping] of Object.entries(fleetTables.textAttributes)) {
      const attribute: FleetTextAttribute = {}
      if (mapping.foreground) {
        attribute.foregroundColor = this.resolveSlot(mapping.foreground, context)
      }
      if (mapping.background) {
        attribute.backgroundColor = this.resolveSlot(mapping.background, context)
      }
      if (mapping.fontModifier) {
        attribute.fontModifier = { ...mapping.fontModifier }
      }
      textAttributes[key] = attribute
    }

    for (const rule of source.rules) {
      const flags = parseFontStyle(rule.font_style)
      const category = this.scopeTaxonomy.classify(rule.scope)
      const attribute = category === undefined ? undefined : textAttributes[category]
      if (flags && attribute) {
        attribute.fontModifier = { ...attribute.fontModifier, ...flags }
      }
    }
    return textAttributes
  }

  private resolveSlot(slot: PaletteSlot, { palette, globals, table, depthBudget }: SlotContext): string {
    if (Array.isArray(slot)) {
      return pickPaletteName({ preferred: slot, fallback: TEXT_FALLBACK }, palette)
    }

    const fallback = pickPaletteName({ preferred: slot.fallback, fallback: TEXT_FALLBACK }, palette)
    const raw = globals.get(slot.global)
    if (raw === undefined) {
      return fallback
    }
    return findPaletteNameByColor(resolveColorExpression(raw, table, depthBudget), palette, fallback)
  }
}
