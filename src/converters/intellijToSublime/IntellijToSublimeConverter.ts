import { inject, injectable } from 'inversify'
import { isPlainHexColor, normalizeColor, shiftChannels } from '@/color'
import type { ColorValue } from '@/color'
import { resolveOverrides } from '@/config'
import { parseIntellijScheme, toFontStyle } from '@/dialects'
import type { IntellijScheme, SublimeRule } from '@/dialects'
import { TOKENS } from '@/di/tokens'
import { createVariableTable, parseColorExpression, resolveColorExpression, toReference } from '@/reference'
import { TaxonomyMatcher } from '@/taxonomy'
import { classifyPolarity, selectPreset } from '@/theme'
import type { PolarityPresets } from '@/theme'
import { stem } from '../stem'
import { BaseThemeConverter, ConversionDirection } from '../types'
import type { ConversionOptions, ConvertedTheme } from '../types'
import { buildPopupCss } from './buildPopupCss'
import { sublimeTables } from './tables'
import type { SemanticGroup, SublimePreset } from './tables'
import type { SublimeTheme } from './types'

const DEFAULT_AUTHOR = 'Converted from IntelliJ theme'
const KEY_FALLBACK_COLOR = '#000000'

interface GroupColors {
  foreground?: ColorValue
  background?: ColorValue
  fontStyle?: string
}

function firstDefined(chain: readonly string[], variables: Readonly<Record<string, string>>) {
  const name = chain.find((candidate) => candidate in variables)
  return name === undefined ? undefined : toReference(name)
}

@injectable()
export class IntellijToSublimeConverter extends BaseThemeConverter<IntellijScheme, SublimeTheme> {
  readonly direction = ConversionDirection.IntellijToSublime
  readonly outputSuffix = '.sublime-color-scheme'
  readonly indent = 4

  private readonly groups = new Map(sublimeTables.groups.map((group) => [group.name, group]))
  private readonly groupTaxonomy = TaxonomyMatcher.fromPairs(
    sublimeTables.groups.flatMap((group) => group.attributes.map((attribute) => [attribute, group.name] as const)),
  )
  private readonly priorityAttributes = new Set(sublimeTables.priorityAttributes)

  constructor(@inject(TOKENS.SublimePresets) private readonly presets: PolarityPresets<SublimePreset>) {
    super()
  }

  protected parse(text: string, fileName: string): IntellijScheme {
    return parseIntellijScheme(text, stem(fileName))
  }

  protected build(scheme: IntellijScheme, options: ConversionOptions): ConvertedTheme<SublimeTheme> {
    const { name } = scheme
    const overrides = new Map<string, ColorValue>()
    for (const [key, value] of resolveOverrides(options.overrides, name)) {
      overrides.set(key, normalizeColor(value))
    }
    const colors = new Map([...scheme.colors, ...overrides])

    // overridden base colors win over the TEXT attribute
    const text = scheme.attributes.get('TEXT')
    const foreground = overrides.get('FOREGROUND') ?? text?.foreground ?? colors.get('FOREGROUND')
    const background = overrides.get('BACKGROUND') ?? text?.background ?? colors.get('BACKGROUND')

    const polarity = classifyPolarity(background, 'wcag')
    const preset = selectPreset(this.presets, polarity)
    const popupBackground =
      background && isPlainHexColor(background) ? shiftChannels(background, preset.popupShift) : preset.popupDefault

    const groupColors = this.collectGroupColors(scheme)
    const variables: Record<string, string> = {
      popup_bg: popupBackground,
      ...preset.accents,
      ...preset.diff,
    }
    if (foreground) {
      variables.textcolor = foreground
    }
    if (background) {
      variables.background = background
    }
    const selection = colors.get('SELECTION_BACKGROUND')
    if (selection) {
      variables.selection_background = selection
    }

    for (const groupName of sublimeTables.keyFallbackGroups) {
      const entry = groupColors.get(groupName)
      if (!entry) {
        groupColors.set(groupName, { foreground: variables.textcolor ?? KEY_FALLBACK_COLOR })
      } else if (!entry.foreground && !entry.background) {
        entry.foreground = variables.textcolor ?? KEY_FALLBACK_COLOR
      }
    }

    for (const [groupName, entry] of groupColors) {
      const group = this.groups.get(groupName)
      if (group && entry.foreground) {
        variables[group.variable] = entry.foreground
      }
    }

    const lineHighlight = colors.get('CARET_ROW_COLOR')
    if (lineHighlight) {
      variables.line_highlight_color = lineHighlight
    }
    const gutterForeground = colors.get('LINE_NUMBERS_COLOR')
    if (gutterForeground) {
      variables.gutter_foreground_color = gutterForeground
    }

    const globals = this.buildGlobals(variables)
    globals.popup_css = buildPopupCss(preset.popupAccents, popupBackground, preset.popupBackground ?? popupBackground)

    const rules = [...this.buildGroupRules(groupColors, variables), ...this.buildStaticRules(variables)]
    this.assertResolvable(variables, globals, rules, options.depthBudget)
    this.logger.debug(`'${name}' mapped ${groupColors.size} semantic groups as ${polarity}`)

    return {
      name,
      document: {
        name,
        author: options.author ?? DEFAULT_AUTHOR,
        variables,
        globals,
        rules,
      },
      stats: {
        variables: Object.keys(variables).length,
        rules: rules.length,
      },
    }
  }

  /**
   * The first attribute of a group to carry a color sets it; priority
   * attributes override whatever came before.
   */
  private collectGroupColors(scheme: IntellijScheme) {
    const groupColors = new Map<string, GroupColors>()
    for (const [attributeName, attribute] of scheme.attributes) {
      const groupName = this.groupTaxonomy.classify(attributeName)
      if (groupName === undefined) {
        continue
      }

      let entry = groupColors.get(groupName)
      if (!entry) {
        entry = {}
        groupColors.set(groupName, entry)
      }
      if (!this.priorityAttributes.has(attributeName) && (entry.foreground || entry.background)) {
        continue
      }

      if (attribute.foreground) {
        entry.foreground = attribute.foreground
      }
      if (attribute.background) {
        entry.background = attribute.background
      }
      const fontStyle = toFontStyle(attribute.fontType)
      if (fontStyle) {
        entry.fontStyle = fontStyle
      }
    }
    return groupColors
  }

  private buildGlobals(variables: Readonly<Record<string, string>>) {
    const globals: Record<string, string> = {}
    for (const [key, chain] of Object.entries(sublimeTables.globals)) {
      const value = typeof chain === 'string' ? chain : firstDefined(chain, variables)
      if (value !== undefined) {
        globals[key] = value
      }
    }
    return globals
  }

  private buildGroupRules(groupColors: ReadonlyMap<string, GroupColors>, variables: Readonly<Record<string, string>>) {
    const rules: SublimeRule[] = []
    for (const [groupName, entry] of groupColors) {
      const group = this.groups.get(groupName)
      if (!group || (!entry.foreground && !entry.background)) {
        continue
      }
      rules.push(this.toGroupRule(group, entry, variables))
    }
    return rules
  }

  private toGroupRule(group: SemanticGroup, entry: GroupColors, variables: Readonly<Record<string, string>>) {
    const rule: SublimeRule = { name: group.name, scope: group.scopes }
    if (group.variable in variables) {
      rule.foreground = toReference(group.variable)
    }
    if (entry.background) {
      rule.background = entry.background
    }
    if (entry.fontStyle) {
      rule.font_style = entry.fontStyle
    }
    return rule
  }

  private buildStaticRules(variables: Readonly<Record<string, string>>) {
    const rules: SublimeRule[] = []
    for (const { name, scope, foreground, background, requires } of sublimeTables.staticRules) {
      if (requires !== undefined && !(requires in variables)) {
        continue
      }

      const rule: SublimeRule = name === undefined ? { scope } : { name, scope }
      const resolvedForeground = foreground && firstDefined(foreground, variables)
      const resolvedBackground = background && firstDefined(background, variables)
      if (resolvedForeground) {
        rule.foreground = resolvedForeground
      }
      if (resolvedBackground) {
        rule.background = resolvedBackground
      }
      if (rule.foreground || rule.background) {
        rules.push(rule)
      }
    }
    return rules
  }

  /** Every `var()` emitted must dereference within the variables block. */
  private assertResolvable(
    variables: Readonly<Record<string, string>>,
    globals: Readonly<Record<string, string>>,
    rules: readonly SublimeRule[],
    depthBudget: number,
  ) {
    const table = createVariableTable(variables)
    const values = [
      ...Object.entries(globals)
        .filter(([key]) => key !== 'popup_css')
        .map(([, value]) => value),
      ...rules.flatMap((rule) => [rule.foreground, rule.background]),
    ]
    for (const value of values) {
      if (value !== undefined && parseColorExpression(value).kind === 'reference') {
        resolveColorExpression(value, table, depthBudget)
      }
    }
  }
}
