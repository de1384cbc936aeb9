import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { z } from 'zod'
import { tryNormalizeColor } from '@/color'
import type { ColorValue } from '@/color'
import { ThemeParseError } from '../errors'
import type { IntellijAttribute, IntellijScheme } from './types'

// self-closing elements such as `<colors />` come back as empty strings
const emptyElement = z.literal('')

const optionSchema = z.object({
  name: z.string(),
  value: z.string().optional(),
})

const optionListSchema = z.union([z.object({ option: z.array(optionSchema).optional() }), emptyElement])

const attributeOptionSchema = z.object({
  name: z.string(),
  baseAttributes: z.string().optional(),
  value: optionListSchema.optional(),
})

const schemeSchema = z.object({
  scheme: z.object({
    name: z.string().optional(),
    colors: optionListSchema.optional(),
    attributes: z.union([z.object({ option: z.array(attributeOptionSchema).optional() }), emptyElement]).optional(),
  }),
})

type OptionList = z.infer<typeof optionListSchema>

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  isArray: (name) => name === 'option',
})

function optionsOf(list: OptionList | undefined) {
  return list ? (list.option ?? []) : []
}

function toAttribute(options: OptionList | undefined, baseAttributes: string | undefined): IntellijAttribute {
  const attribute: IntellijAttribute = {}
  if (baseAttributes) {
    attribute.baseAttributes = baseAttributes
  }

  for (const { name, value } of optionsOf(options)) {
    const color = tryNormalizeColor(value)
    switch (name) {
      case 'FOREGROUND':
        if (color) {
          attribute.foreground = color
        }
        break
      case 'BACKGROUND':
        if (color) {
          attribute.background = color
        }
        break
      case 'FONT_TYPE': {
        const fontType = Number.parseInt(value ?? '', 10)
        if (!Number.isNaN(fontType)) {
          attribute.fontType = fontType
        }
        break
      }
    }
  }

  return attribute
}

/**
 * Reads an IntelliJ `.icls` color scheme. Color values that are not hex are
 * dropped; `fallbackName` is used when the scheme carries no name.
 */
export function parseIntellijScheme(text: string, fallbackName: string): IntellijScheme {
  const validation = XMLValidator.validate(text)
  if (validation !== true) {
    const { msg, line, col } = validation.err
    throw new ThemeParseError('IntelliJ scheme', `${msg} (line ${line}, column ${col})`)
  }

  const result = schemeSchema.safeParse(parser.parse(text))
  if (!result.success) {
    throw new ThemeParseError('IntelliJ scheme', result.error.issues[0]?.message ?? 'unexpected structure')
  }
  const { scheme } = result.data

  const colors = new Map<string, ColorValue>()
  for (const { name, value } of optionsOf(scheme.colors)) {
    const color = tryNormalizeColor(value)
    if (color) {
      colors.set(name, color)
    }
  }

  const attributes = new Map<string, IntellijAttribute>()
  const attributeOptions = scheme.attributes ? (scheme.attributes.option ?? []) : []
  for (const { name, baseAttributes, value } of attributeOptions) {
    const attribute = toAttribute(value, baseAttributes)
    if (Object.keys(attribute).length > 0) {
      attributes.set(name, attribute)
    }
  }

  return { name: scheme.name || fallbackName, colors, attributes }
}
