import { z } from 'zod'
import { colorSchema, polarityPresetsSchema } from '../shared/schema'
import rawPresets from './presets.json'
import rawTables from './tables.json'

/** Variable names tried in order; the first one defined becomes `var(name)`. */
const variableChainSchema = z.array(z.string())

const groupSchema = z.object({
  name: z.string(),
  scopes: z.string(),
  attributes: z.array(z.string()),
  variable: z.string(),
})

const staticRuleSchema = z.object({
  name: z.string().optional(),
  scope: z.string(),
  foreground: variableChainSchema.optional(),
  background: variableChainSchema.optional(),
  requires: z.string().optional(),
})

export const sublimeTablesSchema = z.object({
  groups: z.array(groupSchema),
  priorityAttributes: z.array(z.string()),
  keyFallbackGroups: z.array(z.string()),
  globals: z.record(z.union([z.string(), variableChainSchema])),
  staticRules: z.array(staticRuleSchema),
})

export const sublimePresetSchema = z.object({
  accents: z.record(colorSchema),
  diff: z.record(colorSchema),
  popupAccents: z.record(colorSchema),
  /** Background of generic popups; the derived popup color when absent. */
  popupBackground: colorSchema.optional(),
  popupShift: z.number().int(),
  popupDefault: colorSchema,
})

export type SemanticGroup = z.infer<typeof groupSchema>
export type SublimeTables = z.infer<typeof sublimeTablesSchema>
export type SublimePreset = z.infer<typeof sublimePresetSchema>

export const sublimeTables: SublimeTables = sublimeTablesSchema.parse(rawTables)
export const sublimePresets = polarityPresetsSchema(sublimePresetSchema).parse(rawPresets)
