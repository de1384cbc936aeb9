import { z } from 'zod'
import { polarityPresetsSchema, taxonomyPairsSchema } from '../shared/schema'
import rawPresets from './presets.json'
import rawTables from './tables.json'

const preferredSchema = z.array(z.string())

/** Either a preference list, or a reverse lookup of a resolved global with a fallback list. */
const slotSchema = z.union([preferredSchema, z.object({ global: z.string(), fallback: preferredSchema })])

const fontModifierSchema = z.object({
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
})

const textAttributeSchema = z.object({
  foreground: slotSchema.optional(),
  background: slotSchema.optional(),
  fontModifier: fontModifierSchema.optional(),
})

export const fleetTablesSchema = z.object({
  globals: taxonomyPairsSchema,
  variables: taxonomyPairsSchema,
  scopes: taxonomyPairsSchema,
  paletteNames: z.record(z.string()),
  colors: z.record(slotSchema),
  textAttributes: z.record(textAttributeSchema),
})

export const fleetPresetSchema = z.object({
  popupShift: z.number().int(),
})

export type PaletteSlot = z.infer<typeof slotSchema>
export type FontModifier = z.infer<typeof fontModifierSchema>
export type FleetTables = z.infer<typeof fleetTablesSchema>
export type FleetPreset = z.infer<typeof fleetPresetSchema>

export const fleetTables: FleetTables = fleetTablesSchema.parse(rawTables)
export const fleetPresets = polarityPresetsSchema(fleetPresetSchema).parse(rawPresets)
