import { z } from 'zod'
import type { ColorVariants } from '@/color'
import { colorSchema, polarityPresetsSchema, taxonomyPairsSchema } from '../shared/schema'
import rawPresets from './presets.json'
import rawTables from './tables.json'

const VARIANT_NAMES = [
  'base',
  'darker2',
  'darker5',
  'darker10',
  'darker15',
  'darker20',
  'lighter2',
  'lighter5',
  'lighter10',
  'lighter15',
  'lighter20',
  'hover',
  'active',
  'disabled',
  'muted',
] as const satisfies readonly (keyof ColorVariants)[]

/** A literal color, or UI keys copied from in order, the first present one winning. */
const derivedSchema = z.union([z.object({ color: colorSchema }), z.array(z.string())])

export const zedTablesSchema = z.object({
  ui: taxonomyPairsSchema,
  surfaces: z.array(z.string()),
  syntax: taxonomyPairsSchema,
  essentialSyntax: z.array(z.string()),
  derived: z.record(derivedSchema),
  players: z.array(colorSchema),
})

export const zedPresetSchema = z.object({
  /** Status name to the color of its background and border. */
  status: z.record(colorSchema),
  terminal: z.record(colorSchema),
  vcs: z.record(colorSchema),
  /** Variant of the caret row color used for `border`. */
  borderVariant: z.enum(VARIANT_NAMES),
})

export type DerivedColor = z.infer<typeof derivedSchema>
export type ZedTables = z.infer<typeof zedTablesSchema>
export type ZedPreset = z.infer<typeof zedPresetSchema>

export const zedTables: ZedTables = zedTablesSchema.parse(rawTables)
export const zedPresets = polarityPresetsSchema(zedPresetSchema).parse(rawPresets)
