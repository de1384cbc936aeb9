import { z } from 'zod'
import { DEFAULT_DEPTH_BUDGET } from '@/reference'

export const DEFAULT_CONCURRENCY = 4

/**
 * Flat entries apply to every theme; a `"[Theme Name]"` block applies only to
 * the theme with that name and wins over the flat entries.
 */
export const colorOverridesSchema = z.record(z.union([z.string(), z.record(z.string())]))

export const configSchema = z.object({
  author: z.string().optional(),
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  depthBudget: z.number().int().positive().default(DEFAULT_DEPTH_BUDGET),
  overrides: colorOverridesSchema.default({}),
})

export type ColorOverrides = z.infer<typeof colorOverridesSchema>
export type Config = z.infer<typeof configSchema>
