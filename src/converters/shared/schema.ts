import { z } from 'zod'
import { normalizeColor } from '@/color'

export const taxonomyPairsSchema = z.array(z.tuple([z.string(), z.string()]))

export const colorSchema = z.string().transform((value, context) => {
  try {
    return normalizeColor(value)
  } catch (error) {
    context.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) })
    return z.NEVER
  }
})

/** Keys match the `ThemePolarity` values. */
export function polarityPresetsSchema<T extends z.ZodTypeAny>(preset: T) {
  return z.object({ light: preset, dark: preset })
}
