import { z } from 'zod'

// hashed foregrounds (`["#F00", "#0F0"]`) keep their first stop
const colorSchema = z.union([z.string(), z.array(z.string()).transform((stops) => stops[0])])

export const sublimeRuleSchema = z.object({
  name: z.string().optional(),
  scope: z.string(),
  foreground: colorSchema.optional(),
  background: z.string().optional(),
  font_style: z.string().optional(),
})

export const sublimeColorSchemeSchema = z.object({
  name: z.string().optional(),
  author: z.string().optional(),
  variables: z.record(z.string()).default({}),
  globals: z.record(z.string()).default({}),
  rules: z.array(sublimeRuleSchema).default([]),
})

export const tmThemeSchema = z.object({
  name: z.string().optional(),
  author: z.string().optional(),
  settings: z.array(
    z.object({
      name: z.string().optional(),
      scope: z.string().optional(),
      settings: z.record(z.string()).default({}),
    }),
  ),
})
