import { tryNormalizeColor } from '@/color'
import type { ColorValue } from '@/color'
import { Logger } from '@/logger'
import { DEFAULT_DEPTH_BUDGET, resolveColorExpression } from '@/reference'
import type { VariableTable } from '@/reference'
import type { SemanticCategory } from '@/taxonomy'
import { TRANSPARENT_COLOR, TRANSPARENT_NAME } from './types'
import type { Palette } from './types'

const logger = Logger.create(synthesizePalette)

/**
 * Builds the named palette from categorized raw expressions. Categories without
 * a palette name are ignored, and so are values that do not resolve to hex
 * (color functions, named colors). Every value is resolved first, so resolver
 * errors propagate even for categories that end up unused.
 */
export function synthesizePalette(
  categorized: ReadonlyMap<SemanticCategory, string>,
  table: VariableTable,
  names: ReadonlyMap<SemanticCategory, string>,
  depthBudget: number = DEFAULT_DEPTH_BUDGET,
): Palette {
  const palette = new Map<string, ColorValue>()

  for (const [category, raw] of categorized) {
    const literal = resolveColorExpression(raw, table, depthBudget)
    const name = names.get(category)
    if (!name || palette.has(name)) {
      continue
    }

    const color = tryNormalizeColor(literal)
    if (!color) {
      logger.debug(`skipping '${category}': '${literal}' is not a hex color`)
      continue
    }
    palette.set(name, color)
  }

  palette.delete(TRANSPARENT_NAME)
  palette.set(TRANSPARENT_NAME, TRANSPARENT_COLOR)
  return palette
}
