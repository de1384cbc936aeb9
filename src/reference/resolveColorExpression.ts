import { normalizeColor } from '@/color'
import type { ColorValue } from '@/color'
import { CycleDetectedError, UnresolvedReferenceError } from './errors'
import { parseColorExpression } from './parseColorExpression'
import { DEFAULT_DEPTH_BUDGET } from './types'
import type { VariableTable } from './types'

function resolveExpression(raw: string, table: VariableTable, depthBudget: number, chain: string[]): string {
  const expression = parseColorExpression(raw)
  if (expression.kind === 'literal') {
    return expression.value
  }

  const walked = [...chain, expression.name]
  if (depthBudget <= 0) {
    throw new CycleDetectedError(walked)
  }

  const value = table.get(expression.name)
  if (value === undefined) {
    throw new UnresolvedReferenceError(expression.name, chain)
  }
  return resolveExpression(value, table, depthBudget - 1, walked)
}

/**
 * Follows `var()` references until a literal is reached and returns the literal
 * text as written. Each dereference consumes one unit of `depthBudget`.
 */
export function resolveColorExpression(
  raw: string,
  table: VariableTable,
  depthBudget: number = DEFAULT_DEPTH_BUDGET,
): string {
  return resolveExpression(raw, table, depthBudget, [])
}

export function resolveVariable(name: string, table: VariableTable, depthBudget: number = DEFAULT_DEPTH_BUDGET) {
  return resolveExpression(`var(${name})`, table, depthBudget, [])
}

export function resolveColor(raw: string, table: VariableTable, depthBudget: number = DEFAULT_DEPTH_BUDGET): ColorValue {
  return normalizeColor(resolveColorExpression(raw, table, depthBudget))
}

/** Every variable in the table must bottom out at a literal, referenced or not. */
export function assertTableResolvable(table: VariableTable, depthBudget: number = DEFAULT_DEPTH_BUDGET) {
  for (const name of table.keys()) {
    resolveVariable(name, table, depthBudget)
  }
}
