import type { VariableTable } from './types'

export function createVariableTable(variables: Record<string, string> = {}): VariableTable {
  return new Map(Object.entries(variables))
}
