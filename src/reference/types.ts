export type ColorExpression = { kind: 'literal'; value: string } | { kind: 'reference'; name: string }

/** Variable name to raw expression, either a literal or a `var(name)` reference. */
export type VariableTable = ReadonlyMap<string, string>

export const DEFAULT_DEPTH_BUDGET = 32
