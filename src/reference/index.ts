export type { ColorExpression, VariableTable } from './types'
export { DEFAULT_DEPTH_BUDGET } from './types'
export { CycleDetectedError, UnresolvedReferenceError } from './errors'
export { parseColorExpression, toReference } from './parseColorExpression'
export { createVariableTable } from './createVariableTable'
export { assertTableResolvable, resolveColor, resolveColorExpression, resolveVariable } from './resolveColorExpression'
