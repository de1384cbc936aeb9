export type { SemanticCategory, TaxonomyRule } from './types'
export { TaxonomyMatcher } from './TaxonomyMatcher'
