export type SemanticCategory = string

export interface TaxonomyRule {
  sourceKey: string
  category: SemanticCategory
}
