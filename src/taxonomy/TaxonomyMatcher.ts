import type { SemanticCategory, TaxonomyRule } from './types'

function* dotPrefixes(key: string) {
  const segments = key.split('.')
  for (let length = segments.length; length > 0; length--) {
    yield segments.slice(0, length).join('.')
  }
}

/**
 * Maps dialect keys (TextMate scopes, IntelliJ attribute names) to semantic
 * categories. A scope such as `entity.name.function.js` falls back to its
 * dot-prefixes, most specific first; comma separated scope lists try each
 * alternative in turn.
 */
export class TaxonomyMatcher {
  private readonly index = new Map<string, SemanticCategory[]>()

  constructor(rules: Iterable<TaxonomyRule>) {
    for (const { sourceKey, category } of rules) {
      const categories = this.index.get(sourceKey)
      if (categories) {
        categories.push(category)
      } else {
        this.index.set(sourceKey, [category])
      }
    }
  }

  static fromPairs(pairs: Iterable<readonly [string, SemanticCategory]>) {
    const rules: TaxonomyRule[] = []
    for (const [sourceKey, category] of pairs) {
      rules.push({ sourceKey, category })
    }
    return new TaxonomyMatcher(rules)
  }

  classify(sourceKey: string): SemanticCategory | undefined {
    return this.classifyAll(sourceKey)[0]
  }

  classifyAll(sourceKey: string): readonly SemanticCategory[] {
    const trimmed = sourceKey.trim()
    const exact = this.index.get(trimmed)
    if (exact) {
      return exact
    }

    for (const candidate of trimmed.split(',')) {
      for (const prefix of dotPrefixes(candidate.trim())) {
        const categories = this.index.get(prefix)
        if (categories) {
          return categories
        }
      }
    }

    return []
  }
}
