import type { SlotFallbackChain } from './types'

export function pickPaletteName(chain: SlotFallbackChain, palette: ReadonlyMap<string, unknown>): string {
  for (const name of chain.preferred) {
    if (palette.has(name)) {
      return name
    }
  }
  if (palette.has(chain.fallback)) {
    return chain.fallback
  }

  const [first] = palette.keys()
  return first ?? chain.fallback
}
