import type { ColorOverrides } from './schema'

/** Flattens the overrides that apply to `themeName`, theme block last. */
export function resolveOverrides(overrides: ColorOverrides, themeName: string): Map<string, string> {
  const resolved = new Map<string, string>()
  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value === 'string') {
      resolved.set(key, value)
    }
  }

  const themeBlock = overrides[`[${themeName}]`]
  if (themeBlock && typeof themeBlock !== 'string') {
    for (const [key, value] of Object.entries(themeBlock)) {
      resolved.set(key, value)
    }
  }
  return resolved
}
