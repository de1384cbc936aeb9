import type { ColorExpression } from './types'

const REFERENCE_PATTERN = /^var\(\s*([^()\s]+)\s*\)$/

export function parseColorExpression(raw: string): ColorExpression {
  const trimmed = raw.trim()
  const match = REFERENCE_PATTERN.exec(trimmed)
  if (match) {
    return { kind: 'reference', name: match[1] }
  }
  return { kind: 'literal', value: trimmed }
}

export function toReference(name: string) {
  return `var(${name})`
}
