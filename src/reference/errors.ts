export class UnresolvedReferenceError extends Error {
  constructor(
    readonly reference: string,
    readonly chain: readonly string[] = [],
  ) {
    super(
      chain.length > 0
        ? `unresolved reference '${reference}' (via ${chain.join(' -> ')})`
        : `unresolved reference '${reference}'`,
    )
    this.name = 'UnresolvedReferenceError'
  }
}

export class CycleDetectedError extends Error {
  constructor(readonly chain: readonly string[]) {
    super(`reference chain exceeds depth budget: ${chain.join(' -> ')}`)
    this.name = 'CycleDetectedError'
  }
}
