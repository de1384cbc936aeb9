export class InvalidConfigError extends Error {
  constructor(
    readonly path: string,
    readonly detail: string,
  ) {
    super(`invalid config '${path}': ${detail}`)
    this.name = 'InvalidConfigError'
  }
}
