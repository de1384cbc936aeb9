export class InvalidColorError extends Error {
  constructor(readonly value: string) {
    super(`invalid color '${value}'`)
    this.name = 'InvalidColorError'
  }
}
