export class ThemeParseError extends Error {
  constructor(
    readonly source: string,
    readonly detail: string,
  ) {
    super(`failed to parse ${source}: ${detail}`)
    this.name = 'ThemeParseError'
  }
}
