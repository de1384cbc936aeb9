export class SourceNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`input file not found: ${path}`)
    this.name = 'SourceNotFoundError'
  }
}

export class UnknownDirectionError extends Error {
  constructor(readonly direction: string) {
    super(`no converter registered for '${direction}'`)
    this.name = 'UnknownDirectionError'
  }
}

export class DuplicateOutputError extends Error {
  constructor(
    readonly output: string,
    readonly claimedBy: string,
  ) {
    super(`output '${output}' is already written by '${claimedBy}'`)
    this.name = 'DuplicateOutputError'
  }
}
