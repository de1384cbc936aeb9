type Severity = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG'

function formatTimestamp(date: Date) {
  const y = date.getFullYear()
  const mo = String(date.getMonth() + 1).padStart(2, '0')
  const d = String(date.getDate()).padStart(2, '0')
  const h = String(date.getHours()).padStart(2, '0')
  const mi = String(date.getMinutes()).padStart(2, '0')
  const s = String(date.getSeconds()).padStart(2, '0')
  const ms = String(date.getMilliseconds()).padStart(3, '0')
  return `${y}-${mo}-${d} ${h}:${mi}:${s}.${ms}`
}

function formatArg(arg: unknown) {
  if (arg === null || arg === undefined) {
    return String(arg)
  }
  if (arg instanceof Error) {
    return arg.stack ?? arg.message
  }
  if (typeof arg === 'object') {
    if (Array.isArray(arg) || arg.constructor === Object || !arg.constructor) {
      return JSON.stringify(arg)
    }
    return `${arg.constructor.name} {}`
  }
  return String(arg)
}

export type LogSink = (line: string) => void

export interface LoggerOptions {
  sink?: LogSink
  verbose?: boolean
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`)
}

export class Logger {
  private static sink: LogSink = stderrSink
  private static verbose = false

  static configure(options: LoggerOptions) {
    if (options.sink) {
      Logger.sink = options.sink
    }
    if (options.verbose !== undefined) {
      Logger.verbose = options.verbose
    }
  }

  static reset() {
    Logger.sink = stderrSink
    Logger.verbose = false
  }

  static create(target: { readonly name: string }) {
    return new Logger(target.name)
  }

  private constructor(private readonly tag: string) {}

  info(...args: unknown[]) {
    this.log('INFO', args)
  }

  warn(...args: unknown[]) {
    this.log('WARN', args)
  }

  error(...args: unknown[]) {
    this.log('ERROR', args)
  }

  debug(...args: unknown[]) {
    if (!Logger.verbose) {
      return
    }
    this.log('DEBUG', args)
  }

  private log(severity: Severity, args: unknown[]) {
    const timestamp = formatTimestamp(new Date())
    Logger.sink(`[${timestamp}][${this.tag}][${severity}] ${args.map(formatArg).join(' ')}`)
  }
}
