import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { injectable, multiInject } from 'inversify'
import { SourceNotFoundError, UnknownDirectionError } from '@/converters/errors'
import { stem } from '@/converters/stem'
import type { ThemeConverter } from '@/converters/types'
import { TOKENS } from '@/di/tokens'
import { Logger } from '@/logger'
import { stopwatch } from '@/utils/stopwatch'
import type { ConversionRequest, ConversionResult } from './types'

function isMissingFile(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export function defaultOutputPath(input: string, converter: Pick<ThemeConverter, 'outputSuffix'>, outDir = dirname(input)) {
  return join(outDir, `${stem(input)}${converter.outputSuffix}`)
}

@injectable()
export class ConversionService {
  private readonly logger = Logger.create(ConversionService)
  private readonly converters: ReadonlyMap<string, ThemeConverter>

  constructor(@multiInject(TOKENS.ThemeConverter) converters: ThemeConverter[]) {
    this.converters = new Map(converters.map((converter) => [converter.direction, converter]))
  }

  get directions() {
    return [...this.converters.keys()]
  }

  getConverter(direction: string) {
    const converter = this.converters.get(direction)
    if (!converter) {
      throw new UnknownDirectionError(direction)
    }
    return converter
  }

  /**
   * Reads, converts and writes a single theme. The output is only written once
   * the whole conversion has succeeded.
   */
  async convertFile({ direction, input, output, options }: ConversionRequest): Promise<ConversionResult> {
    const converter = this.getConverter(direction)

    try {
      const text = await this.readSource(input)
      const [converted, elapsed] = await stopwatch(() => converter.convert(text, input, options))

      const target = output ?? defaultOutputPath(input, converter)
      await mkdir(dirname(target), { recursive: true })
      await writeFile(target, `${JSON.stringify(converted.document, null, converter.indent)}\n`, 'utf-8')

      this.logger.info(`converted '${input}' -> '${target}' as '${converted.name}' (in ${elapsed}ms)`)
      return { direction, input, output: target, name: converted.name, stats: converted.stats, elapsed }
    } catch (error) {
      this.logger.error(`failed to convert '${input}' via '${direction}':`, error)
      throw error
    }
  }

  private async readSource(path: string) {
    try {
      return await readFile(path, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) {
        throw new SourceNotFoundError(path)
      }
      throw error
    }
  }
}
