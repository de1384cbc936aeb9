import PQueue from 'p-queue'
import { inject, injectable } from 'inversify'
import { DuplicateOutputError } from '@/converters/errors'
import { Logger } from '@/logger'
import { ConversionService, defaultOutputPath } from './service'
import type { BatchFailure, BatchReport, BatchRequest, ConversionResult } from './types'

@injectable()
export class BatchConversionService {
  private readonly logger = Logger.create(BatchConversionService)

  constructor(@inject(ConversionService) private readonly conversion: ConversionService) {}

  /** Converts every input through a bounded queue; one failure never stops the rest. */
  async convertAll({ direction, inputs, outDir, concurrency, options }: BatchRequest): Promise<BatchReport> {
    const converter = this.conversion.getConverter(direction)
    const queue = new PQueue({ concurrency })

    // the first input to claim an output path keeps it
    const claims = new Map<string, string>()
    const results = await Promise.allSettled(
      inputs.map((input) => {
        const output = defaultOutputPath(input, converter, outDir)
        const claimedBy = claims.get(output)
        if (claimedBy !== undefined) {
          return Promise.reject(new DuplicateOutputError(output, claimedBy))
        }
        claims.set(output, input)

        return queue.add(() => this.conversion.convertFile({ direction, input, output, options }), {
          throwOnTimeout: true,
        })
      }),
    )

    const succeeded: ConversionResult[] = []
    const failed: BatchFailure[] = []
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        succeeded.push(result.value)
      } else {
        const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason))
        failed.push({ input: inputs[index], error })
      }
    })

    const summary = `converted ${succeeded.length}/${inputs.length} themes via '${direction}'`
    if (failed.length > 0) {
      this.logger.warn(`${summary}, failed: ${failed.map(({ input }) => `'${input}'`).join(', ')}`)
    } else {
      this.logger.info(summary)
    }
    return { succeeded, failed }
  }
}
