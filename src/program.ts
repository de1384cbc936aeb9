import { Command, InvalidArgumentError } from 'commander'
import type { Container } from 'inversify'
import packageJson from '../package.json'
import { loadConfig } from '@/config'
import { BatchConversionService, ConversionService } from '@/conversion'
import type { ConversionOptions } from '@/converters/types'
import { Logger } from '@/logger'

interface CommonOptions {
  author?: string
  config?: string
  verbose?: boolean
}

interface BatchOptions extends CommonOptions {
  outDir?: string
  concurrency?: number
}

const logger = Logger.create({ name: 'CLI' })

function parsePositiveInt(value: string) {
  const parsed = Number.parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive number.')
  }
  return parsed
}

function describeError(error: unknown) {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error)
}

async function prepare({ author, config: configPath, verbose = false }: CommonOptions) {
  Logger.configure({ verbose })
  const config = await loadConfig(configPath)
  const options: ConversionOptions = {
    author: author ?? config.author,
    depthBudget: config.depthBudget,
    overrides: config.overrides,
  }
  return { config, options }
}

function withCommonOptions(command: Command) {
  return command
    .option('-a, --author <author>', 'author written into the converted theme')
    .option('-c, --config <path>', 'JSONC config file with defaults and color overrides')
    .option('-v, --verbose', 'print debug output to stderr')
}

export function createProgram(container: Container) {
  const conversion = container.get(ConversionService)
  const batch = container.get(BatchConversionService)
  const { directions } = conversion

  const parseDirection = (value: string) => {
    if (!directions.includes(value)) {
      throw new InvalidArgumentError(`Expected one of: ${directions.join(', ')}.`)
    }
    return value
  }

  const program = new Command()
  program
    .name('theme-bridge')
    .description('Convert editor color themes between IntelliJ, Sublime Text, Fleet and Zed')
    .version(packageJson.version)

  withCommonOptions(
    program
      .command('convert')
      .description('convert a single theme file')
      .argument('<direction>', `one of ${directions.join(', ')}`, parseDirection)
      .argument('<input>', 'source theme file')
      .argument('[output]', 'output file, defaults to the input name with the target suffix'),
  ).action(async (direction: string, input: string, output: string | undefined, commandOptions: CommonOptions) => {
    try {
      const { options } = await prepare(commandOptions)
      const result = await conversion.convertFile({ direction, input, output, options })
      process.stdout.write(`${result.output}\n`)
    } catch (error) {
      logger.error(`could not convert '${input}': ${describeError(error)}`)
      process.exitCode = 1
    }
  })

  withCommonOptions(
    program
      .command('batch')
      .description('convert several theme files concurrently')
      .argument('<direction>', `one of ${directions.join(', ')}`, parseDirection)
      .argument('<inputs...>', 'source theme files')
      .option('-d, --out-dir <dir>', 'directory for the converted themes, defaults to beside each input')
      .option('--concurrency <count>', 'conversions running at once', parsePositiveInt),
  ).action(async (direction: string, inputs: string[], commandOptions: BatchOptions) => {
    try {
      const { config, options } = await prepare(commandOptions)
      const report = await batch.convertAll({
        direction,
        inputs,
        outDir: commandOptions.outDir,
        concurrency: commandOptions.concurrency ?? config.concurrency,
        options,
      })

      for (const { output } of report.succeeded) {
        process.stdout.write(`${output}\n`)
      }
      for (const { input, error } of report.failed) {
        logger.error(`could not convert '${input}': ${describeError(error)}`)
      }
      if (report.failed.length > 0) {
        process.exitCode = 1
      }
    } catch (error) {
      logger.error(`batch conversion failed: ${describeError(error)}`)
      process.exitCode = 1
    }
  })

  return program
}
