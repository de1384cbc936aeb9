import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { DuplicateOutputError, SourceNotFoundError, UnknownDirectionError } from '@/converters/errors'
import { ConversionDirection } from '@/converters/types'
import type { ConversionOptions, ThemeConverter } from '@/converters/types'
import { Logger } from '@/logger'
import { BatchConversionService } from './batch'
import { ConversionService } from './service'

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
  writeFile: vi.fn(),
  mkdir: vi.fn(),
}))

const options: ConversionOptions = { depthBudget: 32, overrides: {} }

const converter: ThemeConverter<{ source: string }> = {
  direction: ConversionDirection.IntellijToZed,
  outputSuffix: '_zed.json',
  indent: 2,
  convert: (text) => ({ name: text.toUpperCase(), document: { source: text }, stats: {} }),
}

function missingFile() {
  return Object.assign(new Error('no such file'), { code: 'ENOENT' })
}

describe('BatchConversionService', () => {
  let batch: BatchConversionService

  beforeEach(() => {
    vi.mocked(readFile).mockReset()
    vi.mocked(writeFile).mockReset()
    vi.mocked(mkdir).mockReset()
    Logger.configure({ sink: vi.fn<(line: string) => void>() })
    batch = new BatchConversionService(new ConversionService([converter]))
  })

  afterEach(() => {
    Logger.reset()
  })

  it('should convert every input into the output directory', async () => {
    vi.mocked(readFile).mockImplementation(async (path) => `theme ${String(path)}`)

    const report = await batch.convertAll({
      direction: 'intellij-to-zed',
      inputs: ['a/one.icls', 'b/two.icls'],
      outDir: 'dist',
      concurrency: 2,
      options,
    })

    expect(report.failed).toEqual([])
    expect(report.succeeded.map(({ output }) => output)).toEqual(['dist/one_zed.json', 'dist/two_zed.json'])
    expect(report.succeeded.map(({ name }) => name)).toEqual(['THEME A/ONE.ICLS', 'THEME B/TWO.ICLS'])
  })

  it('should keep going after a failed input', async () => {
    vi.mocked(readFile).mockImplementation(async (path) => {
      if (path === 'gone.icls') {
        throw missingFile()
      }
      return 'present'
    })

    const report = await batch.convertAll({
      direction: 'intellij-to-zed',
      inputs: ['first.icls', 'gone.icls', 'last.icls'],
      concurrency: 1,
      options,
    })

    expect(report.succeeded.map(({ output }) => output)).toEqual(['first_zed.json', 'last_zed.json'])
    expect(report.failed).toHaveLength(1)
    expect(report.failed[0].input).toBe('gone.icls')
    expect(report.failed[0].error).toBeInstanceOf(SourceNotFoundError)
    expect(writeFile).toHaveBeenCalledTimes(2)
  })

  it('should fail inputs whose output path is already claimed', async () => {
    vi.mocked(readFile).mockImplementation(async () => 'present')

    const report = await batch.convertAll({
      direction: 'intellij-to-zed',
      inputs: ['a/x.icls', 'b/x.icls', 'c/y.icls'],
      outDir: 'dist',
      concurrency: 2,
      options,
    })

    expect(report.succeeded.map(({ input, output }) => [input, output])).toEqual([
      ['a/x.icls', 'dist/x_zed.json'],
      ['c/y.icls', 'dist/y_zed.json'],
    ])
    expect(report.failed).toHaveLength(1)
    expect(report.failed[0].input).toBe('b/x.icls')
    expect(report.failed[0].error).toBeInstanceOf(DuplicateOutputError)
    expect(report.failed[0].error.message).toBe("output 'dist/x_zed.json' is already written by 'a/x.icls'")
    expect(readFile).toHaveBeenCalledTimes(2)
    expect(writeFile).toHaveBeenCalledTimes(2)
  })

  it('should fail before queueing anything for an unknown direction', async () => {
    await expect(
      batch.convertAll({ direction: 'zed-to-intellij', inputs: ['a.json'], concurrency: 1, options }),
    ).rejects.toThrow(UnknownDirectionError)
    expect(readFile).not.toHaveBeenCalled()
  })
})
