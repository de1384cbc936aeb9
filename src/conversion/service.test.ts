import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { Mock } from 'vitest'
import { SourceNotFoundError, UnknownDirectionError } from '@/converters/errors'
import { ConversionDirection } from '@/converters/types'
import type { ConversionOptions, ThemeConverter } from '@/converters/types'
import { Logger } from '@/logger'
import { ConversionService, defaultOutputPath } from './service'

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
  writeFile: vi.fn(),
  mkdir: vi.fn(),
}))

const options: ConversionOptions = { depthBudget: 32, overrides: {} }

function createConverter(): ThemeConverter<{ source: string }> {
  return {
    direction: ConversionDirection.SublimeToFleet,
    outputSuffix: '_fleet.json',
    indent: 2,
    convert: vi.fn((text: string) => ({ name: 'Dusk', document: { source: text }, stats: { palette: 3 } })),
  }
}

describe('ConversionService', () => {
  let converter: ThemeConverter<{ source: string }>
  let service: ConversionService
  let sink: Mock<(line: string) => void>

  beforeEach(() => {
    vi.mocked(readFile).mockReset()
    vi.mocked(writeFile).mockReset()
    vi.mocked(mkdir).mockReset()
    sink = vi.fn<(line: string) => void>()
    Logger.configure({ sink })
    converter = createConverter()
    service = new ConversionService([converter])
  })

  afterEach(() => {
    Logger.reset()
  })

  it('should list the registered directions', () => {
    expect(service.directions).toEqual(['sublime-to-fleet'])
  })

  it('should reject an unknown direction', () => {
    expect(() => service.getConverter('sublime-to-vim')).toThrow(UnknownDirectionError)
  })

  it('should write the converted document beside the input', async () => {
    vi.mocked(readFile).mockResolvedValue('dusk')

    const result = await service.convertFile({
      direction: 'sublime-to-fleet',
      input: 'themes/dusk.sublime-color-scheme',
      options,
    })

    expect(readFile).toHaveBeenCalledWith('themes/dusk.sublime-color-scheme', 'utf-8')
    expect(mkdir).toHaveBeenCalledWith('themes', { recursive: true })
    expect(writeFile).toHaveBeenCalledWith('themes/dusk_fleet.json', '{\n  "source": "dusk"\n}\n', 'utf-8')
    expect(sink).toHaveBeenCalledWith(
      expect.stringContaining(
        "[ConversionService][INFO] converted 'themes/dusk.sublime-color-scheme' -> 'themes/dusk_fleet.json' as 'Dusk'",
      ),
    )
    expect(result).toMatchObject({
      direction: 'sublime-to-fleet',
      input: 'themes/dusk.sublime-color-scheme',
      output: 'themes/dusk_fleet.json',
      name: 'Dusk',
      stats: { palette: 3 },
    })
  })

  it('should honor an explicit output path', async () => {
    vi.mocked(readFile).mockResolvedValue('dusk')

    const result = await service.convertFile({
      direction: 'sublime-to-fleet',
      input: 'dusk.sublime-color-scheme',
      output: 'out/fleet/dusk.json',
      options,
    })

    expect(mkdir).toHaveBeenCalledWith('out/fleet', { recursive: true })
    expect(result.output).toBe('out/fleet/dusk.json')
  })

  it('should report a missing input file', async () => {
    vi.mocked(readFile).mockRejectedValue(Object.assign(new Error('no such file'), { code: 'ENOENT' }))

    await expect(
      service.convertFile({ direction: 'sublime-to-fleet', input: 'missing.json', options }),
    ).rejects.toThrow(new SourceNotFoundError('missing.json'))
    expect(writeFile).not.toHaveBeenCalled()
  })

  it('should not write anything when the conversion fails', async () => {
    vi.mocked(readFile).mockResolvedValue('dusk')
    vi.mocked(converter.convert).mockImplementation(() => {
      throw new Error('boom')
    })

    await expect(service.convertFile({ direction: 'sublime-to-fleet', input: 'dusk.json', options })).rejects.toThrow(
      'boom',
    )
    expect(writeFile).not.toHaveBeenCalled()
    expect(sink).toHaveBeenCalledWith(expect.stringContaining("[ConversionService][ERROR] failed to convert 'dusk.json'"))
  })
})

describe('defaultOutputPath', () => {
  it('should swap the extension for the converter suffix', () => {
    expect(defaultOutputPath('a/b/Night Owl.icls', { outputSuffix: '_zed.json' })).toBe('a/b/Night Owl_zed.json')
    expect(defaultOutputPath('a/b/Night Owl.icls', { outputSuffix: '_zed.json' }, 'dist')).toBe('dist/Night Owl_zed.json')
  })
})
