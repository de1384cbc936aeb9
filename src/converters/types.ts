import { injectable } from 'inversify'
import { Logger } from '@/logger'
import type { ColorOverrides } from '@/config'

export enum ConversionDirection {
  IntellijToSublime = 'intellij-to-sublime',
  IntellijToZed = 'intellij-to-zed',
  SublimeToFleet = 'sublime-to-fleet',
}

export interface ConversionOptions {
  author?: string
  depthBudget: number
  overrides: ColorOverrides
}

export interface ConvertedTheme<TDocument extends object = object> {
  name: string
  document: TDocument
  /** Entry counts reported after a conversion, e.g. palette size. */
  stats: Record<string, number>
}

export interface ThemeConverter<TDocument extends object = object> {
  readonly direction: ConversionDirection
  /** Appended to the input's base name when no output path is given. */
  readonly outputSuffix: string
  readonly indent: number
  convert(text: string, fileName: string, options: ConversionOptions): ConvertedTheme<TDocument>
}

@injectable()
export abstract class BaseThemeConverter<TSource, TDocument extends object> implements ThemeConverter<TDocument> {
  abstract readonly direction: ConversionDirection
  abstract readonly outputSuffix: string
  abstract readonly indent: number
  protected readonly logger: Logger

  constructor() {
    this.logger = Logger.create(this.constructor)
  }

  protected abstract parse(text: string, fileName: string): TSource

  protected abstract build(source: TSource, options: ConversionOptions): ConvertedTheme<TDocument>

  convert(text: string, fileName: string, options: ConversionOptions) {
    const source = this.parse(text, fileName)
    return this.build(source, options)
  }
}
