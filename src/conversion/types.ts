import type { ConversionOptions } from '@/converters/types'

export interface ConversionRequest {
  direction: string
  input: string
  /** Defaults to the input's directory, base name and the converter's suffix. */
  output?: string
  options: ConversionOptions
}

export interface ConversionResult {
  direction: string
  input: string
  output: string
  name: string
  stats: Record<string, number>
  elapsed: number
}

export interface BatchRequest {
  direction: string
  inputs: readonly string[]
  /** Output directory; each output lands beside its input when absent. */
  outDir?: string
  concurrency: number
  options: ConversionOptions
}

export interface BatchFailure {
  input: string
  error: Error
}

export interface BatchReport {
  succeeded: ConversionResult[]
  failed: BatchFailure[]
}
