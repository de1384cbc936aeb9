export { ConversionService, defaultOutputPath } from './service'
export { BatchConversionService } from './batch'
export type { BatchFailure, BatchReport, BatchRequest, ConversionRequest, ConversionResult } from './types'
