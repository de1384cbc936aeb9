export type { ColorOverrides, Config } from './schema'
export { DEFAULT_CONCURRENCY, configSchema } from './schema'
export { InvalidConfigError } from './errors'
export { defaultConfig, loadConfig, parseConfig } from './loadConfig'
export { resolveOverrides } from './resolveOverrides'
