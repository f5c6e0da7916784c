export * as ConfigConstants from './constants'
export * from './types'
export { createConfigFromDefaults, createConfigOptions } from './utils'
export type { ResolvedConfigOptions } from './utils'
