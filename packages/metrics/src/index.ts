export { createMetrics, type Metrics } from './metrics'
export type { ChainMetrics } from './metrics/chain'
export type { HttpMetrics } from './metrics/http'
export type { IngestionMetrics } from './metrics/ingestion'
export * from './options'
export { RegistryMetricCreator } from './utils/registry-metric-creator'
