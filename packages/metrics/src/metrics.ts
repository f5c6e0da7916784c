import { collectDefaultMetrics } from 'prom-client'
import { type ChainMetrics, createChainMetrics } from './metrics/chain'
import { createHttpMetrics, type HttpMetrics } from './metrics/http'
import {
  createIngestionMetrics,
  type IngestionMetrics,
} from './metrics/ingestion'
import { defaultMetricsOptions, type MetricsOptions } from './options'
import { RegistryMetricCreator } from './utils/registry-metric-creator'

export type Metrics = {
  chain: ChainMetrics
  ingestion: IngestionMetrics
  http: HttpMetrics
  register: RegistryMetricCreator
}

export function createMetrics(opts: MetricsOptions = {}): Metrics {
  const prefix = opts.prefix ?? defaultMetricsOptions.prefix
  const register = new RegistryMetricCreator(prefix)
  const chain = createChainMetrics(register)
  const ingestion = createIngestionMetrics(register)
  const http = createHttpMetrics(register)

  if (opts.metadata) {
    register.static({
      name: 'info',
      help: 'Service version information',
      value: opts.metadata,
    })
  }

  if (opts.collectDefaultMetrics ?? defaultMetricsOptions.collectDefaultMetrics) {
    collectDefaultMetrics({ register, prefix: `${prefix}_` })
  }

  return { chain, ingestion, http, register }
}
