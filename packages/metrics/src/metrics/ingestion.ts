import type { RegistryMetricCreator } from '../utils/registry-metric-creator'

export type IngestionMetrics = ReturnType<typeof createIngestionMetrics>

export function createIngestionMetrics(register: RegistryMetricCreator) {
  return {
    blocksAccepted: register.counter({
      name: 'ingestion_blocks_accepted_total',
      help: 'Blocks decoded and inserted into the chain index',
    }),
    blocksRejected: register.counter<'code'>({
      name: 'ingestion_blocks_rejected_total',
      help: 'Blocks or feed records rejected, by error code',
      labelNames: ['code'],
    }),
    orphanPoolSize: register.gauge({
      name: 'ingestion_orphan_pool_size',
      help: 'Blocks waiting for an unknown parent',
    }),
  }
}
