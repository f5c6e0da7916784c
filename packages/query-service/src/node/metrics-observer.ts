import type { ChainIndex, IngestionObserver } from '@blockquery/blockchain'
import type { Metrics } from '@blockquery/metrics'

/**
 * Keeps the chain and ingestion metrics current: subscribes to the chain
 * index events and returns the observer to hand to the pipeline.
 */
export function createMetricsObserver(
  metrics: Metrics,
  chain: ChainIndex,
): IngestionObserver {
  chain.events.on('tip', (tip) => metrics.chain.blockHeight.set(tip.height))
  chain.events.on('reorg', (reorg) => {
    metrics.chain.reorgsTotal.inc()
    metrics.chain.reorgDepth.observe(reorg.disconnected.length)
  })

  return {
    onAccepted(result) {
      metrics.ingestion.blocksAccepted.inc()
      metrics.chain.blocksIndexed.set(chain.size)
      metrics.chain.transactionsIndexed.set(chain.transactions.size)
      if (result.reorgRefused === true) metrics.chain.reorgsRefused.inc()
    },
    onFailure(error) {
      metrics.ingestion.blocksRejected.inc({ code: error.code })
    },
    onOrphanPoolChange(size) {
      metrics.ingestion.orphanPoolSize.set(size)
    },
  }
}
