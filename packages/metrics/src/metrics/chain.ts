import type { RegistryMetricCreator } from '../utils/registry-metric-creator'

export type ChainMetrics = ReturnType<typeof createChainMetrics>

/**
 * Create chain index metrics
 */
export function createChainMetrics(register: RegistryMetricCreator) {
  return {
    blockHeight: register.gauge({
      name: 'chain_block_height',
      help: 'Height of the main-chain tip',
    }),
    blocksIndexed: register.gauge({
      name: 'chain_blocks_indexed',
      help: 'Blocks held by the chain index, side branches included',
    }),
    transactionsIndexed: register.gauge({
      name: 'chain_transactions_indexed',
      help: 'Transactions held by the transaction index',
    }),
    reorgsTotal: register.counter({
      name: 'chain_reorgs_total',
      help: 'Total number of chain reorganizations',
    }),
    reorgDepth: register.histogram({
      name: 'chain_reorg_depth',
      help: 'Main-chain blocks disconnected per reorganization',
      buckets: [1, 2, 3, 6, 10, 100],
    }),
    reorgsRefused: register.counter({
      name: 'chain_reorgs_refused_total',
      help: 'Reorganizations refused for exceeding the maximum depth',
    }),
  }
}
