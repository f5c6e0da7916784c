import {
  BlkFileFeed,
  type BlockFeed,
  ChainIndex,
  IngestionPipeline,
  type IngestionReport,
} from '@blockquery/blockchain'
import { createMetrics, type Metrics } from '@blockquery/metrics'
import { getLogger, type Logger } from '@blockquery/utils'
import type { ResolvedConfigOptions } from '../config/index'
import { QueryServer } from '../http/server/query-server'
import { QueryEngine } from '../query/engine'
import { createMetricsObserver } from './metrics-observer'
import type { QueryNodeInitOptions } from './types'

/**
 * The whole service: chain index, ingestion pipeline, query engine and HTTP
 * server, built from one configuration.
 */
export class QueryNode {
  readonly config: ResolvedConfigOptions
  readonly logger: Logger
  readonly chain: ChainIndex
  readonly pipeline: IngestionPipeline
  readonly engine: QueryEngine
  readonly server: QueryServer
  readonly metrics?: Metrics

  private readonly feed: BlockFeed
  private running = false

  constructor(options: QueryNodeInitOptions) {
    const { config } = options
    this.config = config
    this.logger = config.logger ?? getLogger({ component: 'blockquery' })

    this.chain = new ChainIndex({ maxReorgDepth: config.maxReorgDepth })
    if (config.metrics.enabled) {
      this.metrics = createMetrics(config.metrics)
    }

    this.pipeline = new IngestionPipeline({
      chain: this.chain,
      validateMerkleRoot: config.validateMerkleRoot,
      maxOrphanBlocks: config.maxOrphanBlocks,
      logger: this.logger,
      observer:
        this.metrics === undefined
          ? undefined
          : createMetricsObserver(this.metrics, this.chain),
    })
    this.engine = new QueryEngine({
      chain: this.chain,
      valueUnit: config.valueUnit,
      scriptOrder: config.scriptOrder,
    })
    this.server = new QueryServer(
      { port: config.port, address: config.address, cors: config.cors },
      {
        logger: this.logger,
        engine: this.engine,
        chain: this.chain,
        metrics: this.metrics,
      },
    )
    this.feed = options.feed ?? new BlkFileFeed({ dir: config.blocksDir })
  }

  get isRunning(): boolean {
    return this.running
  }

  /**
   * Starts answering queries. Ingestion is separate, so the API can serve
   * the chain while it grows.
   */
  async listen(): Promise<void> {
    await this.server.listen()
    this.running = true
  }

  /**
   * Drains the configured feed into the chain index.
   */
  async ingest(feed: BlockFeed = this.feed): Promise<IngestionReport> {
    this.logger.info(
      feed instanceof BlkFileFeed
        ? `Loading blocks from ${feed.dir}`
        : 'Loading blocks from feed',
    )
    const report = await this.pipeline.run(feed)
    const tip = this.chain.snapshot().tip
    if (tip !== undefined) {
      this.logger.info(`Chain tip ${tip.hash} at height ${tip.height}`)
    } else {
      this.logger.warn('No blocks were ingested')
    }
    return report
  }

  async stop(): Promise<void> {
    if (!this.running) return
    await this.server.close()
    this.running = false
    this.logger.info('Query node stopped')
  }
}
