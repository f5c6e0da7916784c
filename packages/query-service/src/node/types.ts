import type { BlockFeed } from '@blockquery/blockchain'
import type { ResolvedConfigOptions } from '../config/index'

/**
 * Options for initializing a QueryNode
 */
export interface QueryNodeInitOptions {
  /** Resolved service configuration */
  config: ResolvedConfigOptions

  /**
   * Source of blocks for {@link QueryNode.ingest}.
   *
   * Default: the blk*.dat files of `config.blocksDir`
   */
  feed?: BlockFeed
}
