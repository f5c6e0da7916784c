import type { Block } from '@blockquery/block'
import type { BlockQueryError, DisplayHash, ErrorCode, Logger } from '@blockquery/utils'
import type { ChainIndex } from '../chain-index/chain-index'
import type { InsertResult } from '../chain-index/types'

export const DEFAULT_MAX_ORPHAN_BLOCKS = 1024
export const DEFAULT_PROGRESS_INTERVAL = 10_000

/**
 * Callbacks fired as blocks are processed, used to feed metrics.
 */
export interface IngestionObserver {
  onAccepted?(result: InsertResult, block: Block): void
  onFailure?(error: BlockQueryError): void
  onOrphanPoolChange?(size: number): void
}

export interface IngestionPipelineOptions {
  chain: ChainIndex
  /** Check each block's merkle root before inserting it. Default true */
  validateMerkleRoot?: boolean
  /**
   * Blocks held while their parent is unknown. Oldest are evicted first;
   * 0 disables the pool. Default 1024
   */
  maxOrphanBlocks?: number
  /** Accepted blocks between two progress lines while draining a feed. Default 10000 */
  progressInterval?: number
  logger?: Logger
  observer?: IngestionObserver
}

export type IngestOutcome =
  | {
      readonly status: 'accepted'
      /** The block itself first, then any orphans it released */
      readonly results: readonly InsertResult[]
    }
  | { readonly status: 'orphaned'; readonly hash: DisplayHash }
  | { readonly status: 'failed'; readonly error: BlockQueryError }

export interface IngestionReport {
  readonly accepted: number
  readonly failed: number
  readonly failures: Readonly<Partial<Record<ErrorCode, number>>>
  /** Orphans still waiting for their parent */
  readonly orphans: number
}
