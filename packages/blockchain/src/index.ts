export { ChainIndex } from './chain-index/chain-index'
export {
  createChainNode,
  findCommonAncestor,
  type NodeArena,
} from './chain-index/helpers/chain-helpers'
export {
  createSnapshot,
  EMPTY_SNAPSHOT,
  hashAtHeight,
  isOnMainChain,
} from './chain-index/helpers/snapshot-helpers'
export * from './chain-index/types'
export { ArrayBlockFeed } from './feed/array-feed'
export {
  BLK_RECORD_HEADER_SIZE,
  BlkFileFeed,
  type BlkFileFeedOptions,
  blkFileName,
} from './feed/blk-file-feed'
export * from './feed/types'
export { OrphanPool } from './ingestion/orphan-pool'
export { IngestionPipeline } from './ingestion/pipeline'
export * from './ingestion/types'
export { TransactionIndex, type TxLocation } from './tx-index/tx-index'
