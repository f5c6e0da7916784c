import type { Block } from '@blockquery/block'
import type { DisplayHash } from '@blockquery/utils'
import type { TransactionIndex } from '../tx-index/tx-index'

/**
 * A block placed in the chain tree. Nodes only link to their parent by hash;
 * the arena map is the single owner of every node.
 */
export interface ChainNode {
  readonly block: Block
  readonly hash: DisplayHash
  readonly height: number
  /** Cumulative work from the root up to and including this block */
  readonly chainWork: bigint
  /** Undefined for root blocks, whose previous hash is zero */
  readonly parentHash: DisplayHash | undefined
}

export interface ChainTip {
  readonly hash: DisplayHash
  readonly height: number
  readonly chainWork: bigint
}

/**
 * Immutable view of the main chain. `chain[h]` is the main-chain hash at
 * height h, valid for h <= tip.height. The array may be shared with newer
 * snapshots that extended it, so never read past the tip.
 */
export interface ChainSnapshot {
  readonly tip: ChainTip | undefined
  readonly chain: readonly DisplayHash[]
}

export interface ReorgInfo {
  /** Last block shared by both branches, undefined when they share no root */
  readonly commonAncestor: DisplayHash | undefined
  /** Old main-chain blocks, from the old tip down */
  readonly disconnected: readonly DisplayHash[]
  /** New main-chain blocks, from the first after the ancestor up to the new tip */
  readonly connected: readonly DisplayHash[]
}

export interface InsertResult {
  readonly hash: DisplayHash
  readonly height: number
  readonly chainWork: bigint
  readonly isNewTip: boolean
  readonly reorg?: ReorgInfo
  /** Set when the block had more work but the reorg exceeded maxReorgDepth */
  readonly reorgRefused?: boolean
}

/**
 * Event types emitted by the chain index
 */
export type ChainIndexEvent = {
  block: (node: ChainNode, result: InsertResult) => void
  tip: (tip: ChainTip) => void
  reorg: (reorg: ReorgInfo, tip: ChainTip) => void
}

export interface ChainIndexOptions {
  /**
   * Largest number of main-chain blocks a reorg may disconnect. Undefined
   * means unbounded.
   */
  maxReorgDepth?: number

  /**
   * Transaction index fed with every inserted block. A new one is created
   * when omitted.
   */
  txIndex?: TransactionIndex
}
