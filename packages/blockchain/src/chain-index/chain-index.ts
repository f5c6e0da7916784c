/**
 * ChainIndex - owns every indexed block and tracks the best chain.
 * Mutable state lives here; tree logic is in the pure helpers.
 */

import type { Block } from '@blockquery/block'
import {
  BlockNotFoundError,
  ChainEmptyError,
  type DisplayHash,
  DuplicateBlockError,
} from '@blockquery/utils'
import debugDefault from 'debug'
import { EventEmitter } from 'eventemitter3'
import { TransactionIndex } from '../tx-index/tx-index'
import { createChainNode, findCommonAncestor } from './helpers/chain-helpers'
import {
  createSnapshot,
  EMPTY_SNAPSHOT,
  isOnMainChain,
} from './helpers/snapshot-helpers'
import type {
  ChainIndexEvent,
  ChainIndexOptions,
  ChainNode,
  ChainSnapshot,
  ChainTip,
  InsertResult,
} from './types'

const debug = debugDefault('blockquery:blockchain:index')

export class ChainIndex {
  readonly events: EventEmitter<ChainIndexEvent>
  readonly transactions: TransactionIndex
  readonly maxReorgDepth: number | undefined

  private readonly arena = new Map<DisplayHash, ChainNode>()
  // Backing list of the current snapshot. Only appended to while the tip is
  // extended; replaced by a copy on reorg.
  private chain: DisplayHash[] = []
  private current: ChainSnapshot = EMPTY_SNAPSHOT

  constructor(opts: ChainIndexOptions = {}) {
    this.events = new EventEmitter<ChainIndexEvent>()
    this.transactions = opts.txIndex ?? new TransactionIndex()
    this.maxReorgDepth = opts.maxReorgDepth
  }

  /** Number of indexed blocks, main chain and side branches */
  get size(): number {
    return this.arena.size
  }

  /**
   * Adds a block to the tree and moves the tip when the block's branch has
   * strictly more cumulative work. On equal work the current tip stays.
   *
   * @throws {DuplicateBlockError}
   * @throws {UnknownParentError}
   */
  insert(block: Block): InsertResult {
    if (this.arena.has(block.hash)) {
      throw new DuplicateBlockError(block.hash)
    }

    const node = createChainNode(this.arena, block)
    this.arena.set(node.hash, node)
    this.transactions.indexBlock(block)

    const result = this.updateTip(node)
    debug(
      `inserted ${node.hash} height=${node.height} work=${node.chainWork} newTip=${result.isNewTip}`,
    )
    this.events.emit('block', node, result)
    return result
  }

  private updateTip(node: ChainNode): InsertResult {
    const base: ChainTip = {
      hash: node.hash,
      height: node.height,
      chainWork: node.chainWork,
    }
    const tip = this.current.tip

    if (tip !== undefined && node.chainWork <= tip.chainWork) {
      return Object.freeze({ ...base, isNewTip: false })
    }

    const newTip: ChainTip = Object.freeze(base)

    if (tip === undefined || node.parentHash === tip.hash) {
      this.chain.push(node.hash)
      this.current = createSnapshot(newTip, this.chain)
      this.events.emit('tip', newTip)
      return Object.freeze({ ...base, isNewTip: true })
    }

    const reorg = findCommonAncestor(this.arena, this.current, node)
    if (
      this.maxReorgDepth !== undefined &&
      reorg.disconnected.length > this.maxReorgDepth
    ) {
      debug(
        `refused reorg to ${node.hash}: ${reorg.disconnected.length} blocks deeper than ${this.maxReorgDepth}`,
      )
      return Object.freeze({ ...base, isNewTip: false, reorgRefused: true })
    }

    const ancestorHeight =
      reorg.commonAncestor === undefined
        ? -1
        : this.heightOf(reorg.commonAncestor)
    this.chain = [
      ...this.chain.slice(0, ancestorHeight + 1),
      ...reorg.connected,
    ]
    this.current = createSnapshot(newTip, this.chain)

    debug(
      `reorg to ${node.hash}: ancestor=${reorg.commonAncestor} disconnected=${reorg.disconnected.length} connected=${reorg.connected.length}`,
    )
    this.events.emit('tip', newTip)
    this.events.emit('reorg', reorg, newTip)
    return Object.freeze({ ...base, isNewTip: true, reorg })
  }

  /**
   * The current main-chain view. Later inserts never change a snapshot
   * already handed out.
   */
  snapshot(): ChainSnapshot {
    return this.current
  }

  getNode(hash: DisplayHash): ChainNode | undefined {
    return this.arena.get(hash.toLowerCase())
  }

  hasBlock(hash: DisplayHash): boolean {
    return this.arena.has(hash.toLowerCase())
  }

  /**
   * @throws {BlockNotFoundError}
   */
  getNodeOrThrow(hash: DisplayHash): ChainNode {
    const node = this.getNode(hash)
    if (node === undefined) {
      throw new BlockNotFoundError(hash)
    }
    return node
  }

  getBlock(hash: DisplayHash): Block {
    return this.getNodeOrThrow(hash).block
  }

  /**
   * @throws {BlockNotFoundError}
   */
  heightOf(hash: DisplayHash): number {
    return this.getNodeOrThrow(hash).height
  }

  /**
   * @throws {BlockNotFoundError}
   */
  isMainChain(hash: DisplayHash, snapshot = this.current): boolean {
    return isOnMainChain(snapshot, this.getNodeOrThrow(hash))
  }

  /**
   * @throws {ChainEmptyError}
   */
  latest(snapshot = this.current): { hash: DisplayHash; height: number } {
    if (snapshot.tip === undefined) {
      throw new ChainEmptyError()
    }
    return { hash: snapshot.tip.hash, height: snapshot.tip.height }
  }
}
