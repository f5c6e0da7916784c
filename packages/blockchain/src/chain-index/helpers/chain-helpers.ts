/**
 * Pure helpers over the node arena. They return results and never touch the
 * index state themselves.
 */

import { type Block, getBlockWork } from '@blockquery/block'
import {
  type DisplayHash,
  isZeroHash,
  toDisplayHash,
  UnknownParentError,
} from '@blockquery/utils'
import type { ChainNode, ChainSnapshot, ReorgInfo } from '../types'
import { hashAtHeight, isOnMainChain } from './snapshot-helpers'

export type NodeArena = ReadonlyMap<DisplayHash, ChainNode>

/**
 * Places a block in the tree: resolves its parent and derives height and
 * cumulative work.
 *
 * @throws {UnknownParentError} when the previous hash is neither zero nor indexed
 */
export function createChainNode(arena: NodeArena, block: Block): ChainNode {
  const work = getBlockWork(block.header.bits)

  if (isZeroHash(block.header.prevBlockHash)) {
    return Object.freeze({
      block,
      hash: block.hash,
      height: 0,
      chainWork: work,
      parentHash: undefined,
    })
  }

  const parentHash = toDisplayHash(block.header.prevBlockHash)
  const parent = arena.get(parentHash)
  if (parent === undefined) {
    throw new UnknownParentError(block.hash, parentHash)
  }

  return Object.freeze({
    block,
    hash: block.hash,
    height: parent.height + 1,
    chainWork: parent.chainWork + work,
    parentHash,
  })
}

/**
 * Finds where a node's branch joins the snapshot's main chain.
 *
 * Walks the node's ancestors until one lies on the main chain. The blocks
 * passed on the way become `connected`, the main-chain blocks above the
 * meeting point become `disconnected`.
 */
export function findCommonAncestor(
  arena: NodeArena,
  snapshot: ChainSnapshot,
  node: ChainNode,
): ReorgInfo {
  const branch: DisplayHash[] = []
  let current: ChainNode | undefined = node
  while (current !== undefined && !isOnMainChain(snapshot, current)) {
    branch.push(current.hash)
    current =
      current.parentHash === undefined ? undefined : arena.get(current.parentHash)
  }

  const ancestorHeight = current?.height ?? -1
  const tipHeight = snapshot.tip?.height ?? -1
  const disconnected: DisplayHash[] = []
  for (let height = tipHeight; height > ancestorHeight; height--) {
    const hash = hashAtHeight(snapshot, height)
    if (hash !== undefined) disconnected.push(hash)
  }

  return Object.freeze({
    commonAncestor: current?.hash,
    disconnected: Object.freeze(disconnected),
    connected: Object.freeze(branch.reverse()),
  })
}
