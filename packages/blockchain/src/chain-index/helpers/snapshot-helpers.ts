import type { DisplayHash } from '@blockquery/utils'
import type { ChainNode, ChainSnapshot, ChainTip } from '../types'

export const EMPTY_SNAPSHOT: ChainSnapshot = Object.freeze({
  tip: undefined,
  chain: Object.freeze([]),
})

export function createSnapshot(
  tip: ChainTip,
  chain: readonly DisplayHash[],
): ChainSnapshot {
  return Object.freeze({ tip, chain })
}

/**
 * Main-chain hash at a height, or undefined above the snapshot's tip.
 */
export function hashAtHeight(
  snapshot: ChainSnapshot,
  height: number,
): DisplayHash | undefined {
  if (snapshot.tip === undefined || height < 0 || height > snapshot.tip.height) {
    return undefined
  }
  return snapshot.chain[height]
}

export function isOnMainChain(
  snapshot: ChainSnapshot,
  node: Pick<ChainNode, 'hash' | 'height'>,
): boolean {
  return hashAtHeight(snapshot, node.height) === node.hash
}
