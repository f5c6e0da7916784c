import { equalsBytes, InvalidMerkleRootError, toDisplayHash } from '@blockquery/utils'
import { getTransactionsRoot } from '../helpers/hash-helpers'
import type { Block } from '../types'

/**
 * Checks the header's merkle root against the root of the block's txids.
 */
export function validateMerkleRoot(block: Block): void {
  const computed = getTransactionsRoot(block.transactions)
  if (!equalsBytes(computed, block.header.merkleRoot)) {
    throw new InvalidMerkleRootError(
      `Merkle root mismatch in block ${block.hash}: header has ${toDisplayHash(block.header.merkleRoot)}, transactions give ${toDisplayHash(computed)}`,
      { context: { blockHash: block.hash } },
    )
  }
}
