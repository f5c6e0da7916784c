import {
  concatBytes,
  type DisplayHash,
  fromDisplayHash,
  hash256,
  toDisplayHash,
  ZERO_HASH,
} from '@blockquery/utils'
import type { BlockHeader, Transaction } from '../types'
import {
  encodeBlockHeader,
  encodeTransaction,
  type TransactionBody,
} from './serialize-helpers'

export function computeBlockHash(header: BlockHeader): DisplayHash {
  return toDisplayHash(hash256(encodeBlockHeader(header)))
}

export function computeTxId(tx: TransactionBody): DisplayHash {
  return toDisplayHash(hash256(encodeTransaction(tx, { witness: false })))
}

export function computeWtxId(tx: TransactionBody): DisplayHash {
  return toDisplayHash(hash256(encodeTransaction(tx)))
}

/**
 * Merkle root over wire-order hashes. Each level pairs neighbours and hashes
 * their concatenation; an odd level repeats its last hash.
 * An empty list yields the zero hash.
 */
export function computeMerkleRoot(hashes: readonly Uint8Array[]): Uint8Array {
  if (hashes.length === 0) return ZERO_HASH.slice()

  let level = [...hashes]
  while (level.length > 1) {
    if (level.length % 2 === 1) {
      level.push(level[level.length - 1])
    }
    const next: Uint8Array[] = []
    for (let i = 0; i < level.length; i += 2) {
      next.push(hash256(concatBytes(level[i], level[i + 1])))
    }
    level = next
  }
  return level[0].slice()
}

/**
 * Merkle root of a block's transactions, in wire byte order as it appears
 * in the header.
 */
export function getTransactionsRoot(
  transactions: readonly Pick<Transaction, 'hash'>[],
): Uint8Array {
  return computeMerkleRoot(transactions.map((tx) => fromDisplayHash(tx.hash)))
}
