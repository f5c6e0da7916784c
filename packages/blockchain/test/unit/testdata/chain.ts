import {
  type Block,
  createBlock,
  createCoinbaseTransaction,
  type TransactionData,
} from '@blockquery/block'
import { fromDisplayHash } from '@blockquery/utils'

const encoder = new TextEncoder()

/**
 * Builds a block on top of `parent` (or a root block). The tag goes into the
 * coinbase script, so blocks with different tags never share a hash.
 */
export function buildBlock(
  parent: Block | undefined,
  tag: string,
  transactions: TransactionData[] = [],
): Block {
  return createBlock({
    header: {
      prevBlockHash: parent === undefined ? undefined : fromDisplayHash(parent.hash),
      timestamp: 1_700_000_000,
    },
    transactions: [
      createCoinbaseTransaction({
        height: 0,
        value: 5_000_000_000n,
        extraNonce: encoder.encode(tag),
      }),
      ...transactions,
    ],
  })
}

/**
 * `length` blocks in a row, tagged `${tag}1`, `${tag}2`, ...
 */
export function buildChain(
  parent: Block | undefined,
  tag: string,
  length: number,
): Block[] {
  const blocks: Block[] = []
  let tip = parent
  for (let i = 1; i <= length; i++) {
    tip = buildBlock(tip, `${tag}${i}`)
    blocks.push(tip)
  }
  return blocks
}
