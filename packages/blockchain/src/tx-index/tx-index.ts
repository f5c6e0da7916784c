import type { Block, Transaction } from '@blockquery/block'
import { type DisplayHash, TxNotFoundError } from '@blockquery/utils'
import debugDefault from 'debug'

const debug = debugDefault('blockquery:blockchain:txindex')

export interface TxLocation {
  readonly blockHash: DisplayHash
  readonly transaction: Transaction
  /** Position of the transaction inside its block */
  readonly index: number
}

/**
 * Maps txids to the block that first carried them. Entries are never
 * removed, so transactions of blocks reorged off the main chain stay
 * locatable. A txid seen again in a later block keeps its first location.
 */
export class TransactionIndex {
  private readonly locations = new Map<DisplayHash, TxLocation>()

  get size(): number {
    return this.locations.size
  }

  /**
   * Indexes every transaction of a block and returns how many were new.
   */
  indexBlock(block: Block): number {
    let added = 0
    block.transactions.forEach((transaction, index) => {
      if (this.locations.has(transaction.hash)) {
        debug(
          `duplicate txid ${transaction.hash} in block ${block.hash}, keeping first location`,
        )
        return
      }
      this.locations.set(
        transaction.hash,
        Object.freeze({ blockHash: block.hash, transaction, index }),
      )
      added++
    })
    return added
  }

  has(txHash: DisplayHash): boolean {
    return this.locations.has(txHash.toLowerCase())
  }

  /**
   * @throws {TxNotFoundError}
   */
  locate(txHash: DisplayHash): TxLocation {
    const location = this.locations.get(txHash.toLowerCase())
    if (location === undefined) {
      throw new TxNotFoundError(txHash)
    }
    return location
  }
}
