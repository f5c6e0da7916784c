import type { ChainIndex, ChainSnapshot } from '@blockquery/blockchain'
import {
  type BlockQueryError,
  bytesToHex,
  classifyError,
  isBlockQueryError,
  type DisplayHash,
  type Safe,
  safeError,
  safeResult,
  safeSyncTry,
  satoshiToBtc,
  toDisplayHash,
} from '@blockquery/utils'
import { ScriptOrder, ValueUnit } from '../config/types'
import type {
  BlockHeaderRecord,
  BlockHeightRecord,
  BlockTransactionsRecord,
  LatestBlockRecord,
  MainChainRecord,
  TransactionInfoRecord,
  TransactionInputsRecord,
  TransactionOutputsRecord,
} from './types'

export type QueryResult<T> = Safe<T, BlockQueryError>

export interface QueryEngineOptions {
  chain: ChainIndex
  valueUnit?: ValueUnit
  scriptOrder?: ScriptOrder
}

/**
 * Read side of the service. Every operation reads one chain snapshot taken
 * when it starts and returns its failure instead of throwing.
 */
export class QueryEngine {
  readonly chain: ChainIndex
  readonly valueUnit: ValueUnit
  readonly scriptOrder: ScriptOrder

  constructor(opts: QueryEngineOptions) {
    this.chain = opts.chain
    this.valueUnit = opts.valueUnit ?? ValueUnit.Satoshi
    this.scriptOrder = opts.scriptOrder ?? ScriptOrder.Wire
  }

  private run<T>(operation: string, fn: (snapshot: ChainSnapshot) => T): QueryResult<T> {
    const snapshot = this.chain.snapshot()
    const [err, record] = safeSyncTry(() => fn(snapshot))
    if (err) {
      return safeError(
        isBlockQueryError(err) ? err : classifyError(err, { operation }),
      )
    }
    return safeResult(record)
  }

  /** Satoshis as an exact integer, or as a BTC amount */
  formatValue(satoshi: bigint): number {
    return this.valueUnit === ValueUnit.Btc ? satoshiToBtc(satoshi) : Number(satoshi)
  }

  formatScript(script: Uint8Array): string {
    return this.scriptOrder === ScriptOrder.Reversed
      ? bytesToHex(script.slice().reverse())
      : bytesToHex(script)
  }

  blockHeader(hash: DisplayHash): QueryResult<BlockHeaderRecord> {
    return this.run('blockHeader', () => {
      const { header } = this.chain.getBlock(hash)
      return {
        version: header.version,
        prev_block: toDisplayHash(header.prevBlockHash),
        mrkl_root: toDisplayHash(header.merkleRoot),
        time: header.timestamp,
        bits: header.bits,
        nonce: header.nonce,
      }
    })
  }

  blockTransactions(hash: DisplayHash): QueryResult<BlockTransactionsRecord> {
    return this.run('blockTransactions', () => {
      const { transactions } = this.chain.getBlock(hash)
      return {
        tx_count: transactions.length,
        transactions: transactions.map((tx) => ({
          tx_hash: tx.hash,
          value: this.formatValue(tx.value),
        })),
      }
    })
  }

  blockHeight(hash: DisplayHash): QueryResult<BlockHeightRecord> {
    return this.run('blockHeight', () => ({ height: this.chain.heightOf(hash) }))
  }

  mainChain(hash: DisplayHash): QueryResult<MainChainRecord> {
    return this.run('mainChain', (snapshot) => ({
      main_chain: this.chain.isMainChain(hash, snapshot),
    }))
  }

  latestBlock(): QueryResult<LatestBlockRecord> {
    return this.run('latestBlock', (snapshot) => ({
      hash: this.chain.latest(snapshot).hash,
    }))
  }

  latestHeight(): QueryResult<BlockHeightRecord> {
    return this.run('latestHeight', (snapshot) => ({
      height: this.chain.latest(snapshot).height,
    }))
  }

  transactionInfo(txHash: DisplayHash): QueryResult<TransactionInfoRecord> {
    return this.run('transactionInfo', () => {
      const { blockHash, transaction } = this.chain.transactions.locate(txHash)
      return {
        block_hash: blockHash,
        version: transaction.version,
        input_tx_count: transaction.inputs.length,
        output_tx_count: transaction.outputs.length,
        value: this.formatValue(transaction.value),
        lock_time: transaction.lockTime,
      }
    })
  }

  transactionInputs(txHash: DisplayHash): QueryResult<TransactionInputsRecord> {
    return this.run('transactionInputs', () => {
      const { transaction } = this.chain.transactions.locate(txHash)
      return {
        input_tx_count: transaction.inputs.length,
        input_transactions: transaction.inputs.map((input) => ({
          prev_hash: toDisplayHash(input.prevTxHash),
          sig_script: this.formatScript(input.script),
          seq_num: input.sequence,
        })),
      }
    })
  }

  transactionOutputs(txHash: DisplayHash): QueryResult<TransactionOutputsRecord> {
    return this.run('transactionOutputs', () => {
      const { transaction } = this.chain.transactions.locate(txHash)
      return {
        output_tx_count: transaction.outputs.length,
        output_transactions: transaction.outputs.map((output) => ({
          value: this.formatValue(output.value),
          sig_script: this.formatScript(output.script),
        })),
      }
    })
  }
}
