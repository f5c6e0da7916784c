import { concatBytes, ZERO_HASH } from '@blockquery/utils'
import { COINBASE_PREV_INDEX, SEQUENCE_FINAL } from '../constants'
import {
  computeBlockHash,
  computeTxId,
  computeWtxId,
  getTransactionsRoot,
} from '../helpers/hash-helpers'
import { encodeBlock } from '../helpers/serialize-helpers'
import type {
  Block,
  BlockData,
  BlockHeader,
  HeaderData,
  Transaction,
  TransactionData,
  TxInput,
  TxOutput,
} from '../types'

/** Regtest difficulty, two units of work per block */
export const DEFAULT_BITS = 0x207fffff

export function createBlockHeader(data: HeaderData = {}): BlockHeader {
  return Object.freeze({
    version: data.version ?? 1,
    prevBlockHash: data.prevBlockHash ?? ZERO_HASH.slice(),
    merkleRoot: data.merkleRoot ?? ZERO_HASH.slice(),
    timestamp: data.timestamp ?? 0,
    bits: data.bits ?? DEFAULT_BITS,
    nonce: data.nonce ?? 0,
  })
}

/**
 * Builds a transaction from loose data and computes its txid, wtxid and
 * value. It is segwit as soon as one input carries witness items.
 */
export function createTransaction(data: TransactionData = {}): Transaction {
  const inputs: TxInput[] = (data.inputs ?? []).map((input) =>
    Object.freeze({
      prevTxHash: input.prevTxHash ?? ZERO_HASH.slice(),
      prevIndex: input.prevIndex ?? 0,
      script: input.script ?? new Uint8Array(0),
      sequence: input.sequence ?? SEQUENCE_FINAL,
      witness: Object.freeze([...(input.witness ?? [])]),
    }),
  )
  const outputs: TxOutput[] = (data.outputs ?? []).map((output) =>
    Object.freeze({
      value: output.value,
      script: output.script ?? new Uint8Array(0),
    }),
  )

  const body = {
    version: data.version ?? 1,
    inputs: Object.freeze(inputs),
    outputs: Object.freeze(outputs),
    lockTime: data.lockTime ?? 0,
    segwit: inputs.some((input) => input.witness.length > 0),
  }

  return Object.freeze({
    ...body,
    hash: computeTxId(body),
    wtxid: computeWtxId(body),
    value: outputs.reduce((sum, output) => sum + output.value, 0n),
  })
}

export interface CoinbaseData {
  /** Encoded into the input script so coinbases of different blocks differ */
  height: number
  value: bigint
  outputScript?: Uint8Array
  /** Extra bytes appended to the input script */
  extraNonce?: Uint8Array
}

/**
 * Coinbase transaction: one input spending the null outpoint, with the
 * height pushed as the first item of its script.
 */
export function createCoinbaseTransaction(data: CoinbaseData): Transaction {
  const heightBytes = new Uint8Array(4)
  new DataView(heightBytes.buffer).setUint32(0, data.height, true)
  return createTransaction({
    inputs: [
      {
        prevTxHash: ZERO_HASH.slice(),
        prevIndex: COINBASE_PREV_INDEX,
        script: concatBytes(
          Uint8Array.of(heightBytes.length),
          heightBytes,
          data.extraNonce ?? new Uint8Array(0),
        ),
      },
    ],
    outputs: [{ value: data.value, script: data.outputScript }],
  })
}

/**
 * Builds a block from loose data. The merkle root is computed from the
 * transactions unless the header data sets one.
 */
export function createBlock(data: BlockData = {}): Block {
  const transactions = (data.transactions ?? []).map((tx) =>
    'hash' in tx ? tx : createTransaction(tx),
  )
  const header = createBlockHeader({
    ...data.header,
    merkleRoot: data.header?.merkleRoot ?? getTransactionsRoot(transactions),
  })

  return Object.freeze({
    header,
    hash: computeBlockHash(header),
    transactions: Object.freeze(transactions),
    size: encodeBlock({ header, transactions }).length,
  })
}
