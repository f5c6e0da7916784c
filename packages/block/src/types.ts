import type { DisplayHash } from '@blockquery/utils'

/**
 * Decoded 80-byte block header. Hash fields are kept in wire byte order.
 */
export interface BlockHeader {
  readonly version: number
  readonly prevBlockHash: Uint8Array
  readonly merkleRoot: Uint8Array
  readonly timestamp: number
  readonly bits: number
  readonly nonce: number
}

export interface TxInput {
  /** txid of the transaction holding the spent output, wire byte order */
  readonly prevTxHash: Uint8Array
  readonly prevIndex: number
  readonly script: Uint8Array
  readonly sequence: number
  /** Witness stack, empty for inputs of legacy transactions */
  readonly witness: readonly Uint8Array[]
}

export interface TxOutput {
  /** Amount in satoshis */
  readonly value: bigint
  readonly script: Uint8Array
}

export interface Transaction {
  readonly version: number
  readonly inputs: readonly TxInput[]
  readonly outputs: readonly TxOutput[]
  readonly lockTime: number
  /** True when serialized with the witness marker and flag */
  readonly segwit: boolean
  /** txid, hash of the serialization without witness data */
  readonly hash: DisplayHash
  /** Hash of the full serialization, equal to `hash` for legacy transactions */
  readonly wtxid: DisplayHash
  /** Sum of output values in satoshis */
  readonly value: bigint
}

export interface Block {
  readonly header: BlockHeader
  readonly hash: DisplayHash
  readonly transactions: readonly Transaction[]
  /** Serialized size in bytes */
  readonly size: number
}

/**
 * Loose input accepted by the block creators. Anything omitted gets a
 * neutral default and derived fields (hashes, merkle root, value, size) are
 * computed.
 */
export interface HeaderData {
  version?: number
  prevBlockHash?: Uint8Array
  merkleRoot?: Uint8Array
  timestamp?: number
  bits?: number
  nonce?: number
}

export interface TxInputData {
  prevTxHash?: Uint8Array
  prevIndex?: number
  script?: Uint8Array
  sequence?: number
  witness?: Uint8Array[]
}

export interface TxOutputData {
  value: bigint
  script?: Uint8Array
}

export interface TransactionData {
  version?: number
  inputs?: TxInputData[]
  outputs?: TxOutputData[]
  lockTime?: number
}

export interface BlockData {
  header?: HeaderData
  transactions?: (TransactionData | Transaction)[]
}

export interface EncodeTransactionOptions {
  /**
   * Include marker, flag and witness stacks. Defaults to the transaction's
   * own `segwit` flag.
   */
  witness?: boolean
}
