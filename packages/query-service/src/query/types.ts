import type { DisplayHash } from '@blockquery/utils'

export interface BlockHeaderRecord {
  version: number
  prev_block: DisplayHash
  mrkl_root: DisplayHash
  time: number
  bits: number
  nonce: number
}

export interface BlockTransactionsRecord {
  tx_count: number
  transactions: { tx_hash: DisplayHash; value: number }[]
}

export interface BlockHeightRecord {
  height: number
}

export interface MainChainRecord {
  main_chain: boolean
}

export interface LatestBlockRecord {
  hash: DisplayHash
}

export interface TransactionInfoRecord {
  block_hash: DisplayHash
  version: number
  input_tx_count: number
  output_tx_count: number
  value: number
  lock_time: number
}

export interface TransactionInputsRecord {
  input_tx_count: number
  input_transactions: { prev_hash: DisplayHash; sig_script: string; seq_num: number }[]
}

export interface TransactionOutputsRecord {
  output_tx_count: number
  output_transactions: { value: number; sig_script: string }[]
}
