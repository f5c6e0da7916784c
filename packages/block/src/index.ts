export * from './codec/index'
export * from './constants'
export {
  type CoinbaseData,
  createBlock,
  createBlockHeader,
  createCoinbaseTransaction,
  createTransaction,
  DEFAULT_BITS,
} from './creators/from-data'
export {
  decodeBlock,
  decodeBlockHeader,
  decodeTransaction,
} from './creators/from-bytes'
export {
  computeBlockHash,
  computeMerkleRoot,
  computeTxId,
  computeWtxId,
  getTransactionsRoot,
} from './helpers/hash-helpers'
export {
  encodeBlock,
  encodeBlockHeader,
  encodeTransaction,
  type TransactionBody,
} from './helpers/serialize-helpers'
export { bitsToTarget, getBlockWork } from './helpers/work'
export * from './types'
export { validateMerkleRoot } from './validation/validator'
