import type { MetricsOptions } from '@blockquery/metrics'
import type { Logger } from '@blockquery/utils'

export type ValueUnit = (typeof ValueUnit)[keyof typeof ValueUnit]

export const ValueUnit = {
  Satoshi: 'satoshi',
  Btc: 'btc',
} as const

export type ScriptOrder = (typeof ScriptOrder)[keyof typeof ScriptOrder]

export const ScriptOrder = {
  Wire: 'wire',
  Reversed: 'reversed',
} as const

export interface ConfigOptions {
  /**
   * Directory holding the blk*.dat files to ingest
   *
   * Default: `./blocks`
   */
  blocksDir?: string

  /**
   * HTTP listening port
   *
   * Default: 9000
   */
  port?: number

  /**
   * HTTP listening address
   *
   * Default: `127.0.0.1`
   */
  address?: string

  /**
   * Allowed CORS origin
   *
   * Default: `*`
   */
  cors?: string

  /**
   * Unit of transaction amounts in responses: integer satoshis, or BTC as a
   * decimal number
   *
   * Default: 'satoshi'
   */
  valueUnit?: ValueUnit

  /**
   * Byte order of `sig_script` hex in responses: as serialized on the wire,
   * or byte-reversed like the hashes
   *
   * Default: 'wire'
   */
  scriptOrder?: ScriptOrder

  /**
   * Reject blocks whose header merkle root does not match their transactions
   *
   * Default: true
   */
  validateMerkleRoot?: boolean

  /**
   * Blocks held while waiting for an unknown parent
   *
   * Default: 1024
   */
  maxOrphanBlocks?: number

  /**
   * Deepest reorganization the chain index follows. Unbounded when unset
   */
  maxReorgDepth?: number

  metrics?: MetricsOptions

  logger?: Logger
}
