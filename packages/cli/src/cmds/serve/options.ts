import {
  ConfigConstants,
  type ScriptOrder,
  type ValueUnit,
} from '@blockquery/query-service'
import type { Options } from 'yargs'

/**
 * Serve CLI arguments, one per field of the query node's ConfigOptions
 */
export type ServeArgs = {
  // Input
  blocksDir: string
  validateMerkleRoot: boolean
  maxOrphanBlocks: number
  maxReorgDepth?: number

  // HTTP
  port: number
  address: string
  cors: string
  valueUnit: ValueUnit
  scriptOrder: ScriptOrder

  // Metrics
  metrics: boolean
}

export const serveOptions: Record<keyof ServeArgs, Options> = {
  blocksDir: {
    description: 'Directory holding blk*.dat files',
    type: 'string',
    default: ConfigConstants.BLOCKS_DIR_DEFAULT,
    group: 'Input:',
  },
  validateMerkleRoot: {
    description: 'Reject blocks whose merkle root does not match',
    type: 'boolean',
    default: ConfigConstants.VALIDATE_MERKLE_ROOT_DEFAULT,
    group: 'Input:',
  },
  maxOrphanBlocks: {
    description: 'Blocks held while their parent is unknown',
    type: 'number',
    default: ConfigConstants.MAX_ORPHAN_BLOCKS_DEFAULT,
    group: 'Input:',
  },
  maxReorgDepth: {
    description: 'Deepest reorganization to follow (unbounded when unset)',
    type: 'number',
    group: 'Input:',
  },

  port: {
    description: 'HTTP listening port',
    type: 'number',
    default: ConfigConstants.PORT_DEFAULT,
    group: 'HTTP:',
  },
  address: {
    description: 'HTTP listening address',
    type: 'string',
    default: ConfigConstants.ADDRESS_DEFAULT,
    group: 'HTTP:',
  },
  cors: {
    description: 'Allowed CORS origin',
    type: 'string',
    default: ConfigConstants.CORS_DEFAULT,
    group: 'HTTP:',
  },
  valueUnit: {
    description: 'Unit of amounts in responses',
    type: 'string',
    choices: ['satoshi', 'btc'],
    default: ConfigConstants.VALUE_UNIT_DEFAULT,
    group: 'HTTP:',
  },
  scriptOrder: {
    description: 'Byte order of script hex in responses',
    type: 'string',
    choices: ['wire', 'reversed'],
    default: ConfigConstants.SCRIPT_ORDER_DEFAULT,
    group: 'HTTP:',
  },

  metrics: {
    description: 'Serve Prometheus metrics on /metrics',
    type: 'boolean',
    default: true,
    group: 'Metrics:',
  },
}
