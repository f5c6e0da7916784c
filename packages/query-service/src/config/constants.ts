import type { ScriptOrder, ValueUnit } from './types'

export const BLOCKS_DIR_DEFAULT = './blocks'
export const PORT_DEFAULT = 9000
export const ADDRESS_DEFAULT = '127.0.0.1'
export const CORS_DEFAULT = '*'
export const VALUE_UNIT_DEFAULT: ValueUnit = 'satoshi'
export const SCRIPT_ORDER_DEFAULT: ScriptOrder = 'wire'
export const VALIDATE_MERKLE_ROOT_DEFAULT = true
export const MAX_ORPHAN_BLOCKS_DEFAULT = 1024
