/** Network magic of main-network block files, as read little-endian */
export const MAINNET_MAGIC = 0xd9b4bef9

export const BLOCK_HEADER_SIZE = 80

export const SEGWIT_MARKER = 0x00
export const SEGWIT_FLAG = 0x01

export const VARINT_UINT16 = 0xfd
export const VARINT_UINT32 = 0xfe
export const VARINT_UINT64 = 0xff

/** Input of a coinbase transaction spends this output index */
export const COINBASE_PREV_INDEX = 0xffffffff

export const SEQUENCE_FINAL = 0xffffffff

/** Smallest possible serializations, used to reject impossible counts early */
export const MIN_TX_SIZE = 10
export const MIN_INPUT_SIZE = 41
export const MIN_OUTPUT_SIZE = 9

export const TWO_POW256 = 1n << 256n
