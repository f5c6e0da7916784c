import { bytesToHex, hexToBytes, ZERO_DISPLAY_HASH } from '@blockquery/utils'
import { assert, describe, it } from 'vitest'
import {
  BLOCK_HEADER_SIZE,
  computeBlockHash,
  createBlockHeader,
  DEFAULT_BITS,
  decodeBlockHeader,
  encodeBlockHeader,
} from '../../src/index'
import { GENESIS_BLOCK_HASH, GENESIS_BLOCK_HEX } from './testdata/genesis'

describe('[Block]: Header functions', () => {
  it('should decode the genesis header', () => {
    const bytes = hexToBytes(GENESIS_BLOCK_HEX).subarray(0, BLOCK_HEADER_SIZE)
    const header = decodeBlockHeader(bytes)

    assert.strictEqual(header.version, 1)
    assert.strictEqual(bytesToHex(header.prevBlockHash), '00'.repeat(32))
    assert.strictEqual(
      bytesToHex(header.merkleRoot),
      '3ba3edfd7a7b12b27ac72c3e67768f617fc81bc3888a51323a9fb8aa4b1e5e4a',
    )
    assert.strictEqual(header.timestamp, 1231006505)
    assert.strictEqual(header.bits, 0x1d00ffff)
    assert.strictEqual(header.nonce, 2083236893)
    assert.strictEqual(computeBlockHash(header), GENESIS_BLOCK_HASH)
  })

  it('should encode back to the same 80 bytes', () => {
    const bytes = hexToBytes(GENESIS_BLOCK_HEX).subarray(0, BLOCK_HEADER_SIZE)
    const encoded = encodeBlockHeader(decodeBlockHeader(bytes))
    assert.strictEqual(encoded.length, BLOCK_HEADER_SIZE)
    assert.strictEqual(bytesToHex(encoded), bytesToHex(bytes))
  })

  it('should create with defaults', () => {
    const header = createBlockHeader()
    assert.strictEqual(header.version, 1)
    assert.strictEqual(header.bits, DEFAULT_BITS)
    assert.strictEqual(header.timestamp, 0)
    assert.strictEqual(header.nonce, 0)
    assert.strictEqual(bytesToHex(header.prevBlockHash), '00'.repeat(32))
    assert.isTrue(Object.isFrozen(header))
  })

  it('should change the hash when any field changes', () => {
    const base = computeBlockHash(createBlockHeader())
    assert.notStrictEqual(computeBlockHash(createBlockHeader({ nonce: 1 })), base)
    assert.notStrictEqual(
      computeBlockHash(createBlockHeader({ timestamp: 1 })),
      base,
    )
    assert.notStrictEqual(base, ZERO_DISPLAY_HASH)
  })

  it('should reject headers that are not 80 bytes', () => {
    assert.throws(() => decodeBlockHeader(new Uint8Array(79)), /must be 80 bytes/)
    assert.throws(() => decodeBlockHeader(new Uint8Array(81)), /got 81/)
  })
})
