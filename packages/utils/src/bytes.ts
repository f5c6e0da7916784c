import {
  bytesToHex as nobleBytesToHex,
  hexToBytes as nobleHexToBytes,
} from '@noble/hashes/utils'

export { concatBytes } from '@noble/hashes/utils'

/**
 * Lowercase 64-character hex rendering of a 32-byte hash in display order
 * (byte-reversed relative to the wire encoding).
 */
export type DisplayHash = string

export const HASH_LENGTH = 32

export const ZERO_HASH: Uint8Array = new Uint8Array(HASH_LENGTH)

export const ZERO_DISPLAY_HASH: DisplayHash = '00'.repeat(HASH_LENGTH)

const DISPLAY_HASH_REGEX = /^[0-9a-fA-F]{64}$/

export function bytesToHex(bytes: Uint8Array): string {
  return nobleBytesToHex(bytes)
}

export function hexToBytes(hex: string): Uint8Array {
  return nobleHexToBytes(hex.startsWith('0x') ? hex.slice(2) : hex)
}

/**
 * Returns a reversed copy, the input is left untouched.
 */
export function reverseBytes(bytes: Uint8Array): Uint8Array {
  return bytes.slice().reverse()
}

export function toDisplayHash(hash: Uint8Array): DisplayHash {
  return bytesToHex(reverseBytes(hash))
}

export function fromDisplayHash(hash: DisplayHash): Uint8Array {
  return reverseBytes(hexToBytes(hash))
}

export function isDisplayHash(value: string): value is DisplayHash {
  return DISPLAY_HASH_REGEX.test(value)
}

export function equalsBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

export function isZeroHash(hash: Uint8Array): boolean {
  return hash.length === HASH_LENGTH && hash.every((b) => b === 0)
}
