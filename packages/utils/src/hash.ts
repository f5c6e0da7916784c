import { sha256 } from '@noble/hashes/sha2'

/**
 * SHA256(SHA256(data)), the hash used for block ids, txids and merkle nodes.
 */
export function hash256(data: Uint8Array): Uint8Array {
  return sha256(sha256(data))
}
