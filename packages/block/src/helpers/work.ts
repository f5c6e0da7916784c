import { TWO_POW256 } from '../constants'

/**
 * Expands compact "bits" into the full 256-bit target. A set sign bit yields
 * a zero target.
 */
export function bitsToTarget(bits: number): bigint {
  const exponent = bits >>> 24
  const mantissa = bits & 0x007fffff
  const negative = (bits & 0x00800000) !== 0

  if (negative || mantissa === 0) return 0n

  if (exponent <= 3) {
    return BigInt(mantissa >>> (8 * (3 - exponent)))
  }
  return BigInt(mantissa) << BigInt(8 * (exponent - 3))
}

/**
 * Expected number of hashes to find a block at this difficulty:
 * floor(2^256 / (target + 1)). Zero for a zero or overflowing target.
 */
export function getBlockWork(bits: number): bigint {
  const target = bitsToTarget(bits)
  if (target === 0n || target >= TWO_POW256) return 0n
  return TWO_POW256 / (target + 1n)
}
