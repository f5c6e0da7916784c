/**
 * Satoshis per bitcoin
 */
export const COIN = 100_000_000n

/**
 * Converts a satoshi amount to a BTC number for clients that expect whole-coin
 * amounts. Whole and fractional parts are converted separately.
 */
export const satoshiToBtc = (satoshi: bigint): number => {
  const whole = satoshi / COIN
  const fraction = satoshi % COIN
  return Number(whole) + Number(fraction) / Number(COIN)
}
