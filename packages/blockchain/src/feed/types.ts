import type { BlockQueryError } from '@blockquery/utils'

/** Returned by {@link BlockFeed.nextBlock} once the feed is drained */
export const END_OF_FEED: unique symbol = Symbol('blockquery.endOfFeed')

export type EndOfFeed = typeof END_OF_FEED

/**
 * Source of raw serialized blocks.
 */
export interface BlockFeed {
  nextBlock(): Promise<Uint8Array | EndOfFeed>

  /**
   * Problems the feed skipped over since the last call (bad framing, an
   * unreadable file). Feeds that cannot fail may leave this out.
   */
  takeFailures?(): BlockQueryError[]
}

export function isEndOfFeed(value: Uint8Array | EndOfFeed): value is EndOfFeed {
  return value === END_OF_FEED
}
