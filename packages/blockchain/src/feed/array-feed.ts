import { type BlockFeed, END_OF_FEED, type EndOfFeed } from './types'

/**
 * In-memory feed, serving blocks in the order they were given.
 */
export class ArrayBlockFeed implements BlockFeed {
  private readonly queue: Uint8Array[]

  constructor(blocks: Iterable<Uint8Array> = []) {
    this.queue = [...blocks]
  }

  push(...blocks: Uint8Array[]): void {
    this.queue.push(...blocks)
  }

  async nextBlock(): Promise<Uint8Array | EndOfFeed> {
    return this.queue.shift() ?? END_OF_FEED
  }
}
