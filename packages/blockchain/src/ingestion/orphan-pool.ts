import type { Block } from '@blockquery/block'
import type { DisplayHash } from '@blockquery/utils'

interface Orphan {
  readonly block: Block
  readonly parentHash: DisplayHash
}

/**
 * Blocks whose parent has not been seen yet, keyed by their own hash and
 * by the parent they wait for. Insertion order doubles as eviction order.
 */
export class OrphanPool {
  private readonly orphans = new Map<DisplayHash, Orphan>()
  private readonly byParent = new Map<DisplayHash, Set<DisplayHash>>()

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.orphans.size
  }

  has(hash: DisplayHash): boolean {
    return this.orphans.has(hash)
  }

  /**
   * Adds a block and returns the blocks evicted to make room for it. An
   * evicted orphan takes its waiting descendants with it, and the new block
   * itself when its parent was among them.
   */
  add(block: Block, parentHash: DisplayHash): Block[] {
    const evicted: Block[] = []
    while (this.orphans.size >= this.capacity && this.orphans.size > 0) {
      const oldest = this.orphans.keys().next()
      if (oldest.done === true) break
      evicted.push(...this.removeWithDescendants(oldest.value))
    }
    if (evicted.some((old) => old.hash === parentHash)) {
      evicted.push(block)
      return evicted
    }

    this.orphans.set(block.hash, { block, parentHash })
    const siblings = this.byParent.get(parentHash) ?? new Set<DisplayHash>()
    siblings.add(block.hash)
    this.byParent.set(parentHash, siblings)
    return evicted
  }

  /**
   * Removes and returns every orphan waiting for this parent.
   */
  takeChildren(parentHash: DisplayHash): Block[] {
    const children = this.byParent.get(parentHash)
    if (children === undefined) return []
    const blocks: Block[] = []
    for (const hash of [...children]) {
      const removed = this.remove(hash)
      if (removed !== undefined) blocks.push(removed.block)
    }
    return blocks
  }

  private removeWithDescendants(hash: DisplayHash): Block[] {
    const removed: Block[] = []
    const queue = [hash]
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      const orphan = this.remove(next)
      if (orphan === undefined) continue
      removed.push(orphan.block)
      queue.push(...(this.byParent.get(next) ?? []))
    }
    return removed
  }

  private remove(hash: DisplayHash): Orphan | undefined {
    const orphan = this.orphans.get(hash)
    if (orphan === undefined) return undefined
    this.orphans.delete(hash)
    const siblings = this.byParent.get(orphan.parentHash)
    siblings?.delete(hash)
    if (siblings?.size === 0) this.byParent.delete(orphan.parentHash)
    return orphan
  }
}
