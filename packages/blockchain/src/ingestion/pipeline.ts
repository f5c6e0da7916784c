import {
  type Block,
  decodeBlock,
  validateMerkleRoot,
} from '@blockquery/block'
import {
  type BlockQueryError,
  classifyError,
  DuplicateBlockError,
  ErrorCode,
  hasErrorCode,
  Lock,
  type Logger,
  toDisplayHash,
  UnknownParentError,
} from '@blockquery/utils'
import type { ChainIndex } from '../chain-index/chain-index'
import type { InsertResult } from '../chain-index/types'
import { type BlockFeed, type EndOfFeed, isEndOfFeed } from '../feed/types'
import { OrphanPool } from './orphan-pool'
import {
  DEFAULT_MAX_ORPHAN_BLOCKS,
  DEFAULT_PROGRESS_INTERVAL,
  type IngestionObserver,
  type IngestionPipelineOptions,
  type IngestionReport,
  type IngestOutcome,
} from './types'

class ReportCounter {
  accepted = 0
  failed = 0
  readonly failures: Partial<Record<ErrorCode, number>> = {}

  recordFailure(error: BlockQueryError): void {
    this.failed++
    this.failures[error.code] = (this.failures[error.code] ?? 0) + 1
  }

  toReport(orphans: number): IngestionReport {
    return Object.freeze({
      accepted: this.accepted,
      failed: this.failed,
      failures: Object.freeze({ ...this.failures }),
      orphans,
    })
  }
}

/**
 * Turns raw block bytes into chain index entries. The single writer of the
 * index: every ingest and run goes through one lock. Failures are logged
 * and counted, never thrown.
 */
export class IngestionPipeline {
  readonly chain: ChainIndex
  readonly validateMerkleRoot: boolean
  readonly progressInterval: number

  private readonly lock = new Lock()
  private readonly orphans: OrphanPool
  private readonly logger?: Logger
  private readonly observer?: IngestionObserver
  private readonly totals = new ReportCounter()

  constructor(opts: IngestionPipelineOptions) {
    this.chain = opts.chain
    this.validateMerkleRoot = opts.validateMerkleRoot ?? true
    this.orphans = new OrphanPool(
      opts.maxOrphanBlocks ?? DEFAULT_MAX_ORPHAN_BLOCKS,
    )
    this.progressInterval = Math.max(1, opts.progressInterval ?? DEFAULT_PROGRESS_INTERVAL)
    this.logger = opts.logger
    this.observer = opts.observer
  }

  get orphanCount(): number {
    return this.orphans.size
  }

  /**
   * Totals since the pipeline was created.
   */
  report(): IngestionReport {
    return this.totals.toReport(this.orphans.size)
  }

  async ingest(bytes: Uint8Array): Promise<IngestOutcome> {
    return this.lock.runExclusive(() => this.process(bytes, [this.totals]))
  }

  /**
   * Drains a feed and returns the counts of this run.
   */
  async run(feed: BlockFeed): Promise<IngestionReport> {
    return this.lock.runExclusive(async () => {
      const current = new ReportCounter()
      const counters = [this.totals, current]
      const started = Date.now()
      // One block can release several orphans at once
      let loggedBucket = 0

      for (;;) {
        let next: Uint8Array | EndOfFeed
        try {
          next = await feed.nextBlock()
        } catch (err) {
          const error = classifyError(err, { operation: 'nextBlock' })
          this.logger?.error(`Block feed failed, stopping: ${error.message}`)
          this.recordFailure(error, counters)
          break
        }

        for (const error of feed.takeFailures?.() ?? []) {
          this.logger?.warn(`Skipped feed data: ${error.message}`)
          this.recordFailure(error, counters)
        }
        if (isEndOfFeed(next)) break

        this.process(next, counters)
        const bucket = Math.floor(current.accepted / this.progressInterval)
        if (bucket > loggedBucket) {
          loggedBucket = bucket
          this.logProgress(current)
        }
      }

      const report = current.toReport(this.orphans.size)
      this.logger?.info(
        `Ingestion finished in ${Date.now() - started}ms: accepted=${report.accepted} failed=${report.failed} orphans=${report.orphans} blocks=${this.chain.size}`,
      )
      return report
    })
  }

  private logProgress(counter: ReportCounter): void {
    const tip = this.chain.snapshot().tip
    this.logger?.info(
      `Ingested ${counter.accepted} blocks, tip height=${tip?.height ?? -1} orphans=${this.orphans.size}`,
    )
  }

  private process(bytes: Uint8Array, counters: ReportCounter[]): IngestOutcome {
    let block: Block
    try {
      block = decodeBlock(bytes)
      if (this.validateMerkleRoot) validateMerkleRoot(block)
    } catch (err) {
      return this.failed(classifyError(err), counters)
    }
    return this.insert(block, counters)
  }

  private insert(block: Block, counters: ReportCounter[]): IngestOutcome {
    if (this.orphans.has(block.hash)) {
      return this.failed(new DuplicateBlockError(block.hash), counters)
    }

    let result: InsertResult
    try {
      result = this.chain.insert(block)
    } catch (err) {
      const error = classifyError(err)
      if (hasErrorCode(error, ErrorCode.UNKNOWN_PARENT)) {
        return this.orphan(block, error, counters)
      }
      return this.failed(error, counters)
    }

    const results = [this.accepted(result, block, counters)]
    // Release orphans breadth-first; each accepted child may free its own
    const queue = this.orphans.takeChildren(block.hash)
    for (let child = queue.shift(); child !== undefined; child = queue.shift()) {
      try {
        results.push(this.accepted(this.chain.insert(child), child, counters))
        queue.push(...this.orphans.takeChildren(child.hash))
      } catch (err) {
        this.failed(classifyError(err), counters)
      }
    }
    if (results.length > 1) {
      this.logger?.debug(`Block ${block.hash} released ${results.length - 1} orphans`)
      this.observer?.onOrphanPoolChange?.(this.orphans.size)
    }

    return { status: 'accepted', results }
  }

  private accepted(
    result: InsertResult,
    block: Block,
    counters: ReportCounter[],
  ): InsertResult {
    for (const counter of counters) counter.accepted++
    if (result.reorg !== undefined) {
      this.logger?.info(
        `Reorg to ${result.hash} at height ${result.height}: ${result.reorg.disconnected.length} blocks disconnected, ${result.reorg.connected.length} connected`,
      )
    } else if (result.reorgRefused === true) {
      this.logger?.warn(
        `Block ${result.hash} has more work but would reorg deeper than ${this.chain.maxReorgDepth} blocks, kept as side branch`,
      )
    }
    this.observer?.onAccepted?.(result, block)
    return result
  }

  private orphan(
    block: Block,
    error: BlockQueryError,
    counters: ReportCounter[],
  ): IngestOutcome {
    if (this.orphans.capacity === 0) {
      return this.failed(error, counters)
    }

    const evicted = this.orphans.add(
      block,
      toDisplayHash(block.header.prevBlockHash),
    )
    for (const old of evicted) {
      this.logger?.warn(`Orphan pool full, dropped block ${old.hash}`)
      this.recordFailure(
        new UnknownParentError(old.hash, toDisplayHash(old.header.prevBlockHash)),
        counters,
      )
    }
    if (!this.orphans.has(block.hash)) {
      this.observer?.onOrphanPoolChange?.(this.orphans.size)
      return { status: 'failed', error }
    }
    this.logger?.debug(`Holding orphan ${block.hash}: ${error.message}`)
    this.observer?.onOrphanPoolChange?.(this.orphans.size)
    return { status: 'orphaned', hash: block.hash }
  }

  private failed(error: BlockQueryError, counters: ReportCounter[]): IngestOutcome {
    this.logger?.warn(`Rejected block: ${error.message}`)
    this.recordFailure(error, counters)
    return { status: 'failed', error }
  }

  private recordFailure(error: BlockQueryError, counters: ReportCounter[]): void {
    for (const counter of counters) counter.recordFailure(error)
    this.observer?.onFailure?.(error)
  }
}
