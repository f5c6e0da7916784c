import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { MAINNET_MAGIC } from '@blockquery/block'
import {
  type BlockQueryError,
  classifyError,
  MalformedBlockError,
} from '@blockquery/utils'
import debugDefault from 'debug'
import { type BlockFeed, END_OF_FEED, type EndOfFeed } from './types'

const debug = debugDefault('blockquery:blockchain:feed')

/** magic (4) + size (4) */
export const BLK_RECORD_HEADER_SIZE = 8

export interface BlkFileFeedOptions {
  /** Directory holding blk00000.dat, blk00001.dat, ... */
  dir: string
  /** Network magic expected at the start of each record */
  magic?: number
  /** Number of the first file to read */
  startFile?: number
  /** Number of the last file to read, unbounded when unset */
  endFile?: number
}

/**
 * File name of the n-th block file: blk00000.dat, blk00001.dat, ...
 */
export function blkFileName(n: number): string {
  return `blk${n.toString().padStart(5, '0')}.dat`
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Reads the block files of a node's data directory in file order and yields
 * each framed block. Stops at the first missing file.
 *
 * Zero bytes between records are padding. A wrong magic or a record running
 * past the end of its file abandons the rest of that file and is reported
 * through {@link takeFailures}.
 */
export class BlkFileFeed implements BlockFeed {
  readonly dir: string
  readonly magic: number
  readonly endFile?: number

  private fileNumber: number
  private buffer: Uint8Array | undefined
  private offset = 0
  private done = false
  private failures: BlockQueryError[] = []

  constructor(opts: BlkFileFeedOptions) {
    this.dir = opts.dir
    this.magic = opts.magic ?? MAINNET_MAGIC
    this.fileNumber = opts.startFile ?? 0
    this.endFile = opts.endFile
  }

  /** Name of the file currently being read, or the next one to open */
  get currentFile(): string {
    return blkFileName(this.fileNumber)
  }

  takeFailures(): BlockQueryError[] {
    const failures = this.failures
    this.failures = []
    return failures
  }

  async nextBlock(): Promise<Uint8Array | EndOfFeed> {
    while (!this.done) {
      if (this.buffer === undefined) {
        await this.openNextFile()
        continue
      }
      const block = this.readRecord(this.buffer)
      if (block !== undefined) return block
      this.closeFile()
    }
    return END_OF_FEED
  }

  private async openNextFile(): Promise<void> {
    if (this.endFile !== undefined && this.fileNumber > this.endFile) {
      this.done = true
      return
    }
    const path = join(this.dir, this.currentFile)
    try {
      this.buffer = await readFile(path)
      this.offset = 0
      debug(`opened ${path} (${this.buffer.length} bytes)`)
    } catch (err) {
      if (isMissingFile(err)) {
        debug(`no ${path}, feed drained`)
        this.done = true
        return
      }
      this.failures.push(classifyError(err, { file: this.currentFile }))
      this.fileNumber++
    }
  }

  private closeFile(): void {
    this.buffer = undefined
    this.offset = 0
    this.fileNumber++
  }

  private fail(message: string): undefined {
    this.failures.push(
      new MalformedBlockError(`${message} in ${this.currentFile}`, {
        context: { file: this.currentFile, offset: this.offset },
      }),
    )
    return undefined
  }

  /**
   * Next block of the open file, or undefined once the file is used up.
   */
  private readRecord(buffer: Uint8Array): Uint8Array | undefined {
    while (this.offset < buffer.length && buffer[this.offset] === 0) {
      this.offset++
    }
    const remaining = buffer.length - this.offset
    if (remaining === 0) return undefined
    if (remaining < BLK_RECORD_HEADER_SIZE) {
      return this.fail(`Truncated record header at offset ${this.offset}`)
    }

    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
    const magic = view.getUint32(this.offset, true)
    if (magic !== this.magic) {
      return this.fail(
        `Bad magic 0x${magic.toString(16).padStart(8, '0')} at offset ${this.offset}`,
      )
    }

    const size = view.getUint32(this.offset + 4, true)
    const start = this.offset + BLK_RECORD_HEADER_SIZE
    if (start + size > buffer.length) {
      return this.fail(
        `Record of ${size} bytes at offset ${this.offset} runs past the end of the file`,
      )
    }

    this.offset = start + size
    return buffer.subarray(start, start + size)
  }
}
