import { access } from 'node:fs/promises'
import { basename, dirname } from 'node:path'
import { type Block, decodeBlock } from '@blockquery/block'
import {
  BlkFileFeed,
  type BlockFeed,
  isEndOfFeed,
} from '@blockquery/blockchain'
import {
  type BlockQueryError,
  classifyError,
  InvalidInputError,
} from '@blockquery/utils'
import type { GlobalArgs } from '../../options/globalOptions'
import type { InspectArgs } from './options'

export type InspectHandlerArgs = InspectArgs & GlobalArgs

export interface InspectSummary {
  blocks: number
  failures: BlockQueryError[]
}

/**
 * Number of a block file from its name, `blk00042.dat` -> 42
 */
export function parseBlkFileNumber(file: string): number {
  const match = /^blk(\d+)\.dat$/.exec(basename(file))
  if (match === null) {
    throw new InvalidInputError(`Not a block file name: ${basename(file)}`)
  }
  return Number.parseInt(match[1], 10)
}

export function formatBlockLine(block: Block): string {
  return `${block.hash}\t${block.transactions.length}\t${block.size}`
}

/**
 * Decodes each block of the feed and writes one line per block. Records
 * that fail to decode are written as `error\t<message>` and counted as
 * failures.
 */
export async function inspectBlocks(
  feed: BlockFeed,
  write: (line: string) => void,
  limit = Number.POSITIVE_INFINITY,
): Promise<InspectSummary> {
  const summary: InspectSummary = { blocks: 0, failures: [] }

  while (summary.blocks + summary.failures.length < limit) {
    const next = await feed.nextBlock()
    if (isEndOfFeed(next)) break
    try {
      write(formatBlockLine(decodeBlock(next)))
      summary.blocks++
    } catch (err) {
      const error = classifyError(err)
      write(`error\t${error.message}`)
      summary.failures.push(error)
    }
  }

  for (const error of feed.takeFailures?.() ?? []) {
    write(`error\t${error.message}`)
    summary.failures.push(error)
  }
  return summary
}

export async function inspectHandler(
  args: InspectHandlerArgs,
  write: (line: string) => void = console.log,
): Promise<InspectSummary> {
  const fileNumber = parseBlkFileNumber(args.file)
  await access(args.file)

  const feed = new BlkFileFeed({
    dir: dirname(args.file),
    startFile: fileNumber,
    endFile: fileNumber,
  })
  return inspectBlocks(feed, write, args.limit)
}
