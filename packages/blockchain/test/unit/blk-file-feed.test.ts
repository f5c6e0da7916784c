import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { encodeBlock, MAINNET_MAGIC } from '@blockquery/block'
import { concatBytes, equalsBytes, ErrorCode } from '@blockquery/utils'
import { afterEach, assert, beforeEach, describe, it } from 'vitest'
import {
  BlkFileFeed,
  blkFileName,
  END_OF_FEED,
  type EndOfFeed,
} from '../../src/index'
import { buildBlock, buildChain } from './testdata/chain'

function frame(block: Uint8Array, magic = MAINNET_MAGIC): Uint8Array {
  const header = new Uint8Array(8)
  const view = new DataView(header.buffer)
  view.setUint32(0, magic, true)
  view.setUint32(4, block.length, true)
  return concatBytes(header, block)
}

async function drain(feed: BlkFileFeed): Promise<Uint8Array[]> {
  const blocks: Uint8Array[] = []
  for (;;) {
    const next: Uint8Array | EndOfFeed = await feed.nextBlock()
    if (next === END_OF_FEED) return blocks
    blocks.push(next)
  }
}

describe('[BlkFileFeed]', () => {
  const genesis = buildBlock(undefined, 'genesis')
  const [a1, a2] = buildChain(genesis, 'a', 2)
  const [g, b1, b2] = [genesis, a1, a2].map((b) => encodeBlock(b))
  let dir = ''

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'blockquery-feed-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should name files with five digits', () => {
    assert.strictEqual(blkFileName(0), 'blk00000.dat')
    assert.strictEqual(blkFileName(123), 'blk00123.dat')
  })

  it('should read records across files and skip padding', async () => {
    await writeFile(join(dir, 'blk00000.dat'), concatBytes(frame(g), new Uint8Array(16), frame(b1)))
    await writeFile(join(dir, 'blk00001.dat'), concatBytes(frame(b2), new Uint8Array(3)))

    const feed = new BlkFileFeed({ dir })
    const blocks = await drain(feed)

    assert.deepEqual(blocks.map((b) => b.length), [g.length, b1.length, b2.length])
    assert.isTrue(equalsBytes(blocks[2], b2))
    assert.deepEqual(feed.takeFailures(), [])
  })

  it('should stop after the last requested file', async () => {
    await writeFile(join(dir, 'blk00000.dat'), frame(g))
    await writeFile(join(dir, 'blk00001.dat'), frame(b1))
    await writeFile(join(dir, 'blk00002.dat'), frame(b2))

    const blocks = await drain(new BlkFileFeed({ dir, startFile: 1, endFile: 1 }))
    assert.strictEqual(blocks.length, 1)
    assert.isTrue(equalsBytes(blocks[0], b1))
  })

  it('should end at the first missing file', async () => {
    await writeFile(join(dir, 'blk00000.dat'), frame(g))
    await writeFile(join(dir, 'blk00002.dat'), frame(b1))

    const blocks = await drain(new BlkFileFeed({ dir }))
    assert.lengthOf(blocks, 1)
  })

  it('should end immediately for an empty directory', async () => {
    assert.lengthOf(await drain(new BlkFileFeed({ dir })), 0)
  })

  it('should abandon a file at a bad magic and continue with the next', async () => {
    await writeFile(
      join(dir, 'blk00000.dat'),
      concatBytes(frame(g), Uint8Array.of(1, 2, 3, 4, 0, 0, 0, 0), frame(b1)),
    )
    await writeFile(join(dir, 'blk00001.dat'), frame(b2))

    const feed = new BlkFileFeed({ dir })
    const blocks = await drain(feed)
    const failures = feed.takeFailures()

    assert.lengthOf(blocks, 2)
    assert.lengthOf(failures, 1)
    assert.strictEqual(failures[0].code, ErrorCode.MALFORMED_BLOCK)
    assert.strictEqual(
      failures[0].message,
      `Bad magic 0x04030201 at offset ${g.length + 8} in blk00000.dat`,
    )
  })

  it('should report a record running past the end of its file', async () => {
    const truncated = frame(g).subarray(0, 100)
    await writeFile(join(dir, 'blk00000.dat'), truncated)

    const feed = new BlkFileFeed({ dir })
    assert.lengthOf(await drain(feed), 0)
    const [failure] = feed.takeFailures()
    assert.strictEqual(
      failure.message,
      `Record of ${g.length} bytes at offset 0 runs past the end of the file in blk00000.dat`,
    )
  })

  it('should accept a custom magic', async () => {
    await writeFile(join(dir, 'blk00000.dat'), frame(g, 0x0709110b))
    const blocks = await drain(new BlkFileFeed({ dir, magic: 0x0709110b }))
    assert.lengthOf(blocks, 1)
  })
})
