import {
  BlockNotFoundError,
  ChainEmptyError,
  DuplicateBlockError,
  UnknownParentError,
} from '@blockquery/utils'
import { assert, describe, it } from 'vitest'
import {
  ChainIndex,
  type ChainTip,
  hashAtHeight,
  isOnMainChain,
  type ReorgInfo,
} from '../../src/index'
import { buildBlock, buildChain } from './testdata/chain'

describe('[ChainIndex]: linear chain', () => {
  it('should index a chain of N blocks with the last one as tip', () => {
    const genesis = buildBlock(undefined, 'genesis')
    const blocks = [genesis, ...buildChain(genesis, 'a', 4)]
    const index = new ChainIndex()
    for (const block of blocks) index.insert(block)

    assert.deepEqual(index.latest(), { hash: blocks[4].hash, height: 4 })
    assert.strictEqual(index.size, 5)
    blocks.forEach((block, height) => {
      assert.strictEqual(index.heightOf(block.hash), height)
      assert.isTrue(index.isMainChain(block.hash))
    })
  })

  it('should give each block its parent height plus one', () => {
    const genesis = buildBlock(undefined, 'genesis')
    const [a1, a2] = buildChain(genesis, 'a', 2)
    const index = new ChainIndex()
    const results = [genesis, a1, a2].map((block) => index.insert(block))

    assert.deepEqual(
      results.map((r) => r.height),
      [0, 1, 2],
    )
    assert.deepEqual(
      results.map((r) => r.chainWork),
      [2n, 4n, 6n],
    )
    assert.isTrue(results.every((r) => r.isNewTip))
  })

  it('should look hashes up case-insensitively', () => {
    const genesis = buildBlock(undefined, 'genesis')
    const index = new ChainIndex()
    index.insert(genesis)
    assert.strictEqual(index.heightOf(genesis.hash.toUpperCase()), 0)
  })
})

describe('[ChainIndex]: rejections', () => {
  it('should reject a duplicate block', () => {
    const genesis = buildBlock(undefined, 'genesis')
    const index = new ChainIndex()
    index.insert(genesis)
    assert.throws(() => index.insert(genesis), DuplicateBlockError)
    assert.strictEqual(index.size, 1)
  })

  it('should reject a block whose parent is unknown', () => {
    const genesis = buildBlock(undefined, 'genesis')
    const [a1] = buildChain(genesis, 'a', 1)
    const index = new ChainIndex()
    assert.throws(() => index.insert(a1), UnknownParentError)
    assert.strictEqual(index.size, 0)
  })

  it('should report an empty chain', () => {
    const index = new ChainIndex()
    assert.throws(() => index.latest(), ChainEmptyError)
  })

  it('should report unknown hashes as not found', () => {
    const index = new ChainIndex()
    const unknown = 'ab'.repeat(32)
    assert.throws(() => index.heightOf(unknown), BlockNotFoundError)
    assert.throws(() => index.isMainChain(unknown), BlockNotFoundError)
    assert.isUndefined(index.getNode(unknown))
    assert.isFalse(index.hasBlock(unknown))
  })
})

describe('[ChainIndex]: forks', () => {
  const genesis = buildBlock(undefined, 'genesis')
  const [a1, a2] = buildChain(genesis, 'a', 2)
  const [b1, b2, b3] = buildChain(genesis, 'b', 3)

  it('should keep the first tip on equal work', () => {
    const index = new ChainIndex()
    for (const block of [genesis, a1, a2, b1]) index.insert(block)
    const result = index.insert(b2)

    assert.isFalse(result.isNewTip)
    assert.strictEqual(index.latest().hash, a2.hash)
    assert.isFalse(index.isMainChain(b2.hash))
    assert.strictEqual(index.heightOf(b2.hash), 2)
  })

  it('should reorg onto the branch with more work', () => {
    const index = new ChainIndex()
    for (const block of [genesis, a1, a2, b1, b2]) index.insert(block)
    const before = index.snapshot()
    const result = index.insert(b3)

    assert.isTrue(result.isNewTip)
    assert.deepEqual(result.reorg, {
      commonAncestor: genesis.hash,
      disconnected: [a2.hash, a1.hash],
      connected: [b1.hash, b2.hash, b3.hash],
    })
    assert.deepEqual(index.latest(), { hash: b3.hash, height: 3 })
    assert.isFalse(index.isMainChain(a2.hash))
    assert.isFalse(index.isMainChain(a1.hash))
    assert.isTrue(index.isMainChain(b2.hash))
    assert.isTrue(index.isMainChain(genesis.hash))

    // snapshots taken earlier keep their view
    assert.strictEqual(before.tip?.hash, a2.hash)
    assert.isTrue(index.isMainChain(a2.hash, before))
    assert.strictEqual(hashAtHeight(before, 3), undefined)
  })

  it('should keep transactions of disconnected blocks locatable', () => {
    const index = new ChainIndex()
    for (const block of [genesis, a1, a2, b1, b2, b3]) index.insert(block)
    const coinbase = a1.transactions[0]

    const location = index.transactions.locate(coinbase.hash)
    assert.strictEqual(location.blockHash, a1.hash)
    assert.strictEqual(location.index, 0)
    assert.strictEqual(location.transaction, coinbase)
  })

  it('should refuse a reorg deeper than maxReorgDepth', () => {
    const index = new ChainIndex({ maxReorgDepth: 1 })
    for (const block of [genesis, a1, a2, b1, b2]) index.insert(block)
    const result = index.insert(b3)

    assert.isFalse(result.isNewTip)
    assert.isTrue(result.reorgRefused)
    assert.strictEqual(index.latest().hash, a2.hash)
    assert.isTrue(index.hasBlock(b3.hash))
    assert.isFalse(index.isMainChain(b3.hash))
  })

  it('should allow a reorg within maxReorgDepth', () => {
    const index = new ChainIndex({ maxReorgDepth: 2 })
    for (const block of [genesis, a1, a2, b1, b2]) index.insert(block)
    assert.isTrue(index.insert(b3).isNewTip)
  })

  it('should switch to a heavier chain from another root', () => {
    const otherRoot = buildBlock(undefined, 'other')
    const [c1, c2, c3] = buildChain(otherRoot, 'c', 3)
    const index = new ChainIndex()
    for (const block of [genesis, a1, a2, otherRoot, c1, c2]) index.insert(block)
    const result = index.insert(c3)

    assert.isUndefined(result.reorg?.commonAncestor)
    assert.deepEqual(result.reorg?.disconnected, [a2.hash, a1.hash, genesis.hash])
    assert.isFalse(index.isMainChain(genesis.hash))
    assert.strictEqual(index.latest().height, 3)
    assert.isTrue(isOnMainChain(index.snapshot(), { hash: otherRoot.hash, height: 0 }))
  })

  it('should emit tip and reorg events', () => {
    const index = new ChainIndex()
    const tips: ChainTip[] = []
    const reorgs: ReorgInfo[] = []
    let blocks = 0
    index.events.on('block', () => blocks++)
    index.events.on('tip', (tip) => tips.push(tip))
    index.events.on('reorg', (reorg) => reorgs.push(reorg))

    for (const block of [genesis, a1, a2, b1, b2, b3]) index.insert(block)

    assert.strictEqual(blocks, 6)
    assert.deepEqual(
      tips.map((t) => t.hash),
      [genesis.hash, a1.hash, a2.hash, b3.hash],
    )
    assert.lengthOf(reorgs, 1)
    assert.strictEqual(reorgs[0].commonAncestor, genesis.hash)
  })
})
