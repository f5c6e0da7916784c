import { encodeBlock } from '@blockquery/block'
import { ArrayBlockFeed } from '@blockquery/blockchain'
import { getSilentLogger } from '@blockquery/utils'
import { assert, describe, it } from 'vitest'
import { createConfigOptions, QueryNode } from '../../src/index'
import { buildBlock, buildChain } from './testdata/chain'

function createNode(metricsEnabled = true) {
  return new QueryNode({
    config: createConfigOptions({
      port: 0,
      metrics: { enabled: metricsEnabled, prefix: 'test', collectDefaultMetrics: false },
      logger: getSilentLogger(),
    }),
  })
}

describe('[QueryNode]', () => {
  const genesis = buildBlock(undefined, 'genesis')
  const [a1, a2] = buildChain(genesis, 'a', 2)

  it('should ingest a feed and answer queries from it', async () => {
    const node = createNode()
    const report = await node.ingest(
      new ArrayBlockFeed([genesis, a1, a2].map((block) => encodeBlock(block))),
    )
    assert.strictEqual(report.accepted, 3)
    assert.strictEqual(report.failed, 0)

    const res = await node.server.app.request('/latestheight')
    assert.deepEqual(await res.json(), { height: 2 })
  })

  it('should keep ingestion and HTTP metrics', async () => {
    const node = createNode()
    await node.ingest(
      new ArrayBlockFeed([
        encodeBlock(genesis),
        encodeBlock(a1),
        Uint8Array.of(1, 2, 3),
      ]),
    )
    await node.server.app.request('/latestblock')

    const res = await node.server.app.request('/metrics')
    assert.strictEqual(res.status, 200)
    const text = await res.text()
    assert.match(text, /^test_chain_block_height 1$/m)
    assert.match(text, /^test_chain_blocks_indexed 2$/m)
    assert.match(text, /^test_ingestion_blocks_accepted_total 2$/m)
    assert.match(text, /^test_ingestion_blocks_rejected_total\{code="MALFORMED_BLOCK"\} 1$/m)
    assert.match(text, /^test_http_requests_total\{route="\/latestblock",status="200"\} 1$/m)
  })

  it('should run without metrics', async () => {
    const node = createNode(false)
    assert.isUndefined(node.metrics)
    await node.ingest(new ArrayBlockFeed([encodeBlock(genesis)]))
    assert.strictEqual(node.chain.size, 1)
  })

  it('should stop cleanly when it never listened', async () => {
    const node = createNode(false)
    assert.isFalse(node.isRunning)
    await node.stop()
    assert.isFalse(node.isRunning)
  })
})
