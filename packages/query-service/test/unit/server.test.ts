import { type Block } from '@blockquery/block'
import { ChainIndex } from '@blockquery/blockchain'
import { createMetrics } from '@blockquery/metrics'
import { getSilentLogger } from '@blockquery/utils'
import { assert, describe, it } from 'vitest'
import { QueryEngine, QueryServer } from '../../src/index'
import { buildBlock } from './testdata/chain'

class FailingChainIndex extends ChainIndex {
  override getBlock(): Block {
    throw new Error('disk failure')
  }
}

function setup(blocks: Block[], chain = new ChainIndex()) {
  for (const block of blocks) chain.insert(block)
  const engine = new QueryEngine({ chain })
  return new QueryServer({ port: 0 }, { logger: getSilentLogger(), engine, chain })
}

describe('[QueryServer]: routes', () => {
  const genesis = buildBlock(undefined, 'genesis')
  const a1 = buildBlock(genesis, 'a1')

  it('should answer a hash query', async () => {
    const res = await setup([genesis, a1]).app.request(`/blockheight?${a1.hash}`)
    assert.strictEqual(res.status, 200)
    assert.deepEqual(await res.json(), { height: 1 })
  })

  it('should accept an upper-case hash', async () => {
    const res = await setup([genesis, a1]).app.request(
      `/mainchain?${genesis.hash.toUpperCase()}`,
    )
    assert.strictEqual(res.status, 200)
    assert.deepEqual(await res.json(), { main_chain: true })
  })

  it('should answer parameterless queries', async () => {
    const server = setup([genesis, a1])
    const latest = await server.app.request('/latestblock')
    assert.deepEqual(await latest.json(), { hash: a1.hash })
    const height = await server.app.request('/latestheight')
    assert.deepEqual(await height.json(), { height: 1 })
  })

  it('should return 400 for a malformed hash', async () => {
    const res = await setup([genesis]).app.request('/blockheader?zz')
    assert.strictEqual(res.status, 400)
    assert.deepEqual(await res.json(), {
      error: "Invalid hash: expected 64 hex characters, got 'zz'",
      code: 'INVALID_INPUT',
    })
  })

  it('should return 400 for a missing hash', async () => {
    const res = await setup([genesis]).app.request('/transactioninfo')
    assert.strictEqual(res.status, 400)
    assert.deepEqual(await res.json(), {
      error: "Invalid hash: expected 64 hex characters, got ''",
      code: 'INVALID_INPUT',
    })
  })

  it('should return 400 when a parameterless route gets a query', async () => {
    const res = await setup([genesis]).app.request('/latestblock?abc')
    assert.strictEqual(res.status, 400)
    assert.deepEqual(await res.json(), {
      error: '/latestblock takes no parameters',
      code: 'INVALID_INPUT',
    })
  })

  it('should return 404 for an unknown block', async () => {
    const unknown = 'ab'.repeat(32)
    const res = await setup([genesis]).app.request(`/blockheight?${unknown}`)
    assert.strictEqual(res.status, 404)
    assert.deepEqual(await res.json(), {
      error: `Block ${unknown} not found`,
      code: 'BLOCK_NOT_FOUND',
    })
  })

  it('should return 404 for an unknown transaction', async () => {
    const unknown = 'cd'.repeat(32)
    const res = await setup([genesis]).app.request(`/transactionoutputs?${unknown}`)
    assert.strictEqual(res.status, 404)
    assert.deepEqual(await res.json(), {
      error: `Transaction ${unknown} not found`,
      code: 'TX_NOT_FOUND',
    })
  })

  it('should return 404 before any block is ingested', async () => {
    const res = await setup([]).app.request('/latestheight')
    assert.strictEqual(res.status, 404)
    assert.deepEqual(await res.json(), {
      error: 'No blocks have been ingested',
      code: 'CHAIN_EMPTY',
    })
  })

  it('should return 404 for unknown routes and methods', async () => {
    const server = setup([genesis])
    const unknown = await server.app.request('/blocks')
    assert.strictEqual(unknown.status, 404)
    assert.deepEqual(await unknown.json(), {
      error: 'Route GET /blocks not found',
      code: 'NOT_FOUND',
    })

    const post = await server.app.request('/latestblock', { method: 'POST' })
    assert.strictEqual(post.status, 404)
  })

  it('should hide internal failure details', async () => {
    const server = setup([genesis], new FailingChainIndex())
    const res = await server.app.request(`/blockheader?${genesis.hash}`)
    assert.strictEqual(res.status, 500)
    assert.deepEqual(await res.json(), {
      error: 'Internal error',
      code: 'INTERNAL_ERROR',
    })
  })

  it('should report health', async () => {
    const res = await setup([genesis, a1]).app.request('/health')
    assert.deepEqual(await res.json(), { status: 'ok', blocks: 2 })
  })

  it('should not serve metrics when they are disabled', async () => {
    const res = await setup([genesis]).app.request('/metrics')
    assert.strictEqual(res.status, 404)
  })
})

describe('[QueryServer]: metrics', () => {
  it('should label requests by registered route', async () => {
    const chain = new ChainIndex()
    chain.insert(buildBlock(undefined, 'genesis'))
    const metrics = createMetrics({ collectDefaultMetrics: false })
    const engine = new QueryEngine({ chain })
    const server = new QueryServer({ port: 0 }, { logger: getSilentLogger(), engine, chain, metrics })

    assert.strictEqual((await server.app.request('/health')).status, 200)
    assert.strictEqual((await server.app.request('/blocks')).status, 404)
    assert.strictEqual((await server.app.request('/latestblock')).status, 200)

    const { values } = await metrics.http.requestsTotal.get()
    const labels = values
      .map(({ labels: { route, status } }) => `${route} ${status}`)
      .sort()
    assert.deepEqual(labels, ['/health 200', '/latestblock 200', 'unmatched 404'])

    const scrape = await server.app.request('/metrics')
    assert.include(await scrape.text(), 'blockquery_http_requests_total{route="/health",status="200"} 1')
  })
})

describe('[QueryServer]: listen', () => {
  it('should reject when the port is already taken', async () => {
    const chain = new ChainIndex()
    const engine = new QueryEngine({ chain })
    const modules = { logger: getSilentLogger(), engine, chain }
    const first = new QueryServer({ port: 0 }, modules)
    await first.listen()

    try {
      const second = new QueryServer({ port: first.port }, modules)
      const failure: unknown = await second.listen().then(
        () => undefined,
        (err: unknown) => err,
      )
      assert.instanceOf(failure, Error)
      assert.propertyVal(failure, 'code', 'EADDRINUSE')
      assert.strictEqual(second.port, 0)

      const retry: unknown = await second.listen().then(
        () => undefined,
        (err: unknown) => err,
      )
      assert.propertyVal(retry, 'code', 'EADDRINUSE')
    } finally {
      await first.close()
    }
  })
})
