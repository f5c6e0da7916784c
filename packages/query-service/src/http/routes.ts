import type { DisplayHash } from '@blockquery/utils'
import type { QueryEngine, QueryResult } from '../query/engine'

export type QueryRoute =
  | {
      readonly path: string
      readonly param: 'hash'
      readonly handler: (engine: QueryEngine, hash: DisplayHash) => QueryResult<object>
    }
  | {
      readonly path: string
      readonly param: 'none'
      readonly handler: (engine: QueryEngine) => QueryResult<object>
    }

/**
 * The GET endpoints. Hash endpoints take the hash as the whole query string,
 * e.g. `/blockheight?000000000019d6...`.
 */
export const QUERY_ROUTES: readonly QueryRoute[] = [
  { path: '/blockheader', param: 'hash', handler: (e, h) => e.blockHeader(h) },
  {
    path: '/blocktransactions',
    param: 'hash',
    handler: (e, h) => e.blockTransactions(h),
  },
  { path: '/blockheight', param: 'hash', handler: (e, h) => e.blockHeight(h) },
  { path: '/mainchain', param: 'hash', handler: (e, h) => e.mainChain(h) },
  { path: '/latestblock', param: 'none', handler: (e) => e.latestBlock() },
  { path: '/latestheight', param: 'none', handler: (e) => e.latestHeight() },
  {
    path: '/transactioninfo',
    param: 'hash',
    handler: (e, h) => e.transactionInfo(h),
  },
  {
    path: '/transactioninputs',
    param: 'hash',
    handler: (e, h) => e.transactionInputs(h),
  },
  {
    path: '/transactionoutputs',
    param: 'hash',
    handler: (e, h) => e.transactionOutputs(h),
  },
]
