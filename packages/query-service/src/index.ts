export * from './config/index'
export { getErrorResponse, statusForError } from './http/helpers'
export { QUERY_ROUTES, type QueryRoute } from './http/routes'
export {
  RestServerBase,
  type RestServerModules,
  type RestServerOpts,
} from './http/server/base'
export {
  QUERY_SERVER_DEFAULT_PORT,
  QueryServer,
  type QueryServerModules,
} from './http/server/query-server'
export type { ErrorBody, RestApiEnv } from './http/types'
export { displayHashSchema, getRawQuery, parseHashQuery } from './http/validation'
export { createMetricsObserver } from './node/metrics-observer'
export { QueryNode } from './node/query-node'
export type { QueryNodeInitOptions } from './node/types'
export { QueryEngine, type QueryEngineOptions, type QueryResult } from './query/engine'
export type * from './query/types'
