import type { ChainIndex } from '@blockquery/blockchain'
import type { Metrics } from '@blockquery/metrics'
import { type BlockQueryError, InvalidInputError } from '@blockquery/utils'
import type { Context, Next } from 'hono'
import type { QueryEngine } from '../../query/engine'
import { getErrorResponse } from '../helpers'
import { QUERY_ROUTES, type QueryRoute } from '../routes'
import type { RestApiEnv } from '../types'
import { getRawQuery, parseHashQuery } from '../validation'
import { RestServerBase, type RestServerModules, type RestServerOpts } from './base'

export const QUERY_SERVER_DEFAULT_PORT = 9000

export const queryServerOpts: RestServerOpts = {
  port: QUERY_SERVER_DEFAULT_PORT,
  address: '127.0.0.1',
  cors: '*',
}

export type QueryServerModules = RestServerModules & {
  engine: QueryEngine
  chain: ChainIndex
  metrics?: Metrics
}

/**
 * HTTP face of the query engine: one GET endpoint per query plus health
 * and Prometheus endpoints.
 */
export class QueryServer extends RestServerBase {
  readonly modules: QueryServerModules
  /** Paths with a registered handler, the only route labels metrics use */
  private readonly knownPaths = new Set<string>()

  constructor(optsArg: Partial<RestServerOpts>, modules: QueryServerModules) {
    super({ ...queryServerOpts, ...optsArg }, modules)
    this.modules = modules
    this.registerRoutes()
  }

  private registerRoutes(): void {
    const { metrics } = this.modules
    if (metrics !== undefined) {
      this.app.use('*', this.metricsMiddleware.bind(this))
    }

    for (const route of QUERY_ROUTES) {
      this.app.get(route.path, (c) => this.handleQuery(c, route))
      this.knownPaths.add(route.path)
    }

    this.app.get('/health', (c) =>
      c.json({ status: 'ok', blocks: this.modules.chain.size }),
    )
    this.knownPaths.add('/health')

    if (metrics !== undefined) {
      const { register } = metrics
      this.app.get('/metrics', async (c) =>
        c.text(await register.metrics(), 200, {
          'Content-Type': register.contentType,
        }),
      )
      this.knownPaths.add('/metrics')
    }
  }

  private handleQuery(c: Context<RestApiEnv>, route: QueryRoute) {
    const query = getRawQuery(c.req.url)

    if (route.param === 'none') {
      if (query !== '') {
        return getErrorResponse(
          c,
          new InvalidInputError(`${route.path} takes no parameters`),
        )
      }
      const [err, record] = route.handler(this.modules.engine)
      return err ? this.queryFailed(c, err) : c.json(record, 200)
    }

    const [invalid, hash] = parseHashQuery(query)
    if (invalid) return getErrorResponse(c, invalid)

    const [err, record] = route.handler(this.modules.engine, hash)
    return err ? this.queryFailed(c, err) : c.json(record, 200)
  }

  private queryFailed(c: Context<RestApiEnv>, err: BlockQueryError) {
    const response = getErrorResponse(c, err)
    if (response.status >= 500) {
      this.logger.error(`Query ${c.req.path} failed: ${err.message}`, {
        code: err.code,
        context: err.context,
      })
    }
    return response
  }

  private async metricsMiddleware(c: Context<RestApiEnv>, next: Next) {
    const http = this.modules.metrics?.http
    if (http === undefined) return next()

    const route = this.knownPaths.has(c.req.path) ? c.req.path : 'unmatched'
    const end = http.requestDuration.startTimer({ route })
    await next()
    end()
    http.requestsTotal.inc({ route, status: String(c.res.status) })
  }
}
