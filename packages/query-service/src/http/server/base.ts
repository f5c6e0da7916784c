import type { AddressInfo, Server as NetServer } from 'node:net'
import { serve, type ServerType } from '@hono/node-server'
import { classifyError, ErrorCode, type Logger } from '@blockquery/utils'
import type { Context } from 'hono'
import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { requestId } from 'hono/request-id'
import { isLocalhostIP } from '../../util/ip'
import { getErrorResponse } from '../helpers'
import type { ErrorBody, RestApiEnv } from '../types'

export type RestServerOpts = {
  port: number
  cors?: string
  address?: string
}

export type RestServerModules = {
  logger: Logger
}

export class RestServerBase {
  readonly app: Hono<RestApiEnv>
  protected server?: ServerType
  protected readonly logger: Logger
  protected isListening = false

  constructor(
    protected opts: RestServerOpts,
    modules: RestServerModules,
  ) {
    const app = new Hono<RestApiEnv>()
    this.logger = modules.logger

    app.use('*', cors({ origin: opts.cors ?? '*' }))
    app.use('*', requestId())
    app.onError(this.onError.bind(this))
    app.notFound(this.onNotFound.bind(this))
    this.app = app
  }

  /** Port the server is bound to, 0 until it listens */
  get port(): number {
    const address = this.server?.address()
    return address !== null && typeof address === 'object' ? address.port : 0
  }

  /**
   * Binds the server. Rejects with the bind error (e.g. EADDRINUSE) and can
   * be called again afterwards.
   */
  async listen(): Promise<void> {
    if (this.isListening) return
    this.isListening = true
    return new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        this.isListening = false
        this.logger.error(`Error starting HTTP server: ${err.message}`)
        reject(err)
      }

      try {
        const server = serve(
          {
            fetch: this.app.fetch,
            port: this.opts.port,
            hostname: this.opts.address ?? '127.0.0.1',
          },
          (info) => {
            binding.off('error', onError)
            this.onListening(server, info, resolve)
          },
        )
        const binding: NetServer = server
        binding.once('error', onError)
      } catch (e) {
        onError(classifyError(e, { operation: 'listen' }))
      }
    })
  }

  async close(): Promise<void> {
    const server = this.server
    if (!this.isListening || server === undefined) return

    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    )
    this.isListening = false
    this.server = undefined
    this.logger.debug('HTTP server closed')
  }

  private onError(err: Error, c: Context<RestApiEnv>) {
    const error = classifyError(err, {
      operation: `${c.req.method} ${c.req.path}`,
    })
    this.logger.error(
      `Req ${c.get('requestId')} ${c.req.method} ${c.req.path} failed: ${error.message}`,
    )
    return getErrorResponse(c, error, 500)
  }

  private onNotFound(c: Context<RestApiEnv>) {
    const message = `Route ${c.req.method} ${c.req.path} not found`
    this.logger.debug(message)
    const body: ErrorBody = { error: message, code: ErrorCode.NOT_FOUND }
    return c.json(body, 404)
  }

  private onListening(server: ServerType, info: AddressInfo, resolve: () => void) {
    const host = this.opts.address ?? '127.0.0.1'

    if (!isLocalhostIP(host)) {
      this.logger.warn(
        'HTTP server is exposed, ensure untrusted traffic cannot reach this API',
      )
    }
    this.isListening = true
    this.server = server

    this.logger.info(`Started HTTP server at http://${host}:${info.port}`)
    resolve()
  }
}
