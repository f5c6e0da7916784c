import type { RequestIdVariables } from 'hono/request-id'

export type RestApiEnv = {
  Variables: RequestIdVariables
}

export type ErrorBody = {
  error: string
  code: string
}
