import {
  type BlockQueryError,
  ErrorCode,
  isNotFoundError,
} from '@blockquery/utils'
import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import type { ErrorBody, RestApiEnv } from './types'

export const INTERNAL_ERROR_MESSAGE = 'Internal error'

export function statusForError(error: BlockQueryError): ContentfulStatusCode {
  if (error.code === ErrorCode.INVALID_INPUT) return 400
  if (error.code === ErrorCode.NOT_FOUND || isNotFoundError(error)) return 404
  return 500
}

/**
 * JSON error body. Internal failures keep their message out of the response.
 */
export const getErrorResponse = (
  c: Context<RestApiEnv>,
  error: BlockQueryError,
  status: ContentfulStatusCode = statusForError(error),
) => {
  const body: ErrorBody = {
    error: status >= 500 ? INTERNAL_ERROR_MESSAGE : error.message,
    code: status >= 500 ? ErrorCode.INTERNAL_ERROR : error.code,
  }
  return c.json(body, status)
}
