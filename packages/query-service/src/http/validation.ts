import {
  type DisplayHash,
  InvalidInputError,
  isDisplayHash,
  type Safe,
  safeError,
  safeResult,
} from '@blockquery/utils'
import { z } from 'zod'

export const displayHashSchema = z
  .string()
  .refine(isDisplayHash, 'expected 64 hex characters')
  .transform((hash) => hash.toLowerCase())

/**
 * The raw query string of a URL, without the leading '?'.
 */
export function getRawQuery(url: string): string {
  const index = url.indexOf('?')
  return index === -1 ? '' : url.slice(index + 1)
}

export function parseHashQuery(query: string): Safe<DisplayHash, InvalidInputError> {
  const parsed = displayHashSchema.safeParse(query)
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? 'malformed'
    const shown = query.length > 80 ? `${query.slice(0, 80)}...` : query
    return safeError(new InvalidInputError(`Invalid hash: ${reason}, got '${shown}'`))
  }
  return safeResult(parsed.data)
}
