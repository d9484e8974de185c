import {
  SourceAuthError,
  SourceRateLimitedError,
  SourceUnavailableError,
  errorMessage,
  type HeraldError,
} from '../../errors.js'

const AUTH_PATTERN = /\b(401|403)\b|unauthori[sz]ed|forbidden|invalid credentials/i
const RATE_LIMIT_PATTERN = /\b429\b|too many requests|rate limit/i

/**
 * Map any provider failure onto the source error taxonomy. Errors that
 * are already classified pass through unchanged; anything unknown is
 * treated as an outage.
 */
export function classifySourceError(err: unknown): HeraldError {
  if (
    err instanceof SourceAuthError ||
    err instanceof SourceRateLimitedError ||
    err instanceof SourceUnavailableError
  ) {
    return err
  }

  const message = errorMessage(err)
  if (AUTH_PATTERN.test(message)) {
    return new SourceAuthError(`Source rejected credentials: ${message}`, { cause: err })
  }
  if (RATE_LIMIT_PATTERN.test(message)) {
    return new SourceRateLimitedError(`Source rate limit reached: ${message}`, null, { cause: err })
  }
  return new SourceUnavailableError(`Source unavailable: ${message}`, { cause: err })
}
