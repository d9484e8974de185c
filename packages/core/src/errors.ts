/**
 * Error Taxonomy
 *
 * Every failure the reminder engine can hit is one of these classes.
 * The scheduler catches them at its boundary and turns them into state
 * transitions; `recoverable` decides between backoff-and-retry and alerting.
 */

export type HeraldErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'SOURCE_AUTH'
  | 'SOURCE_RATE_LIMITED'
  | 'DELIVERY_FAILED'
  | 'STORE_TRANSACTION'
  | 'CONFIG'

export abstract class HeraldError extends Error {
  abstract readonly code: HeraldErrorCode
  abstract readonly recoverable: boolean

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Network or provider outage. Retried on the next tick with backoff. */
export class SourceUnavailableError extends HeraldError {
  readonly code = 'SOURCE_UNAVAILABLE'
  readonly recoverable = true
}

/** Bad or expired credential. Needs a human; raises an alert. */
export class SourceAuthError extends HeraldError {
  readonly code = 'SOURCE_AUTH'
  readonly recoverable = false
}

export class SourceRateLimitedError extends HeraldError {
  readonly code = 'SOURCE_RATE_LIMITED'
  readonly recoverable = true

  /** Delay the provider asked for, when it sent one */
  readonly retryAfterMs: number | null

  constructor(message: string, retryAfterMs: number | null = null, options?: { cause?: unknown }) {
    super(message, options)
    this.retryAfterMs = retryAfterMs
  }
}

/** Chat surface unreachable. The event stays due and is retried. */
export class DeliveryFailedError extends HeraldError {
  readonly code = 'DELIVERY_FAILED'
  readonly recoverable = true
}

/** Database unavailable, constraint violation or revision conflict. The pass is rolled back. */
export class StoreTransactionError extends HeraldError {
  readonly code = 'STORE_TRANSACTION'
  readonly recoverable = true
}

export class ConfigError extends HeraldError {
  readonly code = 'CONFIG'
  readonly recoverable = false
}

export function isHeraldError(err: unknown): err is HeraldError {
  return err instanceof HeraldError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
