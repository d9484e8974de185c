/**
 * Exponential Backoff Utility
 *
 * Computes delay for retry attempts: starts at initialMs, grows by factor,
 * holds at maxMs. Jitter spreads the delay by ±jitter of its value and
 * never pushes it past maxMs.
 */

import type { ReconnectPolicy } from '../channels/types.js'

export interface BackoffPolicy {
  initialMs: number
  maxMs: number
  factor: number
  jitter: number
  /** Give up after this many attempts; omit to hold at maxMs forever */
  maxAttempts?: number
}

/** Default reconnect policy for chat channels */
export const DEFAULT_BACKOFF: ReconnectPolicy = {
  initialMs: 2000,
  maxMs: 30000,
  factor: 1.8,
  jitter: 0.25,
  maxAttempts: 50,
}

/**
 * Compute backoff delay for a given attempt number.
 *
 * @param attempt - Zero-based attempt number
 * @returns Delay in milliseconds, or null if maxAttempts exceeded
 */
export function computeBackoff(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random,
): number | null {
  if (policy.maxAttempts !== undefined && attempt >= policy.maxAttempts) return null

  const base = policy.initialMs * Math.pow(policy.factor, attempt)
  const capped = Math.min(base, policy.maxMs)

  if (policy.jitter === 0) return Math.round(capped)

  const jitterRange = capped * policy.jitter
  const jitterOffset = (random() * 2 - 1) * jitterRange

  return Math.min(policy.maxMs, Math.round(capped + jitterOffset))
}
