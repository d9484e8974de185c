/**
 * External Source Adapter
 *
 * Fetches complete snapshots from one provider, one call per rate-limit
 * slot, and classifies every failure. Either the full event list comes
 * back or an error is thrown; there is no partial snapshot.
 */

import { RateGate } from '../../utils/rate-gate.js'
import { createLogger } from '../../logger.js'
import type { EventProvider, Snapshot } from '../types.js'
import { classifySourceError } from './classify.js'

const DAY_MS = 24 * 60 * 60 * 1000

const log = createLogger('SourceAdapter')

export interface SourceAdapterOptions {
  /** Provider's published minimum interval between calls */
  minIntervalMs: number
  lookAheadDays: number
  lookBehindDays: number
  now?: () => Date
}

export class SourceAdapter {
  private provider: EventProvider
  private gate: RateGate
  private lookAheadMs: number
  private lookBehindMs: number
  private now: () => Date

  constructor(provider: EventProvider, options: SourceAdapterOptions) {
    this.provider = provider
    this.now = options.now ?? (() => new Date())
    this.gate = new RateGate(options.minIntervalMs, () => this.now().getTime())
    this.lookAheadMs = options.lookAheadDays * DAY_MS
    this.lookBehindMs = options.lookBehindDays * DAY_MS
  }

  get providerName(): string {
    return this.provider.name
  }

  /**
   * Fetch the current snapshot. Rejects with SourceUnavailableError,
   * SourceAuthError or SourceRateLimitedError.
   */
  fetchSnapshot(): Promise<Snapshot> {
    return this.gate.schedule(async () => {
      const fetchedAt = this.now()
      const from = new Date(fetchedAt.getTime() - this.lookBehindMs)
      const to = new Date(fetchedAt.getTime() + this.lookAheadMs)

      try {
        const events = await this.provider.fetchEvents(from, to)
        log.debug(`[SourceAdapter] ${this.provider.name} returned ${events.length} event(s)`)
        return { events, fetchedAt, provider: this.provider.name }
      } catch (err) {
        throw classifySourceError(err)
      }
    })
  }
}
