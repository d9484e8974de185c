/**
 * Reconciler
 *
 * One fetch-diff-apply pass: pulls a snapshot, upserts every event in it,
 * marks stored events that are absent, purges the ones confirmed gone,
 * all inside a single store transaction. A failure anywhere leaves the
 * store exactly as it was before the pass.
 */

import type { Mutex } from '../utils/mutex.js'
import { createLogger } from '../logger.js'
import type { EventStore } from './event-store.js'
import type { RawEvent, ReconcileResult, Snapshot } from './types.js'

const log = createLogger('Reconciler')

/** Anything that can produce a full snapshot (the source adapter in production) */
export interface SnapshotSource {
  fetchSnapshot(): Promise<Snapshot>
}

export interface ReconcilerOptions {
  store: EventStore
  source: SnapshotSource
  /** Shared with the notification scan */
  mutex: Mutex
  /** Consecutive absent passes before a past event is purged */
  missingStreakThreshold: number
  /** Start a new notification cycle when a notified event moves to a later future time */
  renotifyOnReschedule: boolean
  now?: () => Date
}

interface ApplyResult {
  inserted: number
  updated: number
  unchanged: number
  missing: number
  purged: string[]
  renotified: string[]
}

export class Reconciler {
  private store: EventStore
  private source: SnapshotSource
  private mutex: Mutex
  private threshold: number
  private renotifyOnReschedule: boolean
  private now: () => Date

  constructor(options: ReconcilerOptions) {
    this.store = options.store
    this.source = options.source
    this.mutex = options.mutex
    this.threshold = options.missingStreakThreshold
    this.renotifyOnReschedule = options.renotifyOnReschedule
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Run one reconciliation pass. Fetch failures are logged and rethrown
   * without touching the store; the scheduler decides when to retry.
   */
  async reconcile(): Promise<ReconcileResult> {
    const startedAt = this.now()

    let snapshot: Snapshot
    try {
      snapshot = await this.source.fetchSnapshot()
    } catch (err) {
      log.warn({ err }, '[Reconciler] Snapshot fetch failed, store left untouched')
      throw err
    }

    const { events, duplicates } = dedupeSnapshot(snapshot.events)

    const applied = await this.mutex.runExclusive(() =>
      this.store.transaction(() => this.apply(events, this.now())),
    )

    const result: ReconcileResult = {
      fetched: snapshot.events.length,
      ...applied,
      duplicates,
      startedAt,
      finishedAt: this.now(),
    }

    log.info(
      `[Reconciler] Pass complete: ${result.inserted} new, ${result.updated} changed, ` +
        `${result.unchanged} unchanged, ${result.missing} missing, ${result.purged.length} purged`,
    )

    return result
  }

  private apply(events: RawEvent[], now: Date): ApplyResult {
    const applied: ApplyResult = {
      inserted: 0,
      updated: 0,
      unchanged: 0,
      missing: 0,
      purged: [],
      renotified: [],
    }

    const seen = new Set<string>()

    for (const raw of events) {
      seen.add(raw.externalId)
      const { outcome, event, previous } = this.store.upsert(raw, now)
      applied[outcome]++

      if (
        outcome === 'updated' &&
        this.renotifyOnReschedule &&
        previous?.notified &&
        previous.startsAt.getTime() !== event.startsAt.getTime() &&
        event.startsAt.getTime() > now.getTime()
      ) {
        if (this.store.resetNotification(event.externalId)) {
          applied.renotified.push(event.externalId)
          log.info(
            `[Reconciler] "${event.title}" (${event.externalId}) moved to ${event.startsAt.toISOString()}, ` +
              'starting a new notification cycle',
          )
        }
      }
    }

    for (const externalId of this.store.listIds()) {
      if (seen.has(externalId)) continue

      applied.missing++
      const streak = this.store.softMissing(externalId)
      if (streak === this.threshold) {
        log.warn(
          `[Reconciler] ${externalId} absent for ${streak} consecutive passes; ` +
            'purged once it has ended, retained until then',
        )
      }
    }

    applied.purged = this.store.purgeConfirmedMissing(this.threshold, now)
    for (const externalId of applied.purged) {
      log.info(`[Reconciler] Purged ${externalId} (confirmed missing)`)
    }

    return applied
  }
}

/**
 * Collapse records sharing an external id. The later record in fetch
 * order wins; each collision is a provider data-quality problem.
 */
export function dedupeSnapshot(events: RawEvent[]): { events: RawEvent[]; duplicates: number } {
  const byId = new Map<string, RawEvent>()
  let duplicates = 0

  for (const event of events) {
    if (byId.has(event.externalId)) {
      duplicates++
      log.warn(`[Reconciler] Data quality: duplicate external id ${event.externalId} in snapshot, keeping the later record`)
    }
    byId.set(event.externalId, event)
  }

  return { events: Array.from(byId.values()), duplicates }
}
