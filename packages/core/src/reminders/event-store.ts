/**
 * Event Store — Database Layer
 *
 * Durable table of known events and their notification status, and the
 * single source of truth for "have we already notified this occurrence".
 * Uses better-sqlite3 with WAL mode; every write goes through the
 * operations below, never raw field mutation.
 */

import Database from 'better-sqlite3'
import path from 'node:path'
import fs from 'node:fs'
import { StoreTransactionError, isHeraldError, errorMessage } from '../errors.js'
import { hashEvent } from './hash.js'
import type { RawEvent, StoredEvent, UpsertResult } from './types.js'

interface EventRow {
  external_id: string
  title: string
  description: string | null
  location: string | null
  starts_at: string
  ends_at: string
  all_day: number
  last_seen_hash: string
  notified: number
  notified_at: string | null
  revision: number
  missing_streak: number
  delivery_attempts: number
  last_delivery_error: string | null
  first_seen_at: string
  updated_at: string
}

export class EventStore {
  private db: Database.Database

  /**
   * @param dbPath - SQLite file path, or ":memory:"
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true })
    }

    this.db = new Database(dbPath)
    this.initialize()
  }

  private initialize(): void {
    this.db.pragma('journal_mode = WAL')
    this.db.pragma('busy_timeout = 5000')

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        external_id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        description TEXT,
        location TEXT,
        starts_at TEXT NOT NULL,
        ends_at TEXT NOT NULL,
        all_day INTEGER NOT NULL DEFAULT 0,
        last_seen_hash TEXT NOT NULL,
        notified INTEGER NOT NULL DEFAULT 0,
        notified_at TEXT,
        revision INTEGER NOT NULL DEFAULT 0,
        missing_streak INTEGER NOT NULL DEFAULT 0,
        delivery_attempts INTEGER NOT NULL DEFAULT 0,
        last_delivery_error TEXT,
        first_seen_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        CHECK (starts_at <= ends_at)
      );
    `)

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_events_due
      ON events(notified, starts_at);
    `)
  }

  // ─────────────────────────────────────────────────────────────
  // Transactions
  // ─────────────────────────────────────────────────────────────

  /**
   * Run fn in one transaction. Any throw rolls back everything fn wrote
   * and surfaces as a StoreTransactionError.
   */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)()
    } catch (err) {
      if (err instanceof StoreTransactionError) throw err
      const message = isHeraldError(err) ? err.message : `Store transaction failed: ${errorMessage(err)}`
      throw new StoreTransactionError(message, { cause: err })
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Writes
  // ─────────────────────────────────────────────────────────────

  /**
   * Insert an unseen event, or update a known one when its fingerprint
   * changed (bumping revision). An unchanged event is left as is apart
   * from clearing its missing streak.
   */
  upsert(raw: RawEvent, now: Date = new Date()): UpsertResult {
    if (raw.endsAt.getTime() < raw.startsAt.getTime()) {
      throw new StoreTransactionError(`Event ${raw.externalId} ends before it starts`)
    }

    const hash = hashEvent(raw)
    const previous = this.get(raw.externalId)

    if (!previous) {
      this.db
        .prepare(
          `INSERT INTO events (
            external_id, title, description, location, starts_at, ends_at,
            all_day, last_seen_hash, first_seen_at, updated_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          raw.externalId,
          raw.title,
          raw.description,
          raw.location,
          raw.startsAt.toISOString(),
          raw.endsAt.toISOString(),
          raw.allDay ? 1 : 0,
          hash,
          now.toISOString(),
          now.toISOString(),
        )
      return { outcome: 'inserted', event: this.require(raw.externalId), previous: null }
    }

    if (previous.lastSeenHash === hash) {
      if (previous.missingStreak > 0) {
        this.db.prepare('UPDATE events SET missing_streak = 0 WHERE external_id = ?').run(raw.externalId)
      }
      return { outcome: 'unchanged', event: this.require(raw.externalId), previous }
    }

    // Guarded by the revision we just read: a concurrent writer makes this a no-op
    const result = this.db
      .prepare(
        `UPDATE events SET
          title = ?, description = ?, location = ?, starts_at = ?, ends_at = ?,
          all_day = ?, last_seen_hash = ?, revision = revision + 1,
          missing_streak = 0, updated_at = ?
        WHERE external_id = ? AND revision = ?`,
      )
      .run(
        raw.title,
        raw.description,
        raw.location,
        raw.startsAt.toISOString(),
        raw.endsAt.toISOString(),
        raw.allDay ? 1 : 0,
        hash,
        now.toISOString(),
        raw.externalId,
        previous.revision,
      )

    if (result.changes === 0) {
      throw new StoreTransactionError(
        `Revision conflict on ${raw.externalId} (expected revision ${previous.revision})`,
      )
    }

    return { outcome: 'updated', event: this.require(raw.externalId), previous }
  }

  /**
   * Set notified, only if not already set.
   * @returns false when the event was already notified or is unknown
   */
  markNotified(externalId: string, now: Date = new Date()): boolean {
    const result = this.db
      .prepare(
        `UPDATE events SET notified = 1, notified_at = ?, last_delivery_error = NULL
        WHERE external_id = ? AND notified = 0`,
      )
      .run(now.toISOString(), externalId)
    return result.changes > 0
  }

  recordDeliveryFailure(externalId: string, error: string): void {
    this.db
      .prepare(
        `UPDATE events SET delivery_attempts = delivery_attempts + 1, last_delivery_error = ?
        WHERE external_id = ?`,
      )
      .run(error, externalId)
  }

  /**
   * Start a new notification cycle for a notified event.
   * Only the reconciler's reschedule policy calls this.
   */
  resetNotification(externalId: string): boolean {
    const result = this.db
      .prepare(
        `UPDATE events SET notified = 0, notified_at = NULL,
          delivery_attempts = 0, last_delivery_error = NULL
        WHERE external_id = ? AND notified = 1`,
      )
      .run(externalId)
    return result.changes > 0
  }

  /**
   * Record that an event was absent from the latest snapshot.
   * @returns the new missing streak, or 0 for an unknown id
   */
  softMissing(externalId: string): number {
    const row = this.db
      .prepare<[string], { missing_streak: number }>(
        `UPDATE events SET missing_streak = missing_streak + 1
        WHERE external_id = ?
        RETURNING missing_streak`,
      )
      .get(externalId)
    return row?.missing_streak ?? 0
  }

  /**
   * Delete events missing for at least `threshold` passes that have ended.
   * @returns the deleted ids
   */
  purgeConfirmedMissing(threshold: number, now: Date = new Date()): string[] {
    const rows = this.db
      .prepare<[number, string], { external_id: string }>(
        `DELETE FROM events
        WHERE missing_streak >= ? AND ends_at < ?
        RETURNING external_id`,
      )
      .all(threshold, now.toISOString())
    return rows.map((row) => row.external_id).sort()
  }

  // ─────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────

  get(externalId: string): StoredEvent | null {
    const row = this.db
      .prepare<[string], EventRow>('SELECT * FROM events WHERE external_id = ?')
      .get(externalId)
    return row ? this.rowToEvent(row) : null
  }

  /**
   * Events not yet notified whose start is within the lead window and
   * which have not ended yet, earliest first. Events absent from the
   * latest snapshot (missing streak above zero) are held back until
   * they reappear.
   */
  dueForNotification(now: Date, leadWindowMs: number): StoredEvent[] {
    const horizon = new Date(now.getTime() + leadWindowMs)
    const rows = this.db
      .prepare<[string, string], EventRow>(
        `SELECT * FROM events
        WHERE notified = 0 AND missing_streak = 0 AND starts_at <= ? AND ends_at >= ?
        ORDER BY starts_at ASC, external_id ASC`,
      )
      .all(horizon.toISOString(), now.toISOString())
    return rows.map((row) => this.rowToEvent(row))
  }

  listIds(): string[] {
    const rows = this.db
      .prepare<[], { external_id: string }>('SELECT external_id FROM events ORDER BY external_id')
      .all()
    return rows.map((row) => row.external_id)
  }

  /** Events that have not ended, earliest first */
  listUpcoming(now: Date, limit = 10): StoredEvent[] {
    const rows = this.db
      .prepare<[string, number], EventRow>(
        `SELECT * FROM events WHERE ends_at >= ?
        ORDER BY starts_at ASC, external_id ASC LIMIT ?`,
      )
      .all(now.toISOString(), limit)
    return rows.map((row) => this.rowToEvent(row))
  }

  /** Events absent for at least `threshold` passes but retained (tentative deletions) */
  listFlaggedMissing(threshold: number): StoredEvent[] {
    const rows = this.db
      .prepare<[number], EventRow>(
        `SELECT * FROM events WHERE missing_streak >= ?
        ORDER BY starts_at ASC, external_id ASC`,
      )
      .all(threshold)
    return rows.map((row) => this.rowToEvent(row))
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM events').get()
    return row?.n ?? 0
  }

  close(): void {
    this.db.close()
  }

  // ─────────────────────────────────────────────────────────────

  private require(externalId: string): StoredEvent {
    const event = this.get(externalId)
    if (!event) {
      throw new StoreTransactionError(`Event ${externalId} vanished during write`)
    }
    return event
  }

  private rowToEvent(row: EventRow): StoredEvent {
    return {
      externalId: row.external_id,
      title: row.title,
      description: row.description,
      location: row.location,
      startsAt: new Date(row.starts_at),
      endsAt: new Date(row.ends_at),
      allDay: row.all_day === 1,
      lastSeenHash: row.last_seen_hash,
      notified: row.notified === 1,
      notifiedAt: row.notified_at ? new Date(row.notified_at) : null,
      revision: row.revision,
      missingStreak: row.missing_streak,
      deliveryAttempts: row.delivery_attempts,
      lastDeliveryError: row.last_delivery_error,
      firstSeenAt: new Date(row.first_seen_at),
      updatedAt: new Date(row.updated_at),
    }
  }
}
