/**
 * Reminder Engine Types
 *
 * Shapes shared by the source adapter, event store, reconciler,
 * scheduler and notifier.
 */

/**
 * One occurrence as the external source reports it, after normalization.
 * Every provider produces exactly this shape.
 */
export interface RawEvent {
  /** Stable id assigned by the source; unique per source */
  externalId: string
  title: string
  description: string | null
  location: string | null
  startsAt: Date
  /** Always >= startsAt */
  endsAt: Date
  allDay: boolean
}

/**
 * A complete fetch from the source. Passed by value from adapter to
 * reconciler; there is no shared "current snapshot".
 */
export interface Snapshot {
  events: RawEvent[]
  fetchedAt: Date
  provider: string
}

/** An event as persisted in the event store */
export interface StoredEvent {
  externalId: string
  title: string
  description: string | null
  location: string | null
  startsAt: Date
  endsAt: Date
  allDay: boolean
  /** Content fingerprint of the normalized fields */
  lastSeenHash: string
  /** True once a notification was confirmed delivered for this occurrence */
  notified: boolean
  notifiedAt: Date | null
  /** Bumped on every content change */
  revision: number
  /** Consecutive reconciliation passes this event was absent from */
  missingStreak: number
  deliveryAttempts: number
  lastDeliveryError: string | null
  firstSeenAt: Date
  updatedAt: Date
}

export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged'

export interface UpsertResult {
  outcome: UpsertOutcome
  /** Row as stored after the upsert */
  event: StoredEvent
  /** Row before the upsert, when it existed */
  previous: StoredEvent | null
}

/** Source of raw iCalendar data or events, one per provider kind */
export interface EventProvider {
  readonly name: string
  /**
   * Fetch every current event in [from, to]. Must return the full list or throw;
   * errors are classified by the adapter.
   */
  fetchEvents(from: Date, to: Date): Promise<RawEvent[]>
}

export interface ReconcileResult {
  fetched: number
  inserted: number
  updated: number
  unchanged: number
  /** Stored events absent from this snapshot */
  missing: number
  purged: string[]
  /** Notified events whose start moved and were reset for a new notification cycle */
  renotified: string[]
  /** Snapshot records dropped because a later record had the same id */
  duplicates: number
  startedAt: Date
  finishedAt: Date
}

export interface ScanResult {
  due: number
  delivered: number
  failed: number
}

export type TaskName = 'reconcile' | 'scan'

export type TaskState = 'idle' | 'running' | 'backoff'

export interface TaskStatus {
  name: TaskName
  state: TaskState
  intervalMs: number
  consecutiveFailures: number
  lastRunAt: string | null
  lastSuccessAt: string | null
  nextRunAt: string | null
  lastError: string | null
}

export interface SchedulerStatus {
  running: boolean
  tasks: Record<TaskName, TaskStatus>
  lastReconcile: {
    inserted: number
    updated: number
    unchanged: number
    missing: number
    purged: number
    finishedAt: string
  } | null
  deliveredCount: number
}
