/**
 * Reminder Engine — Module Exports
 */

export { EventStore } from './event-store.js'
export { hashEvent } from './hash.js'
export { formatAbsolute, formatRelative } from './format.js'
export { Reconciler, dedupeSnapshot } from './reconciler.js'
export type { ReconcilerOptions, SnapshotSource } from './reconciler.js'
export { Notifier } from './notifier.js'
export type { NotifierOptions, DeliverFn } from './notifier.js'
export { ReminderScheduler } from './scheduler.js'
export type { ReminderSchedulerOptions, SchedulerAlert } from './scheduler.js'
export * from './source/index.js'

export type {
  RawEvent,
  Snapshot,
  StoredEvent,
  UpsertOutcome,
  UpsertResult,
  EventProvider,
  ReconcileResult,
  ScanResult,
  TaskName,
  TaskState,
  TaskStatus,
  SchedulerStatus,
} from './types.js'
