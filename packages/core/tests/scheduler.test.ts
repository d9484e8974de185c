/**
 * Reminder Scheduler Tests
 *
 * Task state machine, backoff delays, the auth alert and shutdown,
 * with fake reconciler/notifier and fake timers.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest'

import { ReminderScheduler, type SchedulerAlert } from '../src/reminders/scheduler.js'
import {
  SourceAuthError,
  SourceRateLimitedError,
  SourceUnavailableError,
  StoreTransactionError,
} from '../src/errors.js'
import type { ReconcileResult, ScanResult } from '../src/reminders/types.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

const NOW = new Date('2026-10-19T09:00:00.000Z')
const RECONCILE_INTERVAL_MS = 5 * 60_000
const SCAN_INTERVAL_MS = 60_000

function reconcileResult(overrides: Partial<ReconcileResult> = {}): ReconcileResult {
  return {
    fetched: 3,
    inserted: 1,
    updated: 1,
    unchanged: 1,
    missing: 0,
    purged: [],
    renotified: [],
    duplicates: 0,
    startedAt: NOW,
    finishedAt: NOW,
    ...overrides,
  }
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

function after(ms: number): string {
  return new Date(NOW.getTime() + ms).toISOString()
}

// -------------------------------------------------------------------
// Scheduler
// -------------------------------------------------------------------

describe('ReminderScheduler', () => {
  let reconcile: Mock<() => Promise<ReconcileResult>>
  let scan: Mock<() => Promise<ScanResult>>
  let alerts: SchedulerAlert[]
  let scheduler: ReminderScheduler

  beforeEach(() => {
    vi.useFakeTimers()
    reconcile = vi.fn<() => Promise<ReconcileResult>>().mockResolvedValue(reconcileResult())
    scan = vi.fn<() => Promise<ScanResult>>().mockResolvedValue({ due: 0, delivered: 0, failed: 0 })
    alerts = []
    scheduler = new ReminderScheduler({
      reconciler: { reconcile },
      notifier: { scan, deliveredCount: 7 },
      reconcileIntervalMs: RECONCILE_INTERVAL_MS,
      scanIntervalMs: SCAN_INTERVAL_MS,
      backoff: { initialMs: 60_000, maxMs: 30 * 60_000, factor: 2, jitter: 0 },
      onAlert: (alert) => alerts.push(alert),
      now: () => NOW,
    })
  })

  afterEach(async () => {
    await scheduler.stop()
    vi.useRealTimers()
  })

  it('runs both tasks on start and schedules the next runs', async () => {
    await scheduler.start()

    expect(reconcile).toHaveBeenCalledTimes(1)
    expect(scan).toHaveBeenCalledTimes(1)

    const status = scheduler.getStatus()
    expect(status.running).toBe(true)
    expect(status.deliveredCount).toBe(7)
    expect(status.tasks.reconcile).toEqual({
      name: 'reconcile',
      state: 'idle',
      intervalMs: RECONCILE_INTERVAL_MS,
      consecutiveFailures: 0,
      lastRunAt: NOW.toISOString(),
      lastSuccessAt: NOW.toISOString(),
      nextRunAt: after(RECONCILE_INTERVAL_MS),
      lastError: null,
    })
    expect(status.tasks.scan.nextRunAt).toBe(after(SCAN_INTERVAL_MS))
    expect(status.lastReconcile).toEqual({
      inserted: 1,
      updated: 1,
      unchanged: 1,
      missing: 0,
      purged: 0,
      finishedAt: NOW.toISOString(),
    })
  })

  it('keeps both tasks on their own intervals', async () => {
    await scheduler.start()

    await vi.advanceTimersByTimeAsync(RECONCILE_INTERVAL_MS)

    expect(reconcile).toHaveBeenCalledTimes(2)
    expect(scan).toHaveBeenCalledTimes(6)
  })

  it('backs off exponentially on recoverable failures, never below the interval', async () => {
    reconcile.mockRejectedValue(new SourceUnavailableError('Calendar feed unavailable: 503'))

    await scheduler.start()
    let status = scheduler.getStatus().tasks.reconcile
    expect(status.state).toBe('backoff')
    expect(status.consecutiveFailures).toBe(1)
    expect(status.lastError).toBe('Calendar feed unavailable: 503')
    expect(status.nextRunAt).toBe(after(RECONCILE_INTERVAL_MS))

    // Failures 2 and 3 still wait the interval (120s and 240s backoff are shorter)
    await vi.advanceTimersByTimeAsync(RECONCILE_INTERVAL_MS)
    await vi.advanceTimersByTimeAsync(RECONCILE_INTERVAL_MS)
    await vi.advanceTimersByTimeAsync(RECONCILE_INTERVAL_MS)

    status = scheduler.getStatus().tasks.reconcile
    expect(status.consecutiveFailures).toBe(4)
    expect(status.nextRunAt).toBe(after(480_000))
  })

  it('returns to idle after a failure once a run succeeds', async () => {
    reconcile.mockRejectedValueOnce(new SourceUnavailableError('Calendar feed unreachable: ECONNRESET'))

    await scheduler.start()
    expect(scheduler.getStatus().tasks.reconcile.state).toBe('backoff')

    await vi.advanceTimersByTimeAsync(RECONCILE_INTERVAL_MS)

    const status = scheduler.getStatus().tasks.reconcile
    expect(status.state).toBe('idle')
    expect(status.consecutiveFailures).toBe(0)
    expect(status.lastError).toBeNull()
  })

  it('waits at least as long as the source asked for', async () => {
    reconcile.mockRejectedValue(new SourceRateLimitedError('Calendar feed rate limit reached (429)', 900_000))

    await scheduler.start()

    expect(scheduler.getStatus().tasks.reconcile.nextRunAt).toBe(after(900_000))
  })

  it('pauses at the backoff ceiling and raises one alert per auth outage', async () => {
    reconcile.mockRejectedValue(new SourceAuthError('Calendar feed rejected credentials (401)'))

    await scheduler.start()
    expect(scheduler.getStatus().tasks.reconcile.nextRunAt).toBe(after(30 * 60_000))

    await vi.advanceTimersByTimeAsync(30 * 60_000)
    expect(reconcile).toHaveBeenCalledTimes(2)
    expect(alerts).toHaveLength(1)
    expect(alerts[0]).toMatchObject({
      kind: 'source-auth',
      state: 'raised',
      message: 'Calendar source rejected credentials: Calendar feed rejected credentials (401)',
    })

    reconcile.mockResolvedValue(reconcileResult())
    await vi.advanceTimersByTimeAsync(30 * 60_000)

    expect(alerts.map((a) => a.state)).toEqual(['raised', 'cleared'])
    expect(scheduler.getStatus().tasks.reconcile.state).toBe('idle')
  })

  it('keeps scanning while reconciliation is failing', async () => {
    reconcile.mockRejectedValue(new SourceUnavailableError('Calendar feed unavailable: 502'))

    await scheduler.start()
    await vi.advanceTimersByTimeAsync(3 * SCAN_INTERVAL_MS)

    expect(scan).toHaveBeenCalledTimes(4)
    expect(scheduler.getStatus().tasks.scan.state).toBe('idle')
  })

  it('puts the scan in backoff when the store fails', async () => {
    scan.mockRejectedValue(new StoreTransactionError('Store transaction failed: database is locked'))

    await scheduler.start()

    const status = scheduler.getStatus().tasks.scan
    expect(status.state).toBe('backoff')
    expect(status.lastError).toBe('Store transaction failed: database is locked')
    // Backoff of 60s on the first failure equals the scan interval
    expect(status.nextRunAt).toBe(after(60_000))
  })

  it('skips a manual run while the same task is in flight', async () => {
    const gate = deferred<ReconcileResult>()
    reconcile.mockReturnValueOnce(gate.promise)

    const first = scheduler.runReconciliation()
    expect(await scheduler.runReconciliation()).toBeNull()
    expect(scheduler.getStatus().tasks.reconcile.state).toBe('running')

    const result = reconcileResult({ inserted: 4 })
    gate.resolve(result)

    expect(await first).toBe(result)
    expect(reconcile).toHaveBeenCalledTimes(1)
  })

  it('does not schedule anything when runs are triggered before start', async () => {
    await scheduler.runReconciliation()

    expect(scheduler.getStatus().tasks.reconcile.nextRunAt).toBeNull()
    expect(vi.getTimerCount()).toBe(0)
  })

  it('waits for an in-flight pass on stop and leaves no timers behind', async () => {
    const gate = deferred<ReconcileResult>()
    reconcile.mockReturnValueOnce(gate.promise)

    const started = scheduler.start()
    let stopped = false
    const stopping = scheduler.stop().then(() => {
      stopped = true
    })

    await Promise.resolve()
    expect(stopped).toBe(false)

    gate.resolve(reconcileResult())
    await stopping
    await started

    expect(stopped).toBe(true)
    expect(scan).not.toHaveBeenCalled()
    expect(vi.getTimerCount()).toBe(0)
    expect(scheduler.getStatus().running).toBe(false)
  })
})
