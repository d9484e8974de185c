/**
 * Integration Test — Reconcile, scan, reconcile
 *
 * Drives the reconciler and notifier the way the scheduler does, on a
 * shared store, mutex and clock.
 */

import { describe, it, expect, afterEach, vi, type Mock } from 'vitest'

import { EventStore } from '../src/reminders/event-store.js'
import { Reconciler } from '../src/reminders/reconciler.js'
import { Notifier, type DeliverFn } from '../src/reminders/notifier.js'
import { Mutex } from '../src/utils/mutex.js'
import { StoreTransactionError } from '../src/errors.js'
import type { RawEvent, ScanResult } from '../src/reminders/types.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

const EVENT_A: RawEvent = {
  externalId: 'event-a',
  title: 'Weekly standup',
  description: null,
  location: null,
  startsAt: new Date('2026-10-19T10:00:00.000Z'),
  endsAt: new Date('2026-10-19T10:30:00.000Z'),
  allDay: false,
}

const EVENT_B: RawEvent = {
  ...EVENT_A,
  externalId: 'event-b',
  title: 'Release party',
  startsAt: new Date('2026-10-19T10:05:00.000Z'),
  endsAt: new Date('2026-10-19T11:00:00.000Z'),
}

interface Harness {
  store: EventStore
  mutex: Mutex
  reconciler: Reconciler
  notifier: Notifier
  deliver: Mock<DeliverFn>
  /** Events the source returns on the next fetch */
  snapshot: RawEvent[]
  setNow(at: string): void
}

let open: EventStore[] = []

function createHarness(start: string): Harness {
  let now = new Date(start)
  const clock = () => now

  const store = new EventStore(':memory:')
  open.push(store)
  const mutex = new Mutex()
  const deliver = vi.fn<DeliverFn>().mockResolvedValue(undefined)

  const harness: Harness = {
    store,
    mutex,
    deliver,
    snapshot: [],
    setNow: (at) => {
      now = new Date(at)
    },
    reconciler: new Reconciler({
      store,
      source: {
        fetchSnapshot: async () => ({ events: [...harness.snapshot], fetchedAt: clock(), provider: 'fake' }),
      },
      mutex,
      missingStreakThreshold: 3,
      renotifyOnReschedule: true,
      now: clock,
    }),
    notifier: new Notifier({
      store,
      mutex,
      deliver,
      destination: 'reminders-channel',
      leadWindowMs: 10 * 60_000,
      timezone: 'UTC',
      locale: 'en',
      now: clock,
    }),
  }
  return harness
}

afterEach(() => {
  for (const store of open) store.close()
  open = []
})

// -------------------------------------------------------------------
// Flow
// -------------------------------------------------------------------

describe('reminder flow', () => {
  it('notifies once at the lead window and keeps the state through later passes', async () => {
    const h = createHarness('2026-10-19T09:00:00.000Z')
    h.snapshot = [EVENT_A]

    // Tick 1: A appears, too early to notify
    const first = await h.reconciler.reconcile()
    expect(first.inserted).toBe(1)
    expect(await h.notifier.scan()).toEqual({ due: 0, delivered: 0, failed: 0 })
    expect(h.store.get('event-a')?.notified).toBe(false)

    // Tick 2: 9:55 with a 10 minute lead window
    h.setNow('2026-10-19T09:55:00.000Z')
    expect(await h.notifier.scan()).toEqual({ due: 1, delivered: 1, failed: 0 })
    expect(h.deliver).toHaveBeenCalledTimes(1)
    expect(h.store.get('event-a')?.notified).toBe(true)

    // Tick 3: unchanged A, no revision bump, still notified
    h.setNow('2026-10-19T09:57:00.000Z')
    const third = await h.reconciler.reconcile()
    expect(third.unchanged).toBe(1)
    expect(third.updated).toBe(0)

    const a = h.store.get('event-a')
    expect(a?.revision).toBe(0)
    expect(a?.notified).toBe(true)

    expect(await h.notifier.scan()).toEqual({ due: 0, delivered: 0, failed: 0 })
    expect(h.deliver).toHaveBeenCalledTimes(1)
  })

  it('does not remind an event that dropped out of the source until it comes back', async () => {
    const h = createHarness('2026-10-19T09:00:00.000Z')
    h.snapshot = [EVENT_A]
    await h.reconciler.reconcile()

    // Cancelled upstream: the feed stops listing it
    h.snapshot = []
    h.setNow('2026-10-19T09:50:00.000Z')
    await h.reconciler.reconcile()
    expect(h.store.get('event-a')?.missingStreak).toBe(1)

    h.setNow('2026-10-19T09:55:00.000Z')
    expect(await h.notifier.scan()).toEqual({ due: 0, delivered: 0, failed: 0 })
    expect(h.deliver).not.toHaveBeenCalled()

    // Reinstated
    h.snapshot = [EVENT_A]
    h.setNow('2026-10-19T09:56:00.000Z')
    await h.reconciler.reconcile()

    expect(await h.notifier.scan()).toEqual({ due: 1, delivered: 1, failed: 0 })
  })
})

// -------------------------------------------------------------------
// Concurrency
// -------------------------------------------------------------------

describe('scan during a reconciliation pass', () => {
  it('waits for the pass and sees all of it', async () => {
    const h = createHarness('2026-10-19T09:55:00.000Z')
    h.snapshot = [EVENT_A, EVENT_B]

    const upsert = h.store.upsert.bind(h.store)
    let concurrentScan: Promise<ScanResult> | null = null
    let lockedWhenStarted = false
    vi.spyOn(h.store, 'upsert').mockImplementation((raw, at) => {
      if (!concurrentScan) {
        lockedWhenStarted = h.mutex.locked
        concurrentScan = h.notifier.scan()
      }
      return upsert(raw, at)
    })

    const pass = await h.reconciler.reconcile()

    expect(pass.inserted).toBe(2)
    expect(lockedWhenStarted).toBe(true)
    expect(await concurrentScan).toEqual({ due: 2, delivered: 2, failed: 0 })
    expect(h.deliver.mock.calls.map(([, message]) => message.content.split('\n')[0])).toEqual([
      '🔔 **Weekly standup** starts in 5 minutes (Monday 19 October 2026, 10:00 UTC)',
      '🔔 **Release party** starts in 10 minutes (Monday 19 October 2026, 10:05 UTC)',
    ])
  })

  it('sees nothing of a pass that rolled back', async () => {
    const h = createHarness('2026-10-19T09:55:00.000Z')
    h.snapshot = [EVENT_A, EVENT_B]

    const upsert = h.store.upsert.bind(h.store)
    let concurrentScan: Promise<ScanResult> | null = null
    vi.spyOn(h.store, 'upsert').mockImplementation((raw, at) => {
      if (concurrentScan) {
        throw new Error('disk I/O error')
      }
      concurrentScan = h.notifier.scan()
      return upsert(raw, at)
    })

    await expect(h.reconciler.reconcile()).rejects.toThrow(StoreTransactionError)

    expect(await concurrentScan).toEqual({ due: 0, delivered: 0, failed: 0 })
    expect(h.store.count()).toBe(0)
    expect(h.deliver).not.toHaveBeenCalled()
  })
})
