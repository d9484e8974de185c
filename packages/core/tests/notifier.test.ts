/**
 * Notifier Tests
 *
 * Message rendering and the delivery contract: retry until confirmed,
 * never confirm twice.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest'

import { EventStore } from '../src/reminders/event-store.js'
import { Notifier, type DeliverFn } from '../src/reminders/notifier.js'
import { Mutex } from '../src/utils/mutex.js'
import { DeliveryFailedError } from '../src/errors.js'
import type { RawEvent, StoredEvent } from '../src/reminders/types.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

function rawEvent(overrides: Partial<RawEvent> = {}): RawEvent {
  return {
    externalId: 'robotics',
    title: 'Robotics club',
    description: null,
    location: null,
    startsAt: new Date('2026-10-19T10:00:00.000Z'),
    endsAt: new Date('2026-10-19T11:00:00.000Z'),
    allDay: false,
    ...overrides,
  }
}

function stored(store: EventStore, raw: RawEvent): StoredEvent {
  return store.upsert(raw, new Date('2026-10-19T08:00:00.000Z')).event
}

const DESTINATION = '112233445566778899'

// -------------------------------------------------------------------
// Rendering
// -------------------------------------------------------------------

describe('Notifier', () => {
  let store: EventStore
  let now: Date
  let deliver: Mock<DeliverFn>

  function createNotifier(overrides: { timezone?: string } = {}): Notifier {
    return new Notifier({
      store,
      mutex: new Mutex(),
      deliver,
      destination: DESTINATION,
      leadWindowMs: 10 * 60_000,
      timezone: overrides.timezone ?? 'UTC',
      locale: 'en',
      now: () => now,
    })
  }

  beforeEach(() => {
    store = new EventStore(':memory:')
    now = new Date('2026-10-19T09:55:00.000Z')
    deliver = vi.fn<DeliverFn>().mockResolvedValue(undefined)
  })

  afterEach(() => {
    store.close()
  })

  describe('render', () => {
    it('shows the relative and absolute start time', () => {
      const event = stored(store, rawEvent())

      expect(createNotifier().render(event, now)).toBe(
        '🔔 **Robotics club** starts in 5 minutes (Monday 19 October 2026, 10:00 UTC)',
      )
    })

    it('uses the configured time zone for the absolute time', () => {
      const event = stored(store, rawEvent())

      expect(createNotifier({ timezone: 'Europe/Paris' }).render(event, now)).toBe(
        '🔔 **Robotics club** starts in 5 minutes (Monday 19 October 2026, 12:00 Europe/Paris)',
      )
    })

    it('says "started" once the start has passed', () => {
      const event = stored(store, rawEvent())

      expect(createNotifier().render(event, new Date('2026-10-19T10:02:00.000Z'))).toBe(
        '🔔 **Robotics club** started 2 minutes ago (Monday 19 October 2026, 10:00 UTC)',
      )
    })

    it('adds location and description lines', () => {
      const event = stored(
        store,
        rawEvent({ location: 'Lab B', description: 'Bring your laptop' }),
      )

      expect(createNotifier().render(event, now)).toBe(
        [
          '🔔 **Robotics club** starts in 5 minutes (Monday 19 October 2026, 10:00 UTC)',
          '📍 Lab B',
          'Bring your laptop',
        ].join('\n'),
      )
    })

    it('renders all-day events by calendar day', () => {
      const event = stored(
        store,
        rawEvent({
          externalId: 'fair',
          title: 'Club fair',
          startsAt: new Date('2026-10-20T00:00:00.000Z'),
          endsAt: new Date('2026-10-21T00:00:00.000Z'),
          allDay: true,
        }),
      )

      expect(createNotifier().render(event, now)).toBe(
        '🔔 **Club fair** starts tomorrow (Tuesday 20 October 2026)',
      )
    })

    it('truncates long descriptions', () => {
      const event = stored(store, rawEvent({ description: 'x'.repeat(2000) }))

      const lines = createNotifier().render(event, now).split('\n')

      expect(lines[1]).toHaveLength(1500)
      expect(lines[1].endsWith('…')).toBe(true)
    })
  })

  // -----------------------------------------------------------------
  // Delivery
  // -----------------------------------------------------------------

  describe('scan', () => {
    it('delivers a due event to the destination and marks it notified', async () => {
      stored(store, rawEvent())

      const result = await createNotifier().scan()

      expect(result).toEqual({ due: 1, delivered: 1, failed: 0 })
      expect(deliver).toHaveBeenCalledWith(DESTINATION, {
        content: '🔔 **Robotics club** starts in 5 minutes (Monday 19 October 2026, 10:00 UTC)',
      })
      expect(store.get('robotics')?.notified).toBe(true)
      expect(store.get('robotics')?.notifiedAt?.toISOString()).toBe(now.toISOString())
    })

    it('sends at most one notification per occurrence across scans', async () => {
      stored(store, rawEvent())
      const notifier = createNotifier()

      for (let i = 0; i < 5; i++) {
        await notifier.scan()
        now = new Date(now.getTime() + 60_000)
      }

      expect(deliver).toHaveBeenCalledTimes(1)
      expect(notifier.deliveredCount).toBe(1)
    })

    it('retries after failures and confirms exactly once', async () => {
      stored(store, rawEvent())
      deliver
        .mockRejectedValueOnce(new Error('Channel not connected: discord_main'))
        .mockRejectedValueOnce(new Error('Channel not connected: discord_main'))
        .mockRejectedValueOnce(new Error('Channel not connected: discord_main'))
      const notifier = createNotifier()

      const results = []
      for (let i = 0; i < 5; i++) {
        results.push(await notifier.scan())
      }

      expect(results.map((r) => r.failed)).toEqual([1, 1, 1, 0, 0])
      expect(results.map((r) => r.delivered)).toEqual([0, 0, 0, 1, 0])
      expect(deliver).toHaveBeenCalledTimes(4)

      const event = store.get('robotics')
      expect(event?.notified).toBe(true)
      expect(event?.deliveryAttempts).toBe(3)
      expect(event?.lastDeliveryError).toBeNull()
      expect(notifier.deliveredCount).toBe(1)
    })

    it('skips events outside the lead window', async () => {
      stored(store, rawEvent({ startsAt: new Date('2026-10-19T10:30:00.000Z') }))

      const result = await createNotifier().scan()

      expect(result).toEqual({ due: 0, delivered: 0, failed: 0 })
      expect(deliver).not.toHaveBeenCalled()
    })
  })

  describe('notify', () => {
    it('rejects with DeliveryFailedError and records the failure', async () => {
      const event = stored(store, rawEvent())
      deliver.mockRejectedValueOnce(new Error('Missing Access'))

      await expect(createNotifier().notify(event)).rejects.toBeInstanceOf(DeliveryFailedError)

      const after = store.get('robotics')
      expect(after?.notified).toBe(false)
      expect(after?.deliveryAttempts).toBe(1)
      expect(after?.lastDeliveryError).toBe('Missing Access')
    })
  })
})
