/**
 * Notifier
 *
 * Renders due events into reminder messages, delivers them to the chat
 * surface and writes the outcome back to the store. An event is marked
 * notified only after the surface confirmed delivery; a failed delivery
 * leaves it due, so the next scan retries it.
 */

import type { OutgoingMessage } from '../channels/types.js'
import { DeliveryFailedError, errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import type { Mutex } from '../utils/mutex.js'
import type { EventStore } from './event-store.js'
import { formatAbsolute, formatRelative } from './format.js'
import type { ScanResult, StoredEvent } from './types.js'

const log = createLogger('Notifier')

const MAX_DESCRIPTION_LENGTH = 1500

/** Delivers text to a chat destination; rejects when it was not accepted */
export type DeliverFn = (to: string, message: OutgoingMessage) => Promise<void>

export interface NotifierOptions {
  store: EventStore
  /** Shared with the reconciler */
  mutex: Mutex
  deliver: DeliverFn
  /** Platform destination, e.g. a Discord channel id */
  destination: string
  leadWindowMs: number
  /** IANA zone used for absolute times, e.g. "Europe/Paris" */
  timezone: string
  locale: string
  now?: () => Date
}

export class Notifier {
  private store: EventStore
  private mutex: Mutex
  private deliver: DeliverFn
  private destination: string
  private leadWindowMs: number
  private timezone: string
  private locale: string
  private now: () => Date
  private delivered = 0

  constructor(options: NotifierOptions) {
    this.store = options.store
    this.mutex = options.mutex
    this.deliver = options.deliver
    this.destination = options.destination
    this.leadWindowMs = options.leadWindowMs
    this.timezone = options.timezone
    this.locale = options.locale
    this.now = options.now ?? (() => new Date())
  }

  /** Reminders confirmed since startup */
  get deliveredCount(): number {
    return this.delivered
  }

  /**
   * Deliver every due event, earliest first. Delivery failures are
   * counted, not thrown; store failures propagate to the scheduler.
   */
  async scan(): Promise<ScanResult> {
    const now = this.now()
    const due = await this.mutex.runExclusive(() => this.store.dueForNotification(now, this.leadWindowMs))

    const result: ScanResult = { due: due.length, delivered: 0, failed: 0 }

    for (const event of due) {
      try {
        await this.notify(event)
        result.delivered++
      } catch (err) {
        if (!(err instanceof DeliveryFailedError)) throw err
        result.failed++
      }
    }

    if (result.due > 0) {
      log.info(`[Notifier] Scan: ${result.due} due, ${result.delivered} delivered, ${result.failed} failed`)
    }

    return result
  }

  /**
   * Deliver one reminder and confirm it in the store.
   * Rejects with DeliveryFailedError when the chat surface did not accept it.
   */
  async notify(event: StoredEvent): Promise<void> {
    const content = this.render(event, this.now())

    try {
      await this.deliver(this.destination, { content })
    } catch (err) {
      const message = errorMessage(err)
      await this.mutex.runExclusive(() => this.store.recordDeliveryFailure(event.externalId, message))
      log.warn(`[Notifier] Delivery of "${event.title}" (${event.externalId}) failed, will retry: ${message}`)
      throw new DeliveryFailedError(`Delivery failed for ${event.externalId}: ${message}`, { cause: err })
    }

    const marked = await this.mutex.runExclusive(() => this.store.markNotified(event.externalId, this.now()))
    if (marked) {
      this.delivered++
      log.info(`[Notifier] Reminder sent for "${event.title}" (${event.externalId})`)
    } else {
      log.warn(`[Notifier] ${event.externalId} was already notified or no longer stored`)
    }
  }

  /**
   * Message text for an event, with its start time relative to `now`
   * and in absolute form in the configured zone.
   */
  render(event: StoredEvent, now: Date): string {
    const started = event.startsAt.getTime() <= now.getTime()
    const relative = formatRelative(event.startsAt, event.allDay, now, this.timezone, this.locale)
    const absolute = formatAbsolute(event.startsAt, event.allDay, this.timezone, this.locale)
    const when = `${started ? 'started' : 'starts'} ${relative} (${absolute})`

    const lines = [`🔔 **${event.title}** ${when}`]
    if (event.location) {
      lines.push(`📍 ${event.location}`)
    }
    if (event.description) {
      lines.push(truncate(event.description, MAX_DESCRIPTION_LENGTH))
    }
    return lines.join('\n')
  }
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`
}
