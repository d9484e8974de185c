/**
 * CalDAV Provider
 *
 * Reads one calendar collection through tsdav and normalizes its
 * iCalendar objects. The DAV client is cached and dropped after any
 * failure so the next pass logs in again.
 */

import { createDAVClient, type DAVCalendar } from 'tsdav'
import type { SourceCredentials } from '../../config.js'
import { SourceUnavailableError } from '../../errors.js'
import { createLogger } from '../../logger.js'
import type { EventProvider, RawEvent } from '../types.js'
import { normalizeIcs } from './normalize.js'
import { classifySourceError } from './classify.js'

type DAVClientInstance = Awaited<ReturnType<typeof createDAVClient>>

const log = createLogger('CalDavProvider')

export interface CalDavProviderOptions {
  serverUrl: string
  /** Collection id: last path segment of the calendar URL */
  calendarId: string
  credentials: SourceCredentials
  /** Zone for all-day and floating times */
  timezone?: string
}

export class CalDavProvider implements EventProvider {
  readonly name = 'caldav'
  private options: CalDavProviderOptions
  private client: DAVClientInstance | null = null

  constructor(options: CalDavProviderOptions) {
    this.options = options
  }

  async fetchEvents(from: Date, to: Date): Promise<RawEvent[]> {
    try {
      const client = await this.getClient()
      const calendar = await this.findCalendar(client)

      const objects = await client.fetchCalendarObjects({
        calendar,
        timeRange: { start: from.toISOString(), end: to.toISOString() },
      })

      const events: RawEvent[] = []
      for (const obj of objects) {
        if (typeof obj.data !== 'string') continue
        events.push(
          ...normalizeIcs(obj.data, {
            from,
            to,
            timezone: this.options.timezone,
            onWarning: (message) => log.warn(`[CalDavProvider] ${message} (${obj.url})`),
          }),
        )
      }

      // Fetch order is kept: on a duplicate id the later record wins
      return events
    } catch (err) {
      this.client = null
      throw classifySourceError(err)
    }
  }

  private async getClient(): Promise<DAVClientInstance> {
    if (this.client) {
      return this.client
    }

    this.client = await createDAVClient({
      serverUrl: this.options.serverUrl,
      credentials: {
        username: this.options.credentials.username,
        password: this.options.credentials.password,
      },
      authMethod: 'Basic',
      defaultAccountType: 'caldav',
    })

    return this.client
  }

  private async findCalendar(client: DAVClientInstance): Promise<DAVCalendar> {
    const calendars = await client.fetchCalendars()
    for (const calendar of calendars) {
      const urlParts = calendar.url.replace(/\/$/, '').split('/')
      if (urlParts[urlParts.length - 1] === this.options.calendarId) {
        return calendar
      }
    }
    throw new SourceUnavailableError(`Calendar not found: ${this.options.calendarId}`)
  }
}
