/**
 * ICS Feed Provider
 *
 * Reads a published iCalendar feed over HTTP (optionally behind Basic auth)
 * and maps HTTP failures onto the source error taxonomy.
 */

import type { SourceCredentials } from '../../config.js'
import {
  SourceAuthError,
  SourceRateLimitedError,
  SourceUnavailableError,
  errorMessage,
} from '../../errors.js'
import { createLogger } from '../../logger.js'
import type { EventProvider, RawEvent } from '../types.js'
import { normalizeIcs } from './normalize.js'

const log = createLogger('IcsProvider')

export interface IcsProviderOptions {
  url: string
  credentials?: SourceCredentials | null
  fetchFn?: typeof fetch
  /** Zone for all-day and floating times */
  timezone?: string
}

export class IcsFeedProvider implements EventProvider {
  readonly name = 'ics'
  private url: string
  private credentials: SourceCredentials | null
  private fetchFn: typeof fetch
  private timezone: string | undefined

  constructor(options: IcsProviderOptions) {
    this.url = options.url
    this.credentials = options.credentials ?? null
    this.fetchFn = options.fetchFn ?? fetch
    this.timezone = options.timezone
  }

  async fetchEvents(from: Date, to: Date): Promise<RawEvent[]> {
    const headers: Record<string, string> = {
      'User-Agent': 'Herald/0.1',
      Accept: 'text/calendar',
    }
    if (this.credentials) {
      const token = Buffer.from(`${this.credentials.username}:${this.credentials.password}`).toString('base64')
      headers.Authorization = `Basic ${token}`
    }

    let response: Response
    try {
      response = await this.fetchFn(this.url, { headers })
    } catch (err) {
      throw new SourceUnavailableError(`Calendar feed unreachable: ${errorMessage(err)}`, { cause: err })
    }

    if (response.status === 401 || response.status === 403) {
      throw new SourceAuthError(`Calendar feed rejected credentials (${response.status})`)
    }
    if (response.status === 429) {
      throw new SourceRateLimitedError(
        'Calendar feed rate limit reached (429)',
        parseRetryAfter(response.headers.get('retry-after')),
      )
    }
    if (!response.ok) {
      throw new SourceUnavailableError(`Calendar feed unavailable: ${response.status}`)
    }

    const body = await response.text()
    if (!body.includes('BEGIN:VCALENDAR')) {
      throw new SourceUnavailableError('Invalid ICS: missing VCALENDAR')
    }

    try {
      return normalizeIcs(body, {
        from,
        to,
        timezone: this.timezone,
        onWarning: (message) => log.warn(`[IcsProvider] ${message}`),
      })
    } catch (err) {
      throw new SourceUnavailableError(`Malformed calendar feed: ${errorMessage(err)}`, { cause: err })
    }
  }
}

/**
 * Retry-After is either delay-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (!value) return null

  const seconds = Number(value)
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000)
  }

  const date = Date.parse(value)
  if (Number.isNaN(date)) return null
  return Math.max(0, date - now)
}
