/**
 * iCalendar Normalization
 *
 * The one place provider data becomes a RawEvent. Recurring events are
 * expanded into occurrences, each with its own stable external id.
 */

import IcalExpander from 'ical-expander'
import { DateTime } from 'luxon'
import type { RawEvent } from '../types.js'

const MAX_ITERATIONS = 1000

interface ICalTimeLike {
  toJSDate(): Date
  isDate: boolean
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  zone?: { tzid: string } | null
}

interface ICalEventLike {
  uid: string | null
  summary: string | null
  description: string | null
  location: string | null
  component: { getFirstPropertyValue(name: string): unknown }
}

export interface NormalizeOptions {
  /** Expansion window start */
  from: Date
  /** Expansion window end */
  to: Date
  /** IANA zone for all-day dates and floating times; defaults to UTC */
  timezone?: string
  /** Called for records that are dropped or look suspicious */
  onWarning?: (message: string) => void
}

/**
 * Parse an iCalendar document into the events and occurrences that
 * overlap [from, to]. Cancelled events are dropped, and so are records
 * ending before they start.
 */
export function normalizeIcs(ics: string, options: NormalizeOptions): RawEvent[] {
  const warn = options.onWarning ?? (() => {})
  const zone = options.timezone ?? 'UTC'
  const expander = new IcalExpander({ ics, maxIterations: MAX_ITERATIONS })
  const expanded = expander.between(options.from, options.to)

  const result: RawEvent[] = []

  for (const event of expanded.events) {
    if (!event.uid) {
      warn('Skipping event without UID')
      continue
    }
    const raw = toRawEvent(event.uid, event, event.startDate, event.endDate, zone, warn)
    if (raw) result.push(raw)
  }

  for (const occurrence of expanded.occurrences) {
    const uid = occurrence.item.uid
    if (!uid) {
      warn('Skipping recurring occurrence without UID')
      continue
    }
    // Keyed by the original slot so a moved occurrence keeps its id
    const slot = toInstant(occurrence.recurrenceId, zone)
    if (Number.isNaN(slot.getTime())) {
      warn(`Skipping occurrence of ${uid}: unparseable recurrence id`)
      continue
    }
    const externalId = `${uid}:${slot.toISOString()}`
    const raw = toRawEvent(externalId, occurrence.item, occurrence.startDate, occurrence.endDate, zone, warn)
    if (raw) result.push(raw)
  }

  return result
}

function toRawEvent(
  externalId: string,
  event: ICalEventLike,
  startDate: ICalTimeLike,
  endDate: ICalTimeLike | null,
  zone: string,
  warn: (message: string) => void,
): RawEvent | null {
  const status = event.component.getFirstPropertyValue('status')
  if (typeof status === 'string' && status.toUpperCase() === 'CANCELLED') {
    return null
  }

  const startsAt = toInstant(startDate, zone)
  const endsAt = endDate ? toInstant(endDate, zone) : startsAt

  if (Number.isNaN(startsAt.getTime()) || Number.isNaN(endsAt.getTime())) {
    warn(`Skipping ${externalId}: unparseable date`)
    return null
  }

  if (endsAt.getTime() < startsAt.getTime()) {
    warn(`Skipping ${externalId}: ends before it starts`)
    return null
  }

  return {
    externalId,
    title: cleanText(event.summary) ?? 'Untitled',
    description: cleanText(event.description),
    location: cleanText(event.location),
    startsAt,
    endsAt,
    allDay: startDate.isDate,
  }
}

/**
 * The instant a calendar time denotes. All-day dates start at midnight
 * in `zone` and floating times are read as wall time there; times with
 * a UTC or TZID anchor are already absolute.
 */
function toInstant(time: ICalTimeLike, zone: string): Date {
  if (time.isDate) {
    return DateTime.fromObject({ year: time.year, month: time.month, day: time.day }, { zone }).toJSDate()
  }
  if (time.zone?.tzid === 'floating') {
    return DateTime.fromObject(
      {
        year: time.year,
        month: time.month,
        day: time.day,
        hour: time.hour,
        minute: time.minute,
        second: time.second,
      },
      { zone },
    ).toJSDate()
  }
  return time.toJSDate()
}

function cleanText(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : null
}
