import { createHash } from 'node:crypto'
import type { RawEvent } from './types.js'

/**
 * Content fingerprint of the normalized fields. Field order is fixed so
 * the same event always hashes the same.
 */
export function hashEvent(event: RawEvent): string {
  const canonical = JSON.stringify({
    title: event.title,
    description: event.description,
    location: event.location,
    starts_at: event.startsAt.toISOString(),
    ends_at: event.endsAt.toISOString(),
    all_day: event.allDay,
  })
  return createHash('sha256').update(canonical).digest('hex')
}
