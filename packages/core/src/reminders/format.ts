import { DateTime } from 'luxon'

/**
 * Absolute start time in the given zone, e.g.
 * "Monday 19 October 2026, 10:00 UTC"; all-day events drop the time.
 */
export function formatAbsolute(startsAt: Date, allDay: boolean, timezone: string, locale: string): string {
  const start = DateTime.fromJSDate(startsAt, { zone: timezone }).setLocale(locale)
  if (allDay) {
    return start.toFormat('cccc d LLLL yyyy')
  }
  return `${start.toFormat('cccc d LLLL yyyy, HH:mm')} ${start.zoneName ?? timezone}`
}

/**
 * Start time relative to `now`: "in 5 minutes", "5 minutes ago";
 * all-day events use calendar days ("today", "tomorrow").
 */
export function formatRelative(startsAt: Date, allDay: boolean, now: Date, timezone: string, locale: string): string {
  const start = DateTime.fromJSDate(startsAt, { zone: timezone }).setLocale(locale)
  const base = DateTime.fromJSDate(now, { zone: timezone }).setLocale(locale)
  const relative = allDay ? start.toRelativeCalendar({ base }) : start.toRelative({ base })
  return relative ?? start.toISO() ?? startsAt.toISOString()
}
