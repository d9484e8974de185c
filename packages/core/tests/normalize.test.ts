/**
 * iCalendar normalization tests
 */

import { describe, it, expect, vi } from 'vitest'

import { normalizeIcs } from '../src/reminders/source/normalize.js'
import { formatAbsolute } from '../src/reminders/format.js'

const WINDOW = {
  from: new Date('2026-10-01T00:00:00.000Z'),
  to: new Date('2026-12-31T00:00:00.000Z'),
}

function calendar(...events: string[][]): string {
  return [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//Test//Normalize//EN',
    ...events.flatMap((lines) => ['BEGIN:VEVENT', 'DTSTAMP:20261001T000000Z', ...lines, 'END:VEVENT']),
    'END:VCALENDAR',
    '',
  ].join('\r\n')
}

describe('normalizeIcs', () => {
  it('maps a single event with trimmed text fields', () => {
    const ics = calendar([
      'UID:game-night',
      'DTSTART:20261023T190000Z',
      'DTEND:20261023T220000Z',
      'SUMMARY:  Game night ',
      'LOCATION:Voice channel',
      'DESCRIPTION:Bring snacks',
    ])

    expect(normalizeIcs(ics, WINDOW)).toEqual([
      {
        externalId: 'game-night',
        title: 'Game night',
        description: 'Bring snacks',
        location: 'Voice channel',
        startsAt: new Date('2026-10-23T19:00:00.000Z'),
        endsAt: new Date('2026-10-23T22:00:00.000Z'),
        allDay: false,
      },
    ])
  })

  it('falls back to a placeholder title', () => {
    const ics = calendar(['UID:no-title', 'DTSTART:20261023T190000Z', 'DTEND:20261023T200000Z'])

    const [event] = normalizeIcs(ics, WINDOW)
    expect(event?.title).toBe('Untitled')
  })

  it('expands recurrences into occurrences keyed by their original slot', () => {
    const ics = calendar([
      'UID:weekly-1',
      'DTSTART:20261019T180000Z',
      'DTEND:20261019T190000Z',
      'RRULE:FREQ=WEEKLY;COUNT=3',
      'SUMMARY:Weekly sync',
    ])

    const events = normalizeIcs(ics, WINDOW)

    expect(events.map((e) => e.externalId)).toEqual([
      'weekly-1:2026-10-19T18:00:00.000Z',
      'weekly-1:2026-10-26T18:00:00.000Z',
      'weekly-1:2026-11-02T18:00:00.000Z',
    ])
    expect(events.map((e) => e.title)).toEqual(['Weekly sync', 'Weekly sync', 'Weekly sync'])
    expect(events[2]?.endsAt).toEqual(new Date('2026-11-02T19:00:00.000Z'))
  })

  it('drops cancelled events', () => {
    const ics = calendar(
      ['UID:kept', 'DTSTART:20261023T190000Z', 'DTEND:20261023T200000Z', 'SUMMARY:Kept'],
      ['UID:cancelled', 'DTSTART:20261024T190000Z', 'DTEND:20261024T200000Z', 'STATUS:CANCELLED'],
    )

    expect(normalizeIcs(ics, WINDOW).map((e) => e.externalId)).toEqual(['kept'])
  })

  it('flags all-day events', () => {
    const ics = calendar([
      'UID:holiday',
      'DTSTART;VALUE=DATE:20261102',
      'DTEND;VALUE=DATE:20261103',
      'SUMMARY:Server anniversary',
    ])

    const [event] = normalizeIcs(ics, WINDOW)
    expect(event?.allDay).toBe(true)
    expect(event?.title).toBe('Server anniversary')
    expect(event?.startsAt.toISOString()).toBe('2026-11-02T00:00:00.000Z')
    expect(event?.endsAt.toISOString()).toBe('2026-11-03T00:00:00.000Z')
  })

  it('starts all-day events at midnight in the configured zone', () => {
    const ics = calendar([
      'UID:hackathon',
      'DTSTART;VALUE=DATE:20261025',
      'DTEND;VALUE=DATE:20261026',
      'SUMMARY:Hackathon',
    ])

    const [event] = normalizeIcs(ics, { ...WINDOW, timezone: 'America/New_York' })
    expect(event?.startsAt.toISOString()).toBe('2026-10-25T04:00:00.000Z')
    expect(event?.endsAt.toISOString()).toBe('2026-10-26T04:00:00.000Z')
    expect(event && formatAbsolute(event.startsAt, event.allDay, 'America/New_York', 'en')).toBe(
      'Sunday 25 October 2026',
    )
  })

  it('reads floating times as wall time in the configured zone', () => {
    const ics = calendar(['UID:quiz', 'DTSTART:20261023T190000', 'DTEND:20261023T200000', 'SUMMARY:Quiz'])

    const [event] = normalizeIcs(ics, { ...WINDOW, timezone: 'Europe/Paris' })
    expect(event?.startsAt.toISOString()).toBe('2026-10-23T17:00:00.000Z')
    expect(event?.allDay).toBe(false)
  })

  it('keys all-day occurrences by their date in the configured zone', () => {
    const ics = calendar([
      'UID:cleanup',
      'DTSTART;VALUE=DATE:20261024',
      'DTEND;VALUE=DATE:20261025',
      'RRULE:FREQ=WEEKLY;COUNT=2',
      'SUMMARY:Channel cleanup',
    ])

    const ids = normalizeIcs(ics, { ...WINDOW, timezone: 'America/New_York' }).map((e) => e.externalId)
    expect(ids).toEqual(['cleanup:2026-10-24T04:00:00.000Z', 'cleanup:2026-10-31T04:00:00.000Z'])
  })

  it('skips and reports events that end before they start', () => {
    const onWarning = vi.fn<(message: string) => void>()
    const ics = calendar(['UID:backwards', 'DTSTART:20261023T200000Z', 'DTEND:20261023T190000Z'])

    expect(normalizeIcs(ics, { ...WINDOW, onWarning })).toEqual([])
    expect(onWarning).toHaveBeenCalledWith('Skipping backwards: ends before it starts')
  })

  it('ignores events outside the window', () => {
    const ics = calendar(['UID:next-year', 'DTSTART:20270310T180000Z', 'DTEND:20270310T190000Z'])

    expect(normalizeIcs(ics, WINDOW)).toEqual([])
  })
})
