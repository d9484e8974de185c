// ical-expander ships no type declarations; this covers the surface we use.
declare module 'ical-expander' {
  interface ICalTimezone {
    tzid: string
  }

  interface ICalTime {
    toJSDate(): Date
    isDate: boolean
    year: number
    /** 1-based */
    month: number
    day: number
    hour: number
    minute: number
    second: number
    zone?: ICalTimezone | null
  }

  interface ICalComponent {
    getFirstPropertyValue(name: string): unknown
  }

  interface ICalEvent {
    uid: string | null
    summary: string | null
    description: string | null
    location: string | null
    startDate: ICalTime
    endDate: ICalTime
    component: ICalComponent
  }

  interface ICalOccurrence {
    recurrenceId: ICalTime
    item: ICalEvent
    startDate: ICalTime
    endDate: ICalTime
  }

  interface ICalExpanderResult {
    events: ICalEvent[]
    occurrences: ICalOccurrence[]
  }

  interface IcalExpanderOptions {
    ics: string
    maxIterations?: number
    skipInvalidDates?: boolean
  }

  export default class IcalExpander {
    constructor(options: IcalExpanderOptions)
    between(after?: Date, before?: Date): ICalExpanderResult
    all(): ICalExpanderResult
  }
}
