/**
 * Calendar Context
 *
 * The explicit timezone + clock pair every day-granularity computation runs
 * against. Nothing in the engine reads the process timezone.
 */

import {
  type LocalDate,
  type LocalDateTime,
  type LocalTime,
  addDays,
  dateOf,
  fromInstant,
  hourOf,
  makeDateTime,
  makeTime,
  minuteOf,
  timeOf,
  toInstant,
  toLocal,
  toUTC,
} from './time-date'
import { ValidationError } from './errors'

export type Clock = () => Date

export type CalendarContext = {
  readonly timezone: string
  readonly clock: Clock
}

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

export function createCalendar(timezone: string, clock: Clock = () => new Date()): CalendarContext {
  if (!isValidTimezone(timezone)) {
    throw new ValidationError(`Invalid timezone: '${timezone}'`)
  }
  return { timezone, clock }
}

/** Current instant as a UTC LocalDateTime. */
export function nowUtc(calendar: CalendarContext): LocalDateTime {
  return fromInstant(calendar.clock())
}

export function today(calendar: CalendarContext): LocalDate {
  return dateOf(toLocal(nowUtc(calendar), calendar.timezone))
}

export function yesterday(calendar: CalendarContext): LocalDate {
  return addDays(today(calendar), -1)
}

/** Wall-clock hour and minute of a UTC instant in the calendar's timezone. */
export function localTimeOfDay(calendar: CalendarContext, utc: LocalDateTime): LocalTime {
  const local = timeOf(toLocal(utc, calendar.timezone))
  return makeTime(hourOf(local), minuteOf(local))
}

/**
 * Places a wall-clock time on a calendar date in the calendar's timezone.
 * Returns the UTC LocalDateTime and the equivalent JS Date.
 */
export function instantOn(
  calendar: CalendarContext,
  date: LocalDate,
  time: LocalTime
): { utc: LocalDateTime; at: Date } {
  const utc = toUTC(makeDateTime(date, time), calendar.timezone)
  return { utc, at: toInstant(utc) }
}
