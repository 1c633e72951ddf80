/**
 * Time & Date Utilities
 *
 * Pure functions for day-granularity calendar arithmetic, parsing and
 * timezone conversion. Dates are branded ISO strings; arithmetic goes through
 * Julian Day Numbers so month lengths never leak into day offsets.
 * Timezone support comes from Intl.DateTimeFormat.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string without offset: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

/** Weekday number, 1 = Sunday … 7 = Saturday */
export type WeekdayNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7

// ============================================================================
// Helpers
// ============================================================================

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 31
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

function pad4(n: number): string {
  return String(n).padStart(4, '0')
}

function int(s: string | undefined): number {
  return s === undefined ? NaN : parseInt(s, 10)
}

// ============================================================================
// Julian Day Number
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  return {
    year: 100 * b + d - 4800 + Math.floor(m / 10),
    month: m + 3 - 12 * Math.floor(m / 10),
    day: e - Math.floor((153 * m + 2) / 5) + 1,
  }
}

function toJDN(date: LocalDate): number {
  return dateToJDN(yearOf(date), monthOf(date), dayOf(date))
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = int(match[1])
  const month = int(match[2])
  const day = int(match[3])

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = int(match[1])
  const minute = int(match[2])
  const second = match[3] !== undefined ? int(match[3]) : 0

  if (hour > 23) return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59) return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59) return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
}

/**
 * Parses an ISO 8601 timestamp carrying an offset (`Z` or `±hh:mm`) and
 * returns the same instant as a UTC LocalDateTime. Fractional seconds are
 * dropped. A timestamp without an offset is rejected.
 */
export function parseInstant(str: string): Result<LocalDateTime, ParseError> {
  const match = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})(?:\.\d+)?(Z|[+-]\d{2}:\d{2})$/.exec(str)
  if (!match || match[1] === undefined || match[2] === undefined || match[3] === undefined) {
    return Err(new ParseError(`Invalid instant: '${str}'`))
  }

  const local = parseDateTime(`${match[1]}T${match[2]}`)
  if (!local.ok) return Err(new ParseError(`Invalid instant: '${str}'`))

  const offset = match[3]
  if (offset === 'Z') return Ok(local.value)

  const sign = offset.startsWith('-') ? -1 : 1
  const hours = int(offset.substring(1, 3))
  const minutes = int(offset.substring(4, 6))
  if (hours > 23 || minutes > 59) return Err(new ParseError(`Invalid offset in instant: '${str}'`))
  return Ok(addMinutes(local.value, -sign * (hours * 60 + minutes)))
}

// ============================================================================
// Construction & Component Extraction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

/**
 * Whether a date has the four-digit year that `YYYY-MM-DD` ordering relies
 * on. Arithmetic past year 9999 yields a longer string that sorts wrongly.
 */
export function isCalendarDate(date: LocalDate): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(date)
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

// ============================================================================
// Date Arithmetic
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const { year, month, day } = jdnToDate(toJDN(date) + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return toJDN(b) - toJDN(a)
}

/**
 * Adds calendar months. The day is clamped to the length of the target
 * month, so Jan 31 + 1 month is the last day of February.
 */
export function addMonths(date: LocalDate, n: number): LocalDate {
  const index = yearOf(date) * 12 + (monthOf(date) - 1) + n
  const year = Math.floor(index / 12)
  const month = index - year * 12 + 1
  return makeDate(year, month, Math.min(dayOf(date), daysInMonth(year, month)))
}

/**
 * Builds a date from components the way a lenient calendar does: a day past
 * the end of the month carries into the following month(s).
 */
export function rollDate(year: number, month: number, day: number): LocalDate {
  return addDays(makeDate(year, month, 1), day - 1)
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  const time = timeOf(dt)
  let totalMinutes = hourOf(time) * 60 + minuteOf(time) + n

  // Floor division keeps negative offsets on the previous day
  const dayDelta = Math.floor(totalMinutes / 1440)
  totalMinutes = totalMinutes - dayDelta * 1440

  const date = dayDelta === 0 ? dateOf(dt) : addDays(dateOf(dt), dayDelta)
  return makeDateTime(date, makeTime(Math.floor(totalMinutes / 60), totalMinutes % 60, secondOf(time)))
}

// ============================================================================
// Day-of-Week
// ============================================================================

const WEEKDAY_NUMBERS: readonly WeekdayNumber[] = [2, 3, 4, 5, 6, 7, 1]

/** Weekday of a date, 1 = Sunday … 7 = Saturday. */
export function weekdayNumber(date: LocalDate): WeekdayNumber {
  // JDN mod 7 is 0 on a Monday
  return WEEKDAY_NUMBERS[((toJDN(date) % 7) + 7) % 7] ?? 1
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

// ============================================================================
// Instants & Timezone Conversion
// ============================================================================

/** UTC LocalDateTime of a JS Date (second precision). */
export function fromInstant(instant: Date): LocalDateTime {
  return msToDt(Math.floor(instant.getTime() / 1000) * 1000)
}

/** JS Date of a UTC LocalDateTime. */
export function toInstant(utc: LocalDateTime): Date {
  return new Date(dtToMs(utc))
}

/** Given a UTC epoch in ms, return the UTC offset in minutes for timezone tz */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  })

  const parts = formatter.formatToParts(new Date(utcMs))
  const get = (type: Intl.DateTimeFormatPartTypes) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  const h = get('hour') % 24
  const localMs = Date.UTC(get('year'), get('month') - 1, get('day'), h, get('minute'), get('second'))
  return (localMs - utcMs) / 60000
}

function dtToMs(dt: LocalDateTime): number {
  const d = dateOf(dt), t = timeOf(dt)
  return Date.UTC(yearOf(d), monthOf(d) - 1, dayOf(d), hourOf(t), minuteOf(t), secondOf(t))
}

function msToDt(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds())
  )
}

export function toLocal(utc: LocalDateTime, tz: string): LocalDateTime {
  const utcMs = dtToMs(utc)
  return msToDt(utcMs + utcOffsetAtMs(utcMs, tz) * 60000)
}

/**
 * Converts a wall-clock time in `tz` to UTC. Times inside a spring-forward
 * gap resolve to the first instant after the transition; ambiguous
 * fall-back times resolve to standard time.
 */
export function toUTC(local: LocalDateTime, tz: string): LocalDateTime {
  if (tz === 'UTC') return local

  const localMs = dtToMs(local)
  const year = yearOf(dateOf(local))
  const janOffset = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const julOffset = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)

  if (janOffset === julOffset) return msToDt(localMs - janOffset * 60000)

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)

  const utcViaStd = localMs - stdOffset * 60000
  const utcViaDst = localMs - dstOffset * 60000
  const stdMapsBack = utcViaStd + utcOffsetAtMs(utcViaStd, tz) * 60000 === localMs
  const dstMapsBack = utcViaDst + utcOffsetAtMs(utcViaDst, tz) * 60000 === localMs

  if (stdMapsBack) return msToDt(utcViaStd)
  if (dstMapsBack) return msToDt(utcViaDst)

  // Gap: transitions are minute-aligned
  for (let ms = utcViaDst; ms <= utcViaStd; ms += 60000) {
    if (utcOffsetAtMs(ms, tz) !== stdOffset) return msToDt(ms)
  }
  return msToDt(utcViaStd)
}
