/**
 * Recurrence Rule
 *
 * A pure value describing "every N days / weeks / months", with optional
 * weekday and day-of-month selectors and an end date. Computes the next
 * occurrence after a date and bounded occurrence sequences, and round-trips
 * through a JSON wire format stored inside a task.
 */

import {
  type LocalDate,
  type WeekdayNumber,
  addDays,
  addMonths,
  dateOf,
  daysInMonth,
  isCalendarDate,
  makeDate,
  monthOf,
  parseDate,
  parseInstant,
  rollDate,
  toLocal,
  weekdayNumber,
  yearOf,
} from './time-date'
import { type Result, Ok, Err } from './result'
import { DecodeError, InvalidRuleError } from './errors'

export { DecodeError, InvalidRuleError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type RecurrenceFrequency = 'daily' | 'weekly' | 'monthly'

export type RecurrenceRule = {
  frequency: RecurrenceFrequency
  interval: number
  daysOfWeek?: WeekdayNumber[]
  dayOfMonth?: number
  endDate?: LocalDate
}

/**
 * How a monthly `dayOfMonth` beyond the length of a month is resolved.
 *
 * - `rollover`: the excess days carry into the next month (Feb 31 is Mar 3
 *   in a common year) before the interval is added.
 * - `clamp`: the day is pinned to the last day of the target month.
 */
export type MonthOverflowPolicy = 'rollover' | 'clamp'

export type RuleOptions = {
  monthOverflow?: MonthOverflowPolicy
}

export type RecurrenceRuleInput = {
  frequency: RecurrenceFrequency
  interval?: number
  daysOfWeek?: number[]
  dayOfMonth?: number
  endDate?: LocalDate
}

export const DEFAULT_OCCURRENCE_LIMIT = 100

const FREQUENCIES: readonly RecurrenceFrequency[] = ['daily', 'weekly', 'monthly']

// ============================================================================
// Construction
// ============================================================================

function isWeekdayNumber(n: number): n is WeekdayNumber {
  return Number.isInteger(n) && n >= 1 && n <= 7
}

function isFrequency(value: unknown): value is RecurrenceFrequency {
  return typeof value === 'string' && FREQUENCIES.some((f) => f === value)
}

function checkRule(input: RecurrenceRuleInput): string | null {
  const interval = input.interval ?? 1
  if (!Number.isInteger(interval) || interval < 1) {
    return `interval must be a positive integer, got ${interval}`
  }
  if (input.daysOfWeek !== undefined) {
    const bad = input.daysOfWeek.find((d) => !isWeekdayNumber(d))
    if (bad !== undefined) return `daysOfWeek entries must be 1-7, got ${bad}`
  }
  if (input.dayOfMonth !== undefined) {
    const d = input.dayOfMonth
    if (!Number.isInteger(d) || d < 1 || d > 31) return `dayOfMonth must be 1-31, got ${d}`
  }
  return null
}

function build(input: RecurrenceRuleInput): RecurrenceRule {
  const rule: RecurrenceRule = {
    frequency: input.frequency,
    interval: input.interval ?? 1,
  }
  if (input.daysOfWeek !== undefined) {
    rule.daysOfWeek = [...new Set(input.daysOfWeek.filter(isWeekdayNumber))].sort((a, b) => a - b)
  }
  if (input.dayOfMonth !== undefined) rule.dayOfMonth = input.dayOfMonth
  if (input.endDate !== undefined) rule.endDate = input.endDate
  return rule
}

export function createRecurrenceRule(input: RecurrenceRuleInput): RecurrenceRule {
  if (!isFrequency(input.frequency)) {
    throw new InvalidRuleError(`Unknown frequency: '${String(input.frequency)}'`)
  }
  const problem = checkRule(input)
  if (problem !== null) throw new InvalidRuleError(problem)
  return build(input)
}

export const daily = (interval = 1, endDate?: LocalDate): RecurrenceRule =>
  createRecurrenceRule({ frequency: 'daily', interval, ...(endDate ? { endDate } : {}) })

export const weekly = (interval = 1, daysOfWeek?: number[], endDate?: LocalDate): RecurrenceRule =>
  createRecurrenceRule({
    frequency: 'weekly',
    interval,
    ...(daysOfWeek ? { daysOfWeek } : {}),
    ...(endDate ? { endDate } : {}),
  })

export const monthly = (interval = 1, dayOfMonth?: number, endDate?: LocalDate): RecurrenceRule =>
  createRecurrenceRule({
    frequency: 'monthly',
    interval,
    ...(dayOfMonth !== undefined ? { dayOfMonth } : {}),
    ...(endDate ? { endDate } : {}),
  })

// ============================================================================
// Occurrence Computation
// ============================================================================

export function nextOccurrence(
  rule: RecurrenceRule,
  after: LocalDate,
  options?: RuleOptions
): LocalDate | null {
  if (rule.endDate !== undefined && after >= rule.endDate) return null

  const next = step(rule, after, options?.monthOverflow ?? 'rollover')
  return next !== null && isCalendarDate(next) ? next : null
}

function step(rule: RecurrenceRule, after: LocalDate, policy: MonthOverflowPolicy): LocalDate | null {
  switch (rule.frequency) {
    case 'daily':
      return addDays(after, rule.interval)
    case 'weekly':
      return nextWeekly(rule, after)
    case 'monthly':
      return nextMonthly(rule, after, policy)
  }
}

function nextWeekly(rule: RecurrenceRule, after: LocalDate): LocalDate | null {
  const days = rule.daysOfWeek
  if (days === undefined || days.length === 0) {
    return addDays(after, 7 * rule.interval)
  }

  // Non-member days step by one; member days jump a week until
  // interval - 1 jumps are used, then the next member day is the result.
  let candidate = addDays(after, 1)
  let weeksJumped = 0
  for (;;) {
    if (!isCalendarDate(candidate)) return null
    if (!days.includes(weekdayNumber(candidate))) {
      candidate = addDays(candidate, 1)
    } else if (weeksJumped < rule.interval - 1) {
      candidate = addDays(candidate, 7)
      weeksJumped++
    } else {
      return candidate
    }
  }
}

function nextMonthly(rule: RecurrenceRule, after: LocalDate, policy: MonthOverflowPolicy): LocalDate {
  const dom = rule.dayOfMonth
  if (dom === undefined) return addMonths(after, rule.interval)

  if (policy === 'rollover') {
    return addMonths(rollDate(yearOf(after), monthOf(after), dom), rule.interval)
  }

  const target = addMonths(makeDate(yearOf(after), monthOf(after), 1), rule.interval)
  const year = yearOf(target)
  const month = monthOf(target)
  return makeDate(year, month, Math.min(dom, daysInMonth(year, month)))
}

export function occurrences(
  rule: RecurrenceRule,
  from: LocalDate,
  to: LocalDate,
  limit: number = DEFAULT_OCCURRENCE_LIMIT,
  options?: RuleOptions
): LocalDate[] {
  const dates: LocalDate[] = []
  let current = from
  while (dates.length < limit) {
    const next = nextOccurrence(rule, current, options)
    if (next === null || next > to) break
    dates.push(next)
    current = next
  }
  return dates
}

// ============================================================================
// Description
// ============================================================================

const SHORT_WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const

export function describeRule(rule: RecurrenceRule): string {
  const n = rule.interval
  switch (rule.frequency) {
    case 'daily':
      return n === 1 ? 'Daily' : `Every ${n} days`
    case 'weekly': {
      const days = rule.daysOfWeek ?? []
      if (days.length === 0) return n === 1 ? 'Weekly' : `Every ${n} weeks`
      const names = days.map((d) => SHORT_WEEKDAYS[d - 1]).join(', ')
      return n === 1 ? `Weekly on ${names}` : `Every ${n} weeks on ${names}`
    }
    case 'monthly': {
      const day = rule.dayOfMonth
      if (day === undefined) return n === 1 ? 'Monthly' : `Every ${n} months`
      return n === 1 ? `Monthly on day ${day}` : `Every ${n} months on day ${day}`
    }
  }
}

// ============================================================================
// Wire Format
// ============================================================================

type WireRule = {
  frequency: RecurrenceFrequency
  interval: number
  daysOfWeek?: number[]
  dayOfMonth?: number
  endDate?: string
}

export function encodeRule(rule: RecurrenceRule): string {
  const wire: WireRule = { frequency: rule.frequency, interval: rule.interval }
  if (rule.daysOfWeek !== undefined) wire.daysOfWeek = [...rule.daysOfWeek].sort((a, b) => a - b)
  if (rule.dayOfMonth !== undefined) wire.dayOfMonth = rule.dayOfMonth
  if (rule.endDate !== undefined) wire.endDate = rule.endDate
  return JSON.stringify(wire)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function decodeEndDate(value: string, timezone: string): LocalDate | null {
  const asDate = parseDate(value)
  if (asDate.ok) return asDate.value
  const asInstant = parseInstant(value)
  if (asInstant.ok) return dateOf(toLocal(asInstant.value, timezone))
  return null
}

export type DecodeRuleOptions = {
  /** Timezone used to resolve an `endDate` written as an instant. */
  timezone?: string
}

export function decodeRule(text: string, options?: DecodeRuleOptions): Result<RecurrenceRule, DecodeError> {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (e) {
    return Err(new DecodeError(`Recurrence rule is not valid JSON: ${e instanceof Error ? e.message : String(e)}`))
  }
  if (!isRecord(raw)) return Err(new DecodeError('Recurrence rule must be a JSON object'))

  const { frequency, interval, daysOfWeek, dayOfMonth, endDate } = raw
  if (!isFrequency(frequency)) {
    return Err(new DecodeError(`Unknown recurrence frequency: ${JSON.stringify(frequency)}`))
  }
  if (typeof interval !== 'number') {
    return Err(new DecodeError('Recurrence interval must be a number'))
  }

  const input: RecurrenceRuleInput = { frequency, interval }

  if (daysOfWeek !== undefined && daysOfWeek !== null) {
    if (!Array.isArray(daysOfWeek) || !daysOfWeek.every((d): d is number => typeof d === 'number')) {
      return Err(new DecodeError('daysOfWeek must be an array of numbers'))
    }
    input.daysOfWeek = daysOfWeek
  }
  if (dayOfMonth !== undefined && dayOfMonth !== null) {
    if (typeof dayOfMonth !== 'number') return Err(new DecodeError('dayOfMonth must be a number'))
    input.dayOfMonth = dayOfMonth
  }
  if (endDate !== undefined && endDate !== null) {
    if (typeof endDate !== 'string') return Err(new DecodeError('endDate must be a string'))
    const parsed = decodeEndDate(endDate, options?.timezone ?? 'UTC')
    if (parsed === null) return Err(new DecodeError(`Invalid recurrence endDate: '${endDate}'`))
    input.endDate = parsed
  }

  const problem = checkRule(input)
  if (problem !== null) return Err(new DecodeError(`Invalid recurrence rule: ${problem}`))
  return Ok(build(input))
}
