/**
 * daylog-engine
 *
 * Public API exports
 */

// Error system
export {
  DaylogError, DaylogErrorCode,
  DuplicateKeyError, NotFoundError, ForeignKeyError,
  DecodeError, PersistenceError, NotificationSchedulingError,
  ValidationError, InvalidRuleError, ParseError,
  errorMessage,
} from './errors'
export type { DaylogErrorCode as DaylogErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, WeekdayNumber } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseTime, parseDateTime, parseInstant,
  makeDate, makeTime, makeDateTime, isCalendarDate,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, daysBetween, addMonths, rollDate, addMinutes,
  weekdayNumber, compareDates,
  fromInstant, toInstant, toLocal, toUTC,
} from './time-date'

// Calendar context
export type { Clock, CalendarContext } from './calendar'
export {
  createCalendar, isValidTimezone,
  nowUtc, today, yesterday, localTimeOfDay, instantOn,
} from './calendar'

// Recurrence rules
export type {
  RecurrenceRule, RecurrenceRuleInput, RecurrenceFrequency,
  MonthOverflowPolicy, RuleOptions, DecodeRuleOptions,
} from './recurrence-rule'
export {
  DEFAULT_OCCURRENCE_LIMIT,
  createRecurrenceRule, daily, weekly, monthly,
  nextOccurrence, occurrences, describeRule,
  encodeRule, decodeRule,
} from './recurrence-rule'

// Domain types
export type { DayLog, Task, TaskRecord, TaskDraft, TaskStatus } from './domain-types'
export { TASK_STATUSES, isTaskStatus, nextStatus, decodeTask, toRecord, anchorRootOf } from './domain-types'

// Adapter (persistence interface + in-memory mock)
export type { Adapter, TaskChanges } from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter, SqliteExtras } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Logging
export type { Logger, LogLevel } from './logger'
export { createLogger, resolveLogLevel, isLogLevel } from './logger'

// Notifications
export type { NotificationScheduler } from './notifications'
export { createNoopScheduler } from './notifications'

// Processing units
export type { DayRegistry } from './day-registry'
export { createDayRegistry } from './day-registry'
export type {
  RecurrenceGenerator, RecurrenceGeneratorDeps,
  GenerationReport, GenerationError, GeneratorHooks,
} from './recurrence-generator'
export { createRecurrenceGenerator } from './recurrence-generator'
export type {
  AnchorProcessor, AnchorProcessorDeps,
  AnchorReport, AnchorError, AnchorHooks,
} from './anchor-processor'
export { createAnchorProcessor, LAST_ANCHOR_CHECK_KEY } from './anchor-processor'

// Configuration
export type { DaylogEngineConfig, ResolvedConfig } from './config'
export { resolveConfig, DEFAULT_HORIZON_DAYS } from './config'

// High-level API
export type {
  DaylogEngine, TaskInput, TaskUpdate, DayView, EngineEvent, EventPayloads,
} from './engine'
export { createDaylogEngine } from './engine'
