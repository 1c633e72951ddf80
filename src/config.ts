/**
 * Engine configuration: validation and defaults.
 */

import type { Adapter } from './adapter'
import { type CalendarContext, type Clock, createCalendar } from './calendar'
import { ValidationError } from './errors'
import { type LogLevel, type Logger, createLogger } from './logger'
import { type NotificationScheduler, createNoopScheduler } from './notifications'
import { DEFAULT_OCCURRENCE_LIMIT, type MonthOverflowPolicy } from './recurrence-rule'

export type DaylogEngineConfig = {
  adapter: Adapter
  /** IANA timezone all day boundaries are computed in */
  timezone: string
  clock?: Clock
  scheduler?: NotificationScheduler
  logger?: Logger
  logLevel?: LogLevel
  /** How far past today a task save materializes recurring instances */
  horizonDays?: number
  occurrenceLimit?: number
  monthOverflow?: MonthOverflowPolicy
}

export type ResolvedConfig = {
  adapter: Adapter
  calendar: CalendarContext
  scheduler: NotificationScheduler
  logger: Logger
  horizonDays: number
  occurrenceLimit: number
  monthOverflow: MonthOverflowPolicy
}

export const DEFAULT_HORIZON_DAYS = 365

function positiveInteger(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

export function resolveConfig(config: DaylogEngineConfig): ResolvedConfig {
  const monthOverflow = config.monthOverflow ?? 'rollover'
  if (monthOverflow !== 'rollover' && monthOverflow !== 'clamp') {
    throw new ValidationError(`Unknown monthOverflow policy: '${String(monthOverflow)}'`)
  }

  return {
    adapter: config.adapter,
    calendar: createCalendar(config.timezone, config.clock),
    scheduler: config.scheduler ?? createNoopScheduler(),
    logger: config.logger ?? createLogger('[daylog] ', config.logLevel),
    horizonDays: positiveInteger('horizonDays', config.horizonDays, DEFAULT_HORIZON_DAYS),
    occurrenceLimit: positiveInteger('occurrenceLimit', config.occurrenceLimit, DEFAULT_OCCURRENCE_LIMIT),
    monthOverflow,
  }
}
