/**
 * Recurrence Generator
 *
 * Materializes task instances for every recurring template up to a horizon
 * date. Runs are additive and idempotent: an occurrence whose day already
 * holds an instance of the template is left alone, so repeated or
 * overlapping runs converge on one instance per (template, date).
 *
 * Each template is one unit of work committed in its own transaction.
 * Reminders are requested only after the unit commits, one at a time in
 * occurrence order. A scheduler failure leaves the instance without a
 * notification handle.
 */

import type { Adapter } from './adapter'
import { type CalendarContext, instantOn, localTimeOfDay } from './calendar'
import type { DayRegistry } from './day-registry'
import { type Task, type TaskDraft, type TaskRecord, decodeTask } from './domain-types'
import { DecodeError, NotificationSchedulingError, PersistenceError, errorMessage } from './errors'
import type { Logger } from './logger'
import { type NotificationScheduler, scheduleReminder } from './notifications'
import {
  DEFAULT_OCCURRENCE_LIMIT,
  type MonthOverflowPolicy,
  type RecurrenceRule,
  decodeRule,
  occurrences,
} from './recurrence-rule'
import type { LocalDate } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type GenerationError = DecodeError | PersistenceError | NotificationSchedulingError

export type GenerationReport = {
  /** Templates that decoded and were processed */
  templates: number
  created: number
  /** Occurrences that already had an instance */
  existing: number
  remindersScheduled: number
  errors: GenerationError[]
}

export type GeneratorHooks = {
  onInstanceCreated?: (task: Task) => void
  onError?: (error: GenerationError) => void
}

export type RecurrenceGeneratorDeps = {
  adapter: Adapter
  registry: DayRegistry
  calendar: CalendarContext
  scheduler: NotificationScheduler
  logger: Logger
  occurrenceLimit?: number
  monthOverflow?: MonthOverflowPolicy
  hooks?: GeneratorHooks
}

export type RecurrenceGenerator = {
  generate(options: { through: LocalDate }): Promise<GenerationReport>
}

type PendingReminder = { task: Task; at: Date }

type UnitResult = {
  created: Task[]
  existing: number
  reminders: PendingReminder[]
}

// ============================================================================
// Factory
// ============================================================================

export function createRecurrenceGenerator(deps: RecurrenceGeneratorDeps): RecurrenceGenerator {
  const { adapter, registry, calendar, scheduler, logger, hooks } = deps
  const limit = deps.occurrenceLimit ?? DEFAULT_OCCURRENCE_LIMIT
  const ruleOptions = { monthOverflow: deps.monthOverflow ?? 'rollover' } as const

  function instanceDraft(template: Task, date: LocalDate): { draft: TaskDraft; at: Date | null } {
    const draft: TaskDraft = {
      name: template.name,
      notes: template.notes,
      tags: template.tags,
      status: 'normal',
      sourceTemplateId: template.id,
    }
    if (template.reminderTime === undefined) return { draft, at: null }

    const { utc, at } = instantOn(calendar, date, localTimeOfDay(calendar, template.reminderTime))
    draft.reminderTime = utc
    return { draft, at }
  }

  async function materialize(
    template: Task,
    rule: RecurrenceRule,
    baseDate: LocalDate,
    through: LocalDate
  ): Promise<UnitResult> {
    const result: UnitResult = { created: [], existing: 0, reminders: [] }

    for (const date of occurrences(rule, baseDate, through, limit, ruleOptions)) {
      const day = await registry.findByDate(date)
      if (day) {
        const tasks = await registry.tasksOf(day)
        if (tasks.some((t) => t.sourceTemplateId === template.id)) {
          result.existing++
          continue
        }
      }

      const { draft, at } = instanceDraft(template, date)
      const task = await registry.addTask(day ?? (await registry.getOrCreate(date)), draft)
      result.created.push(task)
      if (at) result.reminders.push({ task, at })
      logger.debug(`Created instance of '${template.name}' for ${date}`)
    }

    return result
  }

  async function attachReminder(pending: PendingReminder, report: GenerationReport): Promise<void> {
    const handle = await scheduleReminder(scheduler, pending.task, pending.at, logger, (e) => fail(report, e))
    if (handle === null) return
    try {
      await adapter.updateTask(pending.task.id, { notificationId: handle })
      report.remindersScheduled++
    } catch (e) {
      fail(report, new PersistenceError(`Storing notification handle for task '${pending.task.id}' failed`, e))
    }
  }

  function fail(report: GenerationReport, error: GenerationError): void {
    report.errors.push(error)
    hooks?.onError?.(error)
  }

  async function generate(options: { through: LocalDate }): Promise<GenerationReport> {
    const report: GenerationReport = { templates: 0, created: 0, existing: 0, remindersScheduled: 0, errors: [] }

    let records: TaskRecord[]
    try {
      records = await adapter.getRecurringTemplates()
    } catch (e) {
      const error = new PersistenceError(`Loading recurring templates failed: ${errorMessage(e)}`, e)
      logger.error(error.message)
      fail(report, error)
      return report
    }

    for (const record of records) {
      const decoded = decodeTask(record)
      if (!decoded.ok) {
        logger.warn(`Skipping template: ${decoded.error.message}`)
        fail(report, decoded.error)
        continue
      }
      const template = decoded.value
      if (template.recurrenceRule === undefined) continue

      const decodedRule = decodeRule(template.recurrenceRule, { timezone: calendar.timezone })
      if (!decodedRule.ok) {
        const error = new DecodeError(`Template '${template.id}': ${decodedRule.error.message}`, template.id)
        logger.warn(`Skipping template: ${error.message}`)
        fail(report, error)
        continue
      }
      const rule = decodedRule.value

      let unit: UnitResult
      try {
        unit = await adapter.transaction(async () => {
          const home = await adapter.getDayLog(template.dayLogId)
          if (!home) {
            throw new DecodeError(`Template '${template.id}' has no owning DayLog`, template.id)
          }
          return materialize(template, rule, home.date, options.through)
        })
      } catch (e) {
        const error = e instanceof DecodeError
          ? e
          : new PersistenceError(`Materializing template '${template.id}' failed: ${errorMessage(e)}`, e)
        logger.error(error.message)
        fail(report, error)
        continue
      }

      report.templates++
      report.created += unit.created.length
      report.existing += unit.existing
      for (const task of unit.created) hooks?.onInstanceCreated?.(task)
      for (const pending of unit.reminders) await attachReminder(pending, report)
    }

    logger.info(
      `Recurrence generation through ${options.through}: ${report.created} created, ` +
      `${report.existing} existing, ${report.errors.length} error(s)`
    )
    return report
  }

  return { generate }
}
