/**
 * Day Registry
 *
 * Date-indexed access to DayLogs and the tasks they own. DayLogs are created
 * lazily on first reference; the store's unique date key guarantees one
 * DayLog per date even if two writers race.
 */

import type { Adapter } from './adapter'
import type { CalendarContext } from './calendar'
import { nowUtc } from './calendar'
import type { DayLog, Task, TaskDraft, TaskRecord } from './domain-types'
import { toRecord } from './domain-types'
import { DuplicateKeyError } from './errors'
import type { LocalDate } from './time-date'
import { uuid } from './internal/helpers'

export type DayRegistry = {
  findByDate(date: LocalDate): Promise<DayLog | null>
  getOrCreate(date: LocalDate): Promise<DayLog>
  tasksOf(dayLog: DayLog): Promise<TaskRecord[]>
  addTask(dayLog: DayLog, draft: TaskDraft): Promise<Task>
}

export type DayRegistryDeps = {
  adapter: Adapter
  calendar: CalendarContext
}

export function createDayRegistry(deps: DayRegistryDeps): DayRegistry {
  const { adapter, calendar } = deps

  async function findByDate(date: LocalDate): Promise<DayLog | null> {
    return adapter.getDayLogByDate(date)
  }

  async function getOrCreate(date: LocalDate): Promise<DayLog> {
    const existing = await adapter.getDayLogByDate(date)
    if (existing) return existing

    const dayLog: DayLog = { id: uuid(), date, notes: '' }
    try {
      await adapter.createDayLog(dayLog)
      return dayLog
    } catch (e) {
      if (!(e instanceof DuplicateKeyError)) throw e
      const winner = await adapter.getDayLogByDate(date)
      if (!winner) throw e
      return winner
    }
  }

  async function tasksOf(dayLog: DayLog): Promise<TaskRecord[]> {
    return adapter.getTasksByDayLog(dayLog.id)
  }

  async function addTask(dayLog: DayLog, draft: TaskDraft): Promise<Task> {
    const siblings = await adapter.getTasksByDayLog(dayLog.id)
    const position = siblings.reduce((max, t) => Math.max(max, t.position + 1), 0)
    const now = nowUtc(calendar)

    const task: Task = {
      id: uuid(),
      dayLogId: dayLog.id,
      position,
      name: draft.name,
      notes: draft.notes ?? '',
      tags: [...(draft.tags ?? [])],
      status: draft.status ?? 'normal',
      isRecurring: draft.isRecurring ?? false,
      isAnchor: draft.isAnchor ?? false,
      createdAt: now,
      modifiedAt: now,
      ...(draft.reminderTime !== undefined ? { reminderTime: draft.reminderTime } : {}),
      ...(draft.recurrenceRule !== undefined ? { recurrenceRule: draft.recurrenceRule } : {}),
      ...(draft.recurrenceEndDate !== undefined ? { recurrenceEndDate: draft.recurrenceEndDate } : {}),
      ...(draft.sourceTemplateId !== undefined ? { sourceTemplateId: draft.sourceTemplateId } : {}),
      ...(draft.anchorSourceId !== undefined ? { anchorSourceId: draft.anchorSourceId } : {}),
      ...(draft.anchorDayCount !== undefined ? { anchorDayCount: draft.anchorDayCount } : {}),
    }

    await adapter.createTask(toRecord(task))
    return task
  }

  return { findByDate, getOrCreate, tasksOf, addTask }
}
