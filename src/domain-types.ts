/**
 * Canonical Domain Types
 *
 * Task and DayLog entities plus the record boundary between them and
 * storage. Stored task rows keep the nullable shape of synced data
 * (`TaskRecord`); the processors only ever work on records that decode into
 * a `Task`.
 */

import type { LocalDate, LocalDateTime } from './time-date'
import { type Result, Ok, Err } from './result'
import { DecodeError } from './errors'

// ============================================================================
// Status
// ============================================================================

export const TASK_STATUSES = ['normal', 'inProgress', 'complete', 'notCompleted'] as const

export type TaskStatus = (typeof TASK_STATUSES)[number]

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUSES.some((s) => s === value)
}

/** normal → inProgress → complete → notCompleted → normal */
export function nextStatus(status: TaskStatus): TaskStatus {
  switch (status) {
    case 'normal':
      return 'inProgress'
    case 'inProgress':
      return 'complete'
    case 'complete':
      return 'notCompleted'
    case 'notCompleted':
      return 'normal'
  }
}

// ============================================================================
// Entities
// ============================================================================

export type DayLog = {
  id: string
  date: LocalDate
  notes: string
}

export type Task = {
  id: string
  dayLogId: string
  position: number
  name: string
  notes: string
  tags: string[]
  status: TaskStatus
  /** Absolute reminder instant, UTC */
  reminderTime?: LocalDateTime
  notificationId?: string
  isRecurring: boolean
  /** Encoded RecurrenceRule; present iff isRecurring */
  recurrenceRule?: string
  recurrenceEndDate?: LocalDate
  sourceTemplateId?: string
  isAnchor: boolean
  anchorSourceId?: string
  anchorDayCount?: number
  createdAt: LocalDateTime
  modifiedAt: LocalDateTime
}

/**
 * Task as persisted. Synced stores may hold partially written rows, so
 * content and state fields are nullable here.
 */
export type TaskRecord = {
  id: string
  dayLogId: string
  position: number
  name: string | null
  notes: string | null
  tags: string[]
  status: string | null
  reminderTime: LocalDateTime | null
  notificationId: string | null
  isRecurring: boolean
  recurrenceRule: string | null
  recurrenceEndDate: LocalDate | null
  sourceTemplateId: string | null
  isAnchor: boolean
  anchorSourceId: string | null
  anchorDayCount: number | null
  createdAt: LocalDateTime
  modifiedAt: LocalDateTime
}

/** Fields a caller supplies when a task is created; the registry fills the rest. */
export type TaskDraft = {
  name: string
  notes?: string
  tags?: string[]
  status?: TaskStatus
  reminderTime?: LocalDateTime
  isRecurring?: boolean
  recurrenceRule?: string
  recurrenceEndDate?: LocalDate
  sourceTemplateId?: string
  isAnchor?: boolean
  anchorSourceId?: string
  anchorDayCount?: number
}

// ============================================================================
// Record Boundary
// ============================================================================

export function decodeTask(record: TaskRecord): Result<Task, DecodeError> {
  if (!record.id) return Err(new DecodeError('Task record has no id'))
  if (record.name === null || record.name.trim() === '') {
    return Err(new DecodeError(`Task '${record.id}' has no name`, record.id))
  }
  if (!isTaskStatus(record.status)) {
    return Err(new DecodeError(`Task '${record.id}' has invalid status '${String(record.status)}'`, record.id))
  }
  if (record.isRecurring !== (record.recurrenceRule !== null)) {
    return Err(new DecodeError(`Task '${record.id}' has isRecurring without a matching recurrence rule`, record.id))
  }

  const task: Task = {
    id: record.id,
    dayLogId: record.dayLogId,
    position: record.position,
    name: record.name,
    notes: record.notes ?? '',
    tags: [...record.tags],
    status: record.status,
    isRecurring: record.isRecurring,
    isAnchor: record.isAnchor,
    createdAt: record.createdAt,
    modifiedAt: record.modifiedAt,
  }
  if (record.reminderTime !== null) task.reminderTime = record.reminderTime
  if (record.notificationId !== null) task.notificationId = record.notificationId
  if (record.recurrenceRule !== null) task.recurrenceRule = record.recurrenceRule
  if (record.recurrenceEndDate !== null) task.recurrenceEndDate = record.recurrenceEndDate
  if (record.sourceTemplateId !== null) task.sourceTemplateId = record.sourceTemplateId
  if (record.anchorSourceId !== null) task.anchorSourceId = record.anchorSourceId
  if (record.anchorDayCount !== null) task.anchorDayCount = record.anchorDayCount
  return Ok(task)
}

export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    dayLogId: task.dayLogId,
    position: task.position,
    name: task.name,
    notes: task.notes,
    tags: [...task.tags],
    status: task.status,
    reminderTime: task.reminderTime ?? null,
    notificationId: task.notificationId ?? null,
    isRecurring: task.isRecurring,
    recurrenceRule: task.recurrenceRule ?? null,
    recurrenceEndDate: task.recurrenceEndDate ?? null,
    sourceTemplateId: task.sourceTemplateId ?? null,
    isAnchor: task.isAnchor,
    anchorSourceId: task.anchorSourceId ?? null,
    anchorDayCount: task.anchorDayCount ?? null,
    createdAt: task.createdAt,
    modifiedAt: task.modifiedAt,
  }
}

/** Chain root of an anchor task: the original it was first carried from. */
export function anchorRootOf(task: Task): string {
  return task.anchorSourceId ?? task.id
}
