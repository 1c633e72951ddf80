/**
 * Daylog Engine
 *
 * Consumer-facing facade: wires the day registry, recurrence generator and
 * anchor processor to one adapter and calendar, and exposes the host's
 * trigger points (activation, task save). Mutating operations run one at a
 * time through an in-process queue.
 */

import type { TaskChanges } from './adapter'
import { type AnchorProcessor, type AnchorReport, createAnchorProcessor } from './anchor-processor'
import { nowUtc, today } from './calendar'
import { type DaylogEngineConfig, resolveConfig } from './config'
import { type DayRegistry, createDayRegistry } from './day-registry'
import {
  type DayLog,
  type Task,
  type TaskStatus,
  decodeTask,
  isTaskStatus,
  nextStatus,
} from './domain-types'
import { type DaylogError, NotFoundError, PersistenceError, ValidationError, errorMessage } from './errors'
import { cancelReminder, scheduleReminder } from './notifications'
import { type RecurrenceRule, createRecurrenceRule, encodeRule } from './recurrence-rule'
import { type GenerationReport, type RecurrenceGenerator, createRecurrenceGenerator } from './recurrence-generator'
import { type LocalDate, type LocalDateTime, addDays, toInstant } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type TaskInput = {
  name: string
  notes?: string
  tags?: string[]
  status?: TaskStatus
  /** Absolute reminder instant, UTC */
  reminderTime?: LocalDateTime
  recurrence?: RecurrenceRule
  isAnchor?: boolean
}

export type TaskUpdate = {
  name?: string
  notes?: string
  tags?: string[]
  status?: TaskStatus
  reminderTime?: LocalDateTime | null
  recurrence?: RecurrenceRule | null
  isAnchor?: boolean
}

export type DayView = {
  dayLog: DayLog
  tasks: Task[]
}

export type EventPayloads = {
  instanceCreated: Task
  anchorCarried: Task
  error: DaylogError
}

export type EngineEvent = keyof EventPayloads

export type DaylogEngine = {
  /** Activation hook: carries anchors forward at most once per day. */
  processAnchorsIfNeeded(): Promise<AnchorReport | null>
  processAnchors(): Promise<AnchorReport>
  generateRecurring(through?: LocalDate): Promise<GenerationReport>
  addTask(date: LocalDate, input: TaskInput): Promise<Task>
  updateTask(id: string, update: TaskUpdate): Promise<Task>
  setStatus(id: string, status: TaskStatus): Promise<Task>
  cycleStatus(id: string): Promise<Task>
  deleteTask(id: string): Promise<void>
  getDay(date: LocalDate): Promise<DayView | null>
  on<E extends EngineEvent>(event: E, handler: (payload: EventPayloads[E]) => void): () => void
  close(): Promise<void>
}

// ============================================================================
// Validation
// ============================================================================

function checkShape(fields: { name?: string; status?: unknown; recurring: boolean; isAnchor: boolean }): void {
  if (fields.name !== undefined && fields.name.trim() === '') {
    throw new ValidationError('Task name is required')
  }
  if (fields.status !== undefined && !isTaskStatus(fields.status)) {
    throw new ValidationError(`Unknown task status: '${String(fields.status)}'`)
  }
  if (fields.recurring && fields.isAnchor) {
    throw new ValidationError('A task cannot be both recurring and an anchor')
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createDaylogEngine(config: DaylogEngineConfig): DaylogEngine {
  const resolved = resolveConfig(config)
  const { adapter, calendar, scheduler, logger } = resolved

  // ---- Events ----
  const handlers: { [E in EngineEvent]: Set<(payload: EventPayloads[E]) => void> } = {
    instanceCreated: new Set(),
    anchorCarried: new Set(),
    error: new Set(),
  }

  function emit<E extends EngineEvent>(event: E, payload: EventPayloads[E]): void {
    const listeners: Set<(payload: EventPayloads[E]) => void> = handlers[event]
    for (const handler of listeners) {
      try {
        handler(payload)
      } catch (e) {
        logger.error(`Event handler error on '${event}': ${errorMessage(e)}`)
      }
    }
  }

  function on<E extends EngineEvent>(event: E, handler: (payload: EventPayloads[E]) => void): () => void {
    const listeners: Set<(payload: EventPayloads[E]) => void> = handlers[event]
    listeners.add(handler)
    return () => {
      listeners.delete(handler)
    }
  }

  // ---- Components ----
  const registry: DayRegistry = createDayRegistry({ adapter, calendar })
  const generator: RecurrenceGenerator = createRecurrenceGenerator({
    adapter,
    registry,
    calendar,
    scheduler,
    logger,
    occurrenceLimit: resolved.occurrenceLimit,
    monthOverflow: resolved.monthOverflow,
    hooks: {
      onInstanceCreated: (task) => emit('instanceCreated', task),
      onError: (error) => emit('error', error),
    },
  })
  const anchors: AnchorProcessor = createAnchorProcessor({
    adapter,
    registry,
    calendar,
    logger,
    hooks: {
      onAnchorCarried: (task) => emit('anchorCarried', task),
      onError: (error) => emit('error', error),
    },
  })

  // ---- Single mutator ----
  let queue: Promise<unknown> = Promise.resolve()

  function exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = queue.then(fn)
    queue = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  // ---- Helpers ----
  async function loadTask(id: string): Promise<Task> {
    const record = await adapter.getTask(id)
    if (!record) throw new NotFoundError(`Task '${id}' not found`)
    const decoded = decodeTask(record)
    if (!decoded.ok) throw decoded.error
    return decoded.value
  }

  async function attachNotification(task: Task): Promise<Task> {
    if (task.reminderTime === undefined) return task
    const handle = await scheduleReminder(scheduler, task, toInstant(task.reminderTime), logger, (e) => emit('error', e))
    if (handle === null) return task
    try {
      await adapter.updateTask(task.id, { notificationId: handle })
    } catch (e) {
      const error = new PersistenceError(`Storing notification handle for task '${task.id}' failed`, e)
      logger.error(error.message)
      emit('error', error)
      return task
    }
    return { ...task, notificationId: handle }
  }

  function horizon(): LocalDate {
    return addDays(today(calendar), resolved.horizonDays)
  }

  // ---- Operations ----
  async function addTask(date: LocalDate, input: TaskInput): Promise<Task> {
    checkShape({
      name: input.name,
      status: input.status,
      recurring: input.recurrence !== undefined,
      isAnchor: input.isAnchor ?? false,
    })
    const rule = input.recurrence !== undefined ? createRecurrenceRule(input.recurrence) : undefined

    return exclusive(async () => {
      const created = await adapter.transaction(async () => {
        const dayLog = await registry.getOrCreate(date)
        return registry.addTask(dayLog, {
          name: input.name.trim(),
          ...(input.notes !== undefined ? { notes: input.notes } : {}),
          ...(input.tags !== undefined ? { tags: input.tags } : {}),
          ...(input.status !== undefined ? { status: input.status } : {}),
          ...(input.reminderTime !== undefined ? { reminderTime: input.reminderTime } : {}),
          ...(rule !== undefined
            ? {
                isRecurring: true,
                recurrenceRule: encodeRule(rule),
                ...(rule.endDate !== undefined ? { recurrenceEndDate: rule.endDate } : {}),
              }
            : {}),
          isAnchor: input.isAnchor ?? false,
        })
      })

      const task = await attachNotification(created)
      if (task.isRecurring) await generator.generate({ through: horizon() })
      return task
    })
  }

  async function updateTask(id: string, update: TaskUpdate): Promise<Task> {
    return exclusive(async () => {
      const current = await loadTask(id)
      const recurring = update.recurrence !== undefined ? update.recurrence !== null : current.isRecurring
      checkShape({
        ...(update.name !== undefined ? { name: update.name } : {}),
        status: update.status,
        recurring,
        isAnchor: update.isAnchor ?? current.isAnchor,
      })
      const rule = update.recurrence ? createRecurrenceRule(update.recurrence) : null

      if (current.notificationId !== undefined) {
        await cancelReminder(scheduler, current.notificationId, logger)
      }

      const changes: TaskChanges = { notificationId: null, modifiedAt: nowUtc(calendar) }
      if (update.name !== undefined) changes.name = update.name.trim()
      if (update.notes !== undefined) changes.notes = update.notes
      if (update.tags !== undefined) changes.tags = [...update.tags]
      if (update.status !== undefined) changes.status = update.status
      if (update.isAnchor !== undefined) changes.isAnchor = update.isAnchor
      if (update.reminderTime !== undefined) changes.reminderTime = update.reminderTime
      if (update.recurrence !== undefined) {
        changes.isRecurring = rule !== null
        changes.recurrenceRule = rule ? encodeRule(rule) : null
        changes.recurrenceEndDate = rule?.endDate ?? null
      }

      await adapter.updateTask(id, changes)
      const task = await attachNotification(await loadTask(id))
      if (task.isRecurring) await generator.generate({ through: horizon() })
      return task
    })
  }

  async function setStatus(id: string, status: TaskStatus): Promise<Task> {
    if (!isTaskStatus(status)) throw new ValidationError(`Unknown task status: '${String(status)}'`)
    return exclusive(async () => {
      await loadTask(id)
      await adapter.updateTask(id, { status, modifiedAt: nowUtc(calendar) })
      return loadTask(id)
    })
  }

  async function cycleStatus(id: string): Promise<Task> {
    return exclusive(async () => {
      const task = await loadTask(id)
      await adapter.updateTask(id, { status: nextStatus(task.status), modifiedAt: nowUtc(calendar) })
      return loadTask(id)
    })
  }

  async function deleteTask(id: string): Promise<void> {
    return exclusive(async () => {
      const record = await adapter.getTask(id)
      if (!record) throw new NotFoundError(`Task '${id}' not found`)
      if (record.notificationId !== null) await cancelReminder(scheduler, record.notificationId, logger)
      await adapter.deleteTask(id)
    })
  }

  async function getDay(date: LocalDate): Promise<DayView | null> {
    const dayLog = await registry.findByDate(date)
    if (!dayLog) return null
    const tasks: Task[] = []
    for (const record of await registry.tasksOf(dayLog)) {
      const decoded = decodeTask(record)
      if (decoded.ok) tasks.push(decoded.value)
      else logger.warn(`Hiding unreadable task: ${decoded.error.message}`)
    }
    return { dayLog, tasks }
  }

  return {
    processAnchorsIfNeeded: () => exclusive(() => anchors.processIfNewDay()),
    processAnchors: () => exclusive(() => anchors.process()),
    generateRecurring: (through?: LocalDate) => exclusive(() => generator.generate({ through: through ?? horizon() })),
    addTask,
    updateTask,
    setStatus,
    cycleStatus,
    deleteTask,
    getDay,
    on,
    close: async () => {
      await queue
      await adapter.close?.()
    },
  }
}
