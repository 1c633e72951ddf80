/**
 * Shared test fixtures: branded value helpers, a settable clock, record
 * builders and in-process stand-ins for the scheduler, logger and a store
 * that can be told to fail.
 */
import type { Adapter, TaskChanges } from '../../src/adapter'
import type { Clock } from '../../src/calendar'
import type { DayLog, Task, TaskRecord } from '../../src/domain-types'
import type { Logger } from '../../src/logger'
import type { NotificationScheduler } from '../../src/notifications'
import type { LocalDate, LocalDateTime } from '../../src/time-date'

// ============================================================================
// Values
// ============================================================================

export function date(iso: string): LocalDate {
  return iso as LocalDate
}

export function datetime(iso: string): LocalDateTime {
  return iso as LocalDateTime
}

// ============================================================================
// Clock
// ============================================================================

export type TestClock = {
  clock: Clock
  /** Moves the clock to an ISO instant, e.g. '2025-03-10T12:00:00Z' */
  set(iso: string): void
}

export function createTestClock(iso: string): TestClock {
  let now = new Date(iso)
  return {
    clock: () => new Date(now.getTime()),
    set(next: string) {
      now = new Date(next)
    },
  }
}

// ============================================================================
// Records
// ============================================================================

export function dayLog(id: string, iso: string): DayLog {
  return { id, date: date(iso), notes: '' }
}

export function taskRecord(id: string, dayLogId: string, overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    id,
    dayLogId,
    position: 0,
    name: `Task ${id}`,
    notes: '',
    tags: [],
    status: 'normal',
    reminderTime: null,
    notificationId: null,
    isRecurring: false,
    recurrenceRule: null,
    recurrenceEndDate: null,
    sourceTemplateId: null,
    isAnchor: false,
    anchorSourceId: null,
    anchorDayCount: null,
    createdAt: datetime('2025-01-01T00:00:00'),
    modifiedAt: datetime('2025-01-01T00:00:00'),
    ...overrides,
  }
}

// ============================================================================
// Scheduler
// ============================================================================

export type ScheduledCall = { taskId: string; name: string; at: string }

export type RecordingScheduler = NotificationScheduler & {
  scheduled: ScheduledCall[]
  cancelled: string[]
  /** Makes every later schedule() call reject with this message */
  failWith(message: string | null): void
}

export function createRecordingScheduler(): RecordingScheduler {
  const scheduled: ScheduledCall[] = []
  const cancelled: string[] = []
  let failure: string | null = null

  return {
    scheduled,
    cancelled,
    failWith(message) {
      failure = message
    },
    async schedule(task: Task, at: Date) {
      if (failure !== null) throw new Error(failure)
      scheduled.push({ taskId: task.id, name: task.name, at: at.toISOString() })
      return `notif-${scheduled.length}`
    },
    async cancel(handle: string) {
      cancelled.push(handle)
    },
  }
}

// ============================================================================
// Logger
// ============================================================================

export type LogEntry = { level: 'debug' | 'info' | 'warn' | 'error'; message: string }

export type RecordingLogger = Logger & { entries: LogEntry[] }

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = []
  return {
    entries,
    debug: (message) => { entries.push({ level: 'debug', message }) },
    info: (message) => { entries.push({ level: 'info', message }) },
    warn: (message) => { entries.push({ level: 'warn', message }) },
    error: (message) => { entries.push({ level: 'error', message }) },
  }
}

// ============================================================================
// Failing store
// ============================================================================

type FailableMethod =
  | 'getRecurringTemplates'
  | 'getTasksByDayLog'
  | 'getDayLogByDate'
  | 'createTask'
  | 'updateTask'
  | 'getMeta'
  | 'setMeta'

export type FlakyAdapter = {
  adapter: Adapter
  fail(method: FailableMethod, message?: string): void
  heal(method: FailableMethod): void
}

/** Wraps an adapter so chosen methods throw until healed. */
export function createFlakyAdapter(inner: Adapter): FlakyAdapter {
  const failures = new Map<FailableMethod, string>()

  function check(method: FailableMethod): void {
    const message = failures.get(method)
    if (message !== undefined) throw new Error(message)
  }

  const adapter: Adapter = {
    transaction: (fn) => inner.transaction(fn),
    createDayLog: (d) => inner.createDayLog(d),
    getDayLog: (id) => inner.getDayLog(id),
    async getDayLogByDate(d: LocalDate) {
      check('getDayLogByDate')
      return inner.getDayLogByDate(d)
    },
    getAllDayLogs: () => inner.getAllDayLogs(),
    updateDayLogNotes: (id, notes) => inner.updateDayLogNotes(id, notes),
    async createTask(task: TaskRecord) {
      check('createTask')
      return inner.createTask(task)
    },
    getTask: (id) => inner.getTask(id),
    async getTasksByDayLog(id: string) {
      check('getTasksByDayLog')
      return inner.getTasksByDayLog(id)
    },
    async getRecurringTemplates() {
      check('getRecurringTemplates')
      return inner.getRecurringTemplates()
    },
    async updateTask(id: string, changes: TaskChanges) {
      check('updateTask')
      return inner.updateTask(id, changes)
    },
    deleteTask: (id) => inner.deleteTask(id),
    async getMeta(key: string) {
      check('getMeta')
      return inner.getMeta(key)
    },
    async setMeta(key: string, value: string) {
      check('setMeta')
      return inner.setMeta(key, value)
    },
  }

  return {
    adapter,
    fail(method, message = `${method} unavailable`) {
      failures.set(method, message)
    },
    heal(method) {
      failures.delete(method)
    },
  }
}
