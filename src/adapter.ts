/**
 * Adapter
 *
 * Domain-oriented persistence interface for day logs and their tasks, plus
 * an in-memory implementation. All methods are async so synchronous
 * (better-sqlite3) and remote stores share one contract.
 */

import type { LocalDate } from './time-date'
import type { DayLog, TaskRecord } from './domain-types'
import { DuplicateKeyError, ForeignKeyError, NotFoundError } from './errors'

export type { LocalDate, LocalDateTime } from './time-date'
export type { DayLog, TaskRecord } from './domain-types'
export { DuplicateKeyError, ForeignKeyError, NotFoundError } from './errors'

// ============================================================================
// Adapter Interface
// ============================================================================

export type TaskChanges = Partial<Omit<TaskRecord, 'id'>>

export interface Adapter {
  /** Runs fn atomically: everything it wrote is rolled back if it throws. */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // DayLog
  createDayLog(dayLog: DayLog): Promise<void>
  getDayLog(id: string): Promise<DayLog | null>
  getDayLogByDate(date: LocalDate): Promise<DayLog | null>
  getAllDayLogs(): Promise<DayLog[]>
  updateDayLogNotes(id: string, notes: string): Promise<void>

  // Task
  createTask(task: TaskRecord): Promise<void>
  getTask(id: string): Promise<TaskRecord | null>
  /** Tasks of one day, in display order. */
  getTasksByDayLog(dayLogId: string): Promise<TaskRecord[]>
  /** Every task flagged recurring that carries a rule. */
  getRecurringTemplates(): Promise<TaskRecord[]>
  updateTask(id: string, changes: TaskChanges): Promise<void>
  deleteTask(id: string): Promise<void>

  // Metadata
  getMeta(key: string): Promise<string | null>
  setMeta(key: string, value: string): Promise<void>

  // Lifecycle (optional: persistent adapters may implement)
  close?(): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

type MockState = {
  dayLogs: Map<string, DayLog>
  tasks: Map<string, TaskRecord>
  meta: Map<string, string>
}

export function createMockAdapter(): Adapter {
  let state: MockState = {
    dayLogs: new Map(),
    tasks: new Map(),
    meta: new Map(),
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: MockState | null = null

  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function byPosition(a: TaskRecord, b: TaskRecord): number {
    return a.position - b.position || a.id.localeCompare(b.id)
  }

  const adapter: Adapter = {
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (txDepth === 0) snapshot = clone(state)
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          state = snapshot
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // DayLog
    // ================================================================
    async createDayLog(dayLog: DayLog) {
      if (state.dayLogs.has(dayLog.id)) {
        throw new DuplicateKeyError(`DayLog '${dayLog.id}' already exists`)
      }
      for (const existing of state.dayLogs.values()) {
        if (existing.date === dayLog.date) {
          throw new DuplicateKeyError(`DayLog for ${dayLog.date} already exists`)
        }
      }
      state.dayLogs.set(dayLog.id, clone(dayLog))
    },

    async getDayLog(id: string) {
      const d = state.dayLogs.get(id)
      return d ? clone(d) : null
    },

    async getDayLogByDate(date: LocalDate) {
      for (const d of state.dayLogs.values()) {
        if (d.date === date) return clone(d)
      }
      return null
    },

    async getAllDayLogs() {
      return [...state.dayLogs.values()].sort((a, b) => (a.date < b.date ? -1 : 1)).map(clone)
    },

    async updateDayLogNotes(id: string, notes: string) {
      const existing = state.dayLogs.get(id)
      if (!existing) throw new NotFoundError(`DayLog '${id}' not found`)
      state.dayLogs.set(id, { ...existing, notes })
    },

    // ================================================================
    // Task
    // ================================================================
    async createTask(task: TaskRecord) {
      if (state.tasks.has(task.id)) {
        throw new DuplicateKeyError(`Task '${task.id}' already exists`)
      }
      if (!state.dayLogs.has(task.dayLogId)) {
        throw new ForeignKeyError(`Task '${task.id}' references missing DayLog '${task.dayLogId}'`)
      }
      state.tasks.set(task.id, clone(task))
    },

    async getTask(id: string) {
      const t = state.tasks.get(id)
      return t ? clone(t) : null
    },

    async getTasksByDayLog(dayLogId: string) {
      return [...state.tasks.values()]
        .filter((t) => t.dayLogId === dayLogId)
        .sort(byPosition)
        .map(clone)
    },

    async getRecurringTemplates() {
      return [...state.tasks.values()]
        .filter((t) => t.isRecurring && t.recurrenceRule !== null)
        .sort((a, b) => a.id.localeCompare(b.id))
        .map(clone)
    },

    async updateTask(id: string, changes: TaskChanges) {
      const existing = state.tasks.get(id)
      if (!existing) throw new NotFoundError(`Task '${id}' not found`)
      if (changes.dayLogId !== undefined && !state.dayLogs.has(changes.dayLogId)) {
        throw new ForeignKeyError(`Task '${id}' cannot move to missing DayLog '${changes.dayLogId}'`)
      }
      state.tasks.set(id, clone({ ...existing, ...changes }))
    },

    async deleteTask(id: string) {
      state.tasks.delete(id)
    },

    // ================================================================
    // Metadata
    // ================================================================
    async getMeta(key: string) {
      return state.meta.get(key) ?? null
    },

    async setMeta(key: string, value: string) {
      state.meta.set(key, value)
    },
  }

  return adapter
}
