/**
 * SQLite Adapter
 *
 * Production implementation of the Adapter interface using better-sqlite3.
 * One row per day in `day_log` (unique by date) and one row per task in
 * `task`, cascading on day deletion.
 */
import Database from 'better-sqlite3'
import type { Adapter, TaskChanges } from './adapter'
import type { DayLog, TaskRecord } from './domain-types'
import type { LocalDate, LocalDateTime } from './time-date'
import { DuplicateKeyError, ForeignKeyError, NotFoundError, errorMessage } from './errors'

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
  close(): Promise<void>
}

export type SqliteAdapter = Adapter & SqliteExtras

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS day_log (
    id TEXT PRIMARY KEY,
    date TEXT NOT NULL UNIQUE,
    notes TEXT NOT NULL DEFAULT ''
  );

  CREATE TABLE IF NOT EXISTS task (
    id TEXT PRIMARY KEY,
    day_log_id TEXT NOT NULL REFERENCES day_log(id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    name TEXT,
    notes TEXT,
    tags TEXT NOT NULL DEFAULT '[]',
    status TEXT,
    reminder_time TEXT,
    notification_id TEXT,
    is_recurring INTEGER NOT NULL DEFAULT 0,
    recurrence_rule TEXT,
    recurrence_end_date TEXT,
    source_template_id TEXT,
    is_anchor INTEGER NOT NULL DEFAULT 0,
    anchor_source_id TEXT,
    anchor_day_count INTEGER,
    created_at TEXT NOT NULL,
    modified_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_task_day_log ON task(day_log_id, position);
  CREATE INDEX IF NOT EXISTS idx_task_recurring ON task(is_recurring);
  CREATE INDEX IF NOT EXISTS idx_task_source_template ON task(source_template_id);
  CREATE INDEX IF NOT EXISTS idx_task_anchor_source ON task(anchor_source_id);

  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = errorMessage(e)
  if (/UNIQUE constraint|PRIMARY KEY constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new ForeignKeyError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type DayLogRow = {
  id: string
  date: string
  notes: string
}

type TaskRow = {
  id: string
  day_log_id: string
  position: number
  name: string | null
  notes: string | null
  tags: string
  status: string | null
  reminder_time: string | null
  notification_id: string | null
  is_recurring: number
  recurrence_rule: string | null
  recurrence_end_date: string | null
  source_template_id: string | null
  is_anchor: number
  anchor_source_id: string | null
  anchor_day_count: number | null
  created_at: string
  modified_at: string
}

type TaskParams = [
  string, string, number, string | null, string | null, string, string | null,
  string | null, string | null, number, string | null, string | null,
  string | null, number, string | null, number | null, string, string,
]

// ============================================================================
// Row ↔ Domain Mappers
// ============================================================================

function toDayLog(row: DayLogRow): DayLog {
  return {
    id: row.id,
    date: row.date as LocalDate,
    notes: row.notes,
  }
}

function parseTags(json: string): string[] {
  const parsed: unknown = JSON.parse(json)
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : []
}

function toTask(row: TaskRow): TaskRecord {
  return {
    id: row.id,
    dayLogId: row.day_log_id,
    position: row.position,
    name: row.name,
    notes: row.notes,
    tags: parseTags(row.tags),
    status: row.status,
    reminderTime: row.reminder_time as LocalDateTime | null,
    notificationId: row.notification_id,
    isRecurring: row.is_recurring === 1,
    recurrenceRule: row.recurrence_rule,
    recurrenceEndDate: row.recurrence_end_date as LocalDate | null,
    sourceTemplateId: row.source_template_id,
    isAnchor: row.is_anchor === 1,
    anchorSourceId: row.anchor_source_id,
    anchorDayCount: row.anchor_day_count,
    createdAt: row.created_at as LocalDateTime,
    modifiedAt: row.modified_at as LocalDateTime,
  }
}

function toParams(t: TaskRecord): TaskParams {
  return [
    t.id,
    t.dayLogId,
    t.position,
    t.name,
    t.notes,
    JSON.stringify(t.tags),
    t.status,
    t.reminderTime,
    t.notificationId,
    t.isRecurring ? 1 : 0,
    t.recurrenceRule,
    t.recurrenceEndDate,
    t.sourceTemplateId,
    t.isAnchor ? 1 : 0,
    t.anchorSourceId,
    t.anchorDayCount,
    t.createdAt,
    t.modifiedAt,
  ]
}

const TASK_COLUMNS =
  'id, day_log_id, position, name, notes, tags, status, reminder_time, notification_id, ' +
  'is_recurring, recurrence_rule, recurrence_end_date, source_template_id, is_anchor, ' +
  'anchor_source_id, anchor_day_count, created_at, modified_at'

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.pragma('foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  const ver = db.prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare<[number, string]>('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const stmt = {
    insertDayLog: db.prepare<[string, string, string]>('INSERT INTO day_log (id, date, notes) VALUES (?, ?, ?)'),
    dayLogById: db.prepare<[string], DayLogRow>('SELECT * FROM day_log WHERE id = ?'),
    dayLogByDate: db.prepare<[string], DayLogRow>('SELECT * FROM day_log WHERE date = ?'),
    allDayLogs: db.prepare<[], DayLogRow>('SELECT * FROM day_log ORDER BY date'),
    updateDayLogNotes: db.prepare<[string, string]>('UPDATE day_log SET notes = ? WHERE id = ?'),
    insertTask: db.prepare<TaskParams>(
      `INSERT INTO task (${TASK_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    ),
    taskById: db.prepare<[string], TaskRow>('SELECT * FROM task WHERE id = ?'),
    tasksByDayLog: db.prepare<[string], TaskRow>('SELECT * FROM task WHERE day_log_id = ? ORDER BY position, id'),
    recurringTemplates: db.prepare<[], TaskRow>(
      'SELECT * FROM task WHERE is_recurring = 1 AND recurrence_rule IS NOT NULL ORDER BY id',
    ),
    updateTask: db.prepare<[...TaskParams, string]>(
      `UPDATE task SET id = ?, day_log_id = ?, position = ?, name = ?, notes = ?, tags = ?, status = ?,
        reminder_time = ?, notification_id = ?, is_recurring = ?, recurrence_rule = ?,
        recurrence_end_date = ?, source_template_id = ?, is_anchor = ?, anchor_source_id = ?,
        anchor_day_count = ?, created_at = ?, modified_at = ? WHERE id = ?`,
    ),
    deleteTask: db.prepare<[string]>('DELETE FROM task WHERE id = ?'),
    getMeta: db.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?'),
    setMeta: db.prepare<[string, string]>(
      'INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
    ),
  }

  let _inTx = false

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // DayLog
    // ================================================================
    async createDayLog(dayLog: DayLog) {
      safe(() => stmt.insertDayLog.run(dayLog.id, dayLog.date, dayLog.notes))
    },

    async getDayLog(id: string) {
      const row = stmt.dayLogById.get(id)
      return row ? toDayLog(row) : null
    },

    async getDayLogByDate(date: LocalDate) {
      const row = stmt.dayLogByDate.get(date)
      return row ? toDayLog(row) : null
    },

    async getAllDayLogs() {
      return stmt.allDayLogs.all().map(toDayLog)
    },

    async updateDayLogNotes(id: string, notes: string) {
      const info = stmt.updateDayLogNotes.run(notes, id)
      if (info.changes === 0) throw new NotFoundError(`DayLog '${id}' not found`)
    },

    // ================================================================
    // Task
    // ================================================================
    async createTask(task: TaskRecord) {
      safe(() => stmt.insertTask.run(...toParams(task)))
    },

    async getTask(id: string) {
      const row = stmt.taskById.get(id)
      return row ? toTask(row) : null
    },

    async getTasksByDayLog(dayLogId: string) {
      return stmt.tasksByDayLog.all(dayLogId).map(toTask)
    },

    async getRecurringTemplates() {
      return stmt.recurringTemplates.all().map(toTask)
    },

    async updateTask(id: string, changes: TaskChanges) {
      const row = stmt.taskById.get(id)
      if (!row) throw new NotFoundError(`Task '${id}' not found`)
      const merged: TaskRecord = { ...toTask(row), ...changes, id }
      safe(() => stmt.updateTask.run(...toParams(merged), id))
    },

    async deleteTask(id: string) {
      stmt.deleteTask.run(id)
    },

    // ================================================================
    // Metadata
    // ================================================================
    async getMeta(key: string) {
      return stmt.getMeta.get(key)?.value ?? null
    },

    async setMeta(key: string, value: string) {
      stmt.setMeta.run(key, value)
    },

    // ================================================================
    // Lifecycle & Introspection
    // ================================================================
    async close() {
      db.close()
    },

    async listTables() {
      return db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
        .all()
        .map((r) => r.name)
    },

    async getSchemaVersion() {
      return db.prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM schema_version').get()?.v ?? 0
    },

    async inTransaction() {
      return db.inTransaction
    },
  }

  return adapter
}
