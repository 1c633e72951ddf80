/**
 * Anchor Carry-Forward Processor
 *
 * Copies yesterday's unfinished anchor tasks into today, keeping lineage as
 * a chain root plus a day counter. Only one day back is examined: if the
 * host was not activated for several days, only the latest state carries.
 *
 * A run is idempotent for a given day: a copy whose chain root already has
 * a task in today's log is skipped.
 */

import type { Adapter } from './adapter'
import { type CalendarContext, today } from './calendar'
import type { DayRegistry } from './day-registry'
import { type DayLog, type Task, type TaskRecord, anchorRootOf, decodeTask } from './domain-types'
import { DecodeError, PersistenceError, errorMessage } from './errors'
import type { Logger } from './logger'
import { type LocalDate, addDays, parseDate } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type AnchorError = DecodeError | PersistenceError

export type AnchorReport = {
  today: LocalDate
  yesterday: LocalDate
  /** Incomplete anchors found in yesterday's log */
  candidates: number
  carried: Task[]
  /** Candidates whose chain already reached today */
  skipped: number
  errors: AnchorError[]
}

export type AnchorHooks = {
  onAnchorCarried?: (task: Task) => void
  onError?: (error: AnchorError) => void
}

export type AnchorProcessorDeps = {
  adapter: Adapter
  registry: DayRegistry
  calendar: CalendarContext
  logger: Logger
  hooks?: AnchorHooks
}

export type AnchorProcessor = {
  process(): Promise<AnchorReport>
  /**
   * Activation gate: processes at most once per calendar day. The first
   * activation only records a baseline. Returns null when nothing ran.
   */
  processIfNewDay(): Promise<AnchorReport | null>
}

export const LAST_ANCHOR_CHECK_KEY = 'anchors.lastCheckDate'

// ============================================================================
// Factory
// ============================================================================

export function createAnchorProcessor(deps: AnchorProcessorDeps): AnchorProcessor {
  const { adapter, registry, calendar, logger, hooks } = deps

  function fail(report: AnchorReport, error: AnchorError): void {
    report.errors.push(error)
    hooks?.onError?.(error)
  }

  function candidatesOf(report: AnchorReport, records: TaskRecord[]): Task[] {
    const tasks: Task[] = []
    for (const record of records) {
      if (!record.isAnchor) continue
      const decoded = decodeTask(record)
      if (!decoded.ok) {
        logger.warn(`Skipping anchor: ${decoded.error.message}`)
        fail(report, decoded.error)
        continue
      }
      if (decoded.value.status !== 'complete') tasks.push(decoded.value)
    }
    return tasks
  }

  async function carry(report: AnchorReport, previous: DayLog): Promise<Task[]> {
    const candidates = candidatesOf(report, await registry.tasksOf(previous))
    report.candidates = candidates.length
    if (candidates.length === 0) return []

    const carried: Task[] = []
    let todayLog = await registry.findByDate(report.today)
    const present = new Set<string>()
    if (todayLog) {
      for (const t of await registry.tasksOf(todayLog)) {
        if (t.anchorSourceId !== null) present.add(t.anchorSourceId)
      }
    }

    for (const anchor of candidates) {
      const root = anchorRootOf(anchor)
      if (present.has(root)) {
        logger.debug(`Anchor '${anchor.name}' already carried to ${report.today}`)
        report.skipped++
        continue
      }

      todayLog ??= await registry.getOrCreate(report.today)
      const copy = await registry.addTask(todayLog, {
        name: anchor.name,
        notes: anchor.notes,
        tags: anchor.tags,
        status: 'normal',
        isAnchor: true,
        anchorSourceId: root,
        anchorDayCount: (anchor.anchorDayCount ?? 1) + 1,
      })
      present.add(root)
      carried.push(copy)
      logger.debug(`Anchored '${copy.name}' to ${report.today} (day ${copy.anchorDayCount ?? 2})`)
    }
    return carried
  }

  async function process(): Promise<AnchorReport> {
    const current = today(calendar)
    const report: AnchorReport = {
      today: current,
      yesterday: addDays(current, -1),
      candidates: 0,
      carried: [],
      skipped: 0,
      errors: [],
    }

    try {
      report.carried = await adapter.transaction(async () => {
        const previous = await registry.findByDate(report.yesterday)
        if (!previous) {
          logger.debug(`No day log for ${report.yesterday}`)
          return []
        }
        return carry(report, previous)
      })
    } catch (e) {
      const error = new PersistenceError(`Carrying anchors into ${current} failed: ${errorMessage(e)}`, e)
      logger.error(error.message)
      fail(report, error)
      return report
    }

    for (const task of report.carried) hooks?.onAnchorCarried?.(task)
    logger.info(
      `Anchor processing for ${current}: ${report.carried.length} carried, ${report.skipped} already present`
    )
    return report
  }

  async function processIfNewDay(): Promise<AnchorReport | null> {
    const current = today(calendar)

    let stored: string | null
    try {
      stored = await adapter.getMeta(LAST_ANCHOR_CHECK_KEY)
      if (stored === null) {
        logger.info(`First activation: anchor baseline set to ${current}`)
        await adapter.setMeta(LAST_ANCHOR_CHECK_KEY, current)
        return null
      }
    } catch (e) {
      const error = new PersistenceError(`Reading the anchor checkpoint failed: ${errorMessage(e)}`, e)
      logger.error(error.message)
      hooks?.onError?.(error)
      return null
    }

    const last = parseDate(stored)
    if (last.ok && last.value === current) {
      logger.debug(`Anchors already processed for ${current}`)
      return null
    }

    const report = await process()
    if (report.errors.some((e) => e instanceof PersistenceError)) return report

    try {
      await adapter.setMeta(LAST_ANCHOR_CHECK_KEY, current)
    } catch (e) {
      fail(report, new PersistenceError(`Saving the anchor checkpoint failed: ${errorMessage(e)}`, e))
    }
    return report
  }

  return { process, processIfNewDay }
}
