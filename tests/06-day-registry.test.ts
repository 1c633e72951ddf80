/**
 * Segment 06: Calendar & Day Registry Tests
 *
 * Day boundaries in an explicit timezone, and lazy one-per-date DayLogs.
 */
import { describe, it, expect, beforeEach } from 'vitest'
import { createMockAdapter, type Adapter } from '../src/adapter'
import {
  createCalendar,
  instantOn,
  isValidTimezone,
  localTimeOfDay,
  nowUtc,
  today,
  yesterday,
} from '../src/calendar'
import { createDayRegistry, type DayRegistry } from '../src/day-registry'
import { ValidationError } from '../src/errors'
import { createTestClock, date, datetime, dayLog } from './helpers/fixtures'

// ============================================================================
// 1. CALENDAR
// ============================================================================

describe('Calendar context', () => {
  it('rejects an unknown timezone', () => {
    expect(isValidTimezone('Mars/Olympus')).toBe(false)
    expect(() => createCalendar('Mars/Olympus')).toThrow(ValidationError)
  })

  it('reads now from the injected clock', () => {
    const { clock } = createTestClock('2025-03-10T12:34:56Z')
    expect(nowUtc(createCalendar('UTC', clock))).toBe('2025-03-10T12:34:56')
  })

  it('computes today in the calendar timezone, not UTC', () => {
    // 02:00 UTC is still the previous evening in New York
    const { clock } = createTestClock('2025-03-10T02:00:00Z')
    const calendar = createCalendar('America/New_York', clock)
    expect(today(calendar)).toBe('2025-03-09')
    expect(yesterday(calendar)).toBe('2025-03-08')
  })

  it('computes today east of UTC', () => {
    const { clock } = createTestClock('2025-03-09T23:30:00Z')
    expect(today(createCalendar('Asia/Tokyo', clock))).toBe('2025-03-10')
  })

  it('extracts the local wall-clock time of a reminder', () => {
    const calendar = createCalendar('Europe/Berlin')
    // 08:15:42 UTC in winter is 09:15 in Berlin; seconds are dropped
    expect(localTimeOfDay(calendar, datetime('2025-01-20T08:15:42'))).toBe('09:15:00')
  })

  it('places a wall-clock time on another date across a DST change', () => {
    const calendar = createCalendar('Europe/Berlin')
    const { utc, at } = instantOn(calendar, date('2025-07-01'), localTimeOfDay(calendar, datetime('2025-01-20T08:15:00')))
    expect(utc).toBe('2025-07-01T07:15:00')
    expect(at.toISOString()).toBe('2025-07-01T07:15:00.000Z')
  })
})

// ============================================================================
// 2. DAY REGISTRY
// ============================================================================

describe('Day registry', () => {
  let adapter: Adapter
  let registry: DayRegistry

  beforeEach(() => {
    adapter = createMockAdapter()
    const { clock } = createTestClock('2025-03-10T12:00:00Z')
    registry = createDayRegistry({ adapter, calendar: createCalendar('UTC', clock) })
  })

  describe('findByDate', () => {
    it('returns null without creating', async () => {
      expect(await registry.findByDate(date('2025-03-10'))).toBeNull()
      expect(await adapter.getAllDayLogs()).toEqual([])
    })
  })

  describe('getOrCreate', () => {
    it('creates an empty DayLog on first reference', async () => {
      const created = await registry.getOrCreate(date('2025-03-10'))
      expect(created.date).toBe('2025-03-10')
      expect(created.notes).toBe('')
      expect(await adapter.getDayLogByDate(date('2025-03-10'))).toEqual(created)
    })

    it('returns the same DayLog on later references', async () => {
      const first = await registry.getOrCreate(date('2025-03-10'))
      const second = await registry.getOrCreate(date('2025-03-10'))
      expect(second.id).toBe(first.id)
      expect(await adapter.getAllDayLogs()).toHaveLength(1)
    })

    it('yields to a DayLog another writer created first', async () => {
      const base = createMockAdapter()
      await base.createDayLog(dayLog('winner', '2025-03-10'))
      let lookups = 0
      // The first lookup misses, as if the other writer had not committed yet
      const racing: Adapter = {
        ...base,
        async getDayLogByDate(d) {
          lookups++
          return lookups === 1 ? null : base.getDayLogByDate(d)
        },
      }
      const racingRegistry = createDayRegistry({ adapter: racing, calendar: createCalendar('UTC') })

      const result = await racingRegistry.getOrCreate(date('2025-03-10'))
      expect(result.id).toBe('winner')
      expect(await base.getAllDayLogs()).toHaveLength(1)
    })
  })

  describe('addTask', () => {
    it('fills defaults and timestamps', async () => {
      const day = await registry.getOrCreate(date('2025-03-10'))
      const task = await registry.addTask(day, { name: 'Water plants' })

      expect(task).toMatchObject({
        dayLogId: day.id,
        position: 0,
        name: 'Water plants',
        notes: '',
        tags: [],
        status: 'normal',
        isRecurring: false,
        isAnchor: false,
        createdAt: '2025-03-10T12:00:00',
        modifiedAt: '2025-03-10T12:00:00',
      })
      expect(task.reminderTime).toBeUndefined()
      expect((await adapter.getTask(task.id))?.name).toBe('Water plants')
    })

    it('appends after the last position', async () => {
      const day = await registry.getOrCreate(date('2025-03-10'))
      const a = await registry.addTask(day, { name: 'A' })
      const b = await registry.addTask(day, { name: 'B' })
      expect([a.position, b.position]).toEqual([0, 1])
      expect((await registry.tasksOf(day)).map((t) => t.name)).toEqual(['A', 'B'])
    })
  })
})
