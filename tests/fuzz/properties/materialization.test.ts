/**
 * Property tests for the processing units.
 *
 * - Generation is idempotent and yields one instance per (template, date)
 * - Anchor chains keep their root and count one day per activation
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { createMockAdapter, type Adapter } from '../../../src/adapter'
import { createAnchorProcessor } from '../../../src/anchor-processor'
import { createCalendar, today } from '../../../src/calendar'
import { createDayRegistry } from '../../../src/day-registry'
import { createNoopScheduler } from '../../../src/notifications'
import { createLogger } from '../../../src/logger'
import { createRecurrenceGenerator } from '../../../src/recurrence-generator'
import { encodeRule, occurrences } from '../../../src/recurrence-rule'
import { addDays } from '../../../src/time-date'
import { createTestClock } from '../../helpers/fixtures'
import { localDateGen, ruleGen } from '../generators'

async function instanceDates(adapter: Adapter, templateId: string): Promise<string[]> {
  const dates: string[] = []
  for (const day of await adapter.getAllDayLogs()) {
    for (const task of await adapter.getTasksByDayLog(day.id)) {
      if (task.sourceTemplateId === templateId) dates.push(day.date)
    }
  }
  return dates
}

describe('recurrence generation', () => {
  it('materializes exactly the rule occurrences, once, however often it runs', async () => {
    await fc.assert(
      fc.asyncProperty(
        ruleGen,
        localDateGen({ minYear: 2020, maxYear: 2030 }),
        fc.array(fc.integer({ min: 0, max: 120 }), { minLength: 1, maxLength: 4 }),
        async (rule, home, horizons) => {
          const adapter = createMockAdapter()
          const calendar = createCalendar('UTC', createTestClock('2025-01-01T00:00:00Z').clock)
          const registry = createDayRegistry({ adapter, calendar })
          const generator = createRecurrenceGenerator({
            adapter,
            registry,
            calendar,
            scheduler: createNoopScheduler(),
            logger: createLogger('', 'silent'),
          })
          const template = await registry.addTask(await registry.getOrCreate(home), {
            name: 'Template',
            isRecurring: true,
            recurrenceRule: encodeRule(rule),
          })

          // Overlapping runs in any order
          for (const span of horizons) {
            const report = await generator.generate({ through: addDays(home, span) })
            expect(report.errors).toEqual([])
          }

          const furthest = addDays(home, Math.max(...horizons))
          expect(await instanceDates(adapter, template.id)).toEqual(occurrences(rule, home, furthest))
        }
      ),
      { numRuns: 25 }
    )
  })
})

describe('anchor carry-forward', () => {
  it('counts one day per activation and keeps the root', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 10 }), fc.integer({ min: 1, max: 3 }), async (days, reruns) => {
        const adapter = createMockAdapter()
        const testClock = createTestClock('2025-05-01T12:00:00Z')
        const calendar = createCalendar('UTC', testClock.clock)
        const registry = createDayRegistry({ adapter, calendar })
        const processor = createAnchorProcessor({ adapter, registry, calendar, logger: createLogger('', 'silent') })
        const home = await registry.getOrCreate(today(calendar))
        const original = await registry.addTask(home, { name: 'Anchor', isAnchor: true })

        for (let d = 1; d <= days; d++) {
          testClock.set(`${addDays(home.date, d)}T12:00:00Z`)
          for (let r = 0; r < reruns; r++) await processor.process()
        }

        const last = await adapter.getDayLogByDate(addDays(home.date, days))
        const tasks = last ? await adapter.getTasksByDayLog(last.id) : []
        expect(tasks).toHaveLength(1)
        expect(tasks[0]?.anchorSourceId).toBe(original.id)
        expect(tasks[0]?.anchorDayCount).toBe(days + 1)
      }),
      { numRuns: 20 }
    )
  })
})
