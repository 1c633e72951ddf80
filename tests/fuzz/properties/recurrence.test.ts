/**
 * Property tests for recurrence rules.
 *
 * - Occurrence sequences are ordered, bounded and limited
 * - Weekday and day-of-month selectors are honoured
 * - End dates stop a sequence
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  decodeRule,
  encodeRule,
  nextOccurrence,
  occurrences,
} from '../../../src/recurrence-rule'
import { addDays, daysBetween, dayOf, daysInMonth, monthOf, weekdayNumber, yearOf } from '../../../src/time-date'
import { dailyRuleGen, localDateGen, monthlyRuleGen, openRuleGen, ruleGen, weeklyRuleGen } from '../generators'

const spanGen = fc.integer({ min: 0, max: 400 })
const policyGen = fc.constantFrom('rollover' as const, 'clamp' as const)

describe('occurrences', () => {
  it('are strictly increasing, after from and within to', () => {
    fc.assert(
      fc.property(ruleGen, localDateGen(), spanGen, policyGen, (rule, from, span, monthOverflow) => {
        const to = addDays(from, span)
        const dates = occurrences(rule, from, to, 100, { monthOverflow })
        let previous = from
        for (const d of dates) {
          expect(d > previous).toBe(true)
          expect(d <= to).toBe(true)
          previous = d
        }
      })
    )
  })

  it('never exceed the limit', () => {
    fc.assert(
      fc.property(openRuleGen, localDateGen(), fc.integer({ min: 1, max: 20 }), (rule, from, limit) => {
        expect(occurrences(rule, from, addDays(from, 3650), limit).length).toBeLessThanOrEqual(limit)
      })
    )
  })

  it('are empty once from reaches the end date', () => {
    fc.assert(
      fc.property(openRuleGen, localDateGen(), fc.integer({ min: 0, max: 60 }), (rule, endDate, past) => {
        const bounded = { ...rule, endDate }
        expect(occurrences(bounded, addDays(endDate, past), addDays(endDate, past + 400))).toEqual([])
      })
    )
  })
})

describe('daily rules', () => {
  it('step by exactly the interval', () => {
    fc.assert(
      fc.property(dailyRuleGen, localDateGen(), (rule, from) => {
        const next = nextOccurrence(rule, from)
        expect(next !== null && daysBetween(from, next)).toBe(rule.interval)
      })
    )
  })
})

describe('weekly rules', () => {
  it('land only on selected weekdays', () => {
    fc.assert(
      fc.property(weeklyRuleGen, localDateGen(), (rule, from) => {
        const days = rule.daysOfWeek
        fc.pre(days !== undefined)
        for (const d of occurrences(rule, from, addDays(from, 120))) {
          expect(days?.includes(weekdayNumber(d))).toBe(true)
        }
      })
    )
  })

  it('move forward at most interval weeks plus one', () => {
    fc.assert(
      fc.property(weeklyRuleGen, localDateGen(), (rule, from) => {
        const next = nextOccurrence(rule, from)
        expect(next).not.toBeNull()
        if (next === null) return
        const gap = daysBetween(from, next)
        expect(gap).toBeGreaterThanOrEqual(1)
        expect(gap).toBeLessThanOrEqual(7 * rule.interval + 7)
      })
    )
  })
})

describe('monthly rules', () => {
  it('pin the day to min(dayOfMonth, month length) under clamp', () => {
    fc.assert(
      fc.property(monthlyRuleGen, localDateGen(), (rule, from) => {
        const dom = rule.dayOfMonth
        fc.pre(dom !== undefined)
        for (const d of occurrences(rule, from, addDays(from, 800), 100, { monthOverflow: 'clamp' })) {
          expect(dayOf(d)).toBe(Math.min(dom ?? 0, daysInMonth(yearOf(d), monthOf(d))))
        }
      })
    )
  })

  it('land on dayOfMonth under rollover when the month is long enough', () => {
    fc.assert(
      fc.property(monthlyRuleGen, localDateGen(), (rule, from) => {
        const dom = rule.dayOfMonth
        fc.pre(dom !== undefined && dom <= 28)
        for (const d of occurrences(rule, from, addDays(from, 800))) {
          expect(dayOf(d)).toBe(dom)
        }
      })
    )
  })
})

describe('wire format', () => {
  it('decodes what it encodes', () => {
    fc.assert(
      fc.property(ruleGen, (rule) => {
        expect(decodeRule(encodeRule(rule))).toEqual({ ok: true, value: rule })
      })
    )
  })
})
