/**
 * Segment 05: SQLite Adapter Tests
 *
 * The SQLite adapter is the production implementation of the adapter
 * interface. It must satisfy the shared contract plus SQLite-specific
 * requirements. All tests use in-memory databases.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createSqliteAdapter, type SqliteAdapter } from '../src/sqlite-adapter'
import { describeAdapterContract } from './helpers/adapter-contract'
import { dayLog, taskRecord } from './helpers/fixtures'

describeAdapterContract('sqlite', () => createSqliteAdapter(':memory:'))

describe('sqlite adapter', () => {
  let adapter: SqliteAdapter

  beforeEach(async () => {
    adapter = await createSqliteAdapter(':memory:')
  })

  afterEach(async () => {
    await adapter.close()
  })

  describe('Schema', () => {
    it('creates its tables', async () => {
      expect(await adapter.listTables()).toEqual(['day_log', 'meta', 'schema_version', 'task'])
    })

    it('records schema version 1', async () => {
      expect(await adapter.getSchemaVersion()).toBe(1)
    })
  })

  describe('Transactions', () => {
    it('reports an open transaction only while fn runs', async () => {
      let inside = false
      await adapter.transaction(async () => {
        inside = await adapter.inTransaction()
      })
      expect(inside).toBe(true)
      expect(await adapter.inTransaction()).toBe(false)
    })

    it('closes the transaction after a rollback', async () => {
      await expect(
        adapter.transaction(async () => {
          throw new Error('abort')
        })
      ).rejects.toThrow('abort')
      expect(await adapter.inTransaction()).toBe(false)
    })
  })

  describe('Stored shape', () => {
    it('keeps an empty tag list', async () => {
      await adapter.createDayLog(dayLog('d1', '2025-01-01'))
      await adapter.createTask(taskRecord('t1', 'd1'))
      expect((await adapter.getTask('t1'))?.tags).toEqual([])
    })

    it('stores booleans as flags and reads them back', async () => {
      await adapter.createDayLog(dayLog('d1', '2025-01-01'))
      await adapter.createTask(
        taskRecord('t1', 'd1', { isRecurring: true, recurrenceRule: '{"frequency":"daily","interval":1}' })
      )
      const stored = await adapter.getTask('t1')
      expect(stored?.isRecurring).toBe(true)
      expect(stored?.isAnchor).toBe(false)
    })

    it('can clear a field back to null', async () => {
      await adapter.createDayLog(dayLog('d1', '2025-01-01'))
      await adapter.createTask(taskRecord('t1', 'd1', { notificationId: 'n-1' }))
      await adapter.updateTask('t1', { notificationId: null })
      expect((await adapter.getTask('t1'))?.notificationId).toBeNull()
    })
  })
})
