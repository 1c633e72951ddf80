/**
 * Notification Scheduler
 *
 * Contract of the platform notification service the engine hands reminders
 * to. Delivery is out of scope; the engine only stores the returned handle.
 */

import type { Task } from './domain-types'
import type { Logger } from './logger'
import { NotificationSchedulingError, errorMessage } from './errors'

export interface NotificationScheduler {
  /** Returns a handle for the pending notification, or null if it was not scheduled. */
  schedule(task: Task, at: Date): Promise<string | null>
  cancel(handle: string): Promise<void>
}

export function createNoopScheduler(): NotificationScheduler {
  return {
    async schedule() {
      return null
    },
    async cancel() {},
  }
}

/**
 * Requests a notification and never throws: a failure is logged and
 * reported through onError, and yields no handle.
 */
export async function scheduleReminder(
  scheduler: NotificationScheduler,
  task: Task,
  at: Date,
  logger: Logger,
  onError?: (error: NotificationSchedulingError) => void
): Promise<string | null> {
  try {
    const handle = await scheduler.schedule(task, at)
    if (handle === null) logger.debug(`No notification scheduled for task '${task.id}'`)
    return handle
  } catch (e) {
    const error = new NotificationSchedulingError(
      task.id,
      `Scheduling reminder for task '${task.id}' failed: ${errorMessage(e)}`,
      e,
    )
    logger.warn(error.message)
    onError?.(error)
    return null
  }
}

export async function cancelReminder(
  scheduler: NotificationScheduler,
  handle: string,
  logger: Logger
): Promise<void> {
  try {
    await scheduler.cancel(handle)
  } catch (e) {
    logger.warn(`Cancelling notification '${handle}' failed: ${errorMessage(e)}`)
  }
}
