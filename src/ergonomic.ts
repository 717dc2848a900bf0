/**
 * Ambient Queue Context (with unctx)
 * ==================================
 *
 * Containers take their notification queue as a constructor option. When the
 * option is left out they ask this module for the active queue, so that
 * setup code can create a whole group of owners against one isolated queue
 * without threading it through every call:
 *
 * ```ts
 * const queue = new NotificationQueue()
 * const [a, b] = withNotificationQueue(queue, () => [createOwner(schema), createOwner(schema)])
 * ```
 *
 * As with all `unctx` contexts, the active queue is only visible
 * synchronously inside the callback, and nesting a call with a different
 * queue is a context conflict.
 */

import { getContext } from 'unctx'
import { NotificationQueue, defaultQueue } from './queue'

/**
 * Namespaced so that other libraries using `unctx` cannot collide with it.
 */
const queueContext = getContext<NotificationQueue>('propvalue-notification-queue')

/**
 * Runs `fn` with `queue` as the active queue and returns its result.
 */
function withNotificationQueue<TResult>(queue: NotificationQueue, fn: () => TResult): TResult {
  return queueContext.call(queue, fn)
}

/**
 * Makes `queue` the active queue until `resetNotificationQueue()` is called.
 * Replaces any queue set before.
 */
function setNotificationQueue(queue: NotificationQueue): void {
  queueContext.set(queue, true)
}

function resetNotificationQueue(): void {
  queueContext.unset()
}

/**
 * The active queue, or `null` outside `withNotificationQueue()` and when no
 * queue has been set.
 */
function tryUseNotificationQueue(): NotificationQueue | null {
  return queueContext.tryUse() ?? null
}

/**
 * The active queue, falling back to the process-wide `defaultQueue`.
 */
function useNotificationQueue(): NotificationQueue {
  return tryUseNotificationQueue() ?? defaultQueue
}

export {
  withNotificationQueue,
  setNotificationQueue,
  resetNotificationQueue,
  tryUseNotificationQueue,
  useNotificationQueue
}
