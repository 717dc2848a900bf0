/**
 * Notification Queue
 * ==================
 *
 * A FIFO dispatcher for listener calls. The first caller to enqueue while the
 * queue is idle becomes the drainer and runs every queued call, including
 * calls enqueued by the calls it runs, before returning. Anyone enqueueing
 * while a drain is in progress only appends. A notify -> set -> notify chain
 * therefore runs as a flat sequence instead of a deepening call stack, and a
 * change made from inside a listener is delivered after the current round.
 *
 * A call that throws is logged and the drain carries on.
 */

import { log } from './config'

// =============================================================================
// TYPES
// =============================================================================

/**
 * A deferred call. `description` identifies the listener and the container
 * it belongs to in log output.
 */
interface QueuedCall {
  readonly description: string
  readonly run: () => void
}

interface NotificationQueueOptions {
  /** Label used in debug output, handy when several queues are alive. */
  name?: string
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

class NotificationQueue {
  readonly name: string
  private calls: QueuedCall[] = []
  private draining = false

  constructor(options: NotificationQueueOptions = {}) {
    this.name = options.name ?? 'queue'
  }

  /** Number of calls waiting to run. */
  get size(): number {
    return this.calls.length
  }

  /** True while a drain is in progress. */
  get isDraining(): boolean {
    return this.draining
  }

  /**
   * Enqueues `fn(...args)` and drains the queue unless a drain is already
   * running further up the stack.
   */
  call<TArgs extends unknown[]>(
    description: string,
    fn: (...args: TArgs) => void,
    ...args: TArgs
  ): void {
    this.push({ description, run: () => fn(...args) })
    this.drain()
  }

  /**
   * Enqueues a batch of calls, in order, and drains. Nothing runs until the
   * whole batch is queued.
   */
  callAll(calls: readonly QueuedCall[]): void {
    calls.forEach(call => this.push(call))
    this.drain()
  }

  private push(call: QueuedCall): void {
    log.debug(`Adding ${call.description} to ${this.name} (${this.calls.length} in queue)`)
    this.calls.push(call)
  }

  private drain(): void {
    if (this.draining) return

    this.draining = true
    try {
      let next = this.calls.shift()
      while (next !== undefined) {
        log.debug(`Calling ${next.description} (${this.calls.length} in queue)`)
        try {
          next.run()
        } catch (error) {
          log.error(`Listener ${next.description} raised an error`, error)
        }
        next = this.calls.shift()
      }
    } finally {
      this.draining = false
    }
  }
}

/**
 * The process-wide queue. Containers created without an explicit queue, and
 * outside `withNotificationQueue()`, dispatch through it, so notifications
 * from bound containers share a single total order.
 */
const defaultQueue = new NotificationQueue({ name: 'default' })

export {
  NotificationQueue,
  defaultQueue,
  type QueuedCall,
  type NotificationQueueOptions
}
