import { describe, it, expect, vi, afterEach } from 'vitest'
import { NotificationQueue } from '../src/queue'
import { configure, resetConfig } from '../src/config'
import {
  withNotificationQueue,
  setNotificationQueue,
  resetNotificationQueue,
  tryUseNotificationQueue,
  useNotificationQueue
} from '../src/ergonomic'
import { defaultQueue } from '../src/queue'
import { PropertyValue } from '../src/value'

function spyLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('NotificationQueue', () => {
  afterEach(() => {
    resetConfig()
  })

  it('runs a call straight away when idle', () => {
    const queue = new NotificationQueue()
    const seen: number[] = []

    queue.call('push', (n: number) => seen.push(n), 1)

    expect(seen).toEqual([1])
    expect(queue.size).toBe(0)
    expect(queue.isDraining).toBe(false)
  })

  it('runs calls enqueued during a drain after the current call, in order', () => {
    const queue = new NotificationQueue()
    const order: string[] = []

    queue.call('outer', () => {
      order.push('outer start')
      queue.call('inner 1', () => order.push('inner 1'))
      queue.call('inner 2', () => {
        order.push('inner 2')
        queue.call('inner 3', () => order.push('inner 3'))
      })
      order.push('outer end')
    })

    expect(order).toEqual(['outer start', 'outer end', 'inner 1', 'inner 2', 'inner 3'])
  })

  it('reports draining while a call runs', () => {
    const queue = new NotificationQueue()
    let draining = false

    queue.call('check', () => {
      draining = queue.isDraining
    })

    expect(draining).toBe(true)
    expect(queue.isDraining).toBe(false)
  })

  it('queues a whole batch before running any of it', () => {
    const queue = new NotificationQueue()
    const sizes: number[] = []

    queue.callAll([
      { description: 'first', run: () => sizes.push(queue.size) },
      { description: 'second', run: () => sizes.push(queue.size) }
    ])

    expect(sizes).toEqual([1, 0])
  })

  it('logs a failing call and carries on', () => {
    const logger = spyLogger()
    configure({ logger })
    const queue = new NotificationQueue()
    const seen: string[] = []

    queue.callAll([
      {
        description: 'boom',
        run: () => {
          throw new Error('bad listener')
        }
      },
      { description: 'after', run: () => seen.push('after') }
    ])

    expect(seen).toEqual(['after'])
    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledWith('[PROPVALUE] Listener boom raised an error', expect.any(Error))
    expect(queue.isDraining).toBe(false)
  })

  it('logs dispatch at debug level only when debug is on', () => {
    const logger = spyLogger()
    configure({ logger })
    const queue = new NotificationQueue({ name: 'test' })

    queue.call('quiet', () => undefined)
    expect(logger.debug).not.toHaveBeenCalled()

    configure({ debug: true })
    queue.call('loud', () => undefined)
    expect(logger.debug).toHaveBeenCalledWith('[PROPVALUE] Adding loud to test (0 in queue)')
    expect(logger.debug).toHaveBeenCalledWith('[PROPVALUE] Calling loud (0 in queue)')
  })
})

describe('ambient notification queue', () => {
  afterEach(() => {
    resetNotificationQueue()
  })

  it('falls back to the default queue', () => {
    expect(tryUseNotificationQueue()).toBeNull()
    expect(useNotificationQueue()).toBe(defaultQueue)
  })

  it('hands the active queue to containers created inside withNotificationQueue', () => {
    const queue = new NotificationQueue()

    const value = withNotificationQueue(queue, () => new PropertyValue({ context: null, value: 1 }))

    expect(value.queue).toBe(queue)
    expect(tryUseNotificationQueue()).toBeNull()
  })

  it('keeps a queue set with setNotificationQueue until reset', () => {
    const queue = new NotificationQueue()

    setNotificationQueue(queue)
    expect(useNotificationQueue()).toBe(queue)

    resetNotificationQueue()
    expect(useNotificationQueue()).toBe(defaultQueue)
  })
})
