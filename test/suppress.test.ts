import { describe, it, expect, vi } from 'vitest'
import { NotificationQueue } from '../src/queue'
import { createOwner } from '../src/properties'
import { Int } from '../src/properties-types'
import { suppress, suppressAll, skip } from '../src/suppress'

function makeOwner() {
  return createOwner(
    { lo: Int({ default: 0 }), hi: Int({ default: 10, minval: 5 }) },
    { label: 'range', queue: new NotificationQueue() }
  )
}

describe('suppress', () => {
  it('holds back notifications while the callback runs', () => {
    const owner = makeOwner()
    const listener = vi.fn()
    owner.addListener('lo', 'watch', listener)

    const result = suppress(owner, 'lo', () => {
      owner.set('lo', 3)
      return 'done'
    })

    expect(result).toBe('done')
    expect(listener).not.toHaveBeenCalled()
    expect(owner.getNotificationState('lo')).toBe(true)
  })

  it('notifies each property afterwards when asked to', () => {
    const owner = makeOwner()
    const onLo = vi.fn()
    const onHi = vi.fn()
    owner.addListener('lo', 'watch', onLo)
    owner.addListener('hi', 'watch', onHi)

    suppress(owner, ['lo', 'hi'], () => {
      owner.set('lo', 1)
      owner.set('hi', 2)
    }, { notify: true })

    expect(onLo).toHaveBeenCalledTimes(1)
    expect(onLo).toHaveBeenCalledWith(1, true, owner, 'lo')
    expect(onHi).toHaveBeenCalledWith(2, false, owner, 'hi')
  })

  it('restores the previous state even when the callback throws', () => {
    const owner = makeOwner()
    owner.disableNotification('hi')

    expect(() =>
      suppress(owner, ['lo', 'hi'], () => {
        throw new Error('failed')
      })
    ).toThrow('failed')

    expect(owner.getNotificationState('lo')).toBe(true)
    expect(owner.getNotificationState('hi')).toBe(false)
  })

  it('suppresses every property with suppressAll', () => {
    const owner = makeOwner()
    const listener = vi.fn()
    owner.addListener('hi', 'watch', listener)

    suppressAll(owner, () => owner.set('hi', 20))

    expect(listener).not.toHaveBeenCalled()
    expect(owner.getNotificationState('hi')).toBe(true)
  })
})

describe('skip', () => {
  it('keeps one listener from hearing changes while others still do', () => {
    const owner = makeOwner()
    const skipped = vi.fn()
    const other = vi.fn()
    owner.addListener('lo', 'sync', skipped)
    owner.addListener('lo', 'other', other)

    skip(owner, 'lo', 'sync', () => owner.set('lo', 4))

    expect(skipped).not.toHaveBeenCalled()
    expect(other).toHaveBeenCalledWith(4, true, owner, 'lo')
    expect(owner.isListenerEnabled('lo', 'sync')).toBe(true)
  })

  it('leaves a listener that was already disabled disabled', () => {
    const owner = makeOwner()
    owner.addListener('lo', 'sync', () => undefined)
    owner.disableListener('lo', 'sync')

    skip(owner, 'lo', 'sync', () => owner.set('lo', 4))

    expect(owner.isListenerEnabled('lo', 'sync')).toBe(false)
  })

  it('does not skip listeners of invalid properties with ignoreInvalid', () => {
    const owner = makeOwner()
    const listener = vi.fn()
    owner.addListener('hi', 'sync', listener)
    owner.set('hi', 2)
    listener.mockClear()

    skip(owner, 'hi', 'sync', () => owner.set('hi', 3), { ignoreInvalid: true })

    expect(listener).toHaveBeenCalledWith(3, false, owner, 'hi')
  })
})
