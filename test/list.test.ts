import { describe, it, expect, vi } from 'vitest'
import { NotificationQueue } from '../src/queue'
import { PropertyValueList } from '../src/list'
import {
  IndexError,
  InvalidOrderError,
  LengthMismatchError,
  ValidationError,
  ValueNotFoundError
} from '../src/errors'

const ctx = { label: 'form' }

function makeList(values: number[] = [1, 2, 3]) {
  return new PropertyValueList<number, typeof ctx>({
    context: ctx,
    name: 'nums',
    values,
    queue: new NotificationQueue()
  })
}

describe('PropertyValueList', () => {
  describe('reading', () => {
    it('exposes the values in several ways', () => {
      const list = makeList()

      expect(list.values()).toEqual([1, 2, 3])
      expect(list.length).toBe(3)
      expect(list.at(0)).toBe(1)
      expect(list.at(-1)).toBe(3)
      expect(list.index(2)).toBe(1)
      expect(list.count(2)).toBe(1)
      expect(list.includes(4)).toBe(false)
      expect([...list]).toEqual([1, 2, 3])
      expect(list.toString()).toBe('[1, 2, 3]')
      expect(list.get()).toBe(list)
      expect(list.equals([1, 2, 3])).toBe(true)
    })

    it('throws for positions out of range and values not present', () => {
      const list = makeList()

      expect(() => list.at(3)).toThrow(IndexError)
      expect(() => list.index(9)).toThrow(ValueNotFoundError)
    })
  })

  describe('reassigning items', () => {
    it('refuses a set of a different length', () => {
      const list = makeList()

      expect(() => list.set([1, 2])).toThrow(LengthMismatchError)
      expect(list.values()).toEqual([1, 2, 3])
    })

    it('notifies the list once, then the changed items', () => {
      const list = makeList()
      const order: string[] = []
      const items = list.getPropertyValueList()
      list.addListener('list', () => order.push('list'))
      items[0].addListener('item 0', () => order.push('item 0'))
      items[1].addListener('item 1', value => order.push(`item 1 = ${value}`))

      list.set([1, 20, 3])

      expect(list.values()).toEqual([1, 20, 3])
      expect(order).toEqual(['list', 'item 1 = 20'])
    })

    it('assigns a single item and a slice', () => {
      const list = makeList()
      const listener = vi.fn()
      list.addListener('list', listener)

      list.setItem(-1, 30)
      list.setSlice(0, 2, [10, 20])

      expect(list.values()).toEqual([10, 20, 30])
      expect(listener).toHaveBeenCalledTimes(2)
      expect(() => list.setSlice(0, 2, [1])).toThrow(LengthMismatchError)
    })

    it('keeps item listeners firing while the list is silenced', () => {
      const list = makeList()
      const item = list.getPropertyValueList()[1]
      const onList = vi.fn()
      const onItem = vi.fn()
      list.addListener('list', onList)
      item.addListener('item', onItem)
      list.disableNotification()

      list.setItem(1, 20)
      item.set(21)
      list.set([1, 22, 3])

      expect(onList).not.toHaveBeenCalled()
      expect(onItem.mock.calls.map(call => call[0])).toEqual([20, 21, 22])
      expect(list.values()).toEqual([1, 22, 3])
    })

    it('reports a change made on an item to list listeners', () => {
      const list = makeList()
      const listener = vi.fn()
      list.addListener('list', listener)

      list.getPropertyValueList()[0].set(10)

      expect(listener).toHaveBeenCalledTimes(1)
      expect(listener).toHaveBeenCalledWith(list, true, ctx, 'nums')
      expect(list.values()).toEqual([10, 2, 3])
    })
  })

  describe('structural changes', () => {
    it('notifies once per insertion', () => {
      const list = makeList()
      const listener = vi.fn()
      list.addListener('list', listener)

      list.append(4)
      list.insert(0, 0)
      list.extend([5, 6])

      expect(list.values()).toEqual([0, 1, 2, 3, 4, 5, 6])
      expect(listener).toHaveBeenCalledTimes(3)
    })

    it('pops from the end by default', () => {
      const list = makeList()

      expect(list.pop()).toBe(3)
      expect(list.pop(0)).toBe(1)
      expect(list.values()).toEqual([2])
      expect(() => list.pop(5)).toThrow(IndexError)
    })

    it('removes values', () => {
      const list = makeList([1, 2, 3, 2])
      const listener = vi.fn()
      list.addListener('list', listener)

      list.remove(2)
      expect(list.values()).toEqual([1, 3, 2])

      list.removeAll([1, 2])
      expect(list.values()).toEqual([3])
      expect(listener).toHaveBeenCalledTimes(2)

      expect(() => list.remove(99)).toThrow(ValueNotFoundError)
      expect(() => list.removeAll([3, 3])).toThrow(ValueNotFoundError)
      expect(list.values()).toEqual([3])
    })

    it('moves an item', () => {
      const list = makeList()

      list.move(0, 2)

      expect(list.values()).toEqual([2, 3, 1])
    })

    it('reorders the item containers themselves', () => {
      const list = makeList()
      const items = list.getPropertyValueList()
      const listener = vi.fn()
      items[2].addListener('watch', listener)

      list.reorder([2, 0, 1])

      expect(list.values()).toEqual([3, 1, 2])
      expect(list.getPropertyValueList()[0]).toBe(items[2])
      list.setItem(0, 30)
      expect(listener).toHaveBeenCalledWith(30, true, ctx, 'nums_Item')
    })

    it('ignores the identity order and refuses anything but a permutation', () => {
      const list = makeList()
      const listener = vi.fn()
      list.addListener('list', listener)

      list.reorder([0, 1, 2])
      expect(listener).not.toHaveBeenCalled()

      expect(() => list.reorder([0, 0, 1])).toThrow(InvalidOrderError)
      expect(() => list.reorder([0, 1])).toThrow(InvalidOrderError)
    })
  })

  describe('item and list rules', () => {
    it('casts items with the item cast', () => {
      const list = new PropertyValueList<number, typeof ctx>({
        context: ctx,
        values: [1.5],
        itemCast: (_ctx, _attributes, v) => Math.trunc(v),
        queue: new NotificationQueue()
      })

      list.append(2.9)

      expect(list.values()).toEqual([1, 2])
    })

    it('refuses invalid items when items may not be invalid', () => {
      const list = new PropertyValueList<number, typeof ctx>({
        context: ctx,
        values: [],
        itemValidate: (_ctx, _attributes, v) => {
          if (v < 0) throw new Error('Must be at least 0')
        },
        itemAllowInvalid: false,
        queue: new NotificationQueue()
      })

      expect(() => list.append(-1)).toThrow(ValidationError)
      expect(list.length).toBe(0)
    })

    it('validates the whole list and can refuse an invalid result', () => {
      const list = new PropertyValueList<number, typeof ctx>({
        context: ctx,
        values: [1, 2, 3],
        listValidate: (_ctx, _attributes, values) => {
          if (values.length > 3) throw new Error('Too many values')
        },
        allowInvalid: false,
        queue: new NotificationQueue()
      })

      expect(() => list.append(4)).toThrow(ValidationError)
      expect(list.values()).toEqual([1, 2, 3])
      expect(list.isValid()).toBe(true)
    })

    it('forwards item attribute changes to list attribute listeners', () => {
      const list = makeList()
      const listener = vi.fn()
      list.addAttributeListener('watch', listener)

      list.getPropertyValueList()[0].setAttribute('minval', 0)

      expect(listener).toHaveBeenCalledWith(ctx, 'minval', 0, 'nums')
    })
  })
})
