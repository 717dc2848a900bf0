import { describe, it, expect, vi } from 'vitest'
import { NotificationQueue } from '../src/queue'
import {
  createOwner,
  getChoices,
  getLabels,
  isChoiceEnabled,
  enableChoice,
  disableChoice,
  setChoices,
  addChoice
} from '../src/properties'
import {
  Bool,
  Int,
  Real,
  Percentage,
  Str,
  Choice,
  Colour,
  List,
  Bounds,
  Point,
  BoundsValue,
  PointValue
} from '../src/properties-types'
import { CastError, IndexError, LengthMismatchError, PropertyError, UnknownPropertyError } from '../src/errors'

function makeOwner() {
  return createOwner(
    {
      enabled: Bool({ default: true }),
      count: Int({ minval: 0, maxval: 10 }),
      zoom: Real({ minval: 1, maxval: 8, clamped: true, default: 2 }),
      name: Str({ maxlen: 5 }),
      mode: Choice(['fast', 'accurate'], { labels: ['Fast', 'Accurate'] }),
      colour: Colour(),
      tags: List(Str()),
      range: Bounds({ ndims: 2 }),
      origin: Point()
    },
    { label: 'settings', queue: new NotificationQueue() }
  )
}

describe('PropertyOwner', () => {
  describe('defaults', () => {
    it('creates one container per declaration with its default', () => {
      const owner = makeOwner()

      expect(owner.getPropertyNames()).toEqual([
        'enabled',
        'count',
        'zoom',
        'name',
        'mode',
        'colour',
        'tags',
        'range',
        'origin'
      ])
      expect(owner.get('enabled')).toBe(true)
      expect(owner.get('count')).toBe(5)
      expect(owner.get('zoom')).toBe(2)
      expect(owner.get('name')).toBe('')
      expect(owner.get('mode')).toBe('fast')
      expect(owner.get('colour')).toEqual([1, 1, 1])
      expect(owner.get('tags')).toEqual([])
      expect(owner.get('range')).toEqual([0, 0, 0, 0])
      expect(owner.get('origin')).toEqual([0, 0])
      expect(owner.isValid()).toBe(true)
    })

    it('names each container after its property', () => {
      const owner = makeOwner()

      expect(owner.getPropVal('zoom').name).toBe('zoom')
      expect(owner.getPropVal('zoom').describe()).toBe('settings.zoom')
      expect(owner.getProp('zoom').type).toBe('real')
    })

    it('hands out the container built for each declaration kind', () => {
      const owner = makeOwner()

      expect(owner.getPropVal('tags')).toBe(owner.requireContainer('tags'))
      expect(owner.getPropVal('tags').kind).toBe('list')
      expect(owner.getPropVal('range').kind).toBe('list')
      expect(owner.getPropVal('zoom')).toBe(owner.requireContainer('zoom'))
      expect(owner.getPropVal('zoom').kind).toBe('value')
    })

    it('defaults numbers from their limits', () => {
      const owner = createOwner({
        between: Real({ minval: 2, maxval: 4 }),
        above: Int({ minval: 3 }),
        below: Int({ maxval: -2 }),
        free: Real(),
        percent: Percentage()
      }, { queue: new NotificationQueue() })

      expect(owner.get('between')).toBe(3)
      expect(owner.get('above')).toBe(3)
      expect(owner.get('below')).toBe(-2)
      expect(owner.get('free')).toBe(0)
      expect(owner.get('percent')).toBe(50)
    })
  })

  describe('numbers', () => {
    it('truncates ints and accepts numeric strings', () => {
      const owner = makeOwner()

      owner.set('count', 3.9)
      expect(owner.get('count')).toBe(3)

      owner.setValue('count', '7')
      expect(owner.get('count')).toBe(7)

      expect(() => owner.setValue('count', 'seven')).toThrow(CastError)
    })

    it('keeps an out-of-range value but marks it invalid', () => {
      const owner = makeOwner()

      owner.set('count', 11)

      expect(owner.get('count')).toBe(11)
      expect(owner.isValid('count')).toBe(false)
      expect(owner.validateAll()).toEqual([['count', 'Must be at most 10']])
    })

    it('clamps a clamped number, following a changed limit', () => {
      const owner = makeOwner()

      owner.set('zoom', 20)
      expect(owner.get('zoom')).toBe(8)

      owner.setConstraint('zoom', 'maxval', 4)
      expect(owner.get('zoom')).toBe(4)
      expect(owner.getConstraint('zoom', 'maxval')).toBe(4)
    })

    it('treats reals closer than the precision as equal', () => {
      const owner = makeOwner()
      const listener = vi.fn()
      owner.addListener('zoom', 'watch', listener)

      owner.set('zoom', 2 + 1e-12)

      expect(listener).not.toHaveBeenCalled()
    })
  })

  describe('strings and colours', () => {
    it('checks string length', () => {
      const owner = makeOwner()

      owner.set('name', 'toolong')

      expect(owner.validateAll()).toEqual([['name', 'Must have length at most 5']])
    })

    it('clamps colour channels and reads hex strings', () => {
      const owner = makeOwner()

      owner.set('colour', [2, 0.5, -1])
      expect(owner.get('colour')).toEqual([1, 0.5, 0])

      owner.setValue('colour', '#ff0000')
      expect(owner.get('colour')).toEqual([1, 0, 0])
    })
  })

  describe('choices', () => {
    it('rejects unknown and disabled choices', () => {
      const owner = makeOwner()

      owner.set('mode', 'slow')
      expect(owner.validateAll()).toEqual([['mode', 'Invalid choice (slow)']])

      disableChoice(owner, 'mode', 'accurate')
      expect(isChoiceEnabled(owner, 'mode', 'accurate')).toBe(false)
      owner.set('mode', 'accurate')
      expect(owner.validateAll()).toEqual([['mode', 'Choice is disabled (accurate)']])

      enableChoice(owner, 'mode', 'accurate')
      expect(owner.isValid('mode')).toBe(true)
    })

    it('reports choices and labels', () => {
      const owner = makeOwner()

      expect(getChoices(owner, 'mode')).toEqual(['fast', 'accurate'])
      expect(getLabels(owner, 'mode')).toEqual(['Fast', 'Accurate'])
    })

    it('replaces the choices, selecting the first when the value is gone', () => {
      const owner = makeOwner()

      setChoices(owner, 'mode', ['a', 'b'])
      expect(owner.get('mode')).toBe('a')
      expect(getLabels(owner, 'mode')).toEqual(['a', 'b'])

      owner.set('mode', 'b')
      setChoices(owner, 'mode', ['b', 'c'])
      expect(owner.get('mode')).toBe('b')
    })

    it('adds a choice, keeping disabled ones disabled', () => {
      const owner = makeOwner()
      disableChoice(owner, 'mode', 'accurate')

      addChoice(owner, 'mode', 'exact', 'Exact')

      expect(getChoices(owner, 'mode')).toEqual(['fast', 'accurate', 'exact'])
      expect(getLabels(owner, 'mode')).toEqual(['Fast', 'Accurate', 'Exact'])
      expect(isChoiceEnabled(owner, 'mode', 'exact')).toBe(true)
      expect(isChoiceEnabled(owner, 'mode', 'accurate')).toBe(false)
    })

    it('refuses choice helpers on other properties', () => {
      const owner = makeOwner()

      expect(() => getChoices(owner, 'name')).toThrow(PropertyError)
    })
  })

  describe('lists, bounds and points', () => {
    it('sets lists element-wise and refuses a change of length', () => {
      const owner = makeOwner()
      owner.getPropVal('tags').append('x')

      owner.set('tags', ['y'])
      expect(owner.get('tags')).toEqual(['y'])

      expect(() => owner.set('tags', ['a', 'b'])).toThrow(LengthMismatchError)
      expect(() => owner.setValue('tags', 'a')).toThrow(CastError)
    })

    it('reads and writes bounds by axis', () => {
      const owner = makeOwner()
      const range = new BoundsValue(owner.getPropVal('range'))

      range.setRange('y', 10, 20)
      expect(owner.get('range')).toEqual([0, 0, 10, 20])
      expect(range.getRange(1)).toEqual([10, 20])
      expect(range.getLen('y')).toBe(10)

      range.setLo('x', 5)
      expect(owner.validateAll()).toEqual([
        ['range', 'Minimum bound must be smaller than maximum bound (dimension 0, 5 - 0)']
      ])

      expect(() => range.getLo('z')).toThrow(IndexError)
    })

    it('clamps bound values to their axis limits', () => {
      const owner = makeOwner()
      const range = new BoundsValue(owner.getPropVal('range'))

      range.setLimits('x', 0, 3)
      range.setHi('x', 10)

      expect(range.getHi('x')).toBe(3)
      expect(range.getLimits('x')).toEqual([0, 3])
      expect(owner.getItemConstraint('range', 1, 'maxval')).toBe(3)
    })

    it('keeps bounds at least the minimum distance apart', () => {
      const owner = createOwner({ span: Bounds({ minDistance: 2 }) }, { queue: new NotificationQueue() })

      expect(owner.get('span')).toEqual([0, 2])
      owner.set('span', [0, 1])
      expect(owner.validateAll()).toEqual([['span', 'Minimum and maximum bounds must be at least 2 apart']])
    })

    it('reads and writes points by axis', () => {
      const owner = makeOwner()
      const origin = new PointValue(owner.getPropVal('origin'))

      origin.setAxis('y', 4)

      expect(owner.get('origin')).toEqual([0, 4])
      expect(origin.getAxis(1)).toBe(4)
    })

    it('limits bounds and points to four dimensions', () => {
      expect(() => Bounds({ ndims: 5 })).toThrow(PropertyError)
      expect(() => Point({ ndims: 0 })).toThrow(PropertyError)
      expect(() => Point({ ndims: 2, default: [1, 2, 3] })).toThrow(PropertyError)
    })
  })

  describe('listeners and notification', () => {
    it('notifies owner listeners with the owner as context', () => {
      const owner = makeOwner()
      const listener = vi.fn()
      owner.addListener('count', 'watch', listener)

      owner.set('count', 7)

      expect(listener).toHaveBeenCalledWith(7, true, owner, 'count')
    })

    it('reports constraint changes', () => {
      const owner = makeOwner()
      const listener = vi.fn()
      owner.addConstraintListener('count', 'limits', listener)

      owner.setConstraint('count', 'maxval', 20)

      expect(listener).toHaveBeenCalledWith(owner, 'maxval', 20, 'count')
      owner.removeConstraintListener('count', 'limits')
      owner.setConstraint('count', 'maxval', 30)
      expect(listener).toHaveBeenCalledTimes(1)
    })

    it('switches notification per property and for all of them', () => {
      const owner = makeOwner()
      const listener = vi.fn()
      owner.addListener('count', 'watch', listener)

      owner.disableAllNotification()
      owner.set('count', 1)
      expect(owner.getNotificationState('count')).toBe(false)

      owner.enableAllNotification()
      owner.notify('count')
      expect(listener).toHaveBeenCalledTimes(1)
      expect(listener).toHaveBeenCalledWith(1, true, owner, 'count')
    })

    it('revalidates the other properties when one changes', () => {
      const owner = createOwner(
        {
          useProxy: Bool(),
          proxy: Str({ required: current => current.getValue('useProxy') === true })
        },
        { queue: new NotificationQueue() }
      )
      expect(owner.isValid('proxy')).toBe(true)

      owner.set('useProxy', true)

      expect(owner.isValid('proxy')).toBe(false)
      expect(owner.validateAll()).toEqual([['proxy', 'A value is required']])
    })

    it('throws for properties it does not have', () => {
      const owner = makeOwner()

      expect(() => owner.getValue('missing')).toThrow(UnknownPropertyError)
      expect(owner.getContainer('missing')).toBeUndefined()
    })
  })

  it('prints one aligned line per property', () => {
    const owner = createOwner(
      { count: Int({ default: 3 }), tags: List(Str(), { default: ['a', 'b'] }) },
      { label: 'settings', queue: new NotificationQueue() }
    )

    expect(owner.toString()).toBe('settings:\n  count = 3\n  tags  = [a, b]')
  })
})
