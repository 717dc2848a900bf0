import { describe, it, expect } from 'vitest'
import { NotificationQueue } from '../src/queue'
import { createOwner } from '../src/properties'
import { Bool, Bounds, Colour, Int, List, Str } from '../src/properties-types'
import { deserialise, serialise, serialiseAll } from '../src/serialise'

function makeOwner() {
  return createOwner(
    {
      flag: Bool(),
      count: Int({ default: 2 }),
      title: Str({ default: 'draft' }),
      colour: Colour(),
      range: Bounds(),
      sizes: List(Int())
    },
    { queue: new NotificationQueue() }
  )
}

describe('serialise', () => {
  it('formats scalars with their declaration', () => {
    const owner = makeOwner()
    owner.set('colour', [1, 0, 0.5])

    expect(serialise(owner, 'flag')).toBe('false')
    expect(serialise(owner, 'count')).toBe('2')
    expect(serialise(owner, 'colour')).toBe('#ff0080')
  })

  it('joins list items with the delimiter', () => {
    const owner = makeOwner()
    owner.set('range', [0, 10])

    expect(serialise(owner, 'range')).toBe('0#10')
    expect(serialise(owner, 'sizes')).toBe('')
  })

  it('serialises every property by name', () => {
    const owner = makeOwner()

    expect(serialiseAll(owner)).toEqual({
      flag: 'false',
      count: '2',
      title: 'draft',
      colour: '#ffffff',
      range: '0#0',
      sizes: ''
    })
  })
})

describe('deserialise', () => {
  it('parses, sets and returns the value', () => {
    const owner = makeOwner()

    expect(deserialise(owner, 'flag', '1')).toBe(true)
    expect(deserialise(owner, 'count', '12')).toBe(12)
    expect(deserialise(owner, 'range', '5#15')).toEqual([5, 15])

    expect(owner.get('flag')).toBe(true)
    expect(owner.get('count')).toBe(12)
    expect(owner.get('range')).toEqual([5, 15])
  })

  it('reads an empty string as an empty list', () => {
    const owner = makeOwner()

    expect(deserialise(owner, 'sizes', '')).toEqual([])
  })

  it('reads short hex colours', () => {
    const owner = makeOwner()

    deserialise(owner, 'colour', '#f00')
    expect(owner.get('colour')).toEqual([1, 0, 0])
  })

  it('throws for text the declaration cannot parse', () => {
    const owner = makeOwner()

    expect(() => deserialise(owner, 'count', 'abc')).toThrow('abc is not a number')
    expect(owner.get('count')).toBe(2)
  })
})
