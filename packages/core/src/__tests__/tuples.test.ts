/**
 * @ksynth/core - Fixed-Count Collection Tests
 */

import { FixedList, quadOf } from '../tuples'
import { OutOfRangeError } from '../errors'

describe('FixedList', () => {
  const letters = FixedList.of(['a', 'b', 'c'], 3, 'test.letters')

  it('checks the count when built', () => {
    expect(() => FixedList.of(['a', 'b'], 3, 'test.letters')).toThrow('test.letters count: 2 is outside 3..3')
  })

  it('fills by index', () => {
    expect(FixedList.filled(4, i => i * 2, 'test.even').toArray()).toEqual([0, 2, 4, 6])
  })

  it('replaces one entry and keeps the original', () => {
    const changed = letters.with(1, 'x')
    expect(changed.toArray()).toEqual(['a', 'x', 'c'])
    expect(letters.at(1)).toBe('b')
    expect(changed.length).toBe(3)
  })

  it('rejects an index outside the list', () => {
    expect(() => letters.at(3)).toThrow(OutOfRangeError)
    expect(() => letters.with(-1, 'x')).toThrow('test.letters index: -1 is outside 0..2')
  })

  it('keeps its length and field through map', () => {
    const upper = letters.map(l => l.toUpperCase())
    expect(upper.field).toBe('test.letters')
    expect([...upper]).toEqual(['A', 'B', 'C'])
  })

  it('does not share its array with callers', () => {
    const source = ['a', 'b', 'c']
    const list = FixedList.of(source, 3, 'test.letters')
    source[0] = 'z'
    list.toArray()[1] = 'z'
    expect(list.toArray()).toEqual(['a', 'b', 'c'])
  })
})

describe('quadOf', () => {
  it('names the field in the count error', () => {
    expect(() => quadOf([1, 2, 3], 'test.macros')).toThrow('test.macros count: 3 is outside 4..4')
  })
})
