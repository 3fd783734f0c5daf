/**
 * @ksynth/k5000 - Value Category Tests
 */

import { BoundedValue } from '@ksynth/core'
import { K5000 } from '../categories'

const categories = Object.values(K5000)

describe('K5000 categories', () => {
  it('keeps each neutral value inside its range', () => {
    for (const cat of categories) {
      expect(BoundedValue.zero(cat).value).toBeGreaterThanOrEqual(cat.min)
      expect(BoundedValue.zero(cat).value).toBeLessThanOrEqual(cat.max)
    }
  })

  it('writes every single-byte value as a 7-bit byte and reads it back', () => {
    for (const cat of categories.filter(c => c.bits === 7)) {
      for (let v = cat.min; v <= cat.max; v++) {
        const byte = BoundedValue.fromInteger(cat, v).toWireByte()
        expect(byte).toBeGreaterThanOrEqual(0)
        expect(byte).toBeLessThanOrEqual(127)
        expect(BoundedValue.fromWireByte(cat, byte).value).toBe(v)
      }
    }
  })

  it('has no single wire byte for the wider categories', () => {
    const wide = categories.filter(c => c.bits > 7)
    expect(wide.map(c => c.name)).toEqual(['k5000.wave', 'k5000.instrument'])
    for (const cat of wide) {
      expect(() => BoundedValue.fromInteger(cat, cat.max).toWireByte()).toThrow('has no single wire byte')
      const top = BoundedValue.fromInteger(cat, cat.max).toWireValue()
      expect(top).toBe((1 << cat.bits) - 1)
      expect(BoundedValue.fromWireByte(cat, top).value).toBe(cat.max)
    }
  })
})
