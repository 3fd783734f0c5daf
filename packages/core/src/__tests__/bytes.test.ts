/**
 * @ksynth/core - Bit Field and Interleaving Tests
 */

import { getBit, getBits, packBits, setBit, setBits } from '../bits'
import { deinterleave, gather, interleave, scatter } from '../stride'

describe('bit fields', () => {
  it('reads a field at an offset', () => {
    // 0b0011_0110: bits 4-5 = 0b11, bits 0-3 = 0b0110
    expect(getBits(0x36, 4, 2)).toBe(3)
    expect(getBits(0x36, 0, 4)).toBe(6)
  })

  it('writes a field without touching neighbours', () => {
    expect(setBits(0x36, 0, 4, 0x0F)).toBe(0x3F)
    expect(setBits(0x36, 4, 2, 0)).toBe(0x06)
  })

  it('masks values wider than the field', () => {
    expect(setBits(0, 0, 3, 0x0F)).toBe(0x07)
  })

  it('reads and writes single bits', () => {
    expect(getBit(0x40, 6)).toBe(true)
    expect(getBit(0x40, 5)).toBe(false)
    expect(setBit(0x00, 6, true)).toBe(0x40)
    expect(setBit(0x7F, 6, false)).toBe(0x3F)
  })

  it('packs numeric and boolean fields', () => {
    expect(packBits([[0, 2, 2], [2, 2, 3], [4, 1, true], [5, 1, false]])).toBe(0x1E)
  })

  it('toggling a flag leaves the co-located number alone', () => {
    for (let n = 0; n < 16; n++) {
      const off = packBits([[0, 4, n], [6, 1, false]])
      const on = setBit(off, 6, true)
      expect(getBits(on, 0, 4)).toBe(n)
      expect(getBits(setBits(on, 0, 4, 15 - n), 6, 1)).toBe(1)
    }
  })
})

describe('stride primitives', () => {
  const bytes = Uint8Array.from({ length: 12 }, (_, i) => i + 1)

  it('gathers every nth byte', () => {
    expect(Array.from(gather(bytes, 4, 0, 3))).toEqual([1, 5, 9])
    expect(Array.from(gather(bytes, 4, 1, 3))).toEqual([2, 6, 10])
  })

  it('scatters with the same stride', () => {
    const target = new Uint8Array(12)
    scatter(target, Uint8Array.of(2, 6, 10), 4, 1)
    expect(Array.from(target)).toEqual([0, 2, 0, 0, 0, 6, 0, 0, 0, 10, 0, 0])
  })

  it('deinterleaves into parallel blocks', () => {
    const blocks = deinterleave(bytes, 4, 3)
    expect(blocks.map(block => Array.from(block))).toEqual([
      [1, 5, 9],
      [2, 6, 10],
      [3, 7, 11],
      [4, 8, 12]
    ])
  })

  it('interleave reverses deinterleave', () => {
    expect(Array.from(interleave(deinterleave(bytes, 2, 6)))).toEqual(Array.from(bytes))
    expect(Array.from(interleave(deinterleave(bytes, 4, 3)))).toEqual(Array.from(bytes))
  })

  it('refuses blocks of different sizes', () => {
    expect(() => interleave([Uint8Array.of(1, 2), Uint8Array.of(3)])).toThrow(/block 1 has 1 bytes/)
  })
})
