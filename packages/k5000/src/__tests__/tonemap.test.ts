/**
 * @ksynth/k5000 - Tone Map Tests
 */

import { BoundedValue, TooShortError } from '@ksynth/core'
import { K5000 } from '../categories'
import { TONE_MAP_SIZE, ToneMap } from '../tonemap'

const tone = (n: number) => BoundedValue.fromInteger(K5000.tone, n)

describe('ToneMap', () => {
  it('packs seven tones per byte, lowest bit first', () => {
    const bytes = ToneMap.of([tone(0), tone(7), tone(9), tone(127)]).encode()
    expect(bytes).toHaveLength(TONE_MAP_SIZE)
    expect(bytes[0]).toBe(0x01)
    expect(bytes[1]).toBe(0x05)
    expect(bytes[18]).toBe(0x02)
    expect(Array.from(bytes.subarray(2, 18))).toEqual(new Array(16).fill(0))
  })

  it('lists included tones in ascending order', () => {
    const bytes = new Uint8Array(TONE_MAP_SIZE)
    bytes[0] = 0x42
    bytes[3] = 0x01
    const map = ToneMap.decode(bytes)
    expect(map.tones().map(t => t.value)).toEqual([1, 6, 21])
    expect(map.size).toBe(3)
    expect(map.includes(tone(6))).toBe(true)
    expect(map.includes(tone(7))).toBe(false)
  })

  it('ignores the unused high bit of each byte', () => {
    const bytes = new Uint8Array(TONE_MAP_SIZE)
    bytes[0] = 0x80
    expect(ToneMap.decode(bytes).size).toBe(0)
  })

  it('needs all 19 bytes', () => {
    expect(() => ToneMap.decode(new Uint8Array(18))).toThrow(TooShortError)
  })

  it('is empty by default', () => {
    expect(Array.from(ToneMap.empty().encode())).toEqual(new Array(TONE_MAP_SIZE).fill(0))
  })
})
