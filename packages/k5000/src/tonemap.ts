// =============================================================================
// ksynth - K5000 Tone Map
// =============================================================================

import { BoundedValue, getBit, requireLength, setBit } from '@ksynth/core'
import { K5000 } from './categories'
import type { ToneNumber } from './categories'

export const TONE_COUNT = 128
export const TONE_MAP_SIZE = 19

/**
 * The set of tones included in a block single dump: 128 presence bits,
 * seven per byte, least significant bit first.
 */
export class ToneMap {
  private readonly present: boolean[]

  private constructor(present: boolean[]) {
    this.present = present
  }

  static empty(): ToneMap {
    return new ToneMap(new Array<boolean>(TONE_COUNT).fill(false))
  }

  static of(tones: Iterable<ToneNumber>): ToneMap {
    const map = ToneMap.empty()
    for (const tone of tones) {
      map.present[tone.value] = true
    }
    return map
  }

  /**
   * @throws TooShortError if fewer than 19 bytes are given
   */
  static decode(bytes: Uint8Array): ToneMap {
    requireLength(bytes, TONE_MAP_SIZE, 'k5000.toneMap')
    const present: boolean[] = []
    for (let tone = 0; tone < TONE_COUNT; tone++) {
      present.push(getBit(bytes[Math.floor(tone / 7)], tone % 7))
    }
    return new ToneMap(present)
  }

  encode(): Uint8Array {
    const bytes = new Uint8Array(TONE_MAP_SIZE)
    this.present.forEach((on, tone) => {
      const index = Math.floor(tone / 7)
      bytes[index] = setBit(bytes[index], tone % 7, on)
    })
    return bytes
  }

  includes(tone: ToneNumber): boolean {
    return this.present[tone.value]
  }

  /** Included tones in ascending order */
  tones(): ToneNumber[] {
    const result: ToneNumber[] = []
    this.present.forEach((on, tone) => {
      if (on) {
        result.push(BoundedValue.fromInteger(K5000.tone, tone))
      }
    })
    return result
  }

  get size(): number {
    return this.present.filter(Boolean).length
  }
}
