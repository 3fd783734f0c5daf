// =============================================================================
// ksynth - K4 Source (DCO)
// =============================================================================

import { BoundedValue, fromWire, getBit, getBits, packBits, requireLength } from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { K4 } from './categories'
import type { Coarse, Curve, Fine, Key, Level, WaveNumber } from './categories'
import { decodeWave, encodeWave } from './wave'

export interface Source {
  readonly delay: Level
  readonly wave: WaveNumber
  readonly keyScalingCurve: Curve
  readonly coarse: Coarse
  /** When off, the source plays `fixedKey` regardless of the key pressed */
  readonly keyTracking: boolean
  readonly fixedKey: Key
  readonly fine: Fine
  readonly pressureToFrequency: boolean
  readonly vibratoAutoBend: boolean
  readonly velocityCurve: Curve
}

export function defaultSource(): Source {
  return {
    delay: BoundedValue.zero(K4.level),
    wave: BoundedValue.zero(K4.wave),
    keyScalingCurve: BoundedValue.zero(K4.curve),
    coarse: BoundedValue.zero(K4.coarse),
    keyTracking: true,
    fixedKey: BoundedValue.zero(K4.key),
    fine: BoundedValue.zero(K4.fine),
    pressureToFrequency: false,
    vibratoAutoBend: true,
    velocityCurve: BoundedValue.zero(K4.curve)
  }
}

/**
 * One source as stored after de-interleaving (7 bytes):
 *
 * | byte | contents |
 * |------|----------|
 * | 0 | delay |
 * | 1 | b0 wave high, b4-6 key-scaling curve |
 * | 2 | wave low |
 * | 3 | b0-5 coarse, b6 key tracking |
 * | 4 | fixed key |
 * | 5 | fine |
 * | 6 | b0 pressure>frequency, b1 vibrato/auto bend, b2-4 velocity curve |
 */
export const source: Codec<Source> = {
  name: 'k4.source',
  size: 7,
  decode(bytes) {
    requireLength(bytes, 7, this.name)
    return {
      delay: fromWire(K4.level, bytes[0]),
      wave: decodeWave(bytes[1], bytes[2]),
      keyScalingCurve: fromWire(K4.curve, getBits(bytes[1], 4, 3)),
      coarse: fromWire(K4.coarse, getBits(bytes[3], 0, 6)),
      keyTracking: getBit(bytes[3], 6),
      fixedKey: fromWire(K4.key, bytes[4]),
      fine: fromWire(K4.fine, bytes[5]),
      pressureToFrequency: getBit(bytes[6], 0),
      vibratoAutoBend: getBit(bytes[6], 1),
      velocityCurve: fromWire(K4.curve, getBits(bytes[6], 2, 3))
    }
  },
  encode(s) {
    const [waveHigh, waveLow] = encodeWave(s.wave)
    return Uint8Array.of(
      s.delay.toWireByte(),
      packBits([[0, 1, waveHigh], [4, 3, s.keyScalingCurve.toWireByte()]]),
      waveLow,
      packBits([[0, 6, s.coarse.toWireByte()], [6, 1, s.keyTracking]]),
      s.fixedKey.toWireByte(),
      s.fine.toWireByte(),
      packBits([
        [0, 1, s.pressureToFrequency],
        [1, 1, s.vibratoAutoBend],
        [2, 3, s.velocityCurve.toWireByte()]
      ])
    )
  }
}
