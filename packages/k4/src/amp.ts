// =============================================================================
// ksynth - K4 Amplifier (DCA)
// =============================================================================

import { BoundedValue, concatBytes, decodeAt, fromWire, requireLength } from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { K4 } from './categories'
import type { Level } from './categories'
import {
  defaultLevelModulation,
  defaultTimeModulation,
  levelModulation,
  timeModulation
} from './modulation'
import type { LevelModulation, TimeModulation } from './modulation'

export interface AmpEnvelope {
  readonly attack: Level
  readonly decay: Level
  readonly sustain: Level
  readonly release: Level
}

export interface Amplifier {
  readonly level: Level
  readonly envelope: AmpEnvelope
  readonly levelModulation: LevelModulation
  readonly timeModulation: TimeModulation
}

export function defaultAmplifier(): Amplifier {
  return {
    level: BoundedValue.fromInteger(K4.level, 75),
    envelope: {
      attack: BoundedValue.zero(K4.level),
      decay: BoundedValue.fromInteger(K4.level, 50),
      sustain: BoundedValue.fromInteger(K4.level, 100),
      release: BoundedValue.fromInteger(K4.level, 20)
    },
    levelModulation: defaultLevelModulation(),
    timeModulation: defaultTimeModulation()
  }
}

export const ampEnvelope: Codec<AmpEnvelope> = {
  name: 'k4.ampEnvelope',
  size: 4,
  decode(bytes) {
    requireLength(bytes, 4, this.name)
    return {
      attack: fromWire(K4.level, bytes[0]),
      decay: fromWire(K4.level, bytes[1]),
      sustain: fromWire(K4.level, bytes[2]),
      release: fromWire(K4.level, bytes[3])
    }
  },
  encode(e) {
    return Uint8Array.of(
      e.attack.toWireByte(),
      e.decay.toWireByte(),
      e.sustain.toWireByte(),
      e.release.toWireByte()
    )
  }
}

/**
 * One amplifier as stored after de-interleaving (11 bytes):
 * level, envelope (4), level modulation (3), time modulation (3).
 */
export const amplifier: Codec<Amplifier> = {
  name: 'k4.amplifier',
  size: 11,
  decode(bytes, context) {
    requireLength(bytes, 11, this.name)
    return {
      level: fromWire(K4.level, bytes[0]),
      envelope: decodeAt(ampEnvelope, bytes, 1, context),
      levelModulation: decodeAt(levelModulation, bytes, 5, context),
      timeModulation: decodeAt(timeModulation, bytes, 8, context)
    }
  },
  encode(a) {
    return concatBytes([
      Uint8Array.of(a.level.toWireByte()),
      ampEnvelope.encode(a.envelope),
      levelModulation.encode(a.levelModulation),
      timeModulation.encode(a.timeModulation)
    ])
  }
}
