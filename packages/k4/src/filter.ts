// =============================================================================
// ksynth - K4 Filter (DCF)
// =============================================================================

import {
  BoundedValue,
  concatBytes,
  decodeAt,
  fromWire,
  getBit,
  getBits,
  packBits,
  requireLength
} from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { K4 } from './categories'
import type { Depth, Level, Resonance } from './categories'
import {
  defaultLevelModulation,
  defaultTimeModulation,
  levelModulation,
  timeModulation
} from './modulation'
import type { LevelModulation, TimeModulation } from './modulation'

export interface FilterEnvelope {
  readonly attack: Level
  readonly decay: Level
  /** Sustain is signed on the filter (-50~+50) */
  readonly sustain: Depth
  readonly release: Level
}

export interface Filter {
  readonly cutoff: Level
  readonly resonance: Resonance
  readonly lfoModulatesCutoff: boolean
  readonly cutoffModulation: LevelModulation
  readonly envelopeDepth: Depth
  readonly envelopeVelocityDepth: Depth
  readonly envelope: FilterEnvelope
  readonly timeModulation: TimeModulation
}

export function defaultFilter(): Filter {
  return {
    cutoff: BoundedValue.fromInteger(K4.level, 88),
    resonance: BoundedValue.zero(K4.resonance),
    lfoModulatesCutoff: false,
    cutoffModulation: defaultLevelModulation(),
    envelopeDepth: BoundedValue.zero(K4.depth),
    envelopeVelocityDepth: BoundedValue.zero(K4.depth),
    envelope: {
      attack: BoundedValue.zero(K4.level),
      decay: BoundedValue.fromInteger(K4.level, 50),
      sustain: BoundedValue.zero(K4.depth),
      release: BoundedValue.fromInteger(K4.level, 20)
    },
    timeModulation: defaultTimeModulation()
  }
}

export const filterEnvelope: Codec<FilterEnvelope> = {
  name: 'k4.filterEnvelope',
  size: 4,
  decode(bytes) {
    requireLength(bytes, 4, this.name)
    return {
      attack: fromWire(K4.level, bytes[0]),
      decay: fromWire(K4.level, bytes[1]),
      sustain: fromWire(K4.depth, bytes[2]),
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
 * One filter as stored after de-interleaving (14 bytes).
 * Byte 1 holds resonance in bits 0-2 and the LFO switch in bit 3.
 */
export const filter: Codec<Filter> = {
  name: 'k4.filter',
  size: 14,
  decode(bytes, context) {
    requireLength(bytes, 14, this.name)
    return {
      cutoff: fromWire(K4.level, bytes[0]),
      resonance: fromWire(K4.resonance, getBits(bytes[1], 0, 3)),
      lfoModulatesCutoff: getBit(bytes[1], 3),
      cutoffModulation: decodeAt(levelModulation, bytes, 2, context),
      envelopeDepth: fromWire(K4.depth, bytes[5]),
      envelopeVelocityDepth: fromWire(K4.depth, bytes[6]),
      envelope: decodeAt(filterEnvelope, bytes, 7, context),
      timeModulation: decodeAt(timeModulation, bytes, 11, context)
    }
  },
  encode(f) {
    return concatBytes([
      Uint8Array.of(
        f.cutoff.toWireByte(),
        packBits([[0, 3, f.resonance.toWireByte()], [3, 1, f.lfoModulatesCutoff]])
      ),
      levelModulation.encode(f.cutoffModulation),
      Uint8Array.of(f.envelopeDepth.toWireByte(), f.envelopeVelocityDepth.toWireByte()),
      filterEnvelope.encode(f.envelope),
      timeModulation.encode(f.timeModulation)
    ])
  }
}
