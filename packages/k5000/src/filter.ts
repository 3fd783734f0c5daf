// =============================================================================
// ksynth - K5000 DCF
// =============================================================================

import { BoundedValue, enumeration, fromWire, requireLength } from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { K5000 } from './categories'
import type { FilterLevel, Level, Resonance, Signed, VelocityCurve } from './categories'

export const FILTER_MODES = ['lowPass', 'highPass'] as const
export type FilterMode = typeof FILTER_MODES[number]

const filterModes = enumeration('k5000.filter.mode', FILTER_MODES)

export interface FilterEnvelope {
  readonly attackTime: Level
  readonly decay1Time: Level
  readonly decay1Level: Signed
  readonly decay2Time: Level
  readonly decay2Level: Signed
  readonly releaseTime: Level
}

export interface Filter {
  readonly bypassed: boolean
  readonly mode: FilterMode
  readonly velocityCurve: VelocityCurve
  readonly resonance: Resonance
  readonly level: FilterLevel
  readonly cutoff: Level
  readonly keyScalingToCutoff: Signed
  readonly velocityToCutoff: Signed
  readonly envelopeDepth: Signed
  readonly envelope: FilterEnvelope
  readonly keyScalingToEnvelope: {
    readonly attackTime: Signed
    readonly decay1Time: Signed
  }
  readonly velocityToEnvelope: {
    readonly depth: Signed
    readonly attackTime: Signed
    readonly decay1Time: Signed
  }
}

export function defaultFilter(): Filter {
  const signed = (): Signed => BoundedValue.zero(K5000.signed)
  return {
    bypassed: true,
    mode: 'lowPass',
    velocityCurve: BoundedValue.zero(K5000.velocityCurve),
    resonance: BoundedValue.zero(K5000.resonance),
    level: BoundedValue.fromInteger(K5000.filterLevel, 7),
    cutoff: BoundedValue.fromInteger(K5000.level, 127),
    keyScalingToCutoff: signed(),
    velocityToCutoff: signed(),
    envelopeDepth: signed(),
    envelope: {
      attackTime: BoundedValue.zero(K5000.level),
      decay1Time: BoundedValue.zero(K5000.level),
      decay1Level: signed(),
      decay2Time: BoundedValue.zero(K5000.level),
      decay2Level: signed(),
      releaseTime: BoundedValue.zero(K5000.level)
    },
    keyScalingToEnvelope: { attackTime: signed(), decay1Time: signed() },
    velocityToEnvelope: { depth: signed(), attackTime: signed(), decay1Time: signed() }
  }
}

/**
 * Filter (20 bytes). The first byte is 1 when the filter is bypassed.
 */
export const filterCodec: Codec<Filter> = {
  name: 'k5000.filter',
  size: 20,
  decode(bytes) {
    requireLength(bytes, 20, this.name)
    const signed = (i: number): Signed => fromWire(K5000.signed, bytes[i])
    const level = (i: number): Level => fromWire(K5000.level, bytes[i])
    return {
      bypassed: bytes[0] === 1,
      mode: filterModes.decode(bytes[1]),
      velocityCurve: fromWire(K5000.velocityCurve, bytes[2]),
      resonance: fromWire(K5000.resonance, bytes[3]),
      level: fromWire(K5000.filterLevel, bytes[4]),
      cutoff: level(5),
      keyScalingToCutoff: signed(6),
      velocityToCutoff: signed(7),
      envelopeDepth: signed(8),
      envelope: {
        attackTime: level(9),
        decay1Time: level(10),
        decay1Level: signed(11),
        decay2Time: level(12),
        decay2Level: signed(13),
        releaseTime: level(14)
      },
      keyScalingToEnvelope: { attackTime: signed(15), decay1Time: signed(16) },
      velocityToEnvelope: { depth: signed(17), attackTime: signed(18), decay1Time: signed(19) }
    }
  },
  encode(f) {
    const { envelope: e, keyScalingToEnvelope: ks, velocityToEnvelope: vel } = f
    return Uint8Array.of(
      f.bypassed ? 1 : 0,
      filterModes.encode(f.mode),
      f.velocityCurve.toWireByte(),
      f.resonance.toWireByte(),
      f.level.toWireByte(),
      f.cutoff.toWireByte(),
      f.keyScalingToCutoff.toWireByte(),
      f.velocityToCutoff.toWireByte(),
      f.envelopeDepth.toWireByte(),
      e.attackTime.toWireByte(),
      e.decay1Time.toWireByte(),
      e.decay1Level.toWireByte(),
      e.decay2Time.toWireByte(),
      e.decay2Level.toWireByte(),
      e.releaseTime.toWireByte(),
      ks.attackTime.toWireByte(),
      ks.decay1Time.toWireByte(),
      vel.depth.toWireByte(),
      vel.attackTime.toWireByte(),
      vel.decay1Time.toWireByte()
    )
  }
}
