// =============================================================================
// ksynth - K5000 DCA
// =============================================================================

import { BoundedValue, fromWire, requireLength } from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { K5000 } from './categories'
import type { Level, Signed, VelocityCurve } from './categories'

export interface AmpEnvelope {
  readonly attackTime: Level
  readonly decay1Time: Level
  readonly decay1Level: Level
  readonly decay2Time: Level
  readonly decay2Level: Level
  readonly releaseTime: Level
}

export interface Amplifier {
  readonly velocityCurve: VelocityCurve
  readonly envelope: AmpEnvelope
  readonly keyScalingToEnvelope: {
    readonly level: Signed
    readonly attackTime: Signed
    readonly decay1Time: Signed
    readonly release: Signed
  }
  readonly velocityToEnvelope: {
    readonly level: Level
    readonly attackTime: Signed
    readonly decay1Time: Signed
    readonly release: Signed
  }
}

export function defaultAmplifier(): Amplifier {
  const level = (n = 0): Level => BoundedValue.fromInteger(K5000.level, n)
  const signed = (): Signed => BoundedValue.zero(K5000.signed)
  return {
    velocityCurve: BoundedValue.zero(K5000.velocityCurve),
    envelope: {
      attackTime: level(),
      decay1Time: level(),
      decay1Level: level(127),
      decay2Time: level(),
      decay2Level: level(127),
      releaseTime: level()
    },
    keyScalingToEnvelope: { level: signed(), attackTime: signed(), decay1Time: signed(), release: signed() },
    velocityToEnvelope: { level: level(), attackTime: signed(), decay1Time: signed(), release: signed() }
  }
}

/**
 * Amplifier (15 bytes): velocity curve, envelope, key scaling and velocity
 * modulation of the envelope.
 */
export const amplifierCodec: Codec<Amplifier> = {
  name: 'k5000.amplifier',
  size: 15,
  decode(bytes) {
    requireLength(bytes, 15, this.name)
    const level = (i: number): Level => fromWire(K5000.level, bytes[i])
    const signed = (i: number): Signed => fromWire(K5000.signed, bytes[i])
    return {
      velocityCurve: fromWire(K5000.velocityCurve, bytes[0]),
      envelope: {
        attackTime: level(1),
        decay1Time: level(2),
        decay1Level: level(3),
        decay2Time: level(4),
        decay2Level: level(5),
        releaseTime: level(6)
      },
      keyScalingToEnvelope: { level: signed(7), attackTime: signed(8), decay1Time: signed(9), release: signed(10) },
      velocityToEnvelope: { level: level(11), attackTime: signed(12), decay1Time: signed(13), release: signed(14) }
    }
  },
  encode(a) {
    const { envelope: e, keyScalingToEnvelope: ks, velocityToEnvelope: vel } = a
    return Uint8Array.of(
      a.velocityCurve.toWireByte(),
      e.attackTime.toWireByte(),
      e.decay1Time.toWireByte(),
      e.decay1Level.toWireByte(),
      e.decay2Time.toWireByte(),
      e.decay2Level.toWireByte(),
      e.releaseTime.toWireByte(),
      ks.level.toWireByte(),
      ks.attackTime.toWireByte(),
      ks.decay1Time.toWireByte(),
      ks.release.toWireByte(),
      vel.level.toWireByte(),
      vel.attackTime.toWireByte(),
      vel.decay1Time.toWireByte(),
      vel.release.toWireByte()
    )
  }
}
