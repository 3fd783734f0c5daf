// =============================================================================
// ksynth - K5000 Oscillator
// =============================================================================

import { BoundedValue, decodeAt, enumeration, fromWire, requireLength, concatBytes } from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { ADD_WAVE, K5000 } from './categories'
import type { Coarse, Level, Signed, WaveNumber } from './categories'

export const KEY_SCALING_PITCH = ['zeroCent', 'cent25', 'cent33', 'cent50'] as const
export type KeyScalingPitch = typeof KEY_SCALING_PITCH[number]

const keyScalingPitch = enumeration('k5000.oscillator.keyScaling', KEY_SCALING_PITCH)

export interface PitchEnvelope {
  readonly start: Signed
  readonly attackTime: Level
  readonly attackLevel: Signed
  readonly decayTime: Level
  readonly timeVelocitySensitivity: Signed
  readonly levelVelocitySensitivity: Signed
}

export interface Oscillator {
  /** PCM wave number, or `ADD_WAVE` for an additive source */
  readonly wave: WaveNumber
  readonly coarse: Coarse
  readonly fine: Signed
  /** 0 plays at the note pitch */
  readonly fixedKey: Level
  readonly keyScaling: KeyScalingPitch
  readonly pitchEnvelope: PitchEnvelope
}

export function isAdditive(oscillator: Oscillator): boolean {
  return oscillator.wave.value === ADD_WAVE
}

export function defaultOscillator(wave = K5000.wave.zero): Oscillator {
  return {
    wave: BoundedValue.fromInteger(K5000.wave, wave),
    coarse: BoundedValue.zero(K5000.coarse),
    fine: BoundedValue.zero(K5000.signed),
    fixedKey: BoundedValue.zero(K5000.level),
    keyScaling: 'zeroCent',
    pitchEnvelope: {
      start: BoundedValue.zero(K5000.signed),
      attackTime: BoundedValue.zero(K5000.level),
      attackLevel: BoundedValue.zero(K5000.signed),
      decayTime: BoundedValue.zero(K5000.level),
      timeVelocitySensitivity: BoundedValue.zero(K5000.signed),
      levelVelocitySensitivity: BoundedValue.zero(K5000.signed)
    }
  }
}

/** Wave number from its high (3 bits) and low (7 bits) bytes */
export function decodeWaveNumber(high: number, low: number): WaveNumber {
  return fromWire(K5000.wave, ((high & 0x07) << 7) | (low & 0x7F))
}

export function encodeWaveNumber(wave: WaveNumber): [number, number] {
  const n = wave.toWireValue()
  return [(n >> 7) & 0x07, n & 0x7F]
}

export const pitchEnvelopeCodec: Codec<PitchEnvelope> = {
  name: 'k5000.pitchEnvelope',
  size: 6,
  decode(bytes) {
    requireLength(bytes, 6, this.name)
    return {
      start: fromWire(K5000.signed, bytes[0]),
      attackTime: fromWire(K5000.level, bytes[1]),
      attackLevel: fromWire(K5000.signed, bytes[2]),
      decayTime: fromWire(K5000.level, bytes[3]),
      timeVelocitySensitivity: fromWire(K5000.signed, bytes[4]),
      levelVelocitySensitivity: fromWire(K5000.signed, bytes[5])
    }
  },
  encode(e) {
    return Uint8Array.of(
      e.start.toWireByte(),
      e.attackTime.toWireByte(),
      e.attackLevel.toWireByte(),
      e.decayTime.toWireByte(),
      e.timeVelocitySensitivity.toWireByte(),
      e.levelVelocitySensitivity.toWireByte()
    )
  }
}

/**
 * Oscillator (12 bytes): wave, tuning, key scaling, pitch envelope.
 */
export const oscillatorCodec: Codec<Oscillator> = {
  name: 'k5000.oscillator',
  size: 12,
  decode(bytes, context) {
    requireLength(bytes, 12, this.name)
    return {
      wave: decodeWaveNumber(bytes[0], bytes[1]),
      coarse: fromWire(K5000.coarse, bytes[2]),
      fine: fromWire(K5000.signed, bytes[3]),
      fixedKey: fromWire(K5000.level, bytes[4]),
      keyScaling: keyScalingPitch.decode(bytes[5]),
      pitchEnvelope: decodeAt(pitchEnvelopeCodec, bytes, 6, context)
    }
  },
  encode(o) {
    return concatBytes([
      Uint8Array.of(
        ...encodeWaveNumber(o.wave),
        o.coarse.toWireByte(),
        o.fine.toWireByte(),
        o.fixedKey.toWireByte(),
        keyScalingPitch.encode(o.keyScaling)
      ),
      pitchEnvelopeCodec.encode(o.pitchEnvelope)
    ])
  }
}
