// =============================================================================
// ksynth - K4 Waves
// =============================================================================

import { BoundedValue, getBit, getBits } from '@ksynth/core'
import { K4 } from './categories'
import type { WaveNumber } from './categories'
import WAVE_NAMES from './data/wave-names.json'

/**
 * Display name of a wave (1~256).
 */
export function waveName(wave: WaveNumber): string {
  return WAVE_NAMES[wave.value - 1]
}

/**
 * Decode the wave number from its split fields: the high bit is b0 of the
 * first byte, the low seven bits are the second byte.
 */
export function decodeWave(high: number, low: number): WaveNumber {
  const index = ((getBit(high, 0) ? 1 : 0) << 7) | getBits(low, 0, 7)
  return BoundedValue.fromWireByte(K4.wave, index)
}

/**
 * Split a wave number into its high bit and low seven bits.
 */
export function encodeWave(wave: WaveNumber): [number, number] {
  const index = wave.toWireValue()
  return [(index >> 7) & 0x01, index & 0x7F]
}
