// =============================================================================
// ksynth - K4 Value Categories
// =============================================================================

import { category } from '@ksynth/core'
import type { BoundedValue } from '@ksynth/core'

/**
 * Every bounded parameter of the K4 dump format.
 * Depths and fine tunings are stored with +50, coarse tunings and
 * transposes with +24, effect parameters and pans with +7.
 */
export const K4 = {
  /** Volumes, levels, sends, times and speeds (0~100) */
  level: category('k4.level', 0, 100),
  /** Modulation and key-scaling depths (-50~+50) */
  depth: category('k4.depth', -50, 50, 'center50'),
  coarse: category('k4.coarse', -24, 24, 'center24'),
  fine: category('k4.fine', -50, 50, 'center50'),
  transpose: category('k4.transpose', -24, 24, 'center24'),
  /** Key-scaling and velocity curves (1~8) */
  curve: category('k4.curve', 1, 8, 'oneBased'),
  effectNumber: category('k4.effectNumber', 1, 32, 'oneBased'),
  resonance: category('k4.resonance', 0, 7),
  benderRange: category('k4.benderRange', 0, 12),
  key: category('k4.key', 0, 127, 'identity', 60),
  patchNumber: category('k4.patchNumber', 0, 63),
  channel: category('k4.channel', 1, 16, 'oneBased'),
  submix: category('k4.submix', 0, 7),
  drumDecay: category('k4.drumDecay', 1, 100),
  /** Effect parameters 1 and 2 (-7~+7) */
  smallEffectParameter: category('k4.smallEffectParameter', -7, 7, 'center7'),
  /** Effect parameter 3 (0~31) */
  bigEffectParameter: category('k4.bigEffectParameter', 0, 31),
  pan: category('k4.pan', -7, 7, 'center7'),
  wave: category('k4.wave', 1, 256, 'oneBased', 1, 8)
} as const

export type Level = BoundedValue<'k4.level'>
export type Depth = BoundedValue<'k4.depth'>
export type Coarse = BoundedValue<'k4.coarse'>
export type Fine = BoundedValue<'k4.fine'>
export type Transpose = BoundedValue<'k4.transpose'>
export type Curve = BoundedValue<'k4.curve'>
export type EffectNumber = BoundedValue<'k4.effectNumber'>
export type Resonance = BoundedValue<'k4.resonance'>
export type BenderRange = BoundedValue<'k4.benderRange'>
export type Key = BoundedValue<'k4.key'>
export type PatchNumber = BoundedValue<'k4.patchNumber'>
export type Channel = BoundedValue<'k4.channel'>
export type Submix = BoundedValue<'k4.submix'>
export type DrumDecay = BoundedValue<'k4.drumDecay'>
export type SmallEffectParameter = BoundedValue<'k4.smallEffectParameter'>
export type BigEffectParameter = BoundedValue<'k4.bigEffectParameter'>
export type Pan = BoundedValue<'k4.pan'>
export type WaveNumber = BoundedValue<'k4.wave'>

export const SUBMIX_NAMES = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H'] as const
