// =============================================================================
// ksynth - K5000 Value Categories
// =============================================================================

import { category } from '@ksynth/core'
import type { BoundedValue } from '@ksynth/core'

/**
 * Every bounded parameter of the K5000 dump format.
 * Signed values are stored with +64, except coarse tuning and transpose (+24).
 */
export const K5000 = {
  /** Volumes, times, rates, speeds and cutoffs (0~127) */
  level: category('k5000.level', 0, 127),
  /** Envelope levels, sensitivities, key scaling and pan (-63~+63) */
  signed: category('k5000.signed', -63, 63, 'center64'),
  /** Macro and effect control depths (-31~+31) */
  macroDepth: category('k5000.macroDepth', -31, 31, 'center64'),
  /** Graphic EQ bands (-6~+6) */
  geq: category('k5000.geq', -6, 6, 'center64'),
  coarse: category('k5000.coarse', -24, 24, 'center24'),
  transpose: category('k5000.transpose', -24, 24, 'center24'),
  /** Velocity curves (1~12) */
  velocityCurve: category('k5000.velocityCurve', 1, 12, 'oneBased'),
  channel: category('k5000.channel', 1, 16, 'oneBased'),
  effectPath: category('k5000.effectPath', 1, 4, 'oneBased'),
  resonance: category('k5000.resonance', 0, 7),
  filterLevel: category('k5000.filterLevel', 0, 7),
  /** LFO depths and harmonic envelope levels (0~63) */
  depth: category('k5000.depth', 0, 63),
  effectDepth: category('k5000.effectDepth', 0, 100),
  benderPitch: category('k5000.benderPitch', 0, 24),
  benderCutoff: category('k5000.benderCutoff', 0, 31),
  sourceCount: category('k5000.sourceCount', 2, 6, 'identity', 2),
  /** Index into the velocity switch threshold table */
  velocityThreshold: category('k5000.velocityThreshold', 0, 31),
  /** Tone number within a bank (0~127) */
  tone: category('k5000.tone', 0, 127),
  /** Multi number (0~63) */
  multi: category('k5000.multi', 0, 63),
  /** Oscillator wave: PCM waves and 512 for ADD */
  wave: category('k5000.wave', 0, 1023, 'identity', 384, 10),
  /** Single referenced by a multi section, split over two bytes */
  instrument: category('k5000.instrument', 0, 1023, 'identity', 0, 10)
} as const

export type Level = BoundedValue<'k5000.level'>
export type Signed = BoundedValue<'k5000.signed'>
export type MacroDepth = BoundedValue<'k5000.macroDepth'>
export type GeqBand = BoundedValue<'k5000.geq'>
export type Coarse = BoundedValue<'k5000.coarse'>
export type Transpose = BoundedValue<'k5000.transpose'>
export type VelocityCurve = BoundedValue<'k5000.velocityCurve'>
export type Channel = BoundedValue<'k5000.channel'>
export type EffectPath = BoundedValue<'k5000.effectPath'>
export type Resonance = BoundedValue<'k5000.resonance'>
export type FilterLevel = BoundedValue<'k5000.filterLevel'>
export type Depth = BoundedValue<'k5000.depth'>
export type EffectDepth = BoundedValue<'k5000.effectDepth'>
export type BenderPitch = BoundedValue<'k5000.benderPitch'>
export type BenderCutoff = BoundedValue<'k5000.benderCutoff'>
export type SourceCount = BoundedValue<'k5000.sourceCount'>
export type VelocityThreshold = BoundedValue<'k5000.velocityThreshold'>
export type ToneNumber = BoundedValue<'k5000.tone'>
export type MultiNumber = BoundedValue<'k5000.multi'>
export type WaveNumber = BoundedValue<'k5000.wave'>
export type InstrumentNumber = BoundedValue<'k5000.instrument'>

/** Wave number of an additive source */
export const ADD_WAVE = 512
