// =============================================================================
// ksynth - K5000 Effects
// =============================================================================

import {
  BoundedValue,
  concatBytes,
  decodeAt,
  decodeSequence,
  encodeSequence,
  enumeration,
  FixedList,
  fromWire,
  quadOf,
  requireLength
} from '@ksynth/core'
import type { Codec, Quad } from '@ksynth/core'
import { K5000 } from './categories'
import type { EffectDepth, GeqBand, Level, MacroDepth } from './categories'
import { CONTROL_SOURCES } from './control'
import type { ControlSource } from './control'
import EFFECTS from './data/effects.json'

// =============================================================================
// Effect Types
// =============================================================================

/** Reverb types come first (0~10), the remaining types are effects 1-4 */
export const EFFECT_TYPES = [
  'hall1', 'hall2', 'hall3', 'room1', 'room2', 'room3', 'plate1', 'plate2', 'plate3',
  'reverse', 'longDelay', 'earlyReflection1', 'earlyReflection2', 'tapDelay1', 'tapDelay2',
  'singleDelay', 'dualDelay', 'stereoDelay', 'crossDelay', 'autoPan', 'autoPanAndDelay',
  'chorus1', 'chorus2', 'chorus1AndDelay', 'chorus2AndDelay', 'flanger1', 'flanger2',
  'flanger1AndDelay', 'flanger2AndDelay', 'ensemble', 'ensembleAndDelay', 'celeste',
  'celesteAndDelay', 'tremolo', 'tremoloAndDelay', 'phaser1', 'phaser2', 'phaser1AndDelay',
  'phaser2AndDelay', 'rotary', 'autoWah', 'bandpass', 'exciter', 'enhancer', 'overdrive',
  'distortion', 'overdriveAndDelay', 'distortionAndDelay'
] as const
export type EffectType = typeof EFFECT_TYPES[number]

export const EFFECT_ALGORITHMS = ['algorithm1', 'algorithm2', 'algorithm3', 'algorithm4'] as const
export type EffectAlgorithm = typeof EFFECT_ALGORITHMS[number]

export const EFFECT_DESTINATIONS = [
  'effect1DryWet',
  'effect1Parameter',
  'effect2DryWet',
  'effect2Parameter',
  'effect3DryWet',
  'effect3Parameter',
  'effect4DryWet',
  'effect4Parameter'
] as const
export type EffectDestination = typeof EFFECT_DESTINATIONS[number]

const effectTypes = enumeration('k5000.effect.type', EFFECT_TYPES)
const algorithms = enumeration('k5000.effect.algorithm', EFFECT_ALGORITHMS)
const destinations = enumeration('k5000.effect.destination', EFFECT_DESTINATIONS)
const controlSources = enumeration('k5000.effectControl.source', CONTROL_SOURCES)

export function effectName(type: EffectType): string {
  return EFFECTS[effectTypes.encode(type)].name
}

/** Labels of the four parameters; "?" where a parameter is unused */
export function effectParameterNames(type: EffectType): readonly string[] {
  return EFFECTS[effectTypes.encode(type)].parameters
}

// =============================================================================
// Types
// =============================================================================

export interface EffectDefinition {
  readonly type: EffectType
  readonly depth: EffectDepth
  readonly parameters: Quad<Level>
}

export interface EffectSettings {
  readonly algorithm: EffectAlgorithm
  readonly reverb: EffectDefinition
  readonly effects: Quad<EffectDefinition>
}

export interface EffectControlSource {
  readonly source: ControlSource
  readonly destination: EffectDestination
  readonly depth: MacroDepth
}

export type EffectControl = readonly [EffectControlSource, EffectControlSource]

/** Seven graphic EQ bands, -6~+6 each */
export type GraphicEq = FixedList<GeqBand>

export const GEQ_BANDS = 7

export function effectDefinition(overrides: Partial<EffectDefinition> = {}): EffectDefinition {
  return {
    type: 'hall1',
    depth: BoundedValue.zero(K5000.effectDepth),
    parameters: [
      BoundedValue.zero(K5000.level),
      BoundedValue.zero(K5000.level),
      BoundedValue.zero(K5000.level),
      BoundedValue.zero(K5000.level)
    ],
    ...overrides
  }
}

export function effectSettings(overrides: Partial<EffectSettings> = {}): EffectSettings {
  return {
    algorithm: 'algorithm1',
    reverb: effectDefinition(),
    effects: [
      effectDefinition({ type: 'earlyReflection1' }),
      effectDefinition({ type: 'earlyReflection1' }),
      effectDefinition({ type: 'earlyReflection1' }),
      effectDefinition({ type: 'earlyReflection1' })
    ],
    ...overrides
  }
}

export function effectControl(): EffectControl {
  const source: EffectControlSource = {
    source: 'bender',
    destination: 'effect1DryWet',
    depth: BoundedValue.zero(K5000.macroDepth)
  }
  return [source, source]
}

export function graphicEq(): GraphicEq {
  return FixedList.filled(GEQ_BANDS, () => BoundedValue.zero(K5000.geq), 'k5000.geq')
}

// =============================================================================
// Codecs
// =============================================================================

/**
 * One effect (6 bytes): type, depth, four parameters.
 */
export const effectDefinitionCodec: Codec<EffectDefinition> = {
  name: 'k5000.effect',
  size: 6,
  decode(bytes) {
    requireLength(bytes, 6, this.name)
    return {
      type: effectTypes.decode(bytes[0]),
      depth: fromWire(K5000.effectDepth, bytes[1]),
      parameters: [
        fromWire(K5000.level, bytes[2]),
        fromWire(K5000.level, bytes[3]),
        fromWire(K5000.level, bytes[4]),
        fromWire(K5000.level, bytes[5])
      ]
    }
  },
  encode(e) {
    return Uint8Array.of(
      effectTypes.encode(e.type),
      e.depth.toWireByte(),
      ...e.parameters.map(p => p.toWireByte())
    )
  }
}

/**
 * Effect settings (31 bytes): algorithm, reverb, effects 1-4.
 */
export const effectSettingsCodec: Codec<EffectSettings> = {
  name: 'k5000.effects',
  size: 31,
  decode(bytes, context) {
    requireLength(bytes, 31, this.name)
    return {
      algorithm: algorithms.decode(bytes[0]),
      reverb: decodeAt(effectDefinitionCodec, bytes, 1, context),
      effects: quadOf(decodeSequence(effectDefinitionCodec, bytes, 7, 4, context).items)
    }
  },
  encode(s) {
    return concatBytes([
      Uint8Array.of(algorithms.encode(s.algorithm)),
      effectDefinitionCodec.encode(s.reverb),
      encodeSequence(effectDefinitionCodec, s.effects)
    ])
  }
}

export const geqCodec: Codec<GraphicEq> = {
  name: 'k5000.geq',
  size: GEQ_BANDS,
  decode(bytes) {
    requireLength(bytes, GEQ_BANDS, this.name)
    return FixedList.of(Array.from(bytes.subarray(0, GEQ_BANDS), b => fromWire(K5000.geq, b)), GEQ_BANDS, this.name)
  },
  encode(bands) {
    return Uint8Array.from(bands, b => b.toWireByte())
  }
}

const effectControlSourceCodec: Codec<EffectControlSource> = {
  name: 'k5000.effectControl.source',
  size: 3,
  decode(bytes) {
    requireLength(bytes, 3, this.name)
    return {
      source: controlSources.decode(bytes[0]),
      destination: destinations.decode(bytes[1]),
      depth: fromWire(K5000.macroDepth, bytes[2])
    }
  },
  encode(c) {
    return Uint8Array.of(controlSources.encode(c.source), destinations.encode(c.destination), c.depth.toWireByte())
  }
}

/**
 * Effect control (6 bytes): two sources, each source, destination and depth.
 */
export const effectControlCodec: Codec<EffectControl> = {
  name: 'k5000.effectControl',
  size: 6,
  decode(bytes, context) {
    requireLength(bytes, 6, this.name)
    return [
      decodeAt(effectControlSourceCodec, bytes, 0, context),
      decodeAt(effectControlSourceCodec, bytes, 3, context)
    ]
  },
  encode(c) {
    return encodeSequence(effectControlSourceCodec, c)
  }
}
