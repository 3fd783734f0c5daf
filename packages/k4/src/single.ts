// =============================================================================
// ksynth - K4 Single Patch
// =============================================================================

import {
  BoundedValue,
  appendChecksum,
  deinterleave,
  decodeName,
  encodeName,
  enumeration,
  fromWire,
  getBit,
  getBits,
  interleave,
  packBits,
  pairOf,
  patchName,
  quadOf,
  requireLength
} from '@ksynth/core'
import type { Codec, Pair, PatchName, Quad } from '@ksynth/core'
import { K4 } from './categories'
import type { BenderRange, Depth, EffectNumber, Level, Submix } from './categories'
import { amplifier, defaultAmplifier } from './amp'
import type { Amplifier } from './amp'
import { defaultFilter, filter } from './filter'
import type { Filter } from './filter'
import { defaultSource, source } from './source'
import type { Source } from './source'

// =============================================================================
// Enumerations
// =============================================================================

export const SOURCE_MODES = ['normal', 'twin', 'double'] as const
export type SourceMode = typeof SOURCE_MODES[number]

export const POLYPHONY_MODES = ['poly1', 'poly2', 'solo1', 'solo2'] as const
export type PolyphonyMode = typeof POLYPHONY_MODES[number]

/** Shared by the vibrato and the LFO */
export const LFO_SHAPES = ['triangle', 'sawtooth', 'square', 'random'] as const
export type LfoShape = typeof LFO_SHAPES[number]

export const WHEEL_ASSIGNS = ['vibrato', 'lfo', 'cutoff'] as const
export type WheelAssign = typeof WHEEL_ASSIGNS[number]

const sourceModes = enumeration('k4.single.sourceMode', SOURCE_MODES)
const polyphonyModes = enumeration('k4.single.polyphony', POLYPHONY_MODES)
const vibratoShapes = enumeration('k4.single.vibratoShape', LFO_SHAPES)
const lfoShapes = enumeration('k4.single.lfoShape', LFO_SHAPES)
const wheelAssigns = enumeration('k4.single.wheelAssign', WHEEL_ASSIGNS)

// =============================================================================
// Types
// =============================================================================

export interface Vibrato {
  readonly shape: LfoShape
  readonly speed: Level
  readonly pressure: Depth
  readonly depth: Depth
}

export interface AutoBend {
  readonly time: Level
  readonly depth: Depth
  readonly keyScalingTime: Depth
  readonly velocityDepth: Depth
}

export interface Lfo {
  readonly shape: LfoShape
  readonly speed: Level
  readonly delay: Level
  readonly depth: Depth
  readonly pressureDepth: Depth
}

export interface SinglePatch {
  readonly name: PatchName
  readonly volume: Level
  readonly effect: EffectNumber
  readonly submix: Submix
  readonly sourceMode: SourceMode
  readonly polyphony: PolyphonyMode
  readonly am12: boolean
  readonly am34: boolean
  /** `true` silences the source */
  readonly sourceMutes: Quad<boolean>
  readonly benderRange: BenderRange
  readonly wheelAssign: WheelAssign
  readonly wheelDepth: Depth
  readonly vibrato: Vibrato
  readonly autoBend: AutoBend
  readonly lfo: Lfo
  readonly pressureToFrequency: Depth
  readonly sources: Quad<Source>
  readonly amplifiers: Quad<Amplifier>
  readonly filters: Pair<Filter>
}

export const SINGLE_NAME_LENGTH = 10

// =============================================================================
// Construction
// =============================================================================

/**
 * A single patch with neutral settings, optionally overriding fields.
 * Use it to derive changed copies: `singlePatch({ ...patch, volume })`.
 */
export function singlePatch(overrides: Partial<SinglePatch> = {}): SinglePatch {
  return {
    name: patchName('NewSound', SINGLE_NAME_LENGTH),
    volume: BoundedValue.fromInteger(K4.level, 100),
    effect: BoundedValue.zero(K4.effectNumber),
    submix: BoundedValue.zero(K4.submix),
    sourceMode: 'normal',
    polyphony: 'poly1',
    am12: false,
    am34: false,
    sourceMutes: [false, false, false, false],
    benderRange: BoundedValue.fromInteger(K4.benderRange, 2),
    wheelAssign: 'vibrato',
    wheelDepth: BoundedValue.zero(K4.depth),
    vibrato: {
      shape: 'triangle',
      speed: BoundedValue.zero(K4.level),
      pressure: BoundedValue.zero(K4.depth),
      depth: BoundedValue.zero(K4.depth)
    },
    autoBend: {
      time: BoundedValue.zero(K4.level),
      depth: BoundedValue.zero(K4.depth),
      keyScalingTime: BoundedValue.zero(K4.depth),
      velocityDepth: BoundedValue.zero(K4.depth)
    },
    lfo: {
      shape: 'triangle',
      speed: BoundedValue.zero(K4.level),
      delay: BoundedValue.zero(K4.level),
      depth: BoundedValue.zero(K4.depth),
      pressureDepth: BoundedValue.zero(K4.depth)
    },
    pressureToFrequency: BoundedValue.zero(K4.depth),
    sources: [defaultSource(), defaultSource(), defaultSource(), defaultSource()],
    amplifiers: [defaultAmplifier(), defaultAmplifier(), defaultAmplifier(), defaultAmplifier()],
    filters: [defaultFilter(), defaultFilter()],
    ...overrides
  }
}

// =============================================================================
// Codec
// =============================================================================

const BODY_SIZE = 130
const SOURCES_AT = 30
const AMPLIFIERS_AT = 58
const FILTERS_AT = 102

/**
 * Single patch (131 bytes, s00-s130).
 *
 * Sources, amplifiers and filters are byte-interleaved: byte k of source i
 * sits at s30 + 4k + i, byte k of filter i at s102 + 2k + i.
 */
export const singlePatchCodec: Codec<SinglePatch> = {
  name: 'k4.single',
  size: BODY_SIZE + 1,
  decode(bytes, context) {
    requireLength(bytes, BODY_SIZE + 1, this.name)
    context.verifyChecksum(this.name, bytes.subarray(0, BODY_SIZE), bytes[BODY_SIZE])

    const s13 = bytes[13]
    const s14 = bytes[14]
    const s15 = bytes[15]

    const sources = deinterleave(bytes.subarray(SOURCES_AT, AMPLIFIERS_AT), 4, source.size)
      .map(block => source.decode(block, context))
    const amplifiers = deinterleave(bytes.subarray(AMPLIFIERS_AT, FILTERS_AT), 4, amplifier.size)
      .map(block => amplifier.decode(block, context))
    const filters = deinterleave(bytes.subarray(FILTERS_AT, BODY_SIZE), 2, filter.size)
      .map(block => filter.decode(block, context))

    return {
      name: decodeName(bytes, SINGLE_NAME_LENGTH),
      volume: fromWire(K4.level, bytes[10]),
      effect: fromWire(K4.effectNumber, getBits(bytes[11], 0, 5)),
      submix: fromWire(K4.submix, getBits(bytes[12], 0, 3)),
      sourceMode: sourceModes.decode(getBits(s13, 0, 2)),
      polyphony: polyphonyModes.decode(getBits(s13, 2, 2)),
      am12: getBit(s13, 4),
      am34: getBit(s13, 5),
      // A set bit means the source is sounding
      sourceMutes: [!getBit(s14, 0), !getBit(s14, 1), !getBit(s14, 2), !getBit(s14, 3)],
      benderRange: fromWire(K4.benderRange, getBits(s15, 0, 4)),
      wheelAssign: wheelAssigns.decode(getBits(s15, 4, 2)),
      wheelDepth: fromWire(K4.depth, bytes[17]),
      vibrato: {
        shape: vibratoShapes.decode(getBits(s14, 4, 2)),
        speed: fromWire(K4.level, bytes[16]),
        pressure: fromWire(K4.depth, bytes[22]),
        depth: fromWire(K4.depth, bytes[23])
      },
      autoBend: {
        time: fromWire(K4.level, bytes[18]),
        depth: fromWire(K4.depth, bytes[19]),
        keyScalingTime: fromWire(K4.depth, bytes[20]),
        velocityDepth: fromWire(K4.depth, bytes[21])
      },
      lfo: {
        shape: lfoShapes.decode(getBits(bytes[24], 0, 2)),
        speed: fromWire(K4.level, bytes[25]),
        delay: fromWire(K4.level, bytes[26]),
        depth: fromWire(K4.depth, bytes[27]),
        pressureDepth: fromWire(K4.depth, bytes[28])
      },
      pressureToFrequency: fromWire(K4.depth, bytes[29]),
      sources: quadOf(sources),
      amplifiers: quadOf(amplifiers),
      filters: pairOf(filters)
    }
  },
  encode(p) {
    const body = new Uint8Array(BODY_SIZE)
    body.set(encodeName(p.name), 0)
    body[10] = p.volume.toWireByte()
    body[11] = p.effect.toWireByte()
    body[12] = p.submix.toWireByte()
    body[13] = packBits([
      [0, 2, sourceModes.encode(p.sourceMode)],
      [2, 2, polyphonyModes.encode(p.polyphony)],
      [4, 1, p.am12],
      [5, 1, p.am34]
    ])
    body[14] = packBits([
      [0, 1, !p.sourceMutes[0]],
      [1, 1, !p.sourceMutes[1]],
      [2, 1, !p.sourceMutes[2]],
      [3, 1, !p.sourceMutes[3]],
      [4, 2, vibratoShapes.encode(p.vibrato.shape)]
    ])
    body[15] = packBits([
      [0, 4, p.benderRange.toWireByte()],
      [4, 2, wheelAssigns.encode(p.wheelAssign)]
    ])
    body[16] = p.vibrato.speed.toWireByte()
    body[17] = p.wheelDepth.toWireByte()
    body[18] = p.autoBend.time.toWireByte()
    body[19] = p.autoBend.depth.toWireByte()
    body[20] = p.autoBend.keyScalingTime.toWireByte()
    body[21] = p.autoBend.velocityDepth.toWireByte()
    body[22] = p.vibrato.pressure.toWireByte()
    body[23] = p.vibrato.depth.toWireByte()
    body[24] = lfoShapes.encode(p.lfo.shape)
    body[25] = p.lfo.speed.toWireByte()
    body[26] = p.lfo.delay.toWireByte()
    body[27] = p.lfo.depth.toWireByte()
    body[28] = p.lfo.pressureDepth.toWireByte()
    body[29] = p.pressureToFrequency.toWireByte()
    body.set(interleave(p.sources.map(s => source.encode(s))), SOURCES_AT)
    body.set(interleave(p.amplifiers.map(a => amplifier.encode(a))), AMPLIFIERS_AT)
    body.set(interleave(p.filters.map(f => filter.encode(f))), FILTERS_AT)
    return appendChecksum(body)
  }
}
