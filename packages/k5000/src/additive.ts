// =============================================================================
// ksynth - K5000 Additive Kit
// =============================================================================
//
// Layout (806 bytes):
//
//   0        checksum of bytes 1-805
//   1-6      harmonic common
//   7-19     MORF
//   20-36    formant filter
//   37-100   soft harmonic levels (64)
//   101-164  loud harmonic levels (64)
//   165-292  formant filter bands (128)
//   293-804  harmonic envelopes (64 x 8)
//   805      loud sense select

import {
  BoundedValue,
  FixedList,
  concatBytes,
  decodeAt,
  decodeSequence,
  encodeSequence,
  enumeration,
  fromWire,
  getBit,
  packBits,
  prependChecksum,
  requireLength
} from '@ksynth/core'
import type { Codec, Quad } from '@ksynth/core'
import { K5000 } from './categories'
import type { Depth, Level, Signed, VelocityCurve } from './categories'

export const HARMONIC_COUNT = 64
export const BAND_COUNT = 128
export const ADDITIVE_KIT_SIZE = 806

// =============================================================================
// Enumerations
// =============================================================================

export const HARMONIC_GROUPS = ['low', 'high'] as const
export type HarmonicGroup = typeof HARMONIC_GROUPS[number]

export const ENVELOPE_LOOPS = ['off', 'loop1', 'loop2'] as const
export type EnvelopeLoop = typeof ENVELOPE_LOOPS[number]

export const FORMANT_MODES = ['envelope', 'lfo'] as const
export type FormantMode = typeof FORMANT_MODES[number]

export const FORMANT_LFO_SHAPES = ['triangle', 'sawtooth', 'random'] as const
export type FormantLfoShape = typeof FORMANT_LFO_SHAPES[number]

const harmonicGroups = enumeration('k5000.harmonic.group', HARMONIC_GROUPS)
const morfLoops = enumeration('k5000.morf.loop', ENVELOPE_LOOPS)
const formantLoops = enumeration('k5000.formant.loop', ENVELOPE_LOOPS)
const formantModes = enumeration('k5000.formant.mode', FORMANT_MODES)
const formantLfoShapes = enumeration('k5000.formant.lfoShape', FORMANT_LFO_SHAPES)

// =============================================================================
// Types
// =============================================================================

export interface HarmonicCommon {
  readonly morf: boolean
  readonly totalGain: Depth
  readonly group: HarmonicGroup
  readonly keyScalingToGain: Signed
  readonly velocityCurve: VelocityCurve
  readonly velocityDepth: Level
}

export interface MorfCopy {
  readonly patch: Level
  readonly source: Level
}

export interface Morf {
  readonly copies: Quad<MorfCopy>
  readonly times: Quad<Level>
  readonly loop: EnvelopeLoop
}

export interface FormantSegment {
  readonly rate: Level
  readonly level: Signed
}

export interface FormantFilter {
  readonly bias: Signed
  readonly mode: FormantMode
  readonly envelopeDepth: Signed
  /** Attack, decay 1, decay 2 and release */
  readonly envelope: Quad<FormantSegment>
  readonly loop: EnvelopeLoop
  readonly velocityDepth: Signed
  readonly keyScalingDepth: Signed
  readonly lfo: {
    readonly speed: Level
    readonly shape: FormantLfoShape
    readonly depth: Depth
  }
}

export interface HarmonicSegment {
  readonly rate: Level
  readonly level: Depth
}

export interface HarmonicEnvelope {
  /** Attack, decay 1, decay 2 and release */
  readonly segments: Quad<HarmonicSegment>
  readonly loop: EnvelopeLoop
}

export interface AdditiveKit {
  readonly common: HarmonicCommon
  readonly morf: Morf
  readonly formantFilter: FormantFilter
  readonly softLevels: FixedList<Level>
  readonly loudLevels: FixedList<Level>
  readonly bands: FixedList<Level>
  readonly envelopes: FixedList<HarmonicEnvelope>
  readonly loudSenseSelect: Level
}

// =============================================================================
// Construction
// =============================================================================

function levels(count: number, field: string, value = 0): FixedList<Level> {
  return FixedList.filled(count, () => BoundedValue.fromInteger(K5000.level, value), field)
}

function harmonicEnvelope(): HarmonicEnvelope {
  const segment = (): HarmonicSegment => ({
    rate: BoundedValue.zero(K5000.level),
    level: BoundedValue.zero(K5000.depth)
  })
  return { segments: [segment(), segment(), segment(), segment()], loop: 'off' }
}

/**
 * An additive kit with a single audible harmonic.
 */
export function additiveKit(overrides: Partial<AdditiveKit> = {}): AdditiveKit {
  const formantSegment = (): FormantSegment => ({
    rate: BoundedValue.zero(K5000.level),
    level: BoundedValue.zero(K5000.signed)
  })
  const copy = (): MorfCopy => ({ patch: BoundedValue.zero(K5000.level), source: BoundedValue.zero(K5000.level) })
  const soft = levels(HARMONIC_COUNT, 'k5000.additiveKit.softLevels')
  return {
    common: {
      morf: false,
      totalGain: BoundedValue.fromInteger(K5000.depth, 51),
      group: 'low',
      keyScalingToGain: BoundedValue.zero(K5000.signed),
      velocityCurve: BoundedValue.zero(K5000.velocityCurve),
      velocityDepth: BoundedValue.zero(K5000.level)
    },
    morf: {
      copies: [copy(), copy(), copy(), copy()],
      times: [
        BoundedValue.zero(K5000.level),
        BoundedValue.zero(K5000.level),
        BoundedValue.zero(K5000.level),
        BoundedValue.zero(K5000.level)
      ],
      loop: 'off'
    },
    formantFilter: {
      bias: BoundedValue.zero(K5000.signed),
      mode: 'envelope',
      envelopeDepth: BoundedValue.zero(K5000.signed),
      envelope: [formantSegment(), formantSegment(), formantSegment(), formantSegment()],
      loop: 'off',
      velocityDepth: BoundedValue.zero(K5000.signed),
      keyScalingDepth: BoundedValue.zero(K5000.signed),
      lfo: { speed: BoundedValue.zero(K5000.level), shape: 'triangle', depth: BoundedValue.zero(K5000.depth) }
    },
    softLevels: soft.with(0, BoundedValue.fromInteger(K5000.level, 127)),
    loudLevels: levels(HARMONIC_COUNT, 'k5000.additiveKit.loudLevels'),
    bands: levels(BAND_COUNT, 'k5000.additiveKit.bands', 127),
    envelopes: FixedList.filled(HARMONIC_COUNT, harmonicEnvelope, 'k5000.additiveKit.envelopes'),
    loudSenseSelect: BoundedValue.zero(K5000.level),
    ...overrides
  }
}

// =============================================================================
// Codecs
// =============================================================================

export const harmonicCommonCodec: Codec<HarmonicCommon> = {
  name: 'k5000.harmonic.common',
  size: 6,
  decode(bytes) {
    requireLength(bytes, 6, this.name)
    return {
      morf: bytes[0] === 1,
      totalGain: fromWire(K5000.depth, bytes[1]),
      group: harmonicGroups.decode(bytes[2]),
      keyScalingToGain: fromWire(K5000.signed, bytes[3]),
      velocityCurve: fromWire(K5000.velocityCurve, bytes[4]),
      velocityDepth: fromWire(K5000.level, bytes[5])
    }
  },
  encode(c) {
    return Uint8Array.of(
      c.morf ? 1 : 0,
      c.totalGain.toWireByte(),
      harmonicGroups.encode(c.group),
      c.keyScalingToGain.toWireByte(),
      c.velocityCurve.toWireByte(),
      c.velocityDepth.toWireByte()
    )
  }
}

export const morfCodec: Codec<Morf> = {
  name: 'k5000.morf',
  size: 13,
  decode(bytes) {
    requireLength(bytes, 13, this.name)
    const level = (i: number): Level => fromWire(K5000.level, bytes[i])
    const copy = (i: number): MorfCopy => ({ patch: level(i), source: level(i + 1) })
    return {
      copies: [copy(0), copy(2), copy(4), copy(6)],
      times: [level(8), level(9), level(10), level(11)],
      loop: morfLoops.decode(bytes[12])
    }
  },
  encode(m) {
    return Uint8Array.of(
      ...m.copies.flatMap(c => [c.patch.toWireByte(), c.source.toWireByte()]),
      ...m.times.map(t => t.toWireByte()),
      morfLoops.encode(m.loop)
    )
  }
}

export const formantFilterCodec: Codec<FormantFilter> = {
  name: 'k5000.formant',
  size: 17,
  decode(bytes) {
    requireLength(bytes, 17, this.name)
    const signed = (i: number): Signed => fromWire(K5000.signed, bytes[i])
    const segment = (i: number): FormantSegment => ({ rate: fromWire(K5000.level, bytes[i]), level: signed(i + 1) })
    return {
      bias: signed(0),
      mode: formantModes.decode(bytes[1]),
      envelopeDepth: signed(2),
      envelope: [segment(3), segment(5), segment(7), segment(9)],
      loop: formantLoops.decode(bytes[11]),
      velocityDepth: signed(12),
      keyScalingDepth: signed(13),
      lfo: {
        speed: fromWire(K5000.level, bytes[14]),
        shape: formantLfoShapes.decode(bytes[15]),
        depth: fromWire(K5000.depth, bytes[16])
      }
    }
  },
  encode(f) {
    return Uint8Array.of(
      f.bias.toWireByte(),
      formantModes.encode(f.mode),
      f.envelopeDepth.toWireByte(),
      ...f.envelope.flatMap(s => [s.rate.toWireByte(), s.level.toWireByte()]),
      formantLoops.encode(f.loop),
      f.velocityDepth.toWireByte(),
      f.keyScalingDepth.toWireByte(),
      f.lfo.speed.toWireByte(),
      formantLfoShapes.encode(f.lfo.shape),
      f.lfo.depth.toWireByte()
    )
  }
}

const LOOP_BIT = 6

/**
 * Harmonic envelope (8 bytes): four rate/level pairs. Levels use bits 0-5;
 * bit 6 of the decay 1 and decay 2 levels carries the loop type.
 */
export const harmonicEnvelopeCodec: Codec<HarmonicEnvelope> = {
  name: 'k5000.harmonic.envelope',
  size: 8,
  decode(bytes) {
    requireLength(bytes, 8, this.name)
    const segment = (i: number): HarmonicSegment => ({
      rate: fromWire(K5000.level, bytes[i]),
      level: fromWire(K5000.depth, bytes[i + 1] & 0x3F)
    })
    const decay1Loop = getBit(bytes[3], LOOP_BIT)
    const decay2Loop = getBit(bytes[5], LOOP_BIT)
    const loop: EnvelopeLoop = decay1Loop && decay2Loop ? 'loop1' : decay2Loop ? 'loop2' : 'off'
    return { segments: [segment(0), segment(2), segment(4), segment(6)], loop }
  },
  encode(e) {
    const [attack, decay1, decay2, release] = e.segments
    return Uint8Array.of(
      attack.rate.toWireByte(),
      attack.level.toWireByte(),
      decay1.rate.toWireByte(),
      packBits([[0, 6, decay1.level.toWireByte()], [LOOP_BIT, 1, e.loop === 'loop1']]),
      decay2.rate.toWireByte(),
      packBits([[0, 6, decay2.level.toWireByte()], [LOOP_BIT, 1, e.loop !== 'off']]),
      release.rate.toWireByte(),
      release.level.toWireByte()
    )
  }
}

const COMMON_AT = 1
const MORF_AT = 7
const FORMANT_AT = 20
const SOFT_AT = 37
const LOUD_AT = SOFT_AT + HARMONIC_COUNT
const BANDS_AT = LOUD_AT + HARMONIC_COUNT
const ENVELOPES_AT = BANDS_AT + BAND_COUNT
const LOUD_SENSE_AT = ENVELOPES_AT + HARMONIC_COUNT * harmonicEnvelopeCodec.size

function decodeLevels(bytes: Uint8Array, offset: number, count: number, field: string): FixedList<Level> {
  return FixedList.of(Array.from(bytes.subarray(offset, offset + count), b => fromWire(K5000.level, b)), count, field)
}

function encodeLevels(values: FixedList<Level>): Uint8Array {
  return Uint8Array.from(values, v => v.toWireByte())
}

/**
 * Additive kit (806 bytes) with its own leading checksum.
 */
export const additiveKitCodec: Codec<AdditiveKit> = {
  name: 'k5000.additiveKit',
  size: ADDITIVE_KIT_SIZE,
  decode(bytes, context) {
    requireLength(bytes, ADDITIVE_KIT_SIZE, this.name)
    context.verifyChecksum(this.name, bytes.subarray(1, ADDITIVE_KIT_SIZE), bytes[0])
    return {
      common: decodeAt(harmonicCommonCodec, bytes, COMMON_AT, context),
      morf: decodeAt(morfCodec, bytes, MORF_AT, context),
      formantFilter: decodeAt(formantFilterCodec, bytes, FORMANT_AT, context),
      softLevels: decodeLevels(bytes, SOFT_AT, HARMONIC_COUNT, 'k5000.additiveKit.softLevels'),
      loudLevels: decodeLevels(bytes, LOUD_AT, HARMONIC_COUNT, 'k5000.additiveKit.loudLevels'),
      bands: decodeLevels(bytes, BANDS_AT, BAND_COUNT, 'k5000.additiveKit.bands'),
      envelopes: FixedList.of(
        decodeSequence(harmonicEnvelopeCodec, bytes, ENVELOPES_AT, HARMONIC_COUNT, context).items,
        HARMONIC_COUNT,
        'k5000.additiveKit.envelopes'
      ),
      loudSenseSelect: fromWire(K5000.level, bytes[LOUD_SENSE_AT])
    }
  },
  encode(kit) {
    return prependChecksum(concatBytes([
      harmonicCommonCodec.encode(kit.common),
      morfCodec.encode(kit.morf),
      formantFilterCodec.encode(kit.formantFilter),
      encodeLevels(kit.softLevels),
      encodeLevels(kit.loudLevels),
      encodeLevels(kit.bands),
      encodeSequence(harmonicEnvelopeCodec, kit.envelopes),
      Uint8Array.of(kit.loudSenseSelect.toWireByte())
    ]))
  }
}
