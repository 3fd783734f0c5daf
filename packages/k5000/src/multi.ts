// =============================================================================
// ksynth - K5000 Multi Patch
// =============================================================================

import {
  BoundedValue,
  concatBytes,
  decodeAt,
  decodeName,
  decodeSequence,
  encodeName,
  encodeSequence,
  fromWire,
  getBit,
  packBits,
  patchName,
  prependChecksum,
  quadOf,
  requireLength
} from '@ksynth/core'
import type { Codec, PatchName, Quad } from '@ksynth/core'
import { K5000 } from './categories'
import type { Channel, EffectPath, InstrumentNumber, Level, Signed, Transpose } from './categories'
import {
  effectControl,
  effectControlCodec,
  effectSettings,
  effectSettingsCodec,
  geqCodec,
  graphicEq
} from './effect'
import type { EffectControl, EffectSettings, GraphicEq } from './effect'
import { decodeVelocitySwitch, encodeVelocitySwitch } from './control'
import type { VelocitySwitch } from './control'

export const MULTI_NAME_LENGTH = 8
export const MULTI_SIZE = 99
export const SECTION_COUNT = 4

export interface MultiCommon {
  readonly effects: EffectSettings
  readonly geq: GraphicEq
  readonly name: PatchName
  readonly volume: Level
  /** `true` silences the section */
  readonly sectionMutes: Quad<boolean>
  readonly effectControl: EffectControl
}

export interface Section {
  readonly instrument: InstrumentNumber
  readonly volume: Level
  readonly pan: Signed
  readonly effectPath: EffectPath
  readonly transpose: Transpose
  readonly tune: Signed
  readonly zoneLow: Level
  readonly zoneHigh: Level
  readonly velocitySwitch: VelocitySwitch
  readonly receiveChannel: Channel
}

export interface MultiPatch {
  readonly common: MultiCommon
  readonly sections: Quad<Section>
}

export function section(overrides: Partial<Section> = {}): Section {
  return {
    instrument: BoundedValue.zero(K5000.instrument),
    volume: BoundedValue.fromInteger(K5000.level, 100),
    pan: BoundedValue.zero(K5000.signed),
    effectPath: BoundedValue.zero(K5000.effectPath),
    transpose: BoundedValue.zero(K5000.transpose),
    tune: BoundedValue.zero(K5000.signed),
    zoneLow: BoundedValue.zero(K5000.level),
    zoneHigh: BoundedValue.fromInteger(K5000.level, 127),
    velocitySwitch: { type: 'off', threshold: BoundedValue.zero(K5000.velocityThreshold) },
    receiveChannel: BoundedValue.zero(K5000.channel),
    ...overrides
  }
}

export function multiPatch(overrides: Partial<MultiPatch> = {}): MultiPatch {
  return {
    common: {
      effects: effectSettings(),
      geq: graphicEq(),
      name: patchName('NewMulti', MULTI_NAME_LENGTH),
      volume: BoundedValue.fromInteger(K5000.level, 127),
      sectionMutes: [false, false, false, false],
      effectControl: effectControl()
    },
    sections: [section(), section(), section(), section()],
    ...overrides
  }
}

/**
 * Multi common block (54 bytes).
 */
export const multiCommonCodec: Codec<MultiCommon> = {
  name: 'k5000.multi.common',
  size: 54,
  decode(bytes, context) {
    requireLength(bytes, 54, this.name)
    const mutes = bytes[47]
    return {
      effects: decodeAt(effectSettingsCodec, bytes, 0, context),
      geq: decodeAt(geqCodec, bytes, 31, context),
      name: decodeName(bytes.subarray(38), MULTI_NAME_LENGTH),
      volume: fromWire(K5000.level, bytes[46]),
      sectionMutes: [getBit(mutes, 0), getBit(mutes, 1), getBit(mutes, 2), getBit(mutes, 3)],
      effectControl: decodeAt(effectControlCodec, bytes, 48, context)
    }
  },
  encode(c) {
    return concatBytes([
      effectSettingsCodec.encode(c.effects),
      geqCodec.encode(c.geq),
      encodeName(c.name),
      Uint8Array.of(
        c.volume.toWireByte(),
        packBits(c.sectionMutes.map((muted, i) => [i, 1, muted] as const))
      ),
      effectControlCodec.encode(c.effectControl)
    ])
  }
}

/**
 * Multi section (11 bytes). The instrument number is split into a high
 * byte (3 bits) and a low byte (7 bits).
 */
export const sectionCodec: Codec<Section> = {
  name: 'k5000.multi.section',
  size: 11,
  decode(bytes) {
    requireLength(bytes, 11, this.name)
    return {
      instrument: fromWire(K5000.instrument, ((bytes[0] & 0x07) << 7) | (bytes[1] & 0x7F)),
      volume: fromWire(K5000.level, bytes[2]),
      pan: fromWire(K5000.signed, bytes[3]),
      effectPath: fromWire(K5000.effectPath, bytes[4]),
      transpose: fromWire(K5000.transpose, bytes[5]),
      tune: fromWire(K5000.signed, bytes[6]),
      zoneLow: fromWire(K5000.level, bytes[7]),
      zoneHigh: fromWire(K5000.level, bytes[8]),
      velocitySwitch: decodeVelocitySwitch(bytes[9]),
      receiveChannel: fromWire(K5000.channel, bytes[10])
    }
  },
  encode(s) {
    const instrument = s.instrument.toWireValue()
    return Uint8Array.of(
      (instrument >> 7) & 0x07,
      instrument & 0x7F,
      s.volume.toWireByte(),
      s.pan.toWireByte(),
      s.effectPath.toWireByte(),
      s.transpose.toWireByte(),
      s.tune.toWireByte(),
      s.zoneLow.toWireByte(),
      s.zoneHigh.toWireByte(),
      encodeVelocitySwitch(s.velocitySwitch),
      s.receiveChannel.toWireByte()
    )
  }
}

const COMMON_AT = 1
const SECTIONS_AT = COMMON_AT + multiCommonCodec.size

/**
 * Multi patch (99 bytes): checksum, common, four sections.
 */
export const multiPatchCodec: Codec<MultiPatch> = {
  name: 'k5000.multi',
  size: MULTI_SIZE,
  decode(bytes, context) {
    requireLength(bytes, MULTI_SIZE, this.name)
    context.verifyChecksum(this.name, bytes.subarray(1, MULTI_SIZE), bytes[0])
    return {
      common: decodeAt(multiCommonCodec, bytes, COMMON_AT, context),
      sections: quadOf(decodeSequence(sectionCodec, bytes, SECTIONS_AT, SECTION_COUNT, context).items)
    }
  },
  encode(m) {
    return prependChecksum(concatBytes([
      multiCommonCodec.encode(m.common),
      encodeSequence(sectionCodec, m.sections)
    ]))
  }
}
