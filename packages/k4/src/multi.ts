// =============================================================================
// ksynth - K4 Multi Patch
// =============================================================================

import {
  BoundedValue,
  appendChecksum,
  concatBytes,
  decodeName,
  decodeSequence,
  encodeName,
  encodeSequence,
  enumeration,
  fromWire,
  getBit,
  getBits,
  octetOf,
  packBits,
  patchName,
  requireLength
} from '@ksynth/core'
import type { Codec, Octet, PatchName } from '@ksynth/core'
import { K4 } from './categories'
import type { Channel, EffectNumber, Fine, Key, Level, PatchNumber, Submix, Transpose } from './categories'

export const VELOCITY_SWITCHES = ['all', 'soft', 'loud'] as const
export type VelocitySwitch = typeof VELOCITY_SWITCHES[number]

export const PLAY_MODES = ['keyboard', 'midi', 'mix'] as const
export type PlayMode = typeof PLAY_MODES[number]

const velocitySwitches = enumeration('k4.section.velocitySwitch', VELOCITY_SWITCHES)
const playModes = enumeration('k4.section.playMode', PLAY_MODES)

export interface Section {
  readonly singleNumber: PatchNumber
  readonly zoneLow: Key
  readonly zoneHigh: Key
  readonly receiveChannel: Channel
  readonly velocitySwitch: VelocitySwitch
  readonly muted: boolean
  readonly outSelect: Submix
  readonly playMode: PlayMode
  readonly level: Level
  readonly transpose: Transpose
  readonly tune: Fine
}

export interface MultiPatch {
  readonly name: PatchName
  readonly volume: Level
  readonly effect: EffectNumber
  readonly sections: Octet<Section>
}

export const MULTI_NAME_LENGTH = 10

export function section(overrides: Partial<Section> = {}): Section {
  return {
    singleNumber: BoundedValue.zero(K4.patchNumber),
    zoneLow: BoundedValue.fromInteger(K4.key, 0),
    zoneHigh: BoundedValue.fromInteger(K4.key, 127),
    receiveChannel: BoundedValue.zero(K4.channel),
    velocitySwitch: 'all',
    muted: false,
    outSelect: BoundedValue.zero(K4.submix),
    playMode: 'keyboard',
    level: BoundedValue.fromInteger(K4.level, 80),
    transpose: BoundedValue.zero(K4.transpose),
    tune: BoundedValue.zero(K4.fine),
    ...overrides
  }
}

export function multiPatch(overrides: Partial<MultiPatch> = {}): MultiPatch {
  return {
    name: patchName('NewMulti', MULTI_NAME_LENGTH),
    volume: BoundedValue.fromInteger(K4.level, 80),
    effect: BoundedValue.zero(K4.effectNumber),
    sections: [
      section(), section(), section(), section(),
      section(), section(), section(), section()
    ],
    ...overrides
  }
}

/**
 * Multi section (8 bytes). Byte 3 packs the receive channel (b0-3), velocity
 * switch (b4-5) and mute (b6); byte 4 the out select (b0-2) and play mode (b3-4).
 */
export const sectionCodec: Codec<Section> = {
  name: 'k4.section',
  size: 8,
  decode(bytes) {
    requireLength(bytes, 8, this.name)
    return {
      singleNumber: fromWire(K4.patchNumber, bytes[0]),
      zoneLow: fromWire(K4.key, bytes[1]),
      zoneHigh: fromWire(K4.key, bytes[2]),
      receiveChannel: fromWire(K4.channel, getBits(bytes[3], 0, 4)),
      velocitySwitch: velocitySwitches.decode(getBits(bytes[3], 4, 2)),
      muted: getBit(bytes[3], 6),
      outSelect: fromWire(K4.submix, getBits(bytes[4], 0, 3)),
      playMode: playModes.decode(getBits(bytes[4], 3, 2)),
      level: fromWire(K4.level, bytes[5]),
      transpose: fromWire(K4.transpose, bytes[6]),
      tune: fromWire(K4.fine, bytes[7])
    }
  },
  encode(s) {
    return Uint8Array.of(
      s.singleNumber.toWireByte(),
      s.zoneLow.toWireByte(),
      s.zoneHigh.toWireByte(),
      packBits([
        [0, 4, s.receiveChannel.toWireByte()],
        [4, 2, velocitySwitches.encode(s.velocitySwitch)],
        [6, 1, s.muted]
      ]),
      packBits([
        [0, 3, s.outSelect.toWireByte()],
        [3, 2, playModes.encode(s.playMode)]
      ]),
      s.level.toWireByte(),
      s.transpose.toWireByte(),
      s.tune.toWireByte()
    )
  }
}

const BODY_SIZE = 76
const SECTIONS_AT = 12

/**
 * Multi patch (77 bytes): name, volume, effect, eight sections, checksum.
 */
export const multiPatchCodec: Codec<MultiPatch> = {
  name: 'k4.multi',
  size: BODY_SIZE + 1,
  decode(bytes, context) {
    requireLength(bytes, BODY_SIZE + 1, this.name)
    context.verifyChecksum(this.name, bytes.subarray(0, BODY_SIZE), bytes[BODY_SIZE])
    const sections = decodeSequence(sectionCodec, bytes, SECTIONS_AT, 8, context)
    return {
      name: decodeName(bytes, MULTI_NAME_LENGTH),
      volume: fromWire(K4.level, bytes[10]),
      effect: fromWire(K4.effectNumber, getBits(bytes[11], 0, 5)),
      sections: octetOf(sections.items)
    }
  },
  encode(m) {
    return appendChecksum(concatBytes([
      encodeName(m.name),
      Uint8Array.of(m.volume.toWireByte(), m.effect.toWireByte()),
      encodeSequence(sectionCodec, m.sections)
    ]))
  }
}
