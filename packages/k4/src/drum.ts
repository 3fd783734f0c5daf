// =============================================================================
// ksynth - K4 Drum
// =============================================================================

import {
  BoundedValue,
  FixedList,
  appendChecksum,
  concatBytes,
  decodeAt,
  decodeSequence,
  deinterleave,
  encodeSequence,
  fromWire,
  getBits,
  interleave,
  pairOf,
  requireLength,
  setBits
} from '@ksynth/core'
import type { Codec, Pair } from '@ksynth/core'
import { K4 } from './categories'
import type { Channel, DrumDecay, Fine, Level, Submix, WaveNumber } from './categories'
import { decodeWave, encodeWave } from './wave'

export interface DrumCommon {
  readonly channel: Channel
  readonly volume: Level
  readonly velocityDepth: Level
}

export interface DrumSource {
  readonly wave: WaveNumber
  readonly decay: DrumDecay
  readonly tune: Fine
  readonly level: Level
}

export interface DrumNote {
  readonly submix: Submix
  readonly sources: Pair<DrumSource>
}

export interface DrumPatch {
  readonly common: DrumCommon
  /** One note per key from C1 to C6 */
  readonly notes: FixedList<DrumNote>
}

export const DRUM_NOTE_COUNT = 61

/** MIDI key of the first drum note (C1) */
export const FIRST_DRUM_KEY = 36

export function drumSource(overrides: Partial<DrumSource> = {}): DrumSource {
  return {
    wave: BoundedValue.fromInteger(K4.wave, 97),
    decay: BoundedValue.fromInteger(K4.drumDecay, 50),
    tune: BoundedValue.zero(K4.fine),
    level: BoundedValue.fromInteger(K4.level, 100),
    ...overrides
  }
}

export function drumPatch(overrides: Partial<DrumPatch> = {}): DrumPatch {
  return {
    common: {
      channel: BoundedValue.fromInteger(K4.channel, 10),
      volume: BoundedValue.fromInteger(K4.level, 100),
      velocityDepth: BoundedValue.fromInteger(K4.level, 50)
    },
    notes: FixedList.filled(DRUM_NOTE_COUNT, () => ({
      submix: BoundedValue.zero(K4.submix),
      sources: [drumSource(), drumSource()] as const
    }), 'k4.drum.notes'),
    ...overrides
  }
}

// =============================================================================
// Codecs
// =============================================================================

const COMMON_SIZE = 11

/**
 * Drum common block: channel, volume, velocity depth, seven reserved bytes, checksum.
 */
export const drumCommonCodec: Codec<DrumCommon> = {
  name: 'k4.drum.common',
  size: COMMON_SIZE,
  decode(bytes, context) {
    requireLength(bytes, COMMON_SIZE, this.name)
    context.verifyChecksum(this.name, bytes.subarray(0, COMMON_SIZE - 1), bytes[COMMON_SIZE - 1])
    return {
      channel: fromWire(K4.channel, bytes[0]),
      volume: fromWire(K4.level, bytes[1]),
      velocityDepth: fromWire(K4.level, bytes[2])
    }
  },
  encode(c) {
    const body = new Uint8Array(COMMON_SIZE - 1)
    body[0] = c.channel.toWireByte()
    body[1] = c.volume.toWireByte()
    body[2] = c.velocityDepth.toWireByte()
    return appendChecksum(body)
  }
}

/**
 * One drum source (5 bytes): wave high (b0), wave low, decay, tune, level.
 * Bits 4-6 of the first byte belong to the note.
 */
export const drumSourceCodec: Codec<DrumSource> = {
  name: 'k4.drum.source',
  size: 5,
  decode(bytes) {
    requireLength(bytes, 5, this.name)
    return {
      wave: decodeWave(bytes[0], bytes[1]),
      decay: fromWire(K4.drumDecay, bytes[2]),
      tune: fromWire(K4.fine, bytes[3]),
      level: fromWire(K4.level, bytes[4])
    }
  },
  encode(s) {
    const [waveHigh, waveLow] = encodeWave(s.wave)
    return Uint8Array.of(waveHigh, waveLow, s.decay.toWireByte(), s.tune.toWireByte(), s.level.toWireByte())
  }
}

/**
 * Drum note (11 bytes): two sources interleaved at stride 2, then a checksum.
 * The submix is in bits 4-6 of source 1's first byte.
 */
export const drumNoteCodec: Codec<DrumNote> = {
  name: 'k4.drum.note',
  size: 11,
  decode(bytes, context) {
    requireLength(bytes, 11, this.name)
    context.verifyChecksum(this.name, bytes.subarray(0, 10), bytes[10])
    const [first, second] = deinterleave(bytes.subarray(0, 10), 2, drumSourceCodec.size)
    return {
      submix: fromWire(K4.submix, getBits(first[0], 4, 3)),
      sources: pairOf([
        decodeAt(drumSourceCodec, first, 0, context),
        decodeAt(drumSourceCodec, second, 0, context)
      ])
    }
  },
  encode(n) {
    const first = drumSourceCodec.encode(n.sources[0])
    first[0] = setBits(first[0], 4, 3, n.submix.toWireByte())
    return appendChecksum(interleave([first, drumSourceCodec.encode(n.sources[1])]))
  }
}

/**
 * Complete drum data (682 bytes): common block and 61 notes.
 */
export const drumPatchCodec: Codec<DrumPatch> = {
  name: 'k4.drum',
  size: COMMON_SIZE + DRUM_NOTE_COUNT * drumNoteCodec.size,
  decode(bytes, context) {
    requireLength(bytes, this.size, this.name)
    return {
      common: decodeAt(drumCommonCodec, bytes, 0, context),
      notes: FixedList.of(
        decodeSequence(drumNoteCodec, bytes, COMMON_SIZE, DRUM_NOTE_COUNT, context).items,
        DRUM_NOTE_COUNT,
        'k4.drum.notes'
      )
    }
  },
  encode(d) {
    return concatBytes([
      drumCommonCodec.encode(d.common),
      encodeSequence(drumNoteCodec, d.notes)
    ])
  }
}
