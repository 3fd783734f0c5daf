// =============================================================================
// ksynth - K4 Effect Patch
// =============================================================================

import {
  BoundedValue,
  appendChecksum,
  concatBytes,
  decodeSequence,
  encodeSequence,
  enumeration,
  fromWire,
  octetOf,
  requireLength
} from '@ksynth/core'
import type { Codec, Octet } from '@ksynth/core'
import { K4 } from './categories'
import type { BigEffectParameter, Level, Pan, SmallEffectParameter } from './categories'

// =============================================================================
// Effect Types
// =============================================================================

export const EFFECT_TYPES = [
  'reverb1',
  'reverb2',
  'reverb3',
  'reverb4',
  'gateReverb',
  'reverseGate',
  'normalDelay',
  'stereoPanpotDelay',
  'chorus',
  'overdriveFlanger',
  'overdriveNormalDelay',
  'overdriveReverb',
  'normalDelayNormalDelay',
  'normalDelayStereoPanpotDelay',
  'chorusNormalDelay',
  'chorusStereoPanpotDelay'
] as const
export type EffectType = typeof EFFECT_TYPES[number]

interface EffectInfo {
  readonly name: string
  readonly parameters: readonly [string, string, string]
}

const EFFECT_INFO: Record<EffectType, EffectInfo> = {
  reverb1: { name: 'Reverb 1', parameters: ['Pre.delay', 'Rev.Time', 'Tone'] },
  reverb2: { name: 'Reverb 2', parameters: ['Pre.delay', 'Rev.Time', 'Tone'] },
  reverb3: { name: 'Reverb 3', parameters: ['Pre.delay', 'Rev.Time', 'Tone'] },
  reverb4: { name: 'Reverb 4', parameters: ['Pre.delay', 'Rev.Time', 'Tone'] },
  gateReverb: { name: 'Gate Reverb', parameters: ['Pre.delay', 'Gate Time', 'Tone'] },
  reverseGate: { name: 'Reverse Gate', parameters: ['Pre.delay', 'Gate Time', 'Tone'] },
  normalDelay: { name: 'Normal Delay', parameters: ['Feedback', 'Tone', 'Delay'] },
  stereoPanpotDelay: { name: 'Stereo Panpot Delay', parameters: ['Feedback', 'L/R Delay', 'Delay'] },
  chorus: { name: 'Chorus', parameters: ['Width', 'Feedback', 'Rate'] },
  overdriveFlanger: { name: 'Overdrive + Flanger', parameters: ['Drive', 'Fl.Type', '1-2 Bal'] },
  overdriveNormalDelay: { name: 'Overdrive + Normal Delay', parameters: ['Drive', 'Delay Time', '1-2 Bal'] },
  overdriveReverb: { name: 'Overdrive + Reverb', parameters: ['Drive', 'Rev.Type', '1-2 Bal'] },
  normalDelayNormalDelay: { name: 'Normal Delay + Normal Delay', parameters: ['Delay1', 'Delay2', '1-2 Bal'] },
  normalDelayStereoPanpotDelay: {
    name: 'Normal Delay + Stereo Panpot Delay',
    parameters: ['Delay1', 'Delay2', '1-2 Bal']
  },
  chorusNormalDelay: { name: 'Chorus + Normal Delay', parameters: ['Chorus', 'Delay', '1-2 Bal'] },
  chorusStereoPanpotDelay: { name: 'Chorus + Stereo Panpot Delay', parameters: ['Chorus', 'Delay', '1-2 Bal'] }
}

export function effectName(type: EffectType): string {
  return EFFECT_INFO[type].name
}

export function effectParameterNames(type: EffectType): readonly [string, string, string] {
  return EFFECT_INFO[type].parameters
}

const effectTypes = enumeration('k4.effect.type', EFFECT_TYPES)

// =============================================================================
// Types
// =============================================================================

export interface SubmixSettings {
  readonly pan: Pan
  readonly send1: Level
  readonly send2: Level
}

export interface EffectPatch {
  readonly type: EffectType
  readonly parameter1: SmallEffectParameter
  readonly parameter2: SmallEffectParameter
  readonly parameter3: BigEffectParameter
  /** Settings for submixes A to H */
  readonly submixes: Octet<SubmixSettings>
}

export function submixSettings(overrides: Partial<SubmixSettings> = {}): SubmixSettings {
  return {
    pan: BoundedValue.zero(K4.pan),
    send1: BoundedValue.fromInteger(K4.level, 50),
    send2: BoundedValue.fromInteger(K4.level, 50),
    ...overrides
  }
}

export function effectPatch(overrides: Partial<EffectPatch> = {}): EffectPatch {
  return {
    type: 'reverb1',
    parameter1: BoundedValue.zero(K4.smallEffectParameter),
    parameter2: BoundedValue.zero(K4.smallEffectParameter),
    parameter3: BoundedValue.zero(K4.bigEffectParameter),
    submixes: [
      submixSettings(), submixSettings(), submixSettings(), submixSettings(),
      submixSettings(), submixSettings(), submixSettings(), submixSettings()
    ],
    ...overrides
  }
}

// =============================================================================
// Codecs
// =============================================================================

export const submixSettingsCodec: Codec<SubmixSettings> = {
  name: 'k4.effect.submix',
  size: 3,
  decode(bytes) {
    requireLength(bytes, 3, this.name)
    return {
      pan: fromWire(K4.pan, bytes[0]),
      send1: fromWire(K4.level, bytes[1]),
      send2: fromWire(K4.level, bytes[2])
    }
  },
  encode(s) {
    return Uint8Array.of(s.pan.toWireByte(), s.send1.toWireByte(), s.send2.toWireByte())
  }
}

const BODY_SIZE = 34
const SUBMIXES_AT = 10

/**
 * Effect patch (35 bytes): type, three parameters, six reserved bytes,
 * eight submix settings, checksum.
 */
export const effectPatchCodec: Codec<EffectPatch> = {
  name: 'k4.effect',
  size: BODY_SIZE + 1,
  decode(bytes, context) {
    requireLength(bytes, BODY_SIZE + 1, this.name)
    context.verifyChecksum(this.name, bytes.subarray(0, BODY_SIZE), bytes[BODY_SIZE])
    return {
      type: effectTypes.decode(bytes[0]),
      parameter1: fromWire(K4.smallEffectParameter, bytes[1]),
      parameter2: fromWire(K4.smallEffectParameter, bytes[2]),
      parameter3: fromWire(K4.bigEffectParameter, bytes[3]),
      submixes: octetOf(decodeSequence(submixSettingsCodec, bytes, SUBMIXES_AT, 8, context).items)
    }
  },
  encode(e) {
    return appendChecksum(concatBytes([
      Uint8Array.of(
        effectTypes.encode(e.type),
        e.parameter1.toWireByte(),
        e.parameter2.toWireByte(),
        e.parameter3.toWireByte()
      ),
      new Uint8Array(SUBMIXES_AT - 4),
      encodeSequence(submixSettingsCodec, e.submixes)
    ]))
  }
}
