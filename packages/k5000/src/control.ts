// =============================================================================
// ksynth - K5000 Controllers
// =============================================================================

import {
  BoundedValue,
  concatBytes,
  decodeAt,
  enumeration,
  fromWire,
  getBits,
  packBits,
  requireLength
} from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { K5000 } from './categories'
import type {
  BenderCutoff,
  BenderPitch,
  EffectPath,
  Level,
  MacroDepth,
  Signed,
  VelocityThreshold
} from './categories'

// =============================================================================
// Enumerations
// =============================================================================

export const CONTROL_SOURCES = [
  'bender',
  'channelPressure',
  'wheel',
  'expression',
  'midiVolume',
  'panPot',
  'generalController1',
  'generalController2',
  'generalController3',
  'generalController4',
  'generalController5',
  'generalController6',
  'generalController7',
  'generalController8'
] as const
export type ControlSource = typeof CONTROL_SOURCES[number]

export const CONTROL_DESTINATIONS = [
  'pitchOffset',
  'cutoffOffset',
  'level',
  'vibratoDepthOffset',
  'growlDepthOffset',
  'tremoloDepthOffset',
  'lfoSpeedOffset',
  'attackTimeOffset',
  'decay1TimeOffset',
  'releaseTimeOffset',
  'velocityOffset',
  'resonanceOffset',
  'panPotOffset',
  'formantFilterBiasOffset',
  'formantFilterEnvelopeLfoDepthOffset',
  'formantFilterEnvelopeLfoSpeedOffset',
  'harmonicLowOffset',
  'harmonicHighOffset',
  'harmonicEvenOffset',
  'harmonicOddOffset'
] as const
export type ControlDestination = typeof CONTROL_DESTINATIONS[number]

export const SWITCH_FUNCTIONS = [
  'off',
  'harmonicsMax',
  'harmonicsBright',
  'harmonicsDark',
  'harmonicsSaw',
  'selectLoud',
  'addLoud',
  'addFifth',
  'addOdd',
  'addEven',
  'harmonicEnvelope1',
  'harmonicEnvelope2',
  'harmonicEnvelopeLoop',
  'formantFilterMax',
  'formantFilterComb',
  'formantFilterHighCut',
  'formantFilterComb2'
] as const
export type SwitchFunction = typeof SWITCH_FUNCTIONS[number]

export const VELOCITY_SWITCH_TYPES = ['off', 'loud', 'soft'] as const
export type VelocitySwitchType = typeof VELOCITY_SWITCH_TYPES[number]

export const PAN_TYPES = ['normal', 'random', 'keyScale', 'negativeKeyScale'] as const
export type PanType = typeof PAN_TYPES[number]

export const controlSources = enumeration('k5000.control.source', CONTROL_SOURCES)
export const controlDestinations = enumeration('k5000.control.destination', CONTROL_DESTINATIONS)
export const switchFunctions = enumeration('k5000.control.switch', SWITCH_FUNCTIONS)
const velocitySwitchTypes = enumeration('k5000.velocitySwitch.type', VELOCITY_SWITCH_TYPES)
const panTypes = enumeration('k5000.pan.type', PAN_TYPES)

/** Note velocities selected by the 32 velocity switch threshold steps */
export const VELOCITY_THRESHOLDS: readonly number[] = [
  4, 8, 12, 16, 20, 24, 28, 32,
  36, 40, 44, 48, 52, 56, 60, 64,
  68, 72, 76, 80, 84, 88, 92, 96,
  100, 104, 108, 112, 116, 120, 124, 127
]

// =============================================================================
// Types
// =============================================================================

export interface VelocitySwitch {
  readonly type: VelocitySwitchType
  /** Index into `VELOCITY_THRESHOLDS` */
  readonly threshold: VelocityThreshold
}

export interface MacroController {
  readonly destination1: ControlDestination
  readonly depth1: MacroDepth
  readonly destination2: ControlDestination
  readonly depth2: MacroDepth
}

export interface AssignableController {
  readonly source: ControlSource
  readonly destination: ControlDestination
  readonly depth: Signed
}

export interface SourceControl {
  readonly zoneLow: Level
  readonly zoneHigh: Level
  readonly velocitySwitch: VelocitySwitch
  readonly effectPath: EffectPath
  readonly volume: Level
  readonly benderPitch: BenderPitch
  readonly benderCutoff: BenderCutoff
  readonly pressure: MacroController
  readonly wheel: MacroController
  readonly expression: MacroController
  readonly assignable1: AssignableController
  readonly assignable2: AssignableController
  readonly keyOnDelay: Level
  readonly panType: PanType
  readonly pan: Signed
}

export function thresholdVelocity(threshold: VelocityThreshold): number {
  return VELOCITY_THRESHOLDS[threshold.value]
}

function macroController(): MacroController {
  return {
    destination1: 'pitchOffset',
    depth1: BoundedValue.zero(K5000.macroDepth),
    destination2: 'pitchOffset',
    depth2: BoundedValue.zero(K5000.macroDepth)
  }
}

function assignableController(): AssignableController {
  return { source: 'bender', destination: 'pitchOffset', depth: BoundedValue.zero(K5000.signed) }
}

export function defaultSourceControl(): SourceControl {
  return {
    zoneLow: BoundedValue.zero(K5000.level),
    zoneHigh: BoundedValue.fromInteger(K5000.level, 127),
    velocitySwitch: { type: 'off', threshold: BoundedValue.zero(K5000.velocityThreshold) },
    effectPath: BoundedValue.zero(K5000.effectPath),
    volume: BoundedValue.fromInteger(K5000.level, 100),
    benderPitch: BoundedValue.zero(K5000.benderPitch),
    benderCutoff: BoundedValue.zero(K5000.benderCutoff),
    pressure: macroController(),
    wheel: macroController(),
    expression: macroController(),
    assignable1: assignableController(),
    assignable2: assignableController(),
    keyOnDelay: BoundedValue.zero(K5000.level),
    panType: 'normal',
    pan: BoundedValue.zero(K5000.signed)
  }
}

// =============================================================================
// Codecs
// =============================================================================

/**
 * Velocity switch byte: type in bits 5-6, threshold step in bits 0-4.
 */
export function decodeVelocitySwitch(byte: number): VelocitySwitch {
  return {
    type: velocitySwitchTypes.decode(getBits(byte, 5, 2)),
    threshold: fromWire(K5000.velocityThreshold, getBits(byte, 0, 5))
  }
}

export function encodeVelocitySwitch(vs: VelocitySwitch): number {
  return packBits([
    [0, 5, vs.threshold.toWireByte()],
    [5, 2, velocitySwitchTypes.encode(vs.type)]
  ])
}

export const macroControllerCodec: Codec<MacroController> = {
  name: 'k5000.macro',
  size: 4,
  decode(bytes) {
    requireLength(bytes, 4, this.name)
    return {
      destination1: controlDestinations.decode(bytes[0]),
      depth1: fromWire(K5000.macroDepth, bytes[1]),
      destination2: controlDestinations.decode(bytes[2]),
      depth2: fromWire(K5000.macroDepth, bytes[3])
    }
  },
  encode(m) {
    return Uint8Array.of(
      controlDestinations.encode(m.destination1),
      m.depth1.toWireByte(),
      controlDestinations.encode(m.destination2),
      m.depth2.toWireByte()
    )
  }
}

export const assignableControllerCodec: Codec<AssignableController> = {
  name: 'k5000.assignable',
  size: 3,
  decode(bytes) {
    requireLength(bytes, 3, this.name)
    return {
      source: controlSources.decode(bytes[0]),
      destination: controlDestinations.decode(bytes[1]),
      depth: fromWire(K5000.signed, bytes[2])
    }
  },
  encode(a) {
    return Uint8Array.of(
      controlSources.encode(a.source),
      controlDestinations.encode(a.destination),
      a.depth.toWireByte()
    )
  }
}

/**
 * Source control block (28 bytes).
 *
 * Macros take four bytes (two destination/depth pairs), assignable
 * controllers three (source, destination, depth).
 */
export const sourceControlCodec: Codec<SourceControl> = {
  name: 'k5000.source.control',
  size: 28,
  decode(bytes, context) {
    requireLength(bytes, 28, this.name)
    return {
      zoneLow: fromWire(K5000.level, bytes[0]),
      zoneHigh: fromWire(K5000.level, bytes[1]),
      velocitySwitch: decodeVelocitySwitch(bytes[2]),
      effectPath: fromWire(K5000.effectPath, bytes[3]),
      volume: fromWire(K5000.level, bytes[4]),
      benderPitch: fromWire(K5000.benderPitch, bytes[5]),
      benderCutoff: fromWire(K5000.benderCutoff, bytes[6]),
      pressure: decodeAt(macroControllerCodec, bytes, 7, context),
      wheel: decodeAt(macroControllerCodec, bytes, 11, context),
      expression: decodeAt(macroControllerCodec, bytes, 15, context),
      assignable1: decodeAt(assignableControllerCodec, bytes, 19, context),
      assignable2: decodeAt(assignableControllerCodec, bytes, 22, context),
      keyOnDelay: fromWire(K5000.level, bytes[25]),
      panType: panTypes.decode(bytes[26]),
      pan: fromWire(K5000.signed, bytes[27])
    }
  },
  encode(c) {
    return concatBytes([
      Uint8Array.of(
        c.zoneLow.toWireByte(),
        c.zoneHigh.toWireByte(),
        encodeVelocitySwitch(c.velocitySwitch),
        c.effectPath.toWireByte(),
        c.volume.toWireByte(),
        c.benderPitch.toWireByte(),
        c.benderCutoff.toWireByte()
      ),
      macroControllerCodec.encode(c.pressure),
      macroControllerCodec.encode(c.wheel),
      macroControllerCodec.encode(c.expression),
      assignableControllerCodec.encode(c.assignable1),
      assignableControllerCodec.encode(c.assignable2),
      Uint8Array.of(c.keyOnDelay.toWireByte(), panTypes.encode(c.panType), c.pan.toWireByte())
    ])
  }
}
