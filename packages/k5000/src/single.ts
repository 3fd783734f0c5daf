// =============================================================================
// ksynth - K5000 Single Patch
// =============================================================================
//
// A single is sized by its own contents:
//
//   0                 checksum of common and source bytes
//   1-81              common
//   82 + 86n          source n (source count from common byte 50)
//   ...               one additive kit (806 bytes) per ADD source, in order
//
// The model holds neither the count nor a separate kit list: byte 50 is the
// length of `sources`, and each ADD source carries its own kit.

import {
  BoundedValue,
  concatBytes,
  decodeAt,
  decodeName,
  decodeSequence,
  encodeName,
  encodeSequence,
  enumeration,
  FixedList,
  fromWire,
  getBit,
  packBits,
  patchName,
  prependChecksum,
  requireLength
} from '@ksynth/core'
import type { Codec, DecodeContext, PatchName, Quad } from '@ksynth/core'
import { ADD_WAVE, K5000 } from './categories'
import type { Level, SourceCount } from './categories'
import {
  effectControl,
  effectControlCodec,
  effectSettings,
  effectSettingsCodec,
  geqCodec,
  graphicEq
} from './effect'
import type { EffectControl, EffectSettings, GraphicEq } from './effect'
import { controlDestinations, switchFunctions } from './control'
import type { MacroController, SwitchFunction } from './control'
import { decodeWaveNumber } from './oscillator'
import { SOURCE_SIZE, isAdditiveSource, pcmSource, sourceCodec } from './source'
import type { Source } from './source'
import { ADDITIVE_KIT_SIZE, additiveKit, additiveKitCodec } from './additive'
import type { AdditiveKit } from './additive'

// =============================================================================
// Enumerations
// =============================================================================

export const POLYPHONY_MODES = ['poly', 'solo1', 'solo2'] as const
export type PolyphonyMode = typeof POLYPHONY_MODES[number]

export const AMPLITUDE_MODULATIONS = ['off', 'am1to2', 'am2to3', 'am3to4', 'am4to5', 'am5to6'] as const
export type AmplitudeModulation = typeof AMPLITUDE_MODULATIONS[number]

const polyphonyModes = enumeration('k5000.single.polyphony', POLYPHONY_MODES)
const amplitudeModulations = enumeration('k5000.single.amplitudeModulation', AMPLITUDE_MODULATIONS)

// =============================================================================
// Types
// =============================================================================

export interface Switches {
  readonly switch1: SwitchFunction
  readonly switch2: SwitchFunction
  readonly footSwitch1: SwitchFunction
  readonly footSwitch2: SwitchFunction
}

export interface SingleCommon {
  readonly effects: EffectSettings
  readonly geq: GraphicEq
  readonly drumMark: boolean
  readonly name: PatchName
  readonly volume: Level
  readonly polyphony: PolyphonyMode
  /** One flag per source slot (6); `true` silences the source */
  readonly sourceMutes: FixedList<boolean>
  readonly amplitudeModulation: AmplitudeModulation
  readonly effectControl: EffectControl
  readonly portamento: boolean
  readonly portamentoSpeed: Level
  /** User macros 1-4 */
  readonly macros: Quad<MacroController>
  readonly switches: Switches
}

export interface SingleSource extends Source {
  /**
   * Harmonic data, written only while the oscillator plays the ADD wave.
   * An ADD source without one is written with `additiveKit()`.
   */
  readonly additiveKit?: AdditiveKit
}

export interface SinglePatch {
  readonly common: SingleCommon
  /** 2~6 sources, checked on encode */
  readonly sources: readonly SingleSource[]
}

/** The common block as it sits on the wire, with the source count beside it */
export interface SingleCommonBlock {
  readonly common: SingleCommon
  readonly sourceCount: SourceCount
}

/**
 * A block whose size depends on its contents. `measure` reads only as much
 * as it needs to size the block.
 */
export interface VariableCodec<T> {
  readonly name: string
  measure(bytes: Uint8Array): number
  decode(bytes: Uint8Array, context: DecodeContext): T
  encode(value: T): Uint8Array
}

export const SINGLE_NAME_LENGTH = 8
export const MAX_SOURCES = 6
export const COMMON_SIZE = 81

// =============================================================================
// Construction
// =============================================================================

/**
 * A single playing `sources`, with an additive kit for each ADD source.
 *
 * @example
 * ```typescript
 * const patch = singlePatch('Bells', [pcmSource(), additiveSource()])
 * patch.sources[1].additiveKit // default kit
 * ```
 */
export function singlePatch(name = 'NewSound', sources: readonly Source[] = [pcmSource(), pcmSource()]): SinglePatch {
  const macro: MacroController = {
    destination1: 'pitchOffset',
    depth1: BoundedValue.zero(K5000.macroDepth),
    destination2: 'pitchOffset',
    depth2: BoundedValue.zero(K5000.macroDepth)
  }
  return {
    common: {
      effects: effectSettings(),
      geq: graphicEq(),
      drumMark: false,
      name: patchName(name, SINGLE_NAME_LENGTH),
      volume: BoundedValue.fromInteger(K5000.level, 115),
      polyphony: 'poly',
      sourceMutes: FixedList.filled(MAX_SOURCES, () => false, 'k5000.single.sourceMutes'),
      amplitudeModulation: 'off',
      effectControl: effectControl(),
      portamento: false,
      portamentoSpeed: BoundedValue.zero(K5000.level),
      macros: [macro, macro, macro, macro],
      switches: { switch1: 'off', switch2: 'off', footSwitch1: 'off', footSwitch2: 'off' }
    },
    sources: sources.map(source => isAdditiveSource(source) ? { ...source, additiveKit: additiveKit() } : source)
  }
}

// =============================================================================
// Codecs
// =============================================================================

/**
 * Single common block (81 bytes).
 */
export const singleCommonCodec: Codec<SingleCommonBlock> = {
  name: 'k5000.single.common',
  size: COMMON_SIZE,
  decode(bytes, context) {
    requireLength(bytes, COMMON_SIZE, this.name)
    const depth = (i: number): MacroController['depth1'] => fromWire(K5000.macroDepth, bytes[i])
    const macro = (n: number): MacroController => ({
      destination1: controlDestinations.decode(bytes[61 + 2 * n]),
      depth1: depth(69 + 2 * n),
      destination2: controlDestinations.decode(bytes[62 + 2 * n]),
      depth2: depth(70 + 2 * n)
    })
    const common: SingleCommon = {
      effects: decodeAt(effectSettingsCodec, bytes, 0, context),
      geq: decodeAt(geqCodec, bytes, 31, context),
      drumMark: bytes[38] === 1,
      name: decodeName(bytes.subarray(39), SINGLE_NAME_LENGTH),
      volume: fromWire(K5000.level, bytes[47]),
      polyphony: polyphonyModes.decode(bytes[48]),
      sourceMutes: FixedList.filled(MAX_SOURCES, i => getBit(bytes[51], i), 'k5000.single.sourceMutes'),
      amplitudeModulation: amplitudeModulations.decode(bytes[52]),
      effectControl: decodeAt(effectControlCodec, bytes, 53, context),
      portamento: bytes[59] === 1,
      portamentoSpeed: fromWire(K5000.level, bytes[60]),
      macros: [macro(0), macro(1), macro(2), macro(3)],
      switches: {
        switch1: switchFunctions.decode(bytes[77]),
        switch2: switchFunctions.decode(bytes[78]),
        footSwitch1: switchFunctions.decode(bytes[79]),
        footSwitch2: switchFunctions.decode(bytes[80])
      }
    }
    return { common, sourceCount: fromWire(K5000.sourceCount, bytes[50]) }
  },
  encode({ common: c, sourceCount }) {
    const { switches } = c
    return concatBytes([
      effectSettingsCodec.encode(c.effects),
      geqCodec.encode(c.geq),
      Uint8Array.of(c.drumMark ? 1 : 0),
      encodeName(c.name),
      Uint8Array.of(
        c.volume.toWireByte(),
        polyphonyModes.encode(c.polyphony),
        0,
        sourceCount.toWireByte(),
        packBits(c.sourceMutes.toArray().map((muted, i) => [i, 1, muted] as const)),
        amplitudeModulations.encode(c.amplitudeModulation)
      ),
      effectControlCodec.encode(c.effectControl),
      Uint8Array.of(
        c.portamento ? 1 : 0,
        c.portamentoSpeed.toWireByte(),
        ...c.macros.flatMap(m => [controlDestinations.encode(m.destination1), controlDestinations.encode(m.destination2)]),
        ...c.macros.flatMap(m => [m.depth1.toWireByte(), m.depth2.toWireByte()]),
        switchFunctions.encode(switches.switch1),
        switchFunctions.encode(switches.switch2),
        switchFunctions.encode(switches.footSwitch1),
        switchFunctions.encode(switches.footSwitch2)
      )
    ])
  }
}

const COMMON_AT = 1
const SOURCES_AT = COMMON_AT + COMMON_SIZE
const WAVE_AT = 28

/**
 * Single patch: checksum, common, sources and additive kits.
 */
export const singlePatchCodec: VariableCodec<SinglePatch> = {
  name: 'k5000.single',

  /**
   * @throws TooShortError if the common or source blocks are cut off
   * @throws OutOfRangeError if the source count is not 2~6
   */
  measure(bytes) {
    requireLength(bytes, SOURCES_AT, this.name)
    const count = fromWire(K5000.sourceCount, bytes[COMMON_AT + 50]).value
    const kitsAt = SOURCES_AT + count * SOURCE_SIZE
    requireLength(bytes, kitsAt, this.name)
    let kits = 0
    for (let i = 0; i < count; i++) {
      const wave = SOURCES_AT + i * SOURCE_SIZE + WAVE_AT
      if (decodeWaveNumber(bytes[wave], bytes[wave + 1]).value === ADD_WAVE) {
        kits++
      }
    }
    return kitsAt + kits * ADDITIVE_KIT_SIZE
  },

  decode(bytes, context) {
    const size = this.measure(bytes)
    requireLength(bytes, size, this.name)
    const { common, sourceCount } = decodeAt(singleCommonCodec, bytes, COMMON_AT, context)
    const sources = decodeSequence(sourceCodec, bytes, SOURCES_AT, sourceCount.value, context)
    context.verifyChecksum(this.name, bytes.subarray(COMMON_AT, sources.end), bytes[0])
    const kitCount = sources.items.filter(isAdditiveSource).length
    const kits = decodeSequence(additiveKitCodec, bytes, sources.end, kitCount, context)
    context.trace(`${this.name} "${common.name.trimEnd()}": ${sources.items.length} sources, ${kitCount} additive`)
    let next = 0
    const withKits = sources.items.map((source): SingleSource => {
      if (!isAdditiveSource(source)) {
        return source
      }
      const kit = kits.items[next]
      next++
      return { ...source, additiveKit: kit }
    })
    return { common, sources: withKits }
  },

  /**
   * @throws OutOfRangeError if there are fewer than 2 or more than 6 sources
   */
  encode(patch) {
    const { common, sources } = patch
    const sourceCount = BoundedValue.fromInteger(K5000.sourceCount, sources.length)
    const kits = sources.filter(isAdditiveSource).map(source => source.additiveKit ?? additiveKit())
    return concatBytes([
      prependChecksum(concatBytes([
        singleCommonCodec.encode({ common, sourceCount }),
        encodeSequence(sourceCodec, sources)
      ])),
      encodeSequence(additiveKitCodec, kits)
    ])
  }
}
