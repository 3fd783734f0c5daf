// =============================================================================
// ksynth - K5000 Source
// =============================================================================

import { concatBytes, decodeAt, requireLength } from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { ADD_WAVE } from './categories'
import { defaultSourceControl, sourceControlCodec } from './control'
import type { SourceControl } from './control'
import { defaultOscillator, isAdditive, oscillatorCodec } from './oscillator'
import type { Oscillator } from './oscillator'
import { defaultFilter, filterCodec } from './filter'
import type { Filter } from './filter'
import { amplifierCodec, defaultAmplifier } from './amp'
import type { Amplifier } from './amp'
import { defaultLfo, lfoCodec } from './lfo'
import type { Lfo } from './lfo'

export interface Source {
  readonly control: SourceControl
  readonly oscillator: Oscillator
  readonly filter: Filter
  readonly amplifier: Amplifier
  readonly lfo: Lfo
}

export const SOURCE_SIZE = 86

const OSCILLATOR_AT = sourceControlCodec.size
const FILTER_AT = OSCILLATOR_AT + oscillatorCodec.size
const AMPLIFIER_AT = FILTER_AT + filterCodec.size
const LFO_AT = AMPLIFIER_AT + amplifierCodec.size

/** A PCM source playing the default wave */
export function pcmSource(overrides: Partial<Source> = {}): Source {
  return {
    control: defaultSourceControl(),
    oscillator: defaultOscillator(),
    filter: defaultFilter(),
    amplifier: defaultAmplifier(),
    lfo: defaultLfo(),
    ...overrides
  }
}

/** A source whose oscillator plays its additive kit */
export function additiveSource(overrides: Partial<Source> = {}): Source {
  return pcmSource({ oscillator: defaultOscillator(ADD_WAVE), ...overrides })
}

export function isAdditiveSource(source: Source): boolean {
  return isAdditive(source.oscillator)
}

/**
 * Source (86 bytes): control 28, oscillator 12, filter 20, amplifier 15, LFO 11.
 */
export const sourceCodec: Codec<Source> = {
  name: 'k5000.source',
  size: SOURCE_SIZE,
  decode(bytes, context) {
    requireLength(bytes, SOURCE_SIZE, this.name)
    return {
      control: decodeAt(sourceControlCodec, bytes, 0, context),
      oscillator: decodeAt(oscillatorCodec, bytes, OSCILLATOR_AT, context),
      filter: decodeAt(filterCodec, bytes, FILTER_AT, context),
      amplifier: decodeAt(amplifierCodec, bytes, AMPLIFIER_AT, context),
      lfo: decodeAt(lfoCodec, bytes, LFO_AT, context)
    }
  },
  encode(s) {
    return concatBytes([
      sourceControlCodec.encode(s.control),
      oscillatorCodec.encode(s.oscillator),
      filterCodec.encode(s.filter),
      amplifierCodec.encode(s.amplifier),
      lfoCodec.encode(s.lfo)
    ])
  }
}
