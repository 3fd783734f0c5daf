// =============================================================================
// ksynth - K5000 LFO
// =============================================================================

import { BoundedValue, enumeration, fromWire, requireLength } from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { K5000 } from './categories'
import type { Depth, Level, Signed } from './categories'

export const LFO_WAVEFORMS = ['triangle', 'square', 'sawtooth', 'sine', 'random'] as const
export type LfoWaveform = typeof LFO_WAVEFORMS[number]

const waveforms = enumeration('k5000.lfo.waveform', LFO_WAVEFORMS)

export interface LfoControl {
  readonly depth: Depth
  readonly keyScaling: Signed
}

export interface Lfo {
  readonly waveform: LfoWaveform
  readonly speed: Level
  readonly delayOnset: Level
  readonly fadeInTime: Level
  readonly fadeInToSpeed: Level
  readonly vibrato: LfoControl
  readonly growl: LfoControl
  readonly tremolo: LfoControl
}

function lfoControl(): LfoControl {
  return { depth: BoundedValue.zero(K5000.depth), keyScaling: BoundedValue.zero(K5000.signed) }
}

export function defaultLfo(): Lfo {
  return {
    waveform: 'triangle',
    speed: BoundedValue.zero(K5000.level),
    delayOnset: BoundedValue.zero(K5000.level),
    fadeInTime: BoundedValue.zero(K5000.level),
    fadeInToSpeed: BoundedValue.zero(K5000.level),
    vibrato: lfoControl(),
    growl: lfoControl(),
    tremolo: lfoControl()
  }
}

export const lfoCodec: Codec<Lfo> = {
  name: 'k5000.lfo',
  size: 11,
  decode(bytes) {
    requireLength(bytes, 11, this.name)
    const control = (i: number): LfoControl => ({
      depth: fromWire(K5000.depth, bytes[i]),
      keyScaling: fromWire(K5000.signed, bytes[i + 1])
    })
    return {
      waveform: waveforms.decode(bytes[0]),
      speed: fromWire(K5000.level, bytes[1]),
      delayOnset: fromWire(K5000.level, bytes[2]),
      fadeInTime: fromWire(K5000.level, bytes[3]),
      fadeInToSpeed: fromWire(K5000.level, bytes[4]),
      vibrato: control(5),
      growl: control(7),
      tremolo: control(9)
    }
  },
  encode(l) {
    return Uint8Array.of(
      waveforms.encode(l.waveform),
      l.speed.toWireByte(),
      l.delayOnset.toWireByte(),
      l.fadeInTime.toWireByte(),
      l.fadeInToSpeed.toWireByte(),
      ...[l.vibrato, l.growl, l.tremolo].flatMap(c => [c.depth.toWireByte(), c.keyScaling.toWireByte()])
    )
  }
}
