// =============================================================================
// ksynth - K5000 Text Rendering
// =============================================================================

import type { ToneNumber } from './categories'
import { effectName, effectParameterNames } from './effect'
import type { EffectDefinition, EffectSettings } from './effect'
import { thresholdVelocity } from './control'
import type { VelocitySwitch } from './control'
import { isAdditiveSource } from './source'
import type { MultiPatch } from './multi'
import type { SinglePatch } from './single'
import type { Dump } from './sysex'

const NOTE_NAMES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B']

/**
 * Key name with middle C (60) as C4.
 */
export function keyName(key: number): string {
  return `${NOTE_NAMES[key % 12]}${Math.floor(key / 12) - 1}`
}

/** Tone number as shown on the front panel: 0 -> "001" */
export function toneName(tone: ToneNumber): string {
  return String(tone.value + 1).padStart(3, '0')
}

function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n)
}

function velocitySwitchText(vs: VelocitySwitch): string {
  return vs.type === 'off' ? 'off' : `${vs.type}<${thresholdVelocity(vs.threshold)}`
}

/**
 * "Hall 1 depth=20 Dry/Wet 2=10 Reverb Time=64 ..."; unused parameters are left out.
 */
export function formatEffect(effect: EffectDefinition): string {
  const names = effectParameterNames(effect.type)
  const parameters = effect.parameters
    .map((value, i) => (names[i] === '?' ? '' : ` ${names[i]}=${value}`))
    .join('')
  return `${effectName(effect.type)} depth=${effect.depth}${parameters}`
}

export function formatEffects(settings: EffectSettings): string {
  return [
    `${settings.algorithm}`,
    `Reverb: ${formatEffect(settings.reverb)}`,
    ...settings.effects.map((effect, i) => `Effect ${i + 1}: ${formatEffect(effect)}`)
  ].join('\n')
}

export function formatSingle(patch: SinglePatch): string {
  const { common } = patch
  const portamento = common.portamento ? String(common.portamentoSpeed) : 'off'
  const lines = [
    `${common.name.trimEnd()}  volume=${common.volume} sources=${patch.sources.length} ` +
    `polyphony=${common.polyphony} am=${common.amplitudeModulation} portamento=${portamento}`
  ]
  patch.sources.forEach((source, i) => {
    const muted = common.sourceMutes.at(i) ? ' (muted)' : ''
    const { oscillator, control } = source
    const wave = isAdditiveSource(source) ? 'ADD' : `PCM ${oscillator.wave}`
    lines.push(
      `S${i + 1}${muted}: ${wave} coarse=${signed(oscillator.coarse.value)} fine=${signed(oscillator.fine.value)} ` +
      `zone=${keyName(control.zoneLow.value)}-${keyName(control.zoneHigh.value)} ` +
      `velocity=${velocitySwitchText(control.velocitySwitch)} volume=${control.volume}`
    )
  })
  return lines.join('\n')
}

export function formatMulti(patch: MultiPatch): string {
  const { common } = patch
  const lines = [`${common.name.trimEnd()}  volume=${common.volume}`]
  patch.sections.forEach((section, i) => {
    const muted = common.sectionMutes[i] ? ' (muted)' : ''
    lines.push(
      `${i + 1}${muted}: single ${section.instrument} ` +
      `${keyName(section.zoneLow.value)}-${keyName(section.zoneHigh.value)} ` +
      `ch=${section.receiveChannel} volume=${section.volume} pan=${signed(section.pan.value)}`
    )
  })
  return lines.join('\n')
}

/**
 * One-line summary of a dump, then one line per patch for block dumps.
 */
export function formatDump(dump: Dump): string {
  switch (dump.kind) {
    case 'oneSingle':
      return `single ${dump.bank}${toneName(dump.tone)} ${dump.patch.common.name.trimEnd()}`
    case 'blockSingle':
      return [
        `block single ${dump.bank}: ${dump.patches.length} patches`,
        ...dump.patches.map(({ tone, patch }) => `${dump.bank}${toneName(tone)} ${patch.common.name.trimEnd()}`)
      ].join('\n')
    case 'oneMulti':
      return `multi ${dump.number.value + 1} ${dump.patch.common.name.trimEnd()}`
    case 'blockMulti':
      return [
        `block multi: ${dump.patches.length} patches`,
        ...dump.patches.toArray().map((patch, i) => `${i + 1} ${patch.common.name.trimEnd()}`)
      ].join('\n')
    case 'drumKit':
      return `drum kit: ${dump.data.length} bytes`
    case 'oneDrumInstrument':
      return `drum instrument ${dump.number}: ${dump.data.length} bytes`
    case 'blockDrumInstrument':
      return `block drum instrument: ${dump.data.length} bytes`
  }
}
