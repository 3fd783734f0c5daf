// =============================================================================
// ksynth - K4 Text Rendering
// =============================================================================

import type { PatchNumber, Submix } from './categories'
import { SUBMIX_NAMES } from './categories'
import { effectName, effectParameterNames } from './effect'
import type { EffectPatch } from './effect'
import type { MultiPatch } from './multi'
import type { SinglePatch } from './single'
import type { Bank } from './bank'
import { waveName } from './wave'

const NOTE_NAMES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B']

/**
 * Front panel slot name of a patch number: 0 -> "A-1", 63 -> "D-16".
 */
export function slotName(number: PatchNumber): string {
  return slotNameOf(number.value)
}

/**
 * Key name with middle C (60) as C4.
 */
export function keyName(key: number): string {
  return `${NOTE_NAMES[key % 12]}${Math.floor(key / 12) - 1}`
}

export function submixName(submix: Submix): string {
  return SUBMIX_NAMES[submix.value]
}

function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n)
}

export function formatSingle(patch: SinglePatch): string {
  const lines = [
    `${patch.name.trimEnd()}  volume=${patch.volume} effect=${patch.effect} submix=${submixName(patch.submix)}`,
    `mode=${patch.sourceMode} polyphony=${patch.polyphony} am1>2=${patch.am12} am3>4=${patch.am34}`,
    `bender=${patch.benderRange} wheel=${patch.wheelAssign} ${signed(patch.wheelDepth.value)}`
  ]
  const sourceCount = patch.sourceMode === 'normal' ? 2 : 4
  for (let i = 0; i < sourceCount; i++) {
    const s = patch.sources[i]
    const muted = patch.sourceMutes[i] ? ' (muted)' : ''
    lines.push(
      `S${i + 1}${muted}: wave ${s.wave} ${waveName(s.wave)} coarse=${signed(s.coarse.value)} ` +
      `fine=${signed(s.fine.value)} level=${patch.amplifiers[i].level}`
    )
  }
  return lines.join('\n')
}

export function formatMulti(patch: MultiPatch): string {
  const lines = [`${patch.name.trimEnd()}  volume=${patch.volume} effect=${patch.effect}`]
  patch.sections.forEach((section, i) => {
    const muted = section.muted ? ' (muted)' : ''
    lines.push(
      `${i + 1}${muted}: ${slotName(section.singleNumber)} ` +
      `${keyName(section.zoneLow.value)}-${keyName(section.zoneHigh.value)} ` +
      `ch=${section.receiveChannel} ${section.playMode}`
    )
  })
  return lines.join('\n')
}

export function formatEffect(patch: EffectPatch): string {
  const [p1, p2, p3] = effectParameterNames(patch.type)
  return `${effectName(patch.type)}, ${p1} = ${patch.parameter1}, ${p2} = ${patch.parameter2}, ${p3} = ${patch.parameter3}`
}

/**
 * One line per single and multi, with front panel slot names.
 */
export function formatBank(bank: Bank): string {
  return [
    ...bank.singles.toArray().map((patch, i) => `${slotNameOf(i)} ${patch.name.trimEnd()}`),
    ...bank.multis.toArray().map((patch, i) => `${slotNameOf(i).toLowerCase()} ${patch.name.trimEnd()}`)
  ].join('\n')
}

function slotNameOf(index: number): string {
  return `${'ABCD'[Math.floor(index / 16)]}-${(index % 16) + 1}`
}
