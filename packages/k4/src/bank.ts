// =============================================================================
// ksynth - K4 Bank
// =============================================================================

import { FixedList, concatBytes, decodeAt, decodeSequence, encodeSequence, expectOffset, requireLength } from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { singlePatch, singlePatchCodec } from './single'
import type { SinglePatch } from './single'
import { multiPatch, multiPatchCodec } from './multi'
import type { MultiPatch } from './multi'
import { drumPatch, drumPatchCodec } from './drum'
import type { DrumPatch } from './drum'
import { effectPatch, effectPatchCodec } from './effect'
import type { EffectPatch } from './effect'

export const SINGLE_COUNT = 64
export const MULTI_COUNT = 64
export const EFFECT_COUNT = 32

/**
 * Complete memory image: 64 singles, 64 multis, the drum and 32 effects.
 */
export interface Bank {
  readonly singles: FixedList<SinglePatch>
  readonly multis: FixedList<MultiPatch>
  readonly drum: DrumPatch
  readonly effects: FixedList<EffectPatch>
}

/** Start of each section in a bank image */
export const BANK_OFFSETS = {
  singles: 0,
  multis: SINGLE_COUNT * singlePatchCodec.size,
  drum: SINGLE_COUNT * singlePatchCodec.size + MULTI_COUNT * multiPatchCodec.size,
  effects: SINGLE_COUNT * singlePatchCodec.size + MULTI_COUNT * multiPatchCodec.size + drumPatchCodec.size
} as const

export const BANK_SIZE = BANK_OFFSETS.effects + EFFECT_COUNT * effectPatchCodec.size

/**
 * Byte offset of a single patch (0~63) in a bank image.
 * Patches can be decoded independently from these offsets.
 */
export function singleOffset(index: number): number {
  return BANK_OFFSETS.singles + index * singlePatchCodec.size
}

export function multiOffset(index: number): number {
  return BANK_OFFSETS.multis + index * multiPatchCodec.size
}

export function effectOffset(index: number): number {
  return BANK_OFFSETS.effects + index * effectPatchCodec.size
}

export function bank(overrides: Partial<Bank> = {}): Bank {
  return {
    singles: FixedList.filled(SINGLE_COUNT, () => singlePatch(), 'k4.bank.singles'),
    multis: FixedList.filled(MULTI_COUNT, () => multiPatch(), 'k4.bank.multis'),
    drum: drumPatch(),
    effects: FixedList.filled(EFFECT_COUNT, () => effectPatch(), 'k4.bank.effects'),
    ...overrides
  }
}

export const bankCodec: Codec<Bank> = {
  name: 'k4.bank',
  size: BANK_SIZE,
  decode(bytes, context) {
    requireLength(bytes, BANK_SIZE, this.name)

    const singles = decodeSequence(singlePatchCodec, bytes, BANK_OFFSETS.singles, SINGLE_COUNT, context)
    expectOffset('k4.bank singles', BANK_OFFSETS.multis, singles.end)

    const multis = decodeSequence(multiPatchCodec, bytes, singles.end, MULTI_COUNT, context)
    expectOffset('k4.bank multis', BANK_OFFSETS.drum, multis.end)

    const drum = decodeAt(drumPatchCodec, bytes, multis.end, context)
    const drumEnd = multis.end + drumPatchCodec.size
    expectOffset('k4.bank drum', BANK_OFFSETS.effects, drumEnd)

    const effects = decodeSequence(effectPatchCodec, bytes, drumEnd, EFFECT_COUNT, context)
    expectOffset(this.name, BANK_SIZE, effects.end)

    return {
      singles: FixedList.of(singles.items, SINGLE_COUNT, 'k4.bank.singles'),
      multis: FixedList.of(multis.items, MULTI_COUNT, 'k4.bank.multis'),
      drum,
      effects: FixedList.of(effects.items, EFFECT_COUNT, 'k4.bank.effects')
    }
  },
  encode(b) {
    return concatBytes([
      encodeSequence(singlePatchCodec, b.singles),
      encodeSequence(multiPatchCodec, b.multis),
      drumPatchCodec.encode(b.drum),
      encodeSequence(effectPatchCodec, b.effects)
    ])
  }
}
