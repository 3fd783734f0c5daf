/**
 * @ksynth/k4 - Text Rendering Tests
 */

import { BoundedValue, decode, unwrap } from '@ksynth/core'
import { K4 } from '../categories'
import { formatBank, formatEffect, formatMulti, formatSingle, keyName, slotName } from '../format'
import { effectPatchCodec } from '../effect'
import { multiPatchCodec } from '../multi'
import { singlePatchCodec } from '../single'
import { bank } from '../bank'
import { rawEffect, rawMulti, rawSingle } from './fixtures'

describe('slotName', () => {
  it('names the first and last slots', () => {
    expect(slotName(BoundedValue.fromInteger(K4.patchNumber, 0))).toBe('A-1')
    expect(slotName(BoundedValue.fromInteger(K4.patchNumber, 17))).toBe('B-2')
    expect(slotName(BoundedValue.fromInteger(K4.patchNumber, 63))).toBe('D-16')
  })
})

describe('keyName', () => {
  it('puts middle C in octave 4', () => {
    expect(keyName(60)).toBe('C4')
    expect(keyName(0)).toBe('C-1')
    expect(keyName(127)).toBe('G9')
  })
})

describe('formatSingle', () => {
  it('lists the header and four sources of a twin patch', () => {
    const lines = formatSingle(unwrap(decode(singlePatchCodec, rawSingle()))).split('\n')
    expect(lines).toEqual([
      'Melo Vox 1  volume=100 effect=6 submix=C',
      'mode=twin polyphony=solo1 am1>2=true am3>4=false',
      'bender=7 wheel=lfo +10',
      'S1: wave 256 LOOP 12 coarse=0 fine=0 level=80',
      'S2 (muted): wave 1 SIN 1ST coarse=0 fine=0 level=75',
      'S3: wave 1 SIN 1ST coarse=0 fine=0 level=75',
      'S4: wave 1 SIN 1ST coarse=0 fine=0 level=75'
    ])
  })
})

describe('formatMulti', () => {
  it('lists each section', () => {
    const lines = formatMulti(unwrap(decode(multiPatchCodec, rawMulti()))).split('\n')
    expect(lines).toHaveLength(9)
    expect(lines[0]).toBe('Split Pad  volume=90 effect=4')
    expect(lines[1]).toBe('1 (muted): A-6 C2-B3 ch=3 midi')
    expect(lines[2]).toBe('2: A-2 C-1-G9 ch=1 keyboard')
  })
})

describe('formatEffect', () => {
  it('labels the parameters', () => {
    expect(formatEffect(unwrap(decode(effectPatchCodec, rawEffect()))))
      .toBe('Reverb 1, Pre.delay = 3, Rev.Time = -2, Tone = 20')
  })
})

describe('formatBank', () => {
  it('lists singles then multis', () => {
    const lines = formatBank(bank()).split('\n')
    expect(lines).toHaveLength(128)
    expect(lines[0]).toBe('A-1 NewSound')
    expect(lines[63]).toBe('D-16 NewSound')
    expect(lines[64]).toBe('a-1 NewMulti')
  })
})
