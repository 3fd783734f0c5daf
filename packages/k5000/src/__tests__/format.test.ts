/**
 * @ksynth/k5000 - Text Rendering Tests
 */

import { BoundedValue, decode, unwrap, attempt } from '@ksynth/core'
import { K5000 } from '../categories'
import { formatDump, formatEffect, formatMulti, formatSingle, keyName, toneName } from '../format'
import { multiPatchCodec } from '../multi'
import { singlePatchCodec } from '../single'
import { ADD_OSCILLATOR, PCM_OSCILLATOR, rawMulti, rawSingle } from './fixtures'

const single = unwrap(attempt(context => singlePatchCodec.decode(rawSingle([PCM_OSCILLATOR, ADD_OSCILLATOR]), context)))

describe('names', () => {
  it('numbers tones from 001', () => {
    expect(toneName(BoundedValue.fromInteger(K5000.tone, 0))).toBe('001')
    expect(toneName(BoundedValue.fromInteger(K5000.tone, 127))).toBe('128')
  })

  it('names keys with middle C as C4', () => {
    expect(keyName(60)).toBe('C4')
    expect(keyName(24)).toBe('C1')
    expect(keyName(61)).toBe('C#4')
  })
})

describe('formatEffect', () => {
  it('lists every parameter label with its value', () => {
    expect(formatEffect(single.common.effects.reverb)).toBe(
      'Room 1 depth=20 Dry/Wet 2=10 Reverb Time=64 Predelay Time=30 High Frequency Damping=40'
    )
  })

  it('leaves out unused parameters', () => {
    expect(formatEffect(single.common.effects.effects[0])).toBe(
      'Early Reflection 1 depth=50 Slope=1 Predelay Time=2 Feedback=3'
    )
  })
})

describe('formatSingle', () => {
  it('renders the common line and one line per source', () => {
    expect(formatSingle(single).split('\n')).toEqual([
      'Glassy  volume=110 sources=2 polyphony=solo1 am=am1to2 portamento=50',
      'S1: PCM 300 coarse=+12 fine=-5 zone=C1-C8 velocity=soft<64 volume=120',
      'S2 (muted): ADD coarse=0 fine=0 zone=C1-C8 velocity=soft<64 volume=120'
    ])
  })
})

describe('formatMulti', () => {
  it('renders each section', () => {
    const multi = unwrap(decode(multiPatchCodec, rawMulti()))
    expect(formatMulti(multi).split('\n')).toEqual([
      'Layers  volume=100',
      '1: single 5 C-1-G9 ch=1 volume=100 pan=+20',
      '2: single 300 C2-C4 ch=16 volume=90 pan=0',
      '3 (muted): single 0 C-1-G9 ch=1 volume=100 pan=0',
      '4: single 0 C-1-G9 ch=1 volume=100 pan=0'
    ])
  })
})

describe('formatDump', () => {
  it('summarises a one-single dump', () => {
    expect(formatDump({ kind: 'oneSingle', bank: 'D', tone: BoundedValue.fromInteger(K5000.tone, 5), patch: single }))
      .toBe('single D006 Glassy')
  })

  it('sizes raw drum data', () => {
    expect(formatDump({ kind: 'drumKit', data: new Uint8Array(40) })).toBe('drum kit: 40 bytes')
  })
})
