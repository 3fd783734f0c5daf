/**
 * @ksynth/k4 - Dump Header Tests
 */

import { BoundedValue, FixedList, findOverlaps } from '@ksynth/core'
import { K4 } from '../categories'
import { DUMP_RULES, decodeDump, encodeDump, identify } from '../sysex'
import { multiPatch } from '../multi'
import { drumPatch } from '../drum'
import { effectPatch } from '../effect'
import { rawSingle } from './fixtures'

const singleHeader = [0x00, 0x20, 0x00, 0x04, 0x00, 0x05]

describe('DUMP_RULES', () => {
  it('never match the same header twice', () => {
    expect(findOverlaps(DUMP_RULES)).toEqual([])
  })
})

describe('identify', () => {
  it('tells singles from multis by substatus 2', () => {
    const single = identify(Uint8Array.from([0x00, 0x20, 0x00, 0x04, 0x00, 0x3F]))
    const multi = identify(Uint8Array.from([0x00, 0x20, 0x00, 0x04, 0x00, 0x45]))
    expect(single.kind).toBe('oneSingle')
    expect(multi.kind).toBe('oneMulti')
    expect(multi.captures.number).toBe(0x45)
    expect(multi.payloadStart).toBe(6)
  })

  it('tells effects from the drum', () => {
    expect(identify(Uint8Array.from([0x00, 0x20, 0x00, 0x04, 0x03, 0x1F])).kind).toBe('oneEffect')
    expect(identify(Uint8Array.from([0x00, 0x20, 0x00, 0x04, 0x03, 0x20])).kind).toBe('drum')
  })

  it('reads the memory from substatus 1', () => {
    expect(identify(Uint8Array.from([0x00, 0x22, 0x00, 0x04, 0x00, 0x00])).locality).toBe('internal')
    expect(identify(Uint8Array.from([0x00, 0x22, 0x00, 0x04, 0x02, 0x00])).locality).toBe('external')
  })

  it('throws for an unknown header', () => {
    expect(() => identify(Uint8Array.from([0x00, 0x20, 0x00, 0x04, 0x01, 0x40]))).toThrow('matches no dump kind')
  })
})

describe('decodeDump', () => {
  it('decodes a one-single dump', () => {
    const result = decodeDump(Uint8Array.from([...singleHeader, ...rawSingle()]))
    expect(result.ok).toBe(true)
    if (result.ok) {
      const { header, dump } = result.value
      expect(header.channel.value).toBe(1)
      expect(header.function).toBe('onePatchDataDump')
      expect(dump.kind).toBe('oneSingle')
      if (dump.kind === 'oneSingle') {
        expect(dump.number.value).toBe(5)
        expect(dump.patch.name).toBe('Melo Vox 1')
      }
    }
  })

  it('fails on a truncated payload', () => {
    const result = decodeDump(Uint8Array.from([...singleHeader, ...rawSingle().subarray(0, 100)]))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('too-short')
    }
  })

  it('treats a channel byte past 0Fh as an unknown header', () => {
    const result = decodeDump(Uint8Array.from([0x10, ...singleHeader.slice(1), ...rawSingle()]))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('unidentified')
    }
  })

  it('fails on an unknown header', () => {
    const result = decodeDump(Uint8Array.from([0x00, 0x22, 0x00, 0x04, 0x01, 0x00]))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('unidentified')
    }
  })
})

describe('encodeDump', () => {
  it('offsets multi numbers by 64', () => {
    const bytes = encodeDump(
      {
        kind: 'oneMulti',
        locality: 'external',
        number: BoundedValue.fromInteger(K4.patchNumber, 5),
        patch: multiPatch()
      },
      BoundedValue.fromInteger(K4.channel, 3)
    )
    expect(Array.from(bytes.subarray(0, 6))).toEqual([0x02, 0x20, 0x00, 0x04, 0x02, 0x45])
    expect(bytes.length).toBe(6 + 77)
  })

  it('round-trips a multi dump', () => {
    const dump = {
      kind: 'oneMulti',
      locality: 'internal',
      number: BoundedValue.fromInteger(K4.patchNumber, 63),
      patch: multiPatch()
    } as const
    const result = decodeDump(encodeDump(dump))
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.dump).toEqual(dump)
    }
  })

  it('writes the drum to effect memory', () => {
    const bytes = encodeDump({ kind: 'drum', locality: 'internal', patch: drumPatch() })
    expect(Array.from(bytes.subarray(0, 6))).toEqual([0x00, 0x20, 0x00, 0x04, 0x01, 0x20])
    expect(bytes.length).toBe(6 + 682)
  })

  it('writes a block of effects', () => {
    const patches = FixedList.filled(32, () => effectPatch(), 'k4.blockEffect.patches')
    const bytes = encodeDump({ kind: 'blockEffect', locality: 'external', patches })
    expect(Array.from(bytes.subarray(0, 6))).toEqual([0x00, 0x21, 0x00, 0x04, 0x03, 0x00])
    const result = decodeDump(bytes)
    expect(result.ok && result.value.dump.kind).toBe('blockEffect')
  })
})
