/**
 * @ksynth/k4 - Bank Tests
 */

import { DecodeContext, FixedList, decode, patchName, unwrap } from '@ksynth/core'
import { BANK_OFFSETS, BANK_SIZE, bank, bankCodec, effectOffset, singleOffset } from '../bank'
import { SINGLE_NAME_LENGTH, singlePatch, singlePatchCodec } from '../single'
import { effectPatch, effectPatchCodec } from '../effect'

describe('bankCodec', () => {
  const singles = Array.from({ length: 64 }, (_, i) =>
    singlePatch({ name: patchName(`Single ${i}`, SINGLE_NAME_LENGTH) })
  )
  const effects = Array.from({ length: 32 }, (_, i) =>
    effectPatch({ type: i % 2 === 0 ? 'chorus' : 'reverb2' })
  )
  const built = bank({
    singles: FixedList.of(singles, 64, 'k4.bank.singles'),
    effects: FixedList.of(effects, 32, 'k4.bank.effects')
  })
  const bytes = bankCodec.encode(built)

  it('lays out sections at fixed offsets', () => {
    expect(BANK_SIZE).toBe(15114)
    expect(BANK_OFFSETS.multis).toBe(8384)
    expect(BANK_OFFSETS.drum).toBe(13312)
    expect(BANK_OFFSETS.effects).toBe(13994)
    expect(bytes.length).toBe(BANK_SIZE)
  })

  it('decodes the counts of every section', () => {
    const decoded = unwrap(decode(bankCodec, bytes))
    expect(decoded.singles).toHaveLength(64)
    expect(decoded.multis).toHaveLength(64)
    expect(decoded.effects).toHaveLength(32)
    expect(decoded.drum.notes).toHaveLength(61)
  })

  it('round-trips', () => {
    expect(unwrap(decode(bankCodec, bytes))).toEqual(built)
  })

  it('lets a single be decoded on its own from its offset', () => {
    const context = new DecodeContext()
    const patch = singlePatchCodec.decode(bytes.subarray(singleOffset(42), singleOffset(43)), context)
    expect(patch.name).toBe('Single 42 ')
  })

  it('lets an effect be decoded on its own from its offset', () => {
    const context = new DecodeContext()
    const patch = effectPatchCodec.decode(bytes.subarray(effectOffset(31)), context)
    expect(patch.type).toBe('reverb2')
  })

  it('fails on a truncated bank', () => {
    const result = decode(bankCodec, bytes.subarray(0, BANK_SIZE - 1))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('too-short')
    }
  })

  it('encodes a bank after replacing one single', () => {
    const updated = { ...built, singles: built.singles.with(5, singlePatch({ name: patchName('Changed', SINGLE_NAME_LENGTH) })) }
    const encoded = bankCodec.encode(updated)
    expect(encoded.length).toBe(BANK_SIZE)
    expect(unwrap(decode(bankCodec, encoded)).singles.at(5).name).toBe('Changed   ')
  })

  it('checks the single count when the list is built', () => {
    expect(() => FixedList.of(singles.slice(0, 63), 64, 'k4.bank.singles'))
      .toThrow('k4.bank.singles count: 63 is outside 64..64')
  })

  describe('checksum policy', () => {
    const corrupted = Uint8Array.from(bytes)
    const at = singleOffset(1) + 130
    corrupted[at] = (corrupted[at] + 1) % 128

    it('collects the mismatch silently under ignore', () => {
      const warn = jest.fn()
      const result = decode(bankCodec, corrupted, { checksum: 'ignore', logger: { warn, debug: jest.fn() } })
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.warnings).toHaveLength(1)
        expect(result.value.singles.at(1).name).toBe('Single 1  ')
      }
      expect(warn).not.toHaveBeenCalled()
    })

    it('logs the mismatch under warn', () => {
      const warn = jest.fn()
      const result = decode(bankCodec, corrupted, { logger: { warn, debug: jest.fn() } })
      expect(result.ok).toBe(true)
      expect(warn).toHaveBeenCalledTimes(1)
      expect(warn.mock.calls[0][0]).toMatch(/^\[ksynth\] k4\.single: checksum/)
    })

    it('fails under strict', () => {
      const result = decode(bankCodec, corrupted, { checksum: 'strict' })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.kind).toBe('checksum-mismatch')
      }
    })
  })
})
