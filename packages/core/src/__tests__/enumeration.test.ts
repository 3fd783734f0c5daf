/**
 * @ksynth/core - Enumeration Tests
 */

import { codedEnumeration, enumeration } from '../enumeration'
import { InvalidDiscriminantError } from '../errors'

describe('enumeration', () => {
  const mode = enumeration('test.mode', ['normal', 'twin', 'double'] as const)

  it('decodes by position', () => {
    expect(mode.decode(0)).toBe('normal')
    expect(mode.decode(2)).toBe('double')
  })

  it('encodes by position', () => {
    expect(mode.encode('twin')).toBe(1)
  })

  it('rejects unknown codes', () => {
    expect(() => mode.decode(3)).toThrow(InvalidDiscriminantError)
  })

  it('names the field and raw byte', () => {
    try {
      mode.decode(9)
      throw new Error('expected failure')
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidDiscriminantError)
      if (error instanceof InvalidDiscriminantError) {
        expect(error.field).toBe('test.mode')
        expect(error.rawByte).toBe(9)
        expect(error.message).toBe('test.mode: no variant for raw value 0x09')
      }
    }
  })
})

describe('codedEnumeration', () => {
  const kind = codedEnumeration('test.kind', { single: 0x00, drumKit: 0x10, multi: 0x20 })

  it('decodes sparse codes', () => {
    expect(kind.decode(0x10)).toBe('drumKit')
    expect(kind.decode(0x20)).toBe('multi')
  })

  it('encodes sparse codes', () => {
    expect(kind.encode('multi')).toBe(0x20)
  })

  it('lists its names', () => {
    expect(kind.names).toEqual(['single', 'drumKit', 'multi'])
  })

  it('rejects codes in the gaps', () => {
    expect(() => kind.decode(0x01)).toThrow(InvalidDiscriminantError)
  })
})
