/**
 * @ksynth/k5000 - Leaf Block Tests
 */

import { BoundedValue, DecodeContext, InvalidDiscriminantError, OutOfRangeError } from '@ksynth/core'
import { K5000 } from '../categories'
import { decodeVelocitySwitch, encodeVelocitySwitch, sourceControlCodec, thresholdVelocity } from '../control'
import { decodeWaveNumber, encodeWaveNumber, oscillatorCodec } from '../oscillator'
import { effectControlCodec, effectDefinitionCodec, effectName, effectParameterNames, geqCodec } from '../effect'
import { sourceCodec } from '../source'
import { EFFECT_CONTROL, SOURCE_CONTROL, rawSource } from './fixtures'

const context = new DecodeContext()

describe('wave numbers', () => {
  it('joins three high bits and seven low bits', () => {
    expect(decodeWaveNumber(0x02, 0x2C).value).toBe(300)
    expect(decodeWaveNumber(0x04, 0x00).value).toBe(512)
    expect(decodeWaveNumber(0x07, 0x7F).value).toBe(1023)
  })

  it('splits them again', () => {
    expect(encodeWaveNumber(BoundedValue.fromInteger(K5000.wave, 300))).toEqual([0x02, 0x2C])
    expect(encodeWaveNumber(BoundedValue.fromInteger(K5000.wave, 129))).toEqual([0x01, 0x01])
  })
})

describe('velocity switch', () => {
  it('maps threshold steps to velocities', () => {
    const step = (n: number) => BoundedValue.fromInteger(K5000.velocityThreshold, n)
    expect(thresholdVelocity(step(0))).toBe(4)
    expect(thresholdVelocity(step(30))).toBe(124)
    expect(thresholdVelocity(step(31))).toBe(127)
  })

  it('packs the type above the threshold', () => {
    const vs = decodeVelocitySwitch(0x2A)
    expect(vs.type).toBe('loud')
    expect(vs.threshold.value).toBe(10)
    expect(encodeVelocitySwitch(vs)).toBe(0x2A)
  })
})

describe('sourceControlCodec', () => {
  it('reproduces the raw bytes', () => {
    const control = sourceControlCodec.decode(Uint8Array.from(SOURCE_CONTROL), context)
    expect(Array.from(sourceControlCodec.encode(control))).toEqual(SOURCE_CONTROL)
  })

  it('rejects an unknown controller destination', () => {
    const raw = Uint8Array.from(SOURCE_CONTROL)
    raw[7] = 20
    expect(() => sourceControlCodec.decode(raw, context)).toThrow(InvalidDiscriminantError)
  })

  it('rejects a macro depth outside -31~+31', () => {
    const raw = Uint8Array.from(SOURCE_CONTROL)
    raw[8] = 0x60
    expect(() => sourceControlCodec.decode(raw, context)).toThrow('k5000.macroDepth: 32 is outside -31..31')
  })
})

describe('oscillatorCodec', () => {
  it('keeps coarse and fine biases apart', () => {
    const oscillator = oscillatorCodec.decode(Uint8Array.of(0, 10, 0, 127, 60, 3, 64, 0, 64, 0, 64, 64), context)
    expect(oscillator.coarse.value).toBe(-24)
    expect(oscillator.fine.value).toBe(63)
    expect(oscillator.fixedKey.value).toBe(60)
    expect(oscillator.keyScaling).toBe('cent50')
  })

  it('rejects a coarse tuning above +24', () => {
    expect(() => oscillatorCodec.decode(Uint8Array.of(0, 10, 49, 64, 0, 0, 64, 0, 64, 0, 64, 64), context))
      .toThrow(OutOfRangeError)
  })
})

describe('sourceCodec', () => {
  it('reproduces the raw bytes', () => {
    const raw = Uint8Array.from(rawSource())
    expect(Array.from(sourceCodec.encode(sourceCodec.decode(raw, context)))).toEqual(rawSource())
  })
})

describe('effects', () => {
  it('names effect types and their parameters', () => {
    expect(effectName('distortionAndDelay')).toBe('Distortion & Delay')
    expect(effectParameterNames('overdrive')).toEqual(['EQ Low', 'EQ High', 'Output Level', 'Drive'])
  })

  it('rejects an effect type past the table', () => {
    expect(() => effectDefinitionCodec.decode(Uint8Array.of(48, 0, 0, 0, 0, 0), context))
      .toThrow('k5000.effect.type: no variant for raw value 0x30')
  })

  it('rejects an effect depth above 100', () => {
    expect(() => effectDefinitionCodec.decode(Uint8Array.of(0, 101, 0, 0, 0, 0), context))
      .toThrow('k5000.effectDepth: 101 is outside 0..100')
  })

  it('reproduces the effect control bytes', () => {
    const control = effectControlCodec.decode(Uint8Array.from(EFFECT_CONTROL), context)
    expect(Array.from(effectControlCodec.encode(control))).toEqual(EFFECT_CONTROL)
  })

  it('rejects a graphic EQ band beyond +6', () => {
    expect(() => geqCodec.decode(Uint8Array.of(64, 64, 64, 71, 64, 64, 64), context)).toThrow(OutOfRangeError)
  })
})
