/**
 * @ksynth/k5000 - Multi Patch Tests
 */

import { BoundedValue, InvalidDiscriminantError, decode, unwrap } from '@ksynth/core'
import { K5000 } from '../categories'
import { multiPatch, multiPatchCodec, section } from '../multi'
import { rawMulti } from './fixtures'

describe('multiPatchCodec', () => {
  const patch = unwrap(decode(multiPatchCodec, rawMulti(), { checksum: 'strict' }))

  it('reads the common block', () => {
    expect(patch.common.name).toBe('Layers  ')
    expect(patch.common.volume.value).toBe(100)
    expect(patch.common.sectionMutes).toEqual([false, false, true, false])
    expect(patch.common.effects.reverb.type).toBe('room1')
    expect(patch.common.geq.at(0).value).toBe(-6)
    expect(patch.common.effectControl[0].destination).toBe('effect1Parameter')
  })

  it('reads the first section', () => {
    const [first] = patch.sections
    expect(first.instrument.value).toBe(5)
    expect(first.volume.value).toBe(100)
    expect(first.pan.value).toBe(20)
    expect(first.effectPath.value).toBe(2)
    expect(first.transpose.value).toBe(12)
    expect(first.tune.value).toBe(-3)
    expect(first.velocitySwitch.type).toBe('soft')
    expect(first.velocitySwitch.threshold.value).toBe(15)
    expect(first.receiveChannel.value).toBe(1)
  })

  it('joins the instrument number bytes', () => {
    const second = patch.sections[1]
    expect(second.instrument.value).toBe(300)
    expect(second.zoneLow.value).toBe(36)
    expect(second.zoneHigh.value).toBe(60)
    expect(second.velocitySwitch.type).toBe('loud')
    expect(second.receiveChannel.value).toBe(16)
  })

  it('reproduces the raw bytes', () => {
    expect(Array.from(multiPatchCodec.encode(patch))).toEqual(Array.from(rawMulti()))
  })

  it('round-trips a constructed multi', () => {
    const built = multiPatch({
      sections: [
        section({ instrument: BoundedValue.fromInteger(K5000.instrument, 1023) }),
        section({ transpose: BoundedValue.fromInteger(K5000.transpose, -24) }),
        section({ velocitySwitch: { type: 'soft', threshold: BoundedValue.fromInteger(K5000.velocityThreshold, 31) } }),
        section({ receiveChannel: BoundedValue.fromInteger(K5000.channel, 10) })
      ]
    })
    expect(unwrap(decode(multiPatchCodec, multiPatchCodec.encode(built)))).toEqual(built)
  })

  it('rejects an unused velocity switch type', () => {
    const raw = rawMulti()
    raw[55 + 9] = 0x60
    const result = decode(multiPatchCodec, raw, { checksum: 'ignore' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidDiscriminantError)
      expect(result.error.message).toBe('k5000.velocitySwitch.type: no variant for raw value 0x03')
    }
  })
})
