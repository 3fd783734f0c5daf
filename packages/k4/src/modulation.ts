// =============================================================================
// ksynth - K4 Modulation Blocks
// =============================================================================
//
// Level and time modulation share one layout between the amplifier and the
// filter: three depths, each -50~+50.

import { BoundedValue, fromWire, requireLength } from '@ksynth/core'
import type { Codec } from '@ksynth/core'
import { K4 } from './categories'
import type { Depth } from './categories'

export interface LevelModulation {
  readonly velocityDepth: Depth
  readonly pressureDepth: Depth
  readonly keyScalingDepth: Depth
}

export interface TimeModulation {
  readonly attackVelocity: Depth
  readonly releaseVelocity: Depth
  readonly keyScaling: Depth
}

export function defaultLevelModulation(): LevelModulation {
  return {
    velocityDepth: BoundedValue.zero(K4.depth),
    pressureDepth: BoundedValue.zero(K4.depth),
    keyScalingDepth: BoundedValue.zero(K4.depth)
  }
}

export function defaultTimeModulation(): TimeModulation {
  return {
    attackVelocity: BoundedValue.zero(K4.depth),
    releaseVelocity: BoundedValue.zero(K4.depth),
    keyScaling: BoundedValue.zero(K4.depth)
  }
}

export const levelModulation: Codec<LevelModulation> = {
  name: 'k4.levelModulation',
  size: 3,
  decode(bytes) {
    requireLength(bytes, 3, this.name)
    return {
      velocityDepth: fromWire(K4.depth, bytes[0]),
      pressureDepth: fromWire(K4.depth, bytes[1]),
      keyScalingDepth: fromWire(K4.depth, bytes[2])
    }
  },
  encode(m) {
    return Uint8Array.of(
      m.velocityDepth.toWireByte(),
      m.pressureDepth.toWireByte(),
      m.keyScalingDepth.toWireByte()
    )
  }
}

export const timeModulation: Codec<TimeModulation> = {
  name: 'k4.timeModulation',
  size: 3,
  decode(bytes) {
    requireLength(bytes, 3, this.name)
    return {
      attackVelocity: fromWire(K4.depth, bytes[0]),
      releaseVelocity: fromWire(K4.depth, bytes[1]),
      keyScaling: fromWire(K4.depth, bytes[2])
    }
  },
  encode(m) {
    return Uint8Array.of(
      m.attackVelocity.toWireByte(),
      m.releaseVelocity.toWireByte(),
      m.keyScaling.toWireByte()
    )
  }
}
