/**
 * @ksynth/k4 - Test Fixtures
 *
 * Raw blocks assembled byte by byte, independent of the encoders.
 */

export function sevenBitChecksum(body: ArrayLike<number>): number {
  let total = 0xA5
  for (let i = 0; i < body.length; i++) {
    total += body[i]
  }
  return total % 128
}

export function ascii(text: string): number[] {
  return Array.from(text, c => c.charCodeAt(0))
}

/** Interleave `blocks` into `target` from `start`: byte k of block i goes to start + k * n + i */
function weave(target: number[], start: number, blocks: number[][]): void {
  blocks.forEach((block, i) => {
    block.forEach((byte, k) => {
      target[start + k * blocks.length + i] = byte
    })
  })
}

export const SOURCE_1 = [0, 0x21, 0x7F, 0x58, 60, 50, 0x05]
export const SOURCE_N = [10, 0x00, 0x00, 0x18, 60, 50, 0x02]
export const AMPLIFIER_1 = [80, 0, 50, 100, 20, 50, 50, 50, 50, 50, 50]
export const AMPLIFIER_N = [75, 0, 50, 100, 20, 50, 50, 50, 50, 50, 50]
export const FILTER = [88, 0x0B, 50, 50, 50, 50, 50, 0, 50, 50, 20, 50, 50, 50]

/**
 * A 131-byte single patch named "Melo Vox 1" with volume 100.
 */
export function rawSingle(): Uint8Array {
  const body: number[] = new Array(130).fill(0)
  ascii('Melo Vox 1').forEach((c, i) => { body[i] = c })
  body[10] = 100
  body[11] = 0x05 // effect 6
  body[12] = 0x02 // submix C
  body[13] = 0x19 // twin, solo 1, AM 1>2
  body[14] = 0x2D // source 2 muted, vibrato square
  body[15] = 0x17 // bender 7, wheel -> LFO
  body[16] = 30
  body[17] = 60
  body.splice(18, 4, 10, 50, 50, 50)
  body[22] = 45
  body[23] = 55
  body.splice(24, 5, 3, 40, 20, 70, 50)
  body[29] = 50
  weave(body, 30, [SOURCE_1, SOURCE_N, SOURCE_N, SOURCE_N])
  weave(body, 58, [AMPLIFIER_1, AMPLIFIER_N, AMPLIFIER_N, AMPLIFIER_N])
  weave(body, 102, [FILTER, FILTER])
  return Uint8Array.from([...body, sevenBitChecksum(body)])
}

/**
 * A 35-byte effect patch: Reverb 1, parameters +3, -2, 20.
 */
export function rawEffect(type = 0x00): Uint8Array {
  const body = [type, 10, 5, 20, 0, 0, 0, 0, 0, 0]
  for (let i = 0; i < 8; i++) {
    body.push(7 + i - 4, 50, 100 - i)
  }
  return Uint8Array.from([...body, sevenBitChecksum(body)])
}

/**
 * A 77-byte multi patch named "Split Pad" whose first section is set up.
 */
export function rawMulti(): Uint8Array {
  const body = [...ascii('Split Pad '), 90, 0x03]
  body.push(5, 36, 59, 0x52, 0x0B, 90, 36, 40)
  for (let i = 1; i < 8; i++) {
    body.push(i, 0, 127, 0x00, 0x00, 80, 24, 50)
  }
  return Uint8Array.from([...body, sevenBitChecksum(body)])
}
