// =============================================================================
// ksynth - Byte Interleaving
// =============================================================================
//
// Parallel sub-blocks are sometimes stored byte-multiplexed: with four sources
// of seven bytes, byte k of source i sits at `k * 4 + i`. Every de-interleave
// and re-interleave in the codecs goes through gather/scatter below.

/**
 * Collect `count` bytes from `bytes`, starting at `start` and stepping by `stride`.
 *
 * @example
 * ```typescript
 * gather(Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8), 4, 1, 2) // [2, 6]
 * ```
 */
export function gather(bytes: Uint8Array, stride: number, start: number, count: number): Uint8Array {
  const result = new Uint8Array(count)
  for (let i = 0; i < count; i++) {
    result[i] = bytes[start + i * stride]
  }
  return result
}

/**
 * Inverse of `gather`: write `source` into `target` at `start`, `start + stride`, ...
 */
export function scatter(target: Uint8Array, source: Uint8Array, stride: number, start: number): void {
  for (let i = 0; i < source.length; i++) {
    target[start + i * stride] = source[i]
  }
}

/**
 * Split `ways * blockSize` interleaved bytes into `ways` blocks.
 */
export function deinterleave(bytes: Uint8Array, ways: number, blockSize: number): Uint8Array[] {
  const blocks: Uint8Array[] = []
  for (let i = 0; i < ways; i++) {
    blocks.push(gather(bytes, ways, i, blockSize))
  }
  return blocks
}

/**
 * Interleave equally sized blocks.
 */
export function interleave(blocks: readonly Uint8Array[]): Uint8Array {
  const blockSize = blocks.length > 0 ? blocks[0].length : 0
  const result = new Uint8Array(blocks.length * blockSize)
  blocks.forEach((block, i) => {
    if (block.length !== blockSize) {
      throw new Error(`interleave: block ${i} has ${block.length} bytes, expected ${blockSize}`)
    }
    scatter(result, block, blocks.length, i)
  })
  return result
}
