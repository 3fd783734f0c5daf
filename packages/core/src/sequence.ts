// =============================================================================
// ksynth - Block Sequences
// =============================================================================

import { OffsetMismatchError, TooShortError } from './errors'
import { concatBytes, decodeAt } from './codec'
import type { Codec, DecodeContext } from './codec'

export interface Sequence<T> {
  readonly items: T[]
  /** Offset just past the last block */
  readonly end: number
}

/**
 * Decode `count` consecutive `codec` blocks starting at `offset`.
 *
 * @throws TooShortError if the buffer ends before the last block
 * @throws OffsetMismatchError if the blocks did not consume `count * codec.size` bytes
 */
export function decodeSequence<T>(
  codec: Codec<T>,
  bytes: Uint8Array,
  offset: number,
  count: number,
  context: DecodeContext
): Sequence<T> {
  const expectedEnd = offset + count * codec.size
  if (bytes.length < expectedEnd) {
    throw new TooShortError(expectedEnd, bytes.length, `${count} x ${codec.name}`)
  }

  const items: T[] = []
  let position = offset
  for (let i = 0; i < count; i++) {
    items.push(decodeAt(codec, bytes, position, context))
    position += codec.size
  }
  context.trace(`${count} x ${codec.name} at ${offset}..${position}`)

  expectOffset(`${count} x ${codec.name}`, expectedEnd, position)
  return { items, end: position }
}

export function encodeSequence<T>(codec: Codec<T>, items: Iterable<T>): Uint8Array {
  return concatBytes(Array.from(items, item => codec.encode(item)))
}

/**
 * @throws OffsetMismatchError when `actual` differs from `expected`
 */
export function expectOffset(block: string, expected: number, actual: number): void {
  if (expected !== actual) {
    throw new OffsetMismatchError(block, expected, actual)
  }
}
