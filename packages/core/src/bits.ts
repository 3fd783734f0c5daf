// =============================================================================
// ksynth - Bit Fields
// =============================================================================

/**
 * Read `width` bits starting at bit `offset` (0 = least significant).
 */
export function getBits(byte: number, offset: number, width: number): number {
  return (byte >> offset) & ((1 << width) - 1)
}

/**
 * Replace `width` bits starting at `offset`, leaving the other bits alone.
 */
export function setBits(byte: number, offset: number, width: number, value: number): number {
  const mask = ((1 << width) - 1) << offset
  return (byte & ~mask) | ((value << offset) & mask)
}

export function getBit(byte: number, index: number): boolean {
  return ((byte >> index) & 1) === 1
}

export function setBit(byte: number, index: number, on: boolean): number {
  return on ? byte | (1 << index) : byte & ~(1 << index)
}

/**
 * Pack fields into one byte.
 * Each entry is `[offset, width, value]`; a boolean is a one-bit field.
 */
export function packBits(fields: ReadonlyArray<readonly [number, number, number | boolean]>): number {
  let byte = 0
  for (const [offset, width, value] of fields) {
    byte = setBits(byte, offset, width, typeof value === 'boolean' ? (value ? 1 : 0) : value)
  }
  return byte
}
