// =============================================================================
// ksynth - Block Checksum
// =============================================================================

/**
 * Additive checksum shared by both dialects:
 * (sum of body bytes + 0xA5) mod 128.
 */
export function checksum(body: Uint8Array): number {
  let total = 0xA5
  for (const byte of body) {
    total += byte
  }
  return total & 0x7F
}

/**
 * Body followed by its checksum byte.
 */
export function appendChecksum(body: Uint8Array): Uint8Array {
  const block = new Uint8Array(body.length + 1)
  block.set(body)
  block[body.length] = checksum(body)
  return block
}

/**
 * Checksum byte followed by the body.
 */
export function prependChecksum(body: Uint8Array): Uint8Array {
  const block = new Uint8Array(body.length + 1)
  block[0] = checksum(body)
  block.set(body, 1)
  return block
}
