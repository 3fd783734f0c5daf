// =============================================================================
// ksynth - Patch Names
// =============================================================================

import { InvalidTextError } from './errors'

/** Branded type for names validated against a field width */
declare const PatchNameBrand: unique symbol
export type PatchName = string & { readonly [PatchNameBrand]: never }

/** Index of the first character outside 20h-7Eh, or -1 */
function firstUnprintable(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i)
    if (code < 0x20 || code > 0x7E) {
      return i
    }
  }
  return -1
}

function isPatchText(text: string): text is PatchName {
  return firstUnprintable(text) < 0
}

/**
 * Validate a name for a field of `width` characters, padding it with spaces.
 *
 * @throws InvalidTextError for non-ASCII text or text longer than `width`
 */
export function patchName(text: string, width: number): PatchName {
  if (text.length > width) {
    throw new InvalidTextError(text, `longer than ${width} characters`)
  }
  const padded = text.padEnd(width, ' ')
  if (!isPatchText(padded)) {
    throw new InvalidTextError(text, `character ${firstUnprintable(padded)} is not printable ASCII`)
  }
  return padded
}

/**
 * Read a name field. NUL bytes read as spaces.
 */
export function decodeName(bytes: Uint8Array, width: number): PatchName {
  const text = Array.from(bytes.subarray(0, width), byte => String.fromCharCode(byte === 0x00 ? 0x20 : byte)).join('')
  if (!isPatchText(text)) {
    const at = firstUnprintable(text)
    throw new InvalidTextError(text.slice(0, at), `byte 0x${text.charCodeAt(at).toString(16)} at ${at} is not printable ASCII`)
  }
  return text
}

export function encodeName(name: PatchName): Uint8Array {
  const bytes = new Uint8Array(name.length)
  for (let i = 0; i < name.length; i++) {
    bytes[i] = name.charCodeAt(i)
  }
  return bytes
}
