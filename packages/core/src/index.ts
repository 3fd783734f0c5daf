/**
 * @ksynth/core
 *
 * Shared machinery for the Kawai SysEx patch codecs: bounded values,
 * checksums, bit fields, byte interleaving and header classification.
 */

// --- Errors ---
export {
  SysexError,
  OutOfRangeError,
  InvalidDiscriminantError,
  TooShortError,
  InvalidTextError,
  ChecksumMismatchError,
  UnidentifiedError,
  OffsetMismatchError,
  DuplicateEntryError,
  unwrap
} from './errors'
export type { SysexErrorKind, Result } from './errors'

// --- Values ---
export { BoundedValue, category, bounded, fromWire } from './bounded'
export type { BiasRule, Category } from './bounded'
export { enumeration, codedEnumeration } from './enumeration'
export type { Enumeration } from './enumeration'
export { patchName, decodeName, encodeName } from './text'
export type { PatchName } from './text'

// --- Byte Layout ---
export { checksum, appendChecksum, prependChecksum } from './checksum'
export { getBits, setBits, getBit, setBit, packBits } from './bits'
export { gather, scatter, deinterleave, interleave } from './stride'
export { pairOf, quadOf, octetOf, FixedList } from './tuples'
export type { Pair, Quad, Octet } from './tuples'

// --- Codecs ---
export {
  DecodeContext,
  requireLength,
  decodeAt,
  concatBytes,
  attempt,
  decode
} from './codec'
export type { Codec, ChecksumPolicy, Logger, DecodeOptions } from './codec'
export { decodeSequence, encodeSequence, expectOffset } from './sequence'
export type { Sequence } from './sequence'

// --- Dispatch ---
export { exact, range, any, classify, findOverlaps } from './dispatch'
export type { Locality, BytePattern, DispatchRule, Classification } from './dispatch'
