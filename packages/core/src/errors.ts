// =============================================================================
// ksynth - Decode Error Kinds
// =============================================================================

export type SysexErrorKind =
  | 'range'
  | 'invalid-discriminant'
  | 'too-short'
  | 'invalid-text'
  | 'checksum-mismatch'
  | 'unidentified'
  | 'offset-mismatch'
  | 'duplicate'

/**
 * Base class for every failure the codecs report.
 * Decoders throw these internally; public entry points turn them into `Result`s.
 */
export abstract class SysexError extends Error {
  abstract readonly kind: SysexErrorKind
}

/**
 * A value outside its category's range.
 */
export class OutOfRangeError extends SysexError {
  readonly kind = 'range'

  constructor(
    public readonly category: string,
    public readonly value: number,
    public readonly min: number,
    public readonly max: number
  ) {
    super(`${category}: ${value} is outside ${min}..${max}`)
    this.name = 'OutOfRangeError'
  }
}

/**
 * A raw byte that matches no variant of an enumerated field.
 */
export class InvalidDiscriminantError extends SysexError {
  readonly kind = 'invalid-discriminant'

  constructor(
    public readonly field: string,
    public readonly rawByte: number
  ) {
    super(`${field}: no variant for raw value 0x${hex(rawByte)}`)
    this.name = 'InvalidDiscriminantError'
  }
}

export class TooShortError extends SysexError {
  readonly kind = 'too-short'

  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly block?: string
  ) {
    const where = block ? `${block}: ` : ''
    super(`${where}need ${expected} bytes, got ${actual}`)
    this.name = 'TooShortError'
  }
}

export class InvalidTextError extends SysexError {
  readonly kind = 'invalid-text'

  constructor(
    public readonly text: string,
    public readonly reason: string
  ) {
    super(`invalid name "${text}": ${reason}`)
    this.name = 'InvalidTextError'
  }
}

/**
 * Stored checksum differs from the one computed over the block body.
 * Reported as a warning unless the checksum policy is 'strict'.
 */
export class ChecksumMismatchError extends SysexError {
  readonly kind = 'checksum-mismatch'

  constructor(
    public readonly block: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`${block}: checksum 0x${hex(actual)} does not match computed 0x${hex(expected)}`)
    this.name = 'ChecksumMismatchError'
  }
}

export class UnidentifiedError extends SysexError {
  readonly kind = 'unidentified'

  constructor(public readonly header: readonly number[]) {
    super(`header [${header.map(hex).join(' ')}] matches no dump kind`)
    this.name = 'UnidentifiedError'
  }
}

export class OffsetMismatchError extends SysexError {
  readonly kind = 'offset-mismatch'

  constructor(
    public readonly block: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`${block}: expected to end at offset ${expected}, ended at ${actual}`)
    this.name = 'OffsetMismatchError'
  }
}

/**
 * A key that may appear once in a block, given twice on encode.
 */
export class DuplicateEntryError extends SysexError {
  readonly kind = 'duplicate'

  constructor(
    public readonly block: string,
    public readonly key: number
  ) {
    super(`${block}: ${key} appears twice`)
    this.name = 'DuplicateEntryError'
  }
}

function hex(byte: number): string {
  return byte.toString(16).toUpperCase().padStart(2, '0')
}

// =============================================================================
// Result
// =============================================================================

export type Result<T> =
  | { readonly ok: true; readonly value: T; readonly warnings: readonly ChecksumMismatchError[] }
  | { readonly ok: false; readonly error: SysexError }

/**
 * Unwrap a successful result or throw its error.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error
  }
  return result.value
}
