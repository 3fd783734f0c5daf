// =============================================================================
// ksynth - Codec Contract
// =============================================================================

import { ChecksumMismatchError, SysexError, TooShortError } from './errors'
import type { Result } from './errors'
import { checksum } from './checksum'

// =============================================================================
// Types
// =============================================================================

/**
 * Fixed-size block codec.
 * `decode` reads exactly `size` bytes from the front of its input and throws
 * a `SysexError` on malformed data; `encode` returns exactly `size` bytes.
 */
export interface Codec<T> {
  readonly name: string
  readonly size: number
  decode(bytes: Uint8Array, context: DecodeContext): T
  encode(value: T): Uint8Array
}

export type ChecksumPolicy = 'strict' | 'warn' | 'ignore'

export interface Logger {
  warn(message: string): void
  debug(message: string): void
}

/**
 * Decode configuration options.
 */
export interface DecodeOptions {
  /** What to do when a stored checksum is wrong (default: 'warn') */
  checksum?: ChecksumPolicy

  /** Where warnings and traces go (default: console) */
  logger?: Logger

  /** Trace block-by-block progress through `logger.debug` (default: false) */
  verbose?: boolean
}

// =============================================================================
// Decode Context
// =============================================================================

/**
 * Per-call decode state: resolved options and collected checksum warnings.
 */
export class DecodeContext {
  readonly options: Required<DecodeOptions>
  readonly warnings: ChecksumMismatchError[] = []

  constructor(options: DecodeOptions = {}) {
    this.options = {
      checksum: options.checksum ?? 'warn',
      logger: options.logger ?? console,
      verbose: options.verbose ?? false
    }
  }

  /**
   * Compare a stored checksum with the one computed over `body`.
   *
   * @throws ChecksumMismatchError under the 'strict' policy
   */
  verifyChecksum(block: string, body: Uint8Array, stored: number): void {
    const expected = checksum(body)
    if (expected === stored) {
      return
    }
    const mismatch = new ChecksumMismatchError(block, expected, stored)
    if (this.options.checksum === 'strict') {
      throw mismatch
    }
    if (this.options.checksum === 'warn') {
      this.options.logger.warn(`[ksynth] ${mismatch.message}`)
    }
    this.warnings.push(mismatch)
  }

  trace(message: string): void {
    if (this.options.verbose) {
      this.options.logger.debug(`[ksynth] ${message}`)
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * @throws TooShortError if fewer than `size` bytes are available
 */
export function requireLength(bytes: Uint8Array, size: number, block?: string): void {
  if (bytes.length < size) {
    throw new TooShortError(size, bytes.length, block)
  }
}

/**
 * Decode the block of `codec.size` bytes starting at `offset`.
 */
export function decodeAt<T>(codec: Codec<T>, bytes: Uint8Array, offset: number, context: DecodeContext): T {
  const available = Math.max(0, bytes.length - offset)
  if (available < codec.size) {
    throw new TooShortError(codec.size, available, codec.name)
  }
  return codec.decode(bytes.subarray(offset, offset + codec.size), context)
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0)
  const result = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    result.set(part, offset)
    offset += part.length
  }
  return result
}

/**
 * Run a throwing decode and capture its outcome as a `Result`.
 * Only `SysexError`s are captured; anything else is a bug and propagates.
 */
export function attempt<T>(run: (context: DecodeContext) => T, options: DecodeOptions = {}): Result<T> {
  const context = new DecodeContext(options)
  try {
    const value = run(context)
    return { ok: true, value, warnings: context.warnings }
  } catch (error) {
    if (error instanceof SysexError) {
      return { ok: false, error }
    }
    throw error
  }
}

/**
 * Decode one block with `codec`.
 *
 * @example
 * ```typescript
 * const result = decode(k4.singlePatch, bytes, { checksum: 'strict' })
 * if (result.ok) console.log(result.value.name)
 * ```
 */
export function decode<T>(codec: Codec<T>, bytes: Uint8Array, options: DecodeOptions = {}): Result<T> {
  return attempt(context => decodeAt(codec, bytes, 0, context), options)
}
