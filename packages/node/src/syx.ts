// =============================================================================
// ksynth - SysEx Files
// =============================================================================
//
// A .syx file is a run of raw messages:
//
//   F0h 40h <channel> <function> 00h <machine> ... F7h
//
// Kawai's manufacturer ID is 40h; the machine byte picks the dialect.

import { readFile } from 'fs/promises'
import {
  TooShortError,
  UnidentifiedError,
  attempt,
  category,
  fromWire
} from '@ksynth/core'
import type { BoundedValue, DecodeOptions, Result } from '@ksynth/core'
import { decodeDump as decodeK4Dump, MACHINE_ID as K4_MACHINE_ID } from '@ksynth/k4'
import type { DecodedDump as K4Dump } from '@ksynth/k4'
import { decodeDump as decodeK5000Dump, MACHINE_ID as K5000_MACHINE_ID } from '@ksynth/k5000'
import type { DecodedDump as K5000Dump } from '@ksynth/k5000'

export const SYSEX_START = 0xF0
export const SYSEX_END = 0xF7
export const KAWAI_ID = 0x40

const channels = category('sysex.channel', 1, 16, 'oneBased')
export type MidiChannel = BoundedValue<'sysex.channel'>

export type Dialect = 'k4' | 'k5000'

export interface SysexMessage {
  readonly channel: MidiChannel
  readonly dialect: Dialect
  /** Everything between the manufacturer ID and F7h, starting at the channel byte */
  readonly payload: Uint8Array
}

export type DecodedMessage =
  | { readonly dialect: 'k4'; readonly channel: MidiChannel; readonly decoded: K4Dump }
  | { readonly dialect: 'k5000'; readonly channel: MidiChannel; readonly decoded: K5000Dump }

// =============================================================================
// Framing
// =============================================================================

/**
 * Cut a byte stream into its F0h...F7h messages. Bytes between messages
 * are skipped.
 *
 * @throws TooShortError when the last message has no F7h
 */
export function splitMessages(bytes: Uint8Array): Uint8Array[] {
  const messages: Uint8Array[] = []
  let start = -1

  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === SYSEX_START) {
      start = i
    } else if (bytes[i] === SYSEX_END && start >= 0) {
      messages.push(bytes.slice(start, i + 1))
      start = -1
    }
  }

  if (start >= 0) {
    const length = bytes.length - start
    throw new TooShortError(length + 1, length, 'sysex message')
  }
  return messages
}

/**
 * Strip the framing from one message and detect its dialect.
 *
 * @throws UnidentifiedError for other manufacturers or machines
 */
export function unwrapMessage(message: Uint8Array): SysexMessage {
  // F0 40 channel function group machine F7
  if (message.length < 7 || message[0] !== SYSEX_START || message[message.length - 1] !== SYSEX_END) {
    throw new TooShortError(7, message.length, 'sysex message')
  }
  if (message[1] !== KAWAI_ID) {
    throw new UnidentifiedError(Array.from(message.subarray(0, 6)))
  }

  const payload = message.slice(2, message.length - 1)
  return {
    channel: fromWire(channels, payload[0]),
    dialect: dialectOf(payload),
    payload
  }
}

function dialectOf(payload: Uint8Array): Dialect {
  switch (payload[3]) {
    case K4_MACHINE_ID: return 'k4'
    case K5000_MACHINE_ID: return 'k5000'
    default: throw new UnidentifiedError(Array.from(payload.subarray(0, 4)))
  }
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode one framed message with the codec of its dialect.
 *
 * @example
 * ```typescript
 * const result = decodeMessage(message)
 * if (result.ok && result.value.dialect === 'k5000') {
 *   console.log(result.value.decoded.dump.kind)
 * }
 * ```
 */
export function decodeMessage(message: Uint8Array, options: DecodeOptions = {}): Result<DecodedMessage> {
  const unwrapped = attempt(() => unwrapMessage(message), options)
  if (!unwrapped.ok) {
    return unwrapped
  }

  const { channel, dialect, payload } = unwrapped.value
  if (dialect === 'k4') {
    const result = decodeK4Dump(payload, options)
    if (!result.ok) {
      return result
    }
    return { ok: true, value: { dialect, channel, decoded: result.value }, warnings: result.warnings }
  }

  const result = decodeK5000Dump(payload, options)
  if (!result.ok) {
    return result
  }
  return { ok: true, value: { dialect, channel, decoded: result.value }, warnings: result.warnings }
}

/**
 * Read a .syx file and decode every message in it, one result per message.
 * A truncated file yields a single failed result.
 */
export async function loadDumpFile(filePath: string, options: DecodeOptions = {}): Promise<Result<DecodedMessage>[]> {
  const bytes = new Uint8Array(await readFile(filePath))
  const split = attempt(() => splitMessages(bytes), options)
  if (!split.ok) {
    return [split]
  }
  return split.value.map(message => decodeMessage(message, options))
}

/** Wrap a payload in F0h 40h ... F7h */
export function frameMessage(payload: Uint8Array): Uint8Array {
  const message = new Uint8Array(payload.length + 3)
  message[0] = SYSEX_START
  message[1] = KAWAI_ID
  message.set(payload, 2)
  message[message.length - 1] = SYSEX_END
  return message
}
