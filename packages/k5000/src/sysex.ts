// =============================================================================
// ksynth - K5000 Dump Headers
// =============================================================================
//
// Payload layout after transport framing is removed (F0, 40h ... F7):
//
//   <channel> <function> 00h 0Ah <patch kind> [bank] [number] [tone map] <data>
//
// Patch kinds: 00h single, 10h drum kit, 11h drum instrument, 20h multi.

import {
  BoundedValue,
  any,
  attempt,
  classify,
  codedEnumeration,
  concatBytes,
  decodeAt,
  decodeSequence,
  DuplicateEntryError,
  encodeSequence,
  exact,
  expectOffset,
  FixedList,
  fromWire,
  range,
  requireLength
} from '@ksynth/core'
import type {
  BytePattern,
  Classification,
  DecodeContext,
  DecodeOptions,
  DispatchRule,
  Result
} from '@ksynth/core'
import { K5000 } from './categories'
import type { Channel, MultiNumber, ToneNumber } from './categories'
import { singlePatchCodec } from './single'
import type { SinglePatch } from './single'
import { multiPatchCodec } from './multi'
import type { MultiPatch } from './multi'
import { TONE_MAP_SIZE, ToneMap } from './tonemap'

export const GROUP_ID = 0x00
export const MACHINE_ID = 0x0A
export const MULTI_COUNT = 64

// =============================================================================
// Function Codes
// =============================================================================

export const FUNCTION_CODES = {
  oneBlockDumpRequest: 0x00,
  allBlockDumpRequest: 0x01,
  parameterSend: 0x10,
  trigger: 0x11,
  oneBlockDump: 0x20,
  allBlockDump: 0x21,
  modeChange: 0x31,
  remote: 0x32,
  writeComplete: 0x40,
  writeError: 0x41,
  writeErrorProtect: 0x42,
  writeErrorMemoryFull: 0x44,
  writeErrorNoExpansion: 0x45
} as const
export type FunctionName = keyof typeof FUNCTION_CODES

export const PATCH_KINDS = {
  single: 0x00,
  drumKit: 0x10,
  drumInstrument: 0x11,
  multi: 0x20
} as const
export type PatchKind = keyof typeof PATCH_KINDS

/** Single banks; D is only present on the K5000S/R */
export const BANKS = { A: 0x00, B: 0x01, D: 0x02, E: 0x03, F: 0x04 } as const
export type Bank = keyof typeof BANKS

const functions = codedEnumeration<FunctionName>('k5000.function', FUNCTION_CODES)
const patchKinds = codedEnumeration<PatchKind>('k5000.patchKind', PATCH_KINDS)
const banks = codedEnumeration<Bank>('k5000.bank', BANKS)

export interface Header {
  readonly channel: Channel
  readonly function: FunctionName
  readonly patchKind: PatchKind
}

export const HEADER_SIZE = 5

export function decodeHeader(bytes: Uint8Array): Header {
  requireLength(bytes, HEADER_SIZE, 'k5000.header')
  return {
    channel: fromWire(K5000.channel, bytes[0]),
    function: functions.decode(bytes[1]),
    patchKind: patchKinds.decode(bytes[4])
  }
}

export function encodeHeader(header: Header): Uint8Array {
  return Uint8Array.of(
    header.channel.toWireByte(),
    functions.encode(header.function),
    GROUP_ID,
    MACHINE_ID,
    patchKinds.encode(header.patchKind)
  )
}

// =============================================================================
// Dispatch
// =============================================================================

export type DumpKind =
  | 'oneSingle'
  | 'blockSingle'
  | 'oneMulti'
  | 'blockMulti'
  | 'drumKit'
  | 'oneDrumInstrument'
  | 'blockDrumInstrument'

const ONE = FUNCTION_CODES.oneBlockDump
const BLOCK = FUNCTION_CODES.allBlockDump

function rule(
  kind: DumpKind,
  functionCode: number,
  patchKind: PatchKind,
  rest: readonly BytePattern[] = [],
  trailer?: number
): DispatchRule<DumpKind> {
  return {
    kind,
    locality: 'internal',
    pattern: [range(0, 15, 'channel'), exact(functionCode), exact(GROUP_ID), exact(MACHINE_ID), exact(PATCH_KINDS[patchKind]), ...rest],
    trailer
  }
}

function bank(b: Bank): BytePattern {
  return range(BANKS[b], BANKS[b], 'bank')
}

/**
 * Every recognised data dump. Block single dumps of the ADD banks carry a
 * tone map after the bank byte; bank B (PCM) has none.
 */
export const DUMP_RULES: readonly DispatchRule<DumpKind>[] = [
  rule('oneSingle', ONE, 'single', [bank('A'), any('number')]),
  rule('oneSingle', ONE, 'single', [bank('D'), any('number')]),
  rule('oneSingle', ONE, 'single', [bank('E'), any('number')]),
  rule('oneSingle', ONE, 'single', [bank('F'), any('number')]),
  rule('oneSingle', ONE, 'single', [bank('B'), any('number')]),
  rule('blockSingle', BLOCK, 'single', [bank('A')], TONE_MAP_SIZE),
  rule('blockSingle', BLOCK, 'single', [bank('D')], TONE_MAP_SIZE),
  rule('blockSingle', BLOCK, 'single', [bank('E')], TONE_MAP_SIZE),
  rule('blockSingle', BLOCK, 'single', [bank('F')], TONE_MAP_SIZE),
  rule('blockSingle', BLOCK, 'single', [bank('B')]),
  rule('oneMulti', ONE, 'multi', [any('number')]),
  rule('blockMulti', BLOCK, 'multi'),
  rule('drumKit', ONE, 'drumKit'),
  rule('oneDrumInstrument', ONE, 'drumInstrument', [any('number')]),
  rule('blockDrumInstrument', BLOCK, 'drumInstrument')
]

/**
 * Identify the dump kind of a payload.
 *
 * @throws UnidentifiedError when the header matches no rule
 */
export function identify(payload: Uint8Array): Classification<DumpKind> {
  return classify(DUMP_RULES, payload)
}

// =============================================================================
// Dumps
// =============================================================================

export interface TonePatch {
  readonly tone: ToneNumber
  readonly patch: SinglePatch
}

export type Dump =
  | { readonly kind: 'oneSingle'; readonly bank: Bank; readonly tone: ToneNumber; readonly patch: SinglePatch }
  | { readonly kind: 'blockSingle'; readonly bank: Bank; readonly patches: readonly TonePatch[] }
  | { readonly kind: 'oneMulti'; readonly number: MultiNumber; readonly patch: MultiPatch }
  | { readonly kind: 'blockMulti'; readonly patches: FixedList<MultiPatch> }
  | { readonly kind: 'drumKit'; readonly data: Uint8Array }
  | { readonly kind: 'oneDrumInstrument'; readonly number: number; readonly data: Uint8Array }
  | { readonly kind: 'blockDrumInstrument'; readonly data: Uint8Array }

export interface DecodedDump {
  readonly header: Header
  readonly dump: Dump
}

/**
 * Decode consecutive singles from `offset`, one per tone. Each single is
 * sized from its own common and source bytes.
 */
export function decodeSingles(
  payload: Uint8Array,
  offset: number,
  tones: readonly ToneNumber[],
  context: DecodeContext
): TonePatch[] {
  const patches: TonePatch[] = []
  let position = offset
  for (const tone of tones) {
    const rest = payload.subarray(position)
    const size = singlePatchCodec.measure(rest)
    patches.push({ tone, patch: singlePatchCodec.decode(rest.subarray(0, size), context) })
    position += size
  }
  expectOffset('k5000.blockSingle', payload.length, position)
  context.trace(`${patches.length} x k5000.single at ${offset}..${position}`)
  return patches
}

/**
 * Decode a bank B block: singles follow one another until the payload ends.
 */
function decodeUnmappedSingles(payload: Uint8Array, offset: number, context: DecodeContext): TonePatch[] {
  const patches: TonePatch[] = []
  let position = offset
  while (position < payload.length) {
    const rest = payload.subarray(position)
    const size = singlePatchCodec.measure(rest)
    patches.push({
      tone: BoundedValue.fromInteger(K5000.tone, patches.length),
      patch: singlePatchCodec.decode(rest.subarray(0, size), context)
    })
    position += size
  }
  context.trace(`${patches.length} x k5000.single at ${offset}..${position}`)
  return patches
}

/**
 * Decode a one-single payload, which must hold exactly the measured patch.
 */
function decodeWholeSingle(data: Uint8Array, offset: number, context: DecodeContext): SinglePatch {
  const size = singlePatchCodec.measure(data)
  expectOffset('k5000.oneSingle', offset + data.length, offset + size)
  return singlePatchCodec.decode(data, context)
}

function decodeClassified(
  classification: Classification<DumpKind>,
  payload: Uint8Array,
  context: DecodeContext
): Dump {
  const { kind, payloadStart, captures, trailer } = classification
  const number = captures.number ?? 0
  context.trace(`${kind} dump`)

  switch (kind) {
    case 'oneSingle':
      return {
        kind,
        bank: banks.decode(captures.bank ?? 0),
        tone: fromWire(K5000.tone, number),
        patch: decodeWholeSingle(payload.subarray(payloadStart), payloadStart, context)
      }
    case 'blockSingle': {
      const b = banks.decode(captures.bank ?? 0)
      const patches = b === 'B'
        ? decodeUnmappedSingles(payload, payloadStart, context)
        : decodeSingles(payload, payloadStart, ToneMap.decode(trailer).tones(), context)
      return { kind, bank: b, patches }
    }
    case 'oneMulti':
      return {
        kind,
        number: fromWire(K5000.multi, number),
        patch: decodeAt(multiPatchCodec, payload, payloadStart, context)
      }
    case 'blockMulti':
      return {
        kind,
        patches: FixedList.of(
          decodeSequence(multiPatchCodec, payload, payloadStart, MULTI_COUNT, context).items,
          MULTI_COUNT,
          'k5000.blockMulti.patches'
        )
      }
    case 'drumKit':
    case 'blockDrumInstrument':
      return { kind, data: payload.slice(payloadStart) }
    case 'oneDrumInstrument':
      return { kind, number, data: payload.slice(payloadStart) }
  }
}

/**
 * Classify and decode a K5000 dump payload (transport framing already removed).
 *
 * @example
 * ```typescript
 * const result = decodeDump(payload)
 * if (result.ok && result.value.dump.kind === 'blockSingle') {
 *   for (const { tone, patch } of result.value.dump.patches) {
 *     console.log(tone.value, patch.common.name)
 *   }
 * }
 * ```
 */
export function decodeDump(payload: Uint8Array, options: DecodeOptions = {}): Result<DecodedDump> {
  return attempt(context => {
    const classification = identify(payload)
    const header = decodeHeader(payload)
    return { header, dump: decodeClassified(classification, payload, context) }
  }, options)
}

function sortedByTone(patches: readonly TonePatch[]): TonePatch[] {
  const sorted = [...patches].sort((a, b) => a.tone.value - b.tone.value)
  sorted.forEach((entry, i) => {
    if (i > 0 && entry.tone.value === sorted[i - 1].tone.value) {
      throw new DuplicateEntryError('k5000.blockSingle.tone', entry.tone.value)
    }
  })
  return sorted
}

function encodeBody(dump: Dump): [FunctionName, PatchKind, Uint8Array, Uint8Array] {
  const none = new Uint8Array(0)
  switch (dump.kind) {
    case 'oneSingle':
      return [
        'oneBlockDump',
        'single',
        Uint8Array.of(BANKS[dump.bank], dump.tone.toWireByte()),
        singlePatchCodec.encode(dump.patch)
      ]
    case 'blockSingle': {
      if (dump.bank === 'B') {
        return [
          'allBlockDump',
          'single',
          Uint8Array.of(BANKS.B),
          concatBytes(dump.patches.map(p => singlePatchCodec.encode(p.patch)))
        ]
      }
      const patches = sortedByTone(dump.patches)
      const toneMap = ToneMap.of(patches.map(p => p.tone))
      return [
        'allBlockDump',
        'single',
        concatBytes([Uint8Array.of(BANKS[dump.bank]), toneMap.encode()]),
        concatBytes(patches.map(p => singlePatchCodec.encode(p.patch)))
      ]
    }
    case 'oneMulti':
      return ['oneBlockDump', 'multi', Uint8Array.of(dump.number.toWireByte()), multiPatchCodec.encode(dump.patch)]
    case 'blockMulti':
      return [
        'allBlockDump',
        'multi',
        none,
        encodeSequence(multiPatchCodec, dump.patches)
      ]
    case 'drumKit':
      return ['oneBlockDump', 'drumKit', none, dump.data]
    case 'oneDrumInstrument':
      return ['oneBlockDump', 'drumInstrument', Uint8Array.of(dump.number), dump.data]
    case 'blockDrumInstrument':
      return ['allBlockDump', 'drumInstrument', none, dump.data]
  }
}

/**
 * Build a complete dump payload (header and data) for `channel`.
 */
export function encodeDump(dump: Dump, channel: Channel = BoundedValue.zero(K5000.channel)): Uint8Array {
  const [fn, patchKind, selector, data] = encodeBody(dump)
  return concatBytes([encodeHeader({ channel, function: fn, patchKind }), selector, data])
}
