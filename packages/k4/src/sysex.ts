// =============================================================================
// ksynth - K4 Dump Headers
// =============================================================================
//
// Payload layout after transport framing is removed (F0, 40h ... F7):
//
//   <channel> <function> 00h 04h <substatus 1> <substatus 2> <data>
//
// Substatus 1 selects the memory (internal/external) and patch family,
// substatus 2 the patch number or block.

import {
  BoundedValue,
  FixedList,
  attempt,
  classify,
  codedEnumeration,
  concatBytes,
  decodeAt,
  decodeSequence,
  encodeSequence,
  exact,
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
  Locality,
  Result
} from '@ksynth/core'
import { K4 } from './categories'
import type { Channel, EffectNumber, PatchNumber } from './categories'
import { singlePatchCodec } from './single'
import type { SinglePatch } from './single'
import { multiPatchCodec } from './multi'
import type { MultiPatch } from './multi'
import { drumPatchCodec } from './drum'
import type { DrumPatch } from './drum'
import { effectPatchCodec } from './effect'
import type { EffectPatch } from './effect'
import { EFFECT_COUNT, MULTI_COUNT, SINGLE_COUNT, bankCodec } from './bank'
import type { Bank } from './bank'

export const GROUP_ID = 0x00
export const MACHINE_ID = 0x04
export const HEADER_SIZE = 6

// =============================================================================
// Function Codes
// =============================================================================

export const FUNCTION_CODES = {
  onePatchDumpRequest: 0x00,
  blockPatchDumpRequest: 0x01,
  allPatchDumpRequest: 0x02,
  parameterSend: 0x10,
  onePatchDataDump: 0x20,
  blockPatchDataDump: 0x21,
  allPatchDataDump: 0x22,
  editBufferDump: 0x23,
  programChange: 0x30,
  writeComplete: 0x40,
  writeError: 0x41,
  writeErrorProtect: 0x42,
  writeErrorNoCard: 0x43
} as const
export type FunctionName = keyof typeof FUNCTION_CODES

const functions = codedEnumeration<FunctionName>('k4.function', FUNCTION_CODES)

export interface Header {
  readonly channel: Channel
  readonly function: FunctionName
  readonly substatus1: number
  readonly substatus2: number
}

export function decodeHeader(bytes: Uint8Array): Header {
  requireLength(bytes, HEADER_SIZE, 'k4.header')
  return {
    channel: fromWire(K4.channel, bytes[0]),
    function: functions.decode(bytes[1]),
    substatus1: bytes[4],
    substatus2: bytes[5]
  }
}

export function encodeHeader(header: Header): Uint8Array {
  return Uint8Array.of(
    header.channel.toWireByte(),
    functions.encode(header.function),
    GROUP_ID,
    MACHINE_ID,
    header.substatus1,
    header.substatus2
  )
}

// =============================================================================
// Dispatch
// =============================================================================

export type DumpKind =
  | 'oneSingle'
  | 'oneMulti'
  | 'oneEffect'
  | 'drum'
  | 'blockSingle'
  | 'blockMulti'
  | 'blockEffect'
  | 'all'

function rule(
  kind: DumpKind,
  locality: Locality,
  functionCode: number,
  substatus1: number,
  substatus2: BytePattern
): DispatchRule<DumpKind> {
  return {
    kind,
    locality,
    pattern: [range(0, 15, 'channel'), exact(functionCode), exact(GROUP_ID), exact(MACHINE_ID), exact(substatus1), substatus2]
  }
}

const ONE = FUNCTION_CODES.onePatchDataDump
const BLOCK = FUNCTION_CODES.blockPatchDataDump
const ALL = FUNCTION_CODES.allPatchDataDump

/**
 * Every recognised data dump. Substatus 1 is 00h/02h for singles and multis
 * (internal/external) and 01h/03h for effects and the drum.
 */
export const DUMP_RULES: readonly DispatchRule<DumpKind>[] = [
  rule('oneSingle', 'internal', ONE, 0x00, range(0, 63, 'number')),
  rule('oneMulti', 'internal', ONE, 0x00, range(64, 127, 'number')),
  rule('oneSingle', 'external', ONE, 0x02, range(0, 63, 'number')),
  rule('oneMulti', 'external', ONE, 0x02, range(64, 127, 'number')),
  rule('oneEffect', 'internal', ONE, 0x01, range(0, 31, 'number')),
  rule('drum', 'internal', ONE, 0x01, exact(32)),
  rule('oneEffect', 'external', ONE, 0x03, range(0, 31, 'number')),
  rule('drum', 'external', ONE, 0x03, exact(32)),
  rule('blockSingle', 'internal', BLOCK, 0x00, exact(0x00)),
  rule('blockMulti', 'internal', BLOCK, 0x00, exact(0x40)),
  rule('blockSingle', 'external', BLOCK, 0x02, exact(0x00)),
  rule('blockMulti', 'external', BLOCK, 0x02, exact(0x40)),
  rule('blockEffect', 'internal', BLOCK, 0x01, exact(0x00)),
  rule('blockEffect', 'external', BLOCK, 0x03, exact(0x00)),
  rule('all', 'internal', ALL, 0x00, exact(0x00)),
  rule('all', 'external', ALL, 0x02, exact(0x00))
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

interface DumpBase {
  readonly locality: Locality
}

export type Dump =
  | DumpBase & { readonly kind: 'oneSingle'; readonly number: PatchNumber; readonly patch: SinglePatch }
  | DumpBase & { readonly kind: 'oneMulti'; readonly number: PatchNumber; readonly patch: MultiPatch }
  | DumpBase & { readonly kind: 'oneEffect'; readonly number: EffectNumber; readonly patch: EffectPatch }
  | DumpBase & { readonly kind: 'drum'; readonly patch: DrumPatch }
  | DumpBase & { readonly kind: 'blockSingle'; readonly patches: FixedList<SinglePatch> }
  | DumpBase & { readonly kind: 'blockMulti'; readonly patches: FixedList<MultiPatch> }
  | DumpBase & { readonly kind: 'blockEffect'; readonly patches: FixedList<EffectPatch> }
  | DumpBase & { readonly kind: 'all'; readonly bank: Bank }

export interface DecodedDump {
  readonly header: Header
  readonly dump: Dump
}

function decodeClassified(
  classification: Classification<DumpKind>,
  payload: Uint8Array,
  context: DecodeContext
): Dump {
  const { kind, locality, payloadStart, captures } = classification
  const number = captures.number ?? 0
  context.trace(`${locality} ${kind} dump`)

  switch (kind) {
    case 'oneSingle':
      return {
        kind,
        locality,
        number: fromWire(K4.patchNumber, number),
        patch: decodeAt(singlePatchCodec, payload, payloadStart, context)
      }
    case 'oneMulti':
      return {
        kind,
        locality,
        number: fromWire(K4.patchNumber, number - 64),
        patch: decodeAt(multiPatchCodec, payload, payloadStart, context)
      }
    case 'oneEffect':
      return {
        kind,
        locality,
        number: fromWire(K4.effectNumber, number),
        patch: decodeAt(effectPatchCodec, payload, payloadStart, context)
      }
    case 'drum':
      return { kind, locality, patch: decodeAt(drumPatchCodec, payload, payloadStart, context) }
    case 'blockSingle':
      return {
        kind,
        locality,
        patches: FixedList.of(
          decodeSequence(singlePatchCodec, payload, payloadStart, SINGLE_COUNT, context).items,
          SINGLE_COUNT,
          'k4.blockSingle.patches'
        )
      }
    case 'blockMulti':
      return {
        kind,
        locality,
        patches: FixedList.of(
          decodeSequence(multiPatchCodec, payload, payloadStart, MULTI_COUNT, context).items,
          MULTI_COUNT,
          'k4.blockMulti.patches'
        )
      }
    case 'blockEffect':
      return {
        kind,
        locality,
        patches: FixedList.of(
          decodeSequence(effectPatchCodec, payload, payloadStart, EFFECT_COUNT, context).items,
          EFFECT_COUNT,
          'k4.blockEffect.patches'
        )
      }
    case 'all':
      return { kind, locality, bank: decodeAt(bankCodec, payload, payloadStart, context) }
  }
}

/**
 * Classify and decode a K4 dump payload (transport framing already removed).
 *
 * @example
 * ```typescript
 * const result = decodeDump(payload, { checksum: 'warn' })
 * if (result.ok && result.value.dump.kind === 'all') {
 *   console.log(result.value.dump.bank.singles.at(0).name)
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

function substatus(dump: Dump): [number, number, number] {
  const external = dump.locality === 'external'
  const patchMemory = external ? 0x02 : 0x00
  const effectMemory = external ? 0x03 : 0x01
  switch (dump.kind) {
    case 'oneSingle': return [ONE, patchMemory, dump.number.toWireByte()]
    case 'oneMulti': return [ONE, patchMemory, dump.number.toWireByte() + 64]
    case 'oneEffect': return [ONE, effectMemory, dump.number.toWireByte()]
    case 'drum': return [ONE, effectMemory, 32]
    case 'blockSingle': return [BLOCK, patchMemory, 0x00]
    case 'blockMulti': return [BLOCK, patchMemory, 0x40]
    case 'blockEffect': return [BLOCK, effectMemory, 0x00]
    case 'all': return [ALL, patchMemory, 0x00]
  }
}

function encodeData(dump: Dump): Uint8Array {
  switch (dump.kind) {
    case 'oneSingle': return singlePatchCodec.encode(dump.patch)
    case 'oneMulti': return multiPatchCodec.encode(dump.patch)
    case 'oneEffect': return effectPatchCodec.encode(dump.patch)
    case 'drum': return drumPatchCodec.encode(dump.patch)
    case 'blockSingle': return encodeSequence(singlePatchCodec, dump.patches)
    case 'blockMulti': return encodeSequence(multiPatchCodec, dump.patches)
    case 'blockEffect': return encodeSequence(effectPatchCodec, dump.patches)
    case 'all': return bankCodec.encode(dump.bank)
  }
}

/**
 * Build a complete dump payload (header and data) for `channel`.
 */
export function encodeDump(dump: Dump, channel: Channel = BoundedValue.zero(K4.channel)): Uint8Array {
  const [functionCode, substatus1, substatus2] = substatus(dump)
  const header = encodeHeader({
    channel,
    function: functions.decode(functionCode),
    substatus1,
    substatus2
  })
  return concatBytes([header, encodeData(dump)])
}
