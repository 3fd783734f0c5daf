// =============================================================================
// ksynth - Header Classification
// =============================================================================
//
// A dump header is matched against a table of byte patterns. Each rule names
// the dump kind, the memory it refers to, and how many header bytes precede
// the payload. Rules in one table must never match the same bytes.

import { TooShortError, UnidentifiedError } from './errors'

export type Locality = 'internal' | 'external'

export type BytePattern =
  | { readonly type: 'exact'; readonly byte: number }
  | { readonly type: 'range'; readonly min: number; readonly max: number; readonly capture?: string }
  | { readonly type: 'any'; readonly capture?: string }

export function exact(byte: number): BytePattern {
  return { type: 'exact', byte }
}

export function range(min: number, max: number, capture?: string): BytePattern {
  return { type: 'range', min, max, capture }
}

export function any(capture?: string): BytePattern {
  return { type: 'any', capture }
}

export interface DispatchRule<K extends string> {
  readonly kind: K
  readonly locality: Locality
  readonly pattern: readonly BytePattern[]
  /** Header bytes after the pattern, such as a tone map (default: 0) */
  readonly trailer?: number
}

export interface Classification<K extends string> {
  readonly kind: K
  readonly locality: Locality
  /** Index of the first payload byte */
  readonly payloadStart: number
  /** Header bytes after the pattern */
  readonly trailer: Uint8Array
  /** Values of the pattern's capturing bytes */
  readonly captures: Readonly<Record<string, number>>
}

function bounds(pattern: BytePattern): [number, number] {
  switch (pattern.type) {
    case 'exact': return [pattern.byte, pattern.byte]
    case 'range': return [pattern.min, pattern.max]
    case 'any': return [0x00, 0xFF]
  }
}

function matches(rule: DispatchRule<string>, payload: Uint8Array): boolean {
  if (payload.length < rule.pattern.length) {
    return false
  }
  return rule.pattern.every((pattern, i) => {
    const [min, max] = bounds(pattern)
    return payload[i] >= min && payload[i] <= max
  })
}

/**
 * Find the rule matching the start of `payload`.
 *
 * @throws UnidentifiedError when no rule matches
 * @throws TooShortError when a rule matches but its trailer is cut off
 */
export function classify<K extends string>(
  rules: readonly DispatchRule<K>[],
  payload: Uint8Array
): Classification<K> {
  const rule = rules.find(candidate => matches(candidate, payload))
  if (!rule) {
    throw new UnidentifiedError(Array.from(payload.subarray(0, 8)))
  }

  const payloadStart = rule.pattern.length + (rule.trailer ?? 0)
  if (payload.length < payloadStart) {
    throw new TooShortError(payloadStart, payload.length, `${rule.kind} header`)
  }

  const captures: Record<string, number> = {}
  rule.pattern.forEach((pattern, i) => {
    if (pattern.type !== 'exact' && pattern.capture) {
      captures[pattern.capture] = payload[i]
    }
  })

  return {
    kind: rule.kind,
    locality: rule.locality,
    payloadStart,
    trailer: payload.slice(rule.pattern.length, payloadStart),
    captures
  }
}

/**
 * Pairs of rules that could both match some header.
 * Patterns of different lengths are compared over their common prefix.
 */
export function findOverlaps<K extends string>(
  rules: readonly DispatchRule<K>[]
): Array<[DispatchRule<K>, DispatchRule<K>]> {
  const overlaps: Array<[DispatchRule<K>, DispatchRule<K>]> = []
  for (let i = 0; i < rules.length; i++) {
    for (let j = i + 1; j < rules.length; j++) {
      const a = rules[i].pattern
      const b = rules[j].pattern
      const shared = Math.min(a.length, b.length)
      let disjoint = false
      for (let k = 0; k < shared && !disjoint; k++) {
        const [aMin, aMax] = bounds(a[k])
        const [bMin, bMax] = bounds(b[k])
        disjoint = aMax < bMin || bMax < aMin
      }
      if (!disjoint) {
        overlaps.push([rules[i], rules[j]])
      }
    }
  }
  return overlaps
}
