// =============================================================================
// ksynth - Enumerated Fields
// =============================================================================

import { InvalidDiscriminantError } from './errors'

/**
 * An enumerated field: a set of names and their raw wire codes.
 */
export interface Enumeration<T extends string> {
  readonly field: string
  readonly names: readonly T[]
  /** @throws InvalidDiscriminantError when `raw` is not a known code */
  decode(raw: number): T
  encode(value: T): number
}

/**
 * Enumeration whose wire code is the position of each name.
 *
 * @example
 * ```typescript
 * const shape = enumeration('lfo.shape', ['triangle', 'sawtooth', 'square', 'random'] as const)
 * shape.decode(2) // 'square'
 * ```
 */
export function enumeration<T extends string>(field: string, names: readonly T[]): Enumeration<T> {
  return {
    field,
    names,
    decode(raw: number): T {
      if (raw < 0 || raw >= names.length) {
        throw new InvalidDiscriminantError(field, raw)
      }
      return names[raw]
    },
    encode(value: T): number {
      return names.indexOf(value)
    }
  }
}

/**
 * Enumeration with explicit, possibly sparse, wire codes.
 */
export function codedEnumeration<T extends string>(
  field: string,
  codes: Readonly<Record<T, number>>
): Enumeration<T> {
  const byCode = new Map<number, T>()
  const names: T[] = []
  for (const name in codes) {
    byCode.set(codes[name], name)
    names.push(name)
  }
  return {
    field,
    names,
    decode(raw: number): T {
      const name = byCode.get(raw)
      if (name === undefined) {
        throw new InvalidDiscriminantError(field, raw)
      }
      return name
    },
    encode(value: T): number {
      return codes[value]
    }
  }
}
