// =============================================================================
// ksynth - Fixed-Count Collections
// =============================================================================

import { OutOfRangeError } from './errors'

export type Pair<T> = readonly [T, T]
export type Quad<T> = readonly [T, T, T, T]
export type Octet<T> = readonly [T, T, T, T, T, T, T, T]

function requireCount(items: readonly unknown[], count: number, field: string): void {
  if (items.length !== count) {
    throw new OutOfRangeError(`${field} count`, items.length, count, count)
  }
}

export function pairOf<T>(items: readonly T[], field = 'pair'): Pair<T> {
  requireCount(items, 2, field)
  return [items[0], items[1]]
}

export function quadOf<T>(items: readonly T[], field = 'quad'): Quad<T> {
  requireCount(items, 4, field)
  return [items[0], items[1], items[2], items[3]]
}

export function octetOf<T>(items: readonly T[], field = 'octet'): Octet<T> {
  requireCount(items, 8, field)
  return [items[0], items[1], items[2], items[3], items[4], items[5], items[6], items[7]]
}

/**
 * A collection whose length is fixed by the dump layout (64 singles in a
 * bank, 61 drum notes, 7 GEQ bands). The length is checked once, when the
 * list is built; `with` and `map` keep it.
 *
 * @example
 * ```typescript
 * const bands = FixedList.filled(7, () => BoundedValue.zero(K5000.geq), 'k5000.geq')
 * const boosted = bands.with(3, bands.at(3).withValue(4))
 * ```
 */
export class FixedList<T> implements Iterable<T> {
  private constructor(
    private readonly items: readonly T[],
    public readonly field: string
  ) {}

  /**
   * @throws OutOfRangeError when `items` does not hold exactly `count` entries
   */
  static of<T>(items: readonly T[], count: number, field: string): FixedList<T> {
    requireCount(items, count, field)
    return new FixedList([...items], field)
  }

  static filled<T>(count: number, make: (index: number) => T, field: string): FixedList<T> {
    return new FixedList(Array.from({ length: count }, (_, i) => make(i)), field)
  }

  get length(): number {
    return this.items.length
  }

  /**
   * @throws OutOfRangeError for an index outside the list
   */
  at(index: number): T {
    this.requireIndex(index)
    return this.items[index]
  }

  /** Copy with the entry at `index` replaced */
  with(index: number, item: T): FixedList<T> {
    this.requireIndex(index)
    const items = [...this.items]
    items[index] = item
    return new FixedList(items, this.field)
  }

  map<U>(fn: (item: T, index: number) => U): FixedList<U> {
    return new FixedList(this.items.map(fn), this.field)
  }

  toArray(): T[] {
    return [...this.items]
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]()
  }

  private requireIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new OutOfRangeError(`${this.field} index`, index, 0, this.items.length - 1)
    }
  }
}
