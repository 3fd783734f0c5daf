// =============================================================================
// ksynth - Bounded Values
// =============================================================================

import { OutOfRangeError } from './errors'

/**
 * How a logical value is stored in a 7-bit wire byte.
 */
export type BiasRule =
  | 'identity'
  | 'center64'
  | 'center50'
  | 'center24'
  | 'center7'
  | 'oneBased'

/** Amount added to a logical value to get its wire byte */
const BIAS_OFFSETS: Record<BiasRule, number> = {
  identity: 0,
  center64: 64,
  center50: 50,
  center24: 24,
  center7: 7,
  oneBased: -1
}

export interface Category<N extends string = string> {
  readonly name: N
  readonly min: number
  readonly max: number
  /** Neutral value used by default constructors */
  readonly zero: number
  readonly bias: BiasRule
  /** Width of the wire value; 7 for single-byte fields */
  readonly bits: number
}

/**
 * Define a value category.
 * `zero` defaults to 0 when in range, otherwise to `min`. Values wider than
 * one byte (wave numbers) set `bits` and are split by their block codec.
 */
export function category<N extends string>(
  name: N,
  min: number,
  max: number,
  bias: BiasRule = 'identity',
  zero?: number,
  bits = 7
): Category<N> {
  const neutral = zero ?? (min <= 0 && max >= 0 ? 0 : min)
  if (min > max || neutral < min || neutral > max) {
    throw new Error(`Invalid category ${name}: ${min}..${max} (zero ${neutral})`)
  }
  const lowest = min + BIAS_OFFSETS[bias]
  const highest = max + BIAS_OFFSETS[bias]
  if (lowest < 0 || highest >= 1 << bits) {
    throw new Error(`Invalid category ${name}: wire range ${lowest}..${highest} does not fit ${bits} bits`)
  }
  return Object.freeze({ name, min, max, zero: neutral, bias, bits })
}

/**
 * A scalar parameter that is always inside its category's range.
 *
 * @example
 * ```typescript
 * const fine = BoundedValue.fromInteger(K4.fine, -12)
 * fine.toWireByte() // 38
 *
 * const wave = BoundedValue.fromInteger(K5000.wave, 512)
 * wave.toWireValue() // 512; the oscillator codec splits it over two bytes
 * ```
 */
export class BoundedValue<N extends string = string> {
  private constructor(
    public readonly category: Category<N>,
    public readonly value: number
  ) {}

  /**
   * @throws OutOfRangeError if `n` is not an integer within the category's range
   */
  static fromInteger<N extends string>(category: Category<N>, n: number): BoundedValue<N> {
    if (!Number.isInteger(n) || n < category.min || n > category.max) {
      throw new OutOfRangeError(category.name, n, category.min, category.max)
    }
    return new BoundedValue(category, n)
  }

  static fromWireByte<N extends string>(category: Category<N>, byte: number): BoundedValue<N> {
    return BoundedValue.fromInteger(category, byte - BIAS_OFFSETS[category.bias])
  }

  /** The category's neutral value */
  static zero<N extends string>(category: Category<N>): BoundedValue<N> {
    return new BoundedValue(category, category.zero)
  }

  /** Biased wire value, as wide as the category's `bits` */
  toWireValue(): number {
    return this.value + BIAS_OFFSETS[this.category.bias]
  }

  /**
   * Biased wire value of a single-byte category.
   *
   * @throws Error for categories wider than 7 bits, which need `toWireValue`
   */
  toWireByte(): number {
    if (this.category.bits > 7) {
      throw new Error(`${this.category.name} is ${this.category.bits} bits wide and has no single wire byte`)
    }
    return this.toWireValue()
  }

  /** New value of the same category */
  withValue(n: number): BoundedValue<N> {
    return BoundedValue.fromInteger(this.category, n)
  }

  equals(other: BoundedValue<string>): boolean {
    return this.category.name === other.category.name && this.value === other.value
  }

  toString(): string {
    return String(this.value)
  }
}

/** Shorthand for `BoundedValue.fromInteger` */
export const bounded = BoundedValue.fromInteger

/** Shorthand for `BoundedValue.fromWireByte` */
export const fromWire = BoundedValue.fromWireByte
