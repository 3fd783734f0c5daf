/**
 * @ksynth/k5000 - Test Fixtures
 *
 * Raw blocks assembled byte by byte, independent of the encoders.
 */

export function sevenBitChecksum(body: ArrayLike<number>): number {
  let total = 0xA5
  for (let i = 0; i < body.length; i++) {
    total += body[i]
  }
  return total % 128
}

export function ascii(text: string): number[] {
  return Array.from(text, c => c.charCodeAt(0))
}

export function withChecksum(body: number[]): number[] {
  return [sevenBitChecksum(body), ...body]
}

// =============================================================================
// Effects
// =============================================================================

/** Algorithm 2; Room 1 reverb; Early Reflection 1, Chorus 1, Overdrive, Single Delay */
export const EFFECTS = [
  1,
  3, 20, 10, 64, 30, 40,
  11, 50, 1, 2, 3, 4,
  21, 30, 64, 64, 64, 64,
  44, 100, 10, 20, 30, 40,
  15, 0, 0, 0, 0, 0
]

export const GEQ = [58, 60, 64, 64, 64, 68, 70]

/** Wheel -> effect 1 parameter +10; bender -> effect 4 dry/wet -5 */
export const EFFECT_CONTROL = [2, 1, 74, 0, 6, 59]

// =============================================================================
// Source
// =============================================================================

export const SOURCE_CONTROL = [
  24, 108, 0x4F, 2, 120, 2, 12,
  1, 0x4F, 3, 0x40,
  3, 0x59, 1, 0x40,
  2, 0x5F, 0, 0x40,
  2, 0x0D, 0x40,
  2, 0x09, 0x50,
  0, 1, 0x30
]

/** PCM wave 300, coarse +12, fine -5, 25 cent key scaling */
export const PCM_OSCILLATOR = [2, 44, 36, 59, 0, 1, 74, 5, 44, 30, 64, 64]
export const ADD_OSCILLATOR = [4, 0, 24, 64, 0, 0, 64, 0, 64, 0, 64, 64]

export const FILTER = [0, 1, 2, 3, 6, 90, 64, 70, 44, 10, 20, 74, 30, 64, 40, 64, 64, 64, 64, 64]
export const AMPLIFIER = [1, 5, 40, 120, 60, 100, 30, 64, 64, 64, 64, 20, 64, 64, 64]
export const LFO = [3, 40, 10, 20, 30, 5, 64, 0, 64, 7, 70]

export function rawSource(oscillator = PCM_OSCILLATOR): number[] {
  return [...SOURCE_CONTROL, ...oscillator, ...FILTER, ...AMPLIFIER, ...LFO]
}

// =============================================================================
// Single
// =============================================================================

/**
 * An 81-byte single common block named "Glassy" with source 2 muted.
 */
export function rawCommon(sourceCount = 2): number[] {
  return [
    ...EFFECTS,
    ...GEQ,
    0,
    ...ascii('Glassy  '),
    110, 1, 0, sourceCount, 0x02, 1,
    ...EFFECT_CONTROL,
    1, 50,
    0, 1, 2, 3, 4, 5, 6, 7,
    69, 59, 64, 64, 64, 64, 95, 33,
    1, 5, 12, 0
  ]
}

/**
 * An 806-byte additive kit. Harmonic 1 loops with loop 1, harmonic 2 with
 * loop 2; the others have flat envelopes.
 */
export function rawAdditiveKit(): number[] {
  const body = [
    1, 40, 1, 72, 3, 90,
    1, 2, 3, 4, 5, 6, 7, 0, 10, 20, 30, 40, 2,
    76, 1, 54, 10, 70, 20, 60, 30, 64, 40, 50, 1, 64, 64, 25, 2, 30
  ]
  for (let i = 0; i < 64; i++) body.push(127 - i)
  for (let i = 0; i < 64; i++) body.push(i)
  for (let i = 0; i < 128; i++) body.push(i)
  body.push(0, 63, 10, 0x40 | 32, 20, 0x40 | 16, 30, 0)
  body.push(1, 63, 10, 32, 20, 0x40 | 16, 30, 0)
  for (let i = 2; i < 64; i++) body.push(0, 0, 0, 0, 0, 0, 0, 0)
  body.push(1)
  return withChecksum(body)
}

/**
 * A single with one source block per entry of `oscillators` and an additive
 * kit for every ADD oscillator.
 */
export function rawSingle(oscillators: number[][] = [PCM_OSCILLATOR, PCM_OSCILLATOR]): Uint8Array {
  const body = [...rawCommon(oscillators.length)]
  for (const oscillator of oscillators) {
    body.push(...rawSource(oscillator))
  }
  const kits = oscillators.filter(o => o === ADD_OSCILLATOR).flatMap(() => rawAdditiveKit())
  return Uint8Array.from([...withChecksum(body), ...kits])
}

// =============================================================================
// Multi
// =============================================================================

export const SECTION_1 = [0, 5, 100, 84, 1, 36, 61, 0, 127, 0x4F, 0]
export const SECTION_2 = [2, 44, 90, 64, 0, 24, 64, 36, 60, 0x20, 15]
export const SECTION_N = [0, 0, 100, 64, 0, 24, 64, 0, 127, 0, 0]

/**
 * A 99-byte multi named "Layers" with section 3 muted.
 */
export function rawMulti(): Uint8Array {
  const body = [
    ...EFFECTS,
    ...GEQ,
    ...ascii('Layers  '),
    100, 0x04,
    ...EFFECT_CONTROL,
    ...SECTION_1,
    ...SECTION_2,
    ...SECTION_N,
    ...SECTION_N
  ]
  return Uint8Array.from(withChecksum(body))
}
