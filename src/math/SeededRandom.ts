/**
 * Source of uniform floats in [0, 1). Anything with a `next()` works,
 * so tests can script exact values.
 */
export interface RandomSource {
  next(): number
}

/**
 * Deterministic seeded random number generator using xorshift32.
 * Keeps enemy respawn placement reproducible for a given seed.
 */
export class SeededRandom implements RandomSource {
  private state: number

  constructor(seed: number) {
    this.state = seed >>> 0 || 1
  }

  /**
   * Returns a random float between 0 (inclusive) and 1 (exclusive)
   */
  next(): number {
    let x = this.state
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    this.state = x >>> 0
    return this.state / 0x100000000
  }
}

/**
 * Float in [min, max)
 */
export function randomRange(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min)
}

/**
 * Random element from a non-empty array, or undefined for an empty one
 */
export function randomPick<T>(rng: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined
  return items[Math.floor(rng.next() * items.length)]
}
