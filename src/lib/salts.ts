import { InvalidParametersError } from './errors.ts'

/**
 * Returns a number in [0, 1), like Math.random.
 */
export type RandomSource = () => number

const MAX_DRAWS_PER_SALT = 100

/**
 * Draws `count` distinct salts from `random`, in draw order.
 * A duplicate draw is discarded and drawn again.
 */
export function createSalts (count: number, random: RandomSource = Math.random): number[] {
  const salts = new Set<number>()
  const maxDraws = count * MAX_DRAWS_PER_SALT
  let draws = 0

  while (salts.size < count) {
    if (draws++ >= maxDraws) {
      throw new InvalidParametersError('BLOOM_FILTER_INVALID_RANDOM_SOURCE', `random source produced ${salts.size} distinct salts out of ${count} after ${maxDraws} draws`)
    }

    const salt = random()
    if (typeof salt !== 'number' || !(salt >= 0 && salt < 1)) {
      throw new InvalidParametersError('BLOOM_FILTER_INVALID_RANDOM_SOURCE', `random source returned ${String(salt)}, expected a number in [0, 1)`)
    }
    salts.add(salt)
  }

  return [...salts]
}

/**
 * Mulberry32: a small deterministic generator, so a filter built with the same seed
 * gets the same salts (and therefore the same bit positions).
 */
export function createSeededRandom (seed: number): RandomSource {
  let state = seed >>> 0

  return function seededRandom (): number {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}
