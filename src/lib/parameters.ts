import { InvalidParametersError } from './errors.ts'
import { MAX_FILTER_LENGTH, MAX_HASH_FUNCTIONS, validateCapacity, validateErrorRate } from './options.ts'

export interface FilterParameters {
  length: number
  numHashFuncs: number
}

/**
 * Bits needed to hold `numKeys` keys at `errorRate` when `k` hash functions are used:
 * m(k) = -k * n / ln(1 - p^(1/k))
 */
export function filterLengthFor (numKeys: number, errorRate: number, k: number): number {
  return (-k * numKeys) / Math.log(1 - Math.pow(errorRate, 1 / k))
}

/**
 * Searches k in [1, MAX_HASH_FUNCTIONS] for the smallest bit vector that keeps the
 * false positive rate at `errorRate` once `numKeys` keys are in.
 * Throws InvalidParametersError when the optimum lies beyond the search bound.
 */
export function calculateFilterParameters (numKeys: number, errorRate: number): FilterParameters {
  validateCapacity(numKeys)
  validateErrorRate(errorRate)

  let lowestM: number | undefined
  let bestK = 0

  for (let k = 1; k <= MAX_HASH_FUNCTIONS; k++) {
    const m = filterLengthFor(numKeys, errorRate, k)
    // p^(1/k) rounds to 0 or 1 for extreme rates, which yields 0 or infinite lengths
    if (!Number.isFinite(m) || m <= 0) {
      continue
    }
    if (lowestM === undefined || m < lowestM) {
      lowestM = m
      bestK = k
    }
  }

  if (lowestM === undefined) {
    throw new InvalidParametersError('BLOOM_FILTER_PARAMETERS_UNSATISFIABLE', `no filter size found for ${numKeys} keys at error rate ${errorRate}`)
  }

  if (bestK === MAX_HASH_FUNCTIONS && filterLengthFor(numKeys, errorRate, MAX_HASH_FUNCTIONS + 1) < lowestM) {
    throw new InvalidParametersError('BLOOM_FILTER_PARAMETERS_UNSATISFIABLE', `error rate ${errorRate} needs more than ${MAX_HASH_FUNCTIONS} hash functions`)
  }

  const length = Math.floor(lowestM) + 1
  if (length > MAX_FILTER_LENGTH) {
    throw new InvalidParametersError('BLOOM_FILTER_PARAMETERS_UNSATISFIABLE', `${numKeys} keys at error rate ${errorRate} need ${length} bits, more than ${MAX_FILTER_LENGTH}`)
  }

  return { length, numHashFuncs: bestK }
}
