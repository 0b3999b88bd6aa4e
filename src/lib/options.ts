import type { Logger } from 'pino'
import { InvalidParametersError } from './errors.ts'
import type { RandomSource } from './salts.ts'

export const DEFAULT_BLOOM_FILTER_CAPACITY = 100_000
export const DEFAULT_BLOOM_FILTER_ERROR_RATE = 0.01
export const DEFAULT_HASH_ALGORITHM = 'sha1'
export const MAX_HASH_FUNCTIONS = 100
// positions come from a 32-bit fold, so no bit past this one can be addressed
export const MAX_FILTER_LENGTH = 2 ** 32

export const HASH_ALGORITHMS = ['sha1', 'xxh3'] as const
export type HashAlgorithm = typeof HASH_ALGORITHMS[number]

export interface BloomFilterOptions {
  capacity: number
  errorRate: number

  // changing it changes every bit position, keep it fixed for comparable filters
  hashAlgorithm?: HashAlgorithm
  // Override the salt randomness, e.g. createSeededRandom(seed) for reproducible filters
  random?: RandomSource
  logger?: Logger
}

export type ResolvedBloomFilterOptions = Required<Omit<BloomFilterOptions, 'logger'>> & Pick<BloomFilterOptions, 'logger'>

export const defaultBloomFilterOptions: Omit<ResolvedBloomFilterOptions, 'random'> = {
  capacity: DEFAULT_BLOOM_FILTER_CAPACITY,
  errorRate: DEFAULT_BLOOM_FILTER_ERROR_RATE,
  hashAlgorithm: DEFAULT_HASH_ALGORITHM
}

export function isHashAlgorithm (value: unknown): value is HashAlgorithm {
  return HASH_ALGORITHMS.some(algorithm => algorithm === value)
}

export function validateCapacity (capacity: unknown): number {
  if (typeof capacity !== 'number' || !Number.isSafeInteger(capacity) || capacity <= 0) {
    throw new InvalidParametersError('BLOOM_FILTER_INVALID_CAPACITY', `capacity must be a positive integer, got ${String(capacity)}`)
  }
  return capacity
}

export function validateErrorRate (errorRate: unknown): number {
  if (typeof errorRate !== 'number' || !Number.isFinite(errorRate) || errorRate <= 0 || errorRate >= 1) {
    throw new InvalidParametersError('BLOOM_FILTER_INVALID_ERROR_RATE', `errorRate must be strictly between 0 and 1, got ${String(errorRate)}`)
  }
  return errorRate
}

export function validateBloomFilterOptions (options: BloomFilterOptions): ResolvedBloomFilterOptions {
  const hashAlgorithm = options.hashAlgorithm ?? defaultBloomFilterOptions.hashAlgorithm
  if (!isHashAlgorithm(hashAlgorithm)) {
    throw new InvalidParametersError('BLOOM_FILTER_INVALID_HASH_ALGORITHM', `hashAlgorithm must be one of ${HASH_ALGORITHMS.join(', ')}, got ${String(hashAlgorithm)}`)
  }

  if (options.random !== undefined && typeof options.random !== 'function') {
    throw new InvalidParametersError('BLOOM_FILTER_INVALID_RANDOM_SOURCE', 'random must be a function returning numbers in [0, 1)')
  }

  return {
    capacity: validateCapacity(options.capacity),
    errorRate: validateErrorRate(options.errorRate),
    hashAlgorithm,
    random: options.random ?? Math.random,
    logger: options.logger
  }
}
