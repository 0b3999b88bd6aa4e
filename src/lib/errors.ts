/**
 * Errors raised by the filter. Every error carries a stable `code` so callers
 * can branch on it without matching messages.
 */

export class BloomFilterError extends Error {
  readonly code: string

  constructor (code: string, message: string) {
    super(message)
    this.name = 'BloomFilterError'
    this.code = code
    Error.captureStackTrace(this, this.constructor)
  }
}

export type InvalidParametersCode =
  | 'BLOOM_FILTER_INVALID_CAPACITY'
  | 'BLOOM_FILTER_INVALID_ERROR_RATE'
  | 'BLOOM_FILTER_INVALID_HASH_ALGORITHM'
  | 'BLOOM_FILTER_INVALID_RANDOM_SOURCE'
  | 'BLOOM_FILTER_PARAMETERS_UNSATISFIABLE'

export class InvalidParametersError extends BloomFilterError {
  declare readonly code: InvalidParametersCode

  constructor (code: InvalidParametersCode, message: string) {
    super(code, message)
    this.name = 'InvalidParametersError'
  }
}

export class CapacityExceededError extends BloomFilterError {
  readonly capacity: number

  constructor (capacity: number) {
    super('BLOOM_FILTER_CAPACITY_EXCEEDED', `Bloom filter is full: capacity of ${capacity} keys reached`)
    this.name = 'CapacityExceededError'
    this.capacity = capacity
  }
}
