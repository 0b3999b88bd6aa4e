import { BloomFilter } from './lib/bloom-filter.ts'

export { BloomFilter, createBloomFilter, type BloomFilterStats } from './lib/bloom-filter.ts'
export { calculateFilterParameters, filterLengthFor, type FilterParameters } from './lib/parameters.ts'
export { createSalts, createSeededRandom, type RandomSource } from './lib/salts.ts'
export { getCells, foldDigest, createDigest, sha1Digest, createXxh3Digest, type Digest } from './lib/cells.ts'
export { toKeyBytes, type BloomKey, type ByteConvertible } from './lib/utils.ts'
export { BloomFilterError, InvalidParametersError, CapacityExceededError, type InvalidParametersCode } from './lib/errors.ts'
export {
  validateBloomFilterOptions,
  defaultBloomFilterOptions,
  DEFAULT_BLOOM_FILTER_CAPACITY,
  DEFAULT_BLOOM_FILTER_ERROR_RATE,
  DEFAULT_HASH_ALGORITHM,
  MAX_HASH_FUNCTIONS,
  MAX_FILTER_LENGTH,
  HASH_ALGORITHMS,
  type BloomFilterOptions,
  type ResolvedBloomFilterOptions,
  type HashAlgorithm
} from './lib/options.ts'

export default BloomFilter
