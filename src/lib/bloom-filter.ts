import type { Logger } from 'pino'
import { getCells, createDigest, type Digest } from './cells.ts'
import { CapacityExceededError } from './errors.ts'
import { defaultBloomFilterOptions, validateBloomFilterOptions, type BloomFilterOptions, type HashAlgorithm } from './options.ts'
import { calculateFilterParameters } from './parameters.ts'
import { createSalts } from './salts.ts'
import { toKeyBytes, type BloomKey } from './utils.ts'

export interface BloomFilterStats {
  capacity: number
  keyCount: number
  filterLength: number
  numHashFuncs: number
  byteSize: number
  bitsSet: number
  fillRatio: number
  hashAlgorithm: HashAlgorithm
}

/**
 * A Bloom filter is a space-efficient probabilistic data structure used to test whether an element is a member of a set.
 * False positive matches are possible, but false negatives are not.
 * Keys are hashed once per salt; the filter holds at most `capacity` insertions.
 */
export class BloomFilter {
  readonly capacity: number
  readonly errorRate: number
  readonly filterLength: number
  readonly numHashFuncs: number
  readonly hashAlgorithm: HashAlgorithm
  readonly blankVector = 0

  private bitArray: Uint8Array
  private saltValues: readonly number[]
  private count = 0
  private digest: Digest
  private logger: Logger | undefined

  /**
   * Creates a new Bloom filter
   * @param capacity The maximum number of keys to be inserted
   * @param errorRate The desired false positive rate once full (between 0 and 1)
   */
  constructor (capacity: number, errorRate: number, options: Omit<BloomFilterOptions, 'capacity' | 'errorRate'> = {}) {
    const resolved = validateBloomFilterOptions({ ...options, capacity, errorRate })
    const { length, numHashFuncs } = calculateFilterParameters(resolved.capacity, resolved.errorRate)

    this.capacity = resolved.capacity
    this.errorRate = resolved.errorRate
    this.filterLength = length
    this.numHashFuncs = numHashFuncs
    this.hashAlgorithm = resolved.hashAlgorithm
    this.logger = resolved.logger

    this.saltValues = Object.freeze(createSalts(numHashFuncs, resolved.random))
    this.digest = createDigest(resolved.hashAlgorithm)

    // Initialize bit array
    this.bitArray = new Uint8Array(Math.ceil(this.filterLength / 8))

    this.logger?.debug({
      capacity: this.capacity,
      errorRate: this.errorRate,
      filterLength: this.filterLength,
      numHashFuncs: this.numHashFuncs,
      hashAlgorithm: this.hashAlgorithm
    }, 'BloomFilter created')
  }

  get keyCount (): number {
    return this.count
  }

  get salts (): number[] {
    return [...this.saltValues]
  }

  get isFull (): boolean {
    return this.count >= this.capacity
  }

  /**
   * Adds a key to the Bloom filter. Every call counts against capacity, duplicates included.
   * @throws CapacityExceededError when the filter already holds `capacity` keys
   */
  add (key: BloomKey): void {
    if (this.isFull) {
      this.logger?.warn({ capacity: this.capacity, keyCount: this.count }, 'BloomFilter capacity exceeded')
      throw new CapacityExceededError(this.capacity)
    }

    const positions = this.positions(key)
    this.count++
    for (const position of positions) {
      this.setBit(position)
    }
  }

  /**
   * Tests if a key might be in the set
   * @returns true if the key might be in the set, false if it definitely isn't
   */
  check (key: BloomKey): boolean {
    const positions = this.positions(key)
    return positions.every(position => this.getBit(position))
  }

  /**
   * Gets all bit positions for a key
   */
  positions (key: BloomKey): number[] {
    return getCells(toKeyBytes(key), this.filterLength, this.blankVector, this.saltValues, this.digest)
  }

  /**
   * Gets the false positive probability after `numElements` insertions
   */
  estimateFalsePositiveRate (numElements: number = this.count): number {
    return Math.pow(1 - Math.exp(-this.numHashFuncs * numElements / this.filterLength), this.numHashFuncs)
  }

  getStats (): BloomFilterStats {
    const bitsSet = this.countSetBits()
    return {
      capacity: this.capacity,
      keyCount: this.count,
      filterLength: this.filterLength,
      numHashFuncs: this.numHashFuncs,
      byteSize: this.bitArray.byteLength,
      bitsSet,
      fillRatio: bitsSet / this.filterLength,
      hashAlgorithm: this.hashAlgorithm
    }
  }

  private countSetBits (): number {
    let bits = 0
    for (const byte of this.bitArray) {
      let b = byte
      while (b) {
        bits += b & 1
        b >>>= 1
      }
    }
    return bits
  }

  /**
   * Sets a bit in the bit array
   */
  private setBit (position: number): void {
    const byteIndex = position >>> 3
    const bitOffset = position & 7
    this.bitArray[byteIndex] |= (1 << bitOffset)
  }

  /**
   * Gets a bit from the bit array
   */
  private getBit (position: number): boolean {
    const byteIndex = position >>> 3
    const bitOffset = position & 7
    return (this.bitArray[byteIndex] & (1 << bitOffset)) !== 0
  }
}

/**
 * Builds a filter from an options object, e.g. one loaded from configuration.
 * Missing capacity and error rate fall back to the defaults.
 */
export function createBloomFilter (options: Partial<BloomFilterOptions> = {}): BloomFilter {
  const {
    capacity = defaultBloomFilterOptions.capacity,
    errorRate = defaultBloomFilterOptions.errorRate,
    ...rest
  } = options
  return new BloomFilter(capacity, errorRate, rest)
}
