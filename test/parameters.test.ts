import { test, describe } from 'node:test'
import assert from 'node:assert/strict'

import { calculateFilterParameters, filterLengthFor } from '../src/lib/parameters.ts'
import { InvalidParametersError } from '../src/lib/errors.ts'

describe('calculateFilterParameters', () => {
  test('should pick the shortest filter over k in [1, 100]', () => {
    const cases = [
      { numKeys: 100, errorRate: 0.01, length: 960, numHashFuncs: 7 },
      { numKeys: 1000, errorRate: 0.01, length: 9593, numHashFuncs: 7 },
      { numKeys: 2, errorRate: 0.1, length: 10, numHashFuncs: 3 },
      { numKeys: 500, errorRate: 0.05, length: 3124, numHashFuncs: 4 },
      { numKeys: 2000, errorRate: 0.001, length: 28756, numHashFuncs: 10 },
      { numKeys: 50, errorRate: 0.2, length: 169, numHashFuncs: 2 },
      { numKeys: 1, errorRate: 0.5, length: 2, numHashFuncs: 1 },
      { numKeys: 3, errorRate: 0.999, length: 1, numHashFuncs: 1 },
      { numKeys: 1_000_000, errorRate: 0.01, length: 9592955, numHashFuncs: 7 }
    ]

    for (const { numKeys, errorRate, length, numHashFuncs } of cases) {
      assert.deepStrictEqual(
        calculateFilterParameters(numKeys, errorRate),
        { length, numHashFuncs },
        `${numKeys} keys at ${errorRate}`
      )
    }
  })

  test('should be deterministic', () => {
    assert.deepStrictEqual(calculateFilterParameters(12345, 0.003), calculateFilterParameters(12345, 0.003))
  })

  test('should accept an optimum sitting on the hash function bound', () => {
    // optimal k for 1e-30 is ~99.7, so k = 100 is a real minimum
    assert.deepStrictEqual(calculateFilterParameters(10, 1e-30), { length: 1438, numHashFuncs: 100 })
  })

  test('should reject error rates needing more than 100 hash functions', () => {
    for (const errorRate of [1e-31, 1e-40, 1e-300]) {
      assert.throws(() => calculateFilterParameters(10, errorRate), (err: unknown) => {
        assert.ok(err instanceof InvalidParametersError)
        assert.equal(err.code, 'BLOOM_FILTER_PARAMETERS_UNSATISFIABLE')
        return true
      }, `error rate ${errorRate}`)
    }
  })

  test('should reject filters longer than 2^32 bits', () => {
    assert.throws(() => calculateFilterParameters(1_000_000_000, 0.001), { code: 'BLOOM_FILTER_PARAMETERS_UNSATISFIABLE' })
  })

  test('should reject invalid capacity', () => {
    for (const numKeys of [0, -1, 1.5, Number.NaN, Number.POSITIVE_INFINITY]) {
      assert.throws(() => calculateFilterParameters(numKeys, 0.01), { code: 'BLOOM_FILTER_INVALID_CAPACITY' }, `capacity ${numKeys}`)
    }
  })

  test('should reject invalid error rate', () => {
    for (const errorRate of [0, 1, -0.1, 1.5, Number.NaN]) {
      assert.throws(() => calculateFilterParameters(100, errorRate), { code: 'BLOOM_FILTER_INVALID_ERROR_RATE' }, `error rate ${errorRate}`)
    }
  })
})

describe('filterLengthFor', () => {
  test('should follow m = -k * n / ln(1 - p^(1/k))', () => {
    assert.equal(filterLengthFor(100, 0.5, 1), -100 / Math.log(0.5))
    assert.ok(filterLengthFor(100, 0.01, 7) < filterLengthFor(100, 0.01, 6))
    assert.ok(filterLengthFor(100, 0.01, 7) < filterLengthFor(100, 0.01, 8))
  })
})
