import path from 'node:path'
import url from 'node:url'
import fs from 'node:fs/promises'
import { pino, type Logger } from 'pino'
import { BloomFilter, HASH_ALGORITHMS, createSeededRandom, type HashAlgorithm } from '../src/index.ts'

const __dirname = path.dirname(url.fileURLToPath(import.meta.url))

const CAPACITY = process.env.CAPACITY ? parseInt(process.env.CAPACITY) : 100_000
const ERROR_RATE = process.env.ERROR_RATE ? parseFloat(process.env.ERROR_RATE) : 0.01
const PROBES = process.env.PROBES ? parseInt(process.env.PROBES) : 100_000
const SEED = process.env.SEED ? parseInt(process.env.SEED) : 1

interface BenchmarkStats {
  hashAlgorithm: HashAlgorithm
  filterLength: number
  numHashFuncs: number
  addOpsPerSec: string
  checkOpsPerSec: string
  falsePositiveRate: string
  expectedFalsePositiveRate: string
}

function elapsedMs (startTime: [number, number]): number {
  const [seconds, nanoseconds] = process.hrtime(startTime)
  return seconds * 1000 + nanoseconds / 1000000
}

function opsPerSec (ops: number, ms: number): string {
  return (ops / (ms / 1000)).toFixed(0)
}

function runCase (hashAlgorithm: HashAlgorithm, logger: Logger): BenchmarkStats {
  const filter = new BloomFilter(CAPACITY, ERROR_RATE, { hashAlgorithm, random: createSeededRandom(SEED), logger })

  let startTime = process.hrtime()
  for (let i = 0; i < CAPACITY; i++) {
    filter.add(`member-${i}`)
  }
  const addMs = elapsedMs(startTime)

  let falsePositives = 0
  startTime = process.hrtime()
  for (let i = 0; i < PROBES; i++) {
    if (filter.check(`stranger-${i}`)) falsePositives++
  }
  const checkMs = elapsedMs(startTime)

  return {
    hashAlgorithm,
    filterLength: filter.filterLength,
    numHashFuncs: filter.numHashFuncs,
    addOpsPerSec: opsPerSec(CAPACITY, addMs),
    checkOpsPerSec: opsPerSec(PROBES, checkMs),
    falsePositiveRate: (falsePositives / PROBES).toFixed(5),
    expectedFalsePositiveRate: filter.estimateFalsePositiveRate().toFixed(5)
  }
}

async function runBenchmark () {
  const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' })
  const results: BenchmarkStats[] = []

  for (const hashAlgorithm of HASH_ALGORITHMS) {
    console.log(`\nRunning case: ${hashAlgorithm} (capacity ${CAPACITY}, error rate ${ERROR_RATE})`)
    results.push(runCase(hashAlgorithm, logger))
  }

  console.log('\nBenchmark Results:')
  console.log('==================')
  console.log(JSON.stringify(results, null, 2))

  await fs.mkdir(path.join(__dirname, '/result'), { recursive: true })
  await fs.writeFile(path.join(__dirname, '/result', 'data.json'), JSON.stringify(results, null, 2))
  console.log('\nBenchmark results written')
}

console.log('Starting benchmark...')
runBenchmark().catch(console.error)
