import { createHash } from 'node:crypto'
import { xxh3 } from '@node-rs/xxhash'
import type { HashAlgorithm } from './options.ts'
import { saltToBytes } from './utils.ts'

/**
 * Hashes key+salt bytes. The output must be a whole number of 32-bit words.
 */
export type Digest = (input: Buffer) => Buffer

export function sha1Digest (input: Buffer): Buffer {
  return createHash('sha1').update(input).digest()
}

export function createXxh3Digest (): Digest {
  const hasher = xxh3.Xxh3.withSeed()
  const output = Buffer.alloc(8)

  return function xxh3Digest (input: Buffer): Buffer {
    hasher.reset()
    output.writeBigUInt64BE(hasher.update(input).digest())
    return output
  }
}

export function createDigest (algorithm: HashAlgorithm): Digest {
  switch (algorithm) {
    case 'sha1':
      return sha1Digest
    case 'xxh3':
      return createXxh3Digest()
  }
}

/**
 * XOR of the big-endian 32-bit words of `digest`, starting from `blankVector`.
 */
export function foldDigest (digest: Buffer, blankVector: number): number {
  let folded = blankVector >>> 0
  for (let offset = 0; offset + 4 <= digest.length; offset += 4) {
    folded = (folded ^ digest.readUInt32BE(offset)) >>> 0
  }
  return folded
}

/**
 * Bit positions of a key, one per salt, in salt order. Positions may repeat.
 */
export function getCells (keyBytes: Buffer, filterLength: number, blankVector: number, salts: readonly number[], digest: Digest = sha1Digest): number[] {
  const cells: number[] = []

  for (const salt of salts) {
    const hash = digest(Buffer.concat([keyBytes, saltToBytes(salt)]))
    cells.push(foldDigest(hash, blankVector) % filterLength)
  }

  return cells
}
