/**
 * Anything that can describe itself as bytes can be used as a key.
 */
export interface ByteConvertible {
  toBytes (): Uint8Array
}

export type BloomKey = string | number | bigint | boolean | Uint8Array | ByteConvertible

export function toKeyBytes (key: BloomKey): Buffer {
  if (typeof key === 'string') {
    return Buffer.from(key, 'utf8')
  }
  if (typeof key === 'number' || typeof key === 'bigint' || typeof key === 'boolean') {
    return Buffer.from(String(key), 'utf8')
  }
  if (key instanceof Uint8Array) {
    return Buffer.from(key.buffer, key.byteOffset, key.byteLength)
  }
  return toKeyBytes(key.toBytes())
}

// String(salt) is the shortest text that round-trips the float, e.g. 0.5 -> "0.5"
export function saltToBytes (salt: number): Buffer {
  return Buffer.from(String(salt), 'utf8')
}
