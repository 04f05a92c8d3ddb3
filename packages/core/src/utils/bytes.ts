/**
 * Byte utilities
 *
 * Helpers for the fixed-layout buffers shares are made of.
 */

import { bytesToHex, concatBytes, type Hex } from 'viem'

export { concatBytes }

/**
 * Byte-wise lexicographic comparison, shorter input first on a shared prefix.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): -1 | 0 | 1 {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1
  }
  if (a.length === b.length) return 0
  return a.length < b.length ? -1 : 1
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0
}

/**
 * Encode a number as a 4-byte big-endian unsigned integer
 */
export function encodeUint32BE(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new Error(`Value ${value} does not fit in 4 bytes`)
  }
  const out = new Uint8Array(4)
  new DataView(out.buffer).setUint32(0, value, false)
  return out
}

/**
 * Decode a 4-byte big-endian unsigned integer starting at `offset`
 */
export function decodeUint32BE(bytes: Uint8Array, offset = 0): number {
  if (bytes.length < offset + 4) {
    throw new Error(
      `Insufficient data for 4-byte decoding (got ${bytes.length - offset} bytes)`,
    )
  }
  return new DataView(
    bytes.buffer,
    bytes.byteOffset + offset,
    4,
  ).getUint32(0, false)
}

export function toHex(bytes: Uint8Array): Hex {
  return bytesToHex(bytes)
}
