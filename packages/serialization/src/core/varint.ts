/**
 * Unsigned Varint Serialization
 *
 * Little-endian base-128 encoding: seven data bits per byte, the high bit set
 * on every byte except the last. This is the protobuf `uint64` encoding and
 * the length delimiter prefixed to every unit in compact shares.
 */

import type { Safe } from '@dasquare/types'
import { safeError, safeResult } from '@dasquare/types'

/** Longest encoding of a 64-bit value */
export const MAX_VARINT_LEN_64 = 10

const MAX_UINT64 = 2n ** 64n - 1n

/**
 * Encode an unsigned integer
 *
 * @param value - Non-negative integer below 2^64
 * @returns Encoded octet sequence (1-10 bytes)
 */
export function encodeUvarint(value: number | bigint): Uint8Array {
  let remaining = BigInt(value)
  if (remaining < 0n) throw new Error(`Varint cannot be negative: ${value}`)
  if (remaining > MAX_UINT64) throw new Error('Varint exceeds 64 bits')

  const out: number[] = []
  while (remaining >= 0x80n) {
    out.push(Number(remaining & 0x7fn) | 0x80)
    remaining >>= 7n
  }
  out.push(Number(remaining))
  return new Uint8Array(out)
}

/**
 * Number of bytes `encodeUvarint(value)` produces, without encoding
 */
export function uvarintSize(value: number | bigint): number {
  let remaining = BigInt(value)
  let size = 1
  while (remaining >= 0x80n) {
    remaining >>= 7n
    size++
  }
  return size
}

/**
 * Decode an unsigned integer starting at `offset`
 *
 * Fails on truncated input and on encodings that overflow 64 bits.
 */
export function decodeUvarint(
  data: Uint8Array,
  offset = 0,
): Safe<{ value: bigint; bytesRead: number }> {
  let value = 0n
  let shift = 0n
  for (let i = 0; i < MAX_VARINT_LEN_64; i++) {
    if (offset + i >= data.length) {
      return safeError(new Error('Truncated varint'))
    }
    const byte = data[offset + i]
    if (byte < 0x80) {
      if (i === MAX_VARINT_LEN_64 - 1 && byte > 1) {
        return safeError(new Error('Varint overflows a 64-bit integer'))
      }
      value |= BigInt(byte) << shift
      return safeResult({ value, bytesRead: i + 1 })
    }
    value |= BigInt(byte & 0x7f) << shift
    shift += 7n
  }
  return safeError(new Error('Varint overflows a 64-bit integer'))
}

/**
 * Prefix `unit` with its length as a varint
 */
export function encodeDelimited(unit: Uint8Array): Uint8Array {
  const delimiter = encodeUvarint(unit.length)
  const out = new Uint8Array(delimiter.length + unit.length)
  out.set(delimiter, 0)
  out.set(unit, delimiter.length)
  return out
}
