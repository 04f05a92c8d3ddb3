import { concatBytes, decodeUint32BE, encodeUint32BE } from '@dasquare/core'
import { Blob, Namespace } from '@dasquare/shares'
import { marshalBlobTx } from '@dasquare/tx'
import { type PfbDecoder, type Safe, safeResult } from '@dasquare/types'

export function unwrap<T>(result: Safe<T, Error>): T {
  const [error, value] = result
  if (error) throw error
  return value
}

/** Ordinary transaction bytes; a leading zero never parses as protobuf */
export function patterned(length: number, seed = 0): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (i + seed) % 251)
}

/** Version zero namespace outside the reserved ranges */
export function userNamespace(n: number): Namespace {
  const subId = new Uint8Array(10)
  subId[0] = 1
  subId[9] = n
  return unwrap(Namespace.v0(subId))
}

export function blobV0(n: number, length: number, seed = 0): Blob {
  return unwrap(Blob.v0(userNamespace(n), patterned(length, seed)))
}

/**
 * Blob transaction whose inner transaction is the big-endian data length of
 * each blob, which is what `sizesDecoder` reads back
 */
export function blobTx(...blobs: Blob[]): Uint8Array {
  return unwrap(marshalBlobTx(innerTx(...blobs), ...blobs))
}

export function innerTx(...blobs: Blob[]): Uint8Array {
  return concatBytes(blobs.map((blob) => encodeUint32BE(blob.dataLen)))
}

export const sizesDecoder: PfbDecoder = (tx) =>
  safeResult(
    Array.from({ length: tx.length / 4 }, (_, i) => decodeUint32BE(tx, i * 4)),
  )
