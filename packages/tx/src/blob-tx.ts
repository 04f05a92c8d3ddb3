/**
 * Blob Transactions
 *
 * A blob transaction carries an inner transaction together with the blobs
 * it pays for. The `type_id` field holds a magic string so that ordinary
 * transactions which happen to parse as protobuf are not mistaken for one.
 *
 * message BlobTx {
 *   bytes              tx      = 1;
 *   repeated BlobProto blobs   = 2;
 *   string             type_id = 3;
 * }
 */

import {
  ProtoWriter,
  readBytes,
  readProtoFields,
  readString,
} from '@dasquare/serialization'
import type { Blob } from '@dasquare/shares'
import {
  BLOB_TX_TYPE_ID,
  EnvelopeError,
  type EnvelopeMatch,
  type Safe,
  safeError,
  safeResult,
} from '@dasquare/types'
import { marshalBlob, unmarshalBlob } from './blob-proto'

export interface BlobTx {
  tx: Uint8Array
  blobs: Blob[]
}

const NOT_MATCHED = { matched: false } as const

/**
 * Encode `tx` with the blobs it pays for. No checks are made on the inner
 * transaction.
 */
export function marshalBlobTx(
  tx: Uint8Array,
  ...blobs: Blob[]
): Safe<Uint8Array, EnvelopeError> {
  if (blobs.length === 0) {
    return safeError(new EnvelopeError('At least one blob must be provided'))
  }
  const writer = new ProtoWriter().bytes(1, tx)
  for (const blob of blobs) {
    writer.message(2, marshalBlob(blob))
  }
  return safeResult(writer.string(3, BLOB_TX_TYPE_ID).finish())
}

/**
 * Decode a blob transaction
 *
 * Bytes that do not parse, or that lack the `BLOB` type id, are some other
 * transaction and come back unmatched. Bytes with the type id but no blobs,
 * or with a blob that fails validation, are an `EnvelopeError`.
 */
export function unmarshalBlobTx(
  bytes: Uint8Array,
): Safe<EnvelopeMatch<BlobTx>, EnvelopeError> {
  const [error, fields] = readProtoFields(bytes)
  if (error) return safeResult(NOT_MATCHED)

  let tx = new Uint8Array(0)
  let typeId = ''
  const encodedBlobs: Uint8Array[] = []

  for (const field of fields) {
    if (field.fieldNumber === 1 || field.fieldNumber === 2) {
      const [fieldError, value] = readBytes(field)
      if (fieldError) return safeResult(NOT_MATCHED)
      if (field.fieldNumber === 1) tx = value
      else encodedBlobs.push(value)
    } else if (field.fieldNumber === 3) {
      const [fieldError, value] = readString(field)
      if (fieldError) return safeResult(NOT_MATCHED)
      typeId = value
    }
  }

  if (typeId !== BLOB_TX_TYPE_ID) return safeResult(NOT_MATCHED)
  if (encodedBlobs.length === 0) {
    return safeError(new EnvelopeError('No blobs provided'))
  }

  const blobs: Blob[] = []
  for (const [index, encoded] of encodedBlobs.entries()) {
    const [blobError, blob] = unmarshalBlob(encoded)
    if (blobError) {
      return safeError(
        new EnvelopeError(`Invalid blob at index ${index}: ${blobError.message}`, {
          index,
        }),
      )
    }
    blobs.push(blob)
  }

  const match: EnvelopeMatch<BlobTx> = {
    matched: true,
    value: { tx: tx.slice(), blobs },
  }
  return safeResult(match)
}
