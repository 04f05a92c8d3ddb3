/**
 * Index Wrappers
 *
 * The square builder wraps each pay-for-blob transaction with the share
 * index at which each of its blobs starts.
 *
 * message IndexWrapper {
 *   bytes           tx            = 1;
 *   repeated uint32 share_indexes = 2;
 *   string          type_id       = 3;
 * }
 */

import {
  ProtoWriter,
  readBytes,
  readProtoFields,
  readRepeatedUint32,
  readString,
} from '@dasquare/serialization'
import {
  EnvelopeError,
  type EnvelopeMatch,
  INDEX_WRAPPER_TYPE_ID,
  type Safe,
  safeError,
  safeResult,
} from '@dasquare/types'

export interface IndexWrapper {
  tx: Uint8Array
  shareIndexes: number[]
  typeId: string
}

export function newIndexWrapper(
  tx: Uint8Array,
  ...shareIndexes: number[]
): IndexWrapper {
  return { tx, shareIndexes, typeId: INDEX_WRAPPER_TYPE_ID }
}

export function marshalIndexWrapper(
  tx: Uint8Array,
  ...shareIndexes: number[]
): Uint8Array {
  return encodeIndexWrapper(newIndexWrapper(tx, ...shareIndexes))
}

export function encodeIndexWrapper(wrapper: IndexWrapper): Uint8Array {
  return new ProtoWriter()
    .bytes(1, wrapper.tx)
    .packedUint32(2, wrapper.shareIndexes)
    .string(3, wrapper.typeId)
    .finish()
}

/** Encoded size of `wrapper` in bytes */
export function indexWrapperSize(wrapper: IndexWrapper): number {
  return encodeIndexWrapper(wrapper).length
}

/**
 * Decode an index wrapper
 *
 * Bytes that do not parse, or that lack the `INDX` type id, come back
 * unmatched. Share indexes that fail to decode under the right type id are
 * an `EnvelopeError`.
 */
export function unmarshalIndexWrapper(
  bytes: Uint8Array,
): Safe<EnvelopeMatch<IndexWrapper>, EnvelopeError> {
  const notMatched = { matched: false } as const
  const [error, fields] = readProtoFields(bytes)
  if (error) return safeResult(notMatched)

  let tx = new Uint8Array(0)
  let typeId = ''
  const indexFields = fields.filter((field) => field.fieldNumber === 2)

  for (const field of fields) {
    if (field.fieldNumber === 1) {
      const [fieldError, value] = readBytes(field)
      if (fieldError) return safeResult(notMatched)
      tx = value
    } else if (field.fieldNumber === 3) {
      const [fieldError, value] = readString(field)
      if (fieldError) return safeResult(notMatched)
      typeId = value
    }
  }

  if (typeId !== INDEX_WRAPPER_TYPE_ID) return safeResult(notMatched)

  const shareIndexes: number[] = []
  for (const field of indexFields) {
    const [indexError, values] = readRepeatedUint32(field)
    if (indexError) {
      return safeError(
        new EnvelopeError(`Invalid share indexes: ${indexError.message}`),
      )
    }
    shareIndexes.push(...values)
  }

  const match: EnvelopeMatch<IndexWrapper> = {
    matched: true,
    value: { tx: tx.slice(), shareIndexes, typeId },
  }
  return safeResult(match)
}
