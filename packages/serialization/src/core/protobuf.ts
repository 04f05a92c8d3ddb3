/**
 * Protobuf Wire Format
 *
 * Just enough of the proto3 wire format to write and read the transaction
 * envelopes: varint, length-delimited and fixed-width fields. Writers follow
 * proto3 rules and omit fields holding their default value; fields are
 * emitted in the order the caller writes them, which callers keep ascending.
 */

import type { Safe } from '@dasquare/types'
import { safeError, safeResult, safeTry } from '@dasquare/types'
import { concatBytes } from 'viem'
import { decodeUvarint, encodeUvarint } from './varint'

export enum WireType {
  VARINT = 0,
  FIXED64 = 1,
  LENGTH_DELIMITED = 2,
  START_GROUP = 3,
  END_GROUP = 4,
  FIXED32 = 5,
}

/**
 * A decoded field. Varints keep their full 64-bit value; every other wire
 * type keeps its raw bytes.
 */
export type ProtoField =
  | { fieldNumber: number; wireType: WireType.VARINT; value: bigint }
  | {
      fieldNumber: number
      wireType:
        | WireType.FIXED64
        | WireType.LENGTH_DELIMITED
        | WireType.FIXED32
      value: Uint8Array
    }

function tag(fieldNumber: number, wireType: WireType): Uint8Array {
  return encodeUvarint(fieldNumber * 8 + wireType)
}

/**
 * Accumulates encoded fields of one message
 */
export class ProtoWriter {
  private readonly parts: Uint8Array[] = []

  /** Write a bytes field, skipped when empty */
  bytes(fieldNumber: number, value: Uint8Array | undefined): this {
    if (!value || value.length === 0) return this
    return this.lengthDelimited(fieldNumber, value)
  }

  /** Write a string field, skipped when empty */
  string(fieldNumber: number, value: string): this {
    if (value.length === 0) return this
    return this.lengthDelimited(fieldNumber, new TextEncoder().encode(value))
  }

  /** Write a uint32 field, skipped when zero */
  uint32(fieldNumber: number, value: number): this {
    if (value === 0) return this
    this.parts.push(tag(fieldNumber, WireType.VARINT), encodeUvarint(value))
    return this
  }

  /** Write a packed repeated uint32 field, skipped when empty */
  packedUint32(fieldNumber: number, values: readonly number[]): this {
    if (values.length === 0) return this
    return this.lengthDelimited(
      fieldNumber,
      concatBytes(values.map((v) => encodeUvarint(v))),
    )
  }

  /** Write an embedded message; repeated elements are always written */
  message(fieldNumber: number, encoded: Uint8Array): this {
    return this.lengthDelimited(fieldNumber, encoded)
  }

  finish(): Uint8Array {
    return concatBytes(this.parts)
  }

  private lengthDelimited(fieldNumber: number, value: Uint8Array): this {
    this.parts.push(
      tag(fieldNumber, WireType.LENGTH_DELIMITED),
      encodeUvarint(value.length),
      value,
    )
    return this
  }
}

/**
 * Split an encoded message into its fields, in wire order
 */
export function readProtoFields(data: Uint8Array): Safe<ProtoField[]> {
  const fields: ProtoField[] = []
  let offset = 0
  while (offset < data.length) {
    const [tagError, tagResult] = decodeUvarint(data, offset)
    if (tagError) return safeError(tagError)
    offset += tagResult.bytesRead

    const fieldNumber = Number(tagResult.value >> 3n)
    const wireType = Number(tagResult.value & 7n)
    if (fieldNumber === 0) {
      return safeError(new Error('Invalid field number 0'))
    }

    switch (wireType) {
      case WireType.VARINT: {
        const [error, result] = decodeUvarint(data, offset)
        if (error) return safeError(error)
        offset += result.bytesRead
        fields.push({
          fieldNumber,
          wireType: WireType.VARINT,
          value: result.value,
        })
        break
      }
      case WireType.LENGTH_DELIMITED: {
        const [error, result] = decodeUvarint(data, offset)
        if (error) return safeError(error)
        offset += result.bytesRead
        if (result.value > BigInt(data.length - offset)) {
          return safeError(new Error('Truncated length-delimited field'))
        }
        const length = Number(result.value)
        fields.push({
          fieldNumber,
          wireType: WireType.LENGTH_DELIMITED,
          value: data.subarray(offset, offset + length),
        })
        offset += length
        break
      }
      case WireType.FIXED64:
      case WireType.FIXED32: {
        const fixed =
          wireType === WireType.FIXED64 ? WireType.FIXED64 : WireType.FIXED32
        const width = fixed === WireType.FIXED64 ? 8 : 4
        if (offset + width > data.length) {
          return safeError(new Error('Truncated fixed-width field'))
        }
        fields.push({
          fieldNumber,
          wireType: fixed,
          value: data.subarray(offset, offset + width),
        })
        offset += width
        break
      }
      default:
        return safeError(new Error(`Unsupported wire type ${wireType}`))
    }
  }
  return safeResult(fields)
}

/**
 * Decode the elements of a repeated uint32 field, accepting both the packed
 * and the unpacked encodings. Values wider than 32 bits are truncated the
 * way protobuf truncates them.
 */
export function readRepeatedUint32(field: ProtoField): Safe<number[]> {
  if (field.wireType === WireType.VARINT) {
    return safeResult([Number(field.value & 0xffffffffn)])
  }
  if (field.wireType !== WireType.LENGTH_DELIMITED) {
    return safeError(new Error('Unexpected wire type for uint32'))
  }
  const values: number[] = []
  let offset = 0
  while (offset < field.value.length) {
    const [error, result] = decodeUvarint(field.value, offset)
    if (error) return safeError(error)
    values.push(Number(result.value & 0xffffffffn))
    offset += result.bytesRead
  }
  return safeResult(values)
}

/**
 * Decode a string field, rejecting invalid UTF-8 as proto3 requires
 */
export function readString(field: ProtoField): Safe<string> {
  if (field.wireType !== WireType.LENGTH_DELIMITED) {
    return safeError(new Error('Unexpected wire type for string'))
  }
  const decoder = new TextDecoder('utf-8', { fatal: true })
  const bytes = field.value
  return safeTry(() => decoder.decode(bytes))
}

/**
 * Decode a bytes field
 */
export function readBytes(field: ProtoField): Safe<Uint8Array> {
  if (field.wireType !== WireType.LENGTH_DELIMITED) {
    return safeError(new Error('Unexpected wire type for bytes'))
  }
  return safeResult(field.value)
}

/**
 * Decode a uint32 field, truncating wider values the way protobuf does
 */
export function readUint32(field: ProtoField): Safe<number> {
  if (field.wireType !== WireType.VARINT) {
    return safeError(new Error('Unexpected wire type for uint32'))
  }
  return safeResult(Number(field.value & 0xffffffffn))
}
