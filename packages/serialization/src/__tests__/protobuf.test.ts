import { describe, expect, it } from 'vitest'
import {
  type ProtoField,
  ProtoWriter,
  readBytes,
  readProtoFields,
  readRepeatedUint32,
  readString,
  readUint32,
  WireType,
} from '../core/protobuf'

function fieldAt(fields: ProtoField[] | undefined, index: number): ProtoField {
  const field = fields?.[index]
  if (!field) throw new Error(`Missing field at ${index}`)
  return field
}

describe('Protobuf Wire Format', () => {
  describe('ProtoWriter', () => {
    it('should write bytes and uint32 fields with their tags', () => {
      const encoded = new ProtoWriter()
        .bytes(1, new Uint8Array([1, 2]))
        .uint32(3, 5)
        .finish()

      expect(Array.from(encoded)).toEqual([0x0a, 0x02, 1, 2, 0x18, 0x05])
    })

    it('should omit default values', () => {
      const encoded = new ProtoWriter()
        .bytes(1, new Uint8Array(0))
        .bytes(2, undefined)
        .uint32(3, 0)
        .string(4, '')
        .packedUint32(5, [])
        .finish()

      expect(encoded.length).toBe(0)
    })

    it('should pack repeated uint32 values', () => {
      const encoded = new ProtoWriter().packedUint32(2, [1, 300]).finish()
      expect(Array.from(encoded)).toEqual([0x12, 0x03, 0x01, 0xac, 0x02])
    })

    it('should write strings as UTF-8', () => {
      const encoded = new ProtoWriter().string(3, 'INDX').finish()
      expect(Array.from(encoded)).toEqual([0x1a, 0x04, 73, 78, 68, 88])
    })

    it('should always write embedded messages', () => {
      const encoded = new ProtoWriter().message(2, new Uint8Array(0)).finish()
      expect(Array.from(encoded)).toEqual([0x12, 0x00])
    })
  })

  describe('readProtoFields', () => {
    it('should read back what the writer produced', () => {
      const encoded = new ProtoWriter()
        .bytes(1, new Uint8Array([9]))
        .packedUint32(2, [7, 16384])
        .string(3, 'BLOB')
        .finish()

      const [error, fields] = readProtoFields(encoded)
      expect(error).toBeUndefined()
      expect(fields?.map((f) => f.fieldNumber)).toEqual([1, 2, 3])

      const [indexError, indexes] = readRepeatedUint32(fieldAt(fields, 1))
      expect(indexError).toBeUndefined()
      expect(indexes).toEqual([7, 16384])

      const [stringError, typeId] = readString(fieldAt(fields, 2))
      expect(stringError).toBeUndefined()
      expect(typeId).toBe('BLOB')
    })

    it('should accept unpacked repeated values', () => {
      const [, fields] = readProtoFields(new Uint8Array([0x10, 0x05]))
      expect(fields?.[0].wireType).toBe(WireType.VARINT)
      const [, values] = readRepeatedUint32(fieldAt(fields, 0))
      expect(values).toEqual([5])
    })

    it('should fail on a length prefix running past the end', () => {
      const [error] = readProtoFields(new Uint8Array([0x0a, 0x05, 1]))
      expect(error?.message).toBe('Truncated length-delimited field')
    })

    it('should fail on group wire types', () => {
      const [error] = readProtoFields(new Uint8Array([0x0b]))
      expect(error?.message).toBe('Unsupported wire type 3')
    })

    it('should fail on field number zero', () => {
      const [error] = readProtoFields(new Uint8Array([0x02, 0x00]))
      expect(error).toBeInstanceOf(Error)
    })
  })

  describe('readString', () => {
    it('should reject invalid UTF-8', () => {
      const [, fields] = readProtoFields(new Uint8Array([0x1a, 0x01, 0xff]))
      const [error] = readString(fieldAt(fields, 0))
      expect(error).toBeInstanceOf(Error)
    })
  })

  describe('typed field readers', () => {
    const [, fields] = readProtoFields(new Uint8Array([0x08, 0x96, 0x01, 0x12, 0x01, 0x07]))

    it('should read a uint32 and a bytes field', () => {
      expect(readUint32(fieldAt(fields, 0))).toEqual([undefined, 150])
      expect(Array.from(readBytes(fieldAt(fields, 1))[1] ?? [])).toEqual([7])
    })

    it('should reject a field of the wrong wire type', () => {
      expect(readBytes(fieldAt(fields, 0))[0]?.message).toBe('Unexpected wire type for bytes')
      expect(readUint32(fieldAt(fields, 1))[0]?.message).toBe('Unexpected wire type for uint32')
    })
  })
})
