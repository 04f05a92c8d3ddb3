import { describe, expect, it } from 'vitest'
import {
  INTERMEDIATE_STATE_ROOTS_NAMESPACE,
  MAX_PRIMARY_RESERVED_NAMESPACE,
  MIN_SECONDARY_RESERVED_NAMESPACE,
  Namespace,
  PARITY_SHARES_NAMESPACE,
  PAY_FOR_BLOB_NAMESPACE,
  PAY_FOR_FIBRE_NAMESPACE,
  PRIMARY_RESERVED_PADDING_NAMESPACE,
  TAIL_PADDING_NAMESPACE,
  TX_NAMESPACE,
} from '../namespace'
import { InvalidNamespaceError, NAMESPACE_SIZE } from '@dasquare/types'
import { userNamespace as v0 } from './helpers'

const userNamespace = (subId: number[]): Namespace => v0(...subId)

describe('Namespace', () => {
  describe('construction', () => {
    it('should left-pad a version zero sub id', () => {
      const [, namespace] = Namespace.v0(Uint8Array.from([1, 2, 3]))
      if (!namespace) throw new Error('Expected a namespace')
      expect(namespace.bytes.length).toBe(NAMESPACE_SIZE)
      expect(namespace.version).toBe(0)
      expect(Array.from(namespace.bytes.subarray(26))).toEqual([1, 2, 3])
      expect(namespace.bytes.subarray(0, 26).every((b) => b === 0)).toBe(true)
    })

    it('should reject a sub id longer than 10 bytes', () => {
      const [error] = Namespace.v0(new Uint8Array(11))
      expect(error).toBeInstanceOf(InvalidNamespaceError)
      expect(error?.message).toBe('subID must be <= 10 bytes, but it was 11 bytes')
    })

    it('should reject unsupported versions', () => {
      const [error] = Namespace.create(1, new Uint8Array(28))
      expect(error?.message).toBe('Unsupported namespace version 1')
    })

    it('should reject ids of the wrong length', () => {
      const [error] = Namespace.create(0, new Uint8Array(27))
      expect(error).toBeInstanceOf(InvalidNamespaceError)
    })

    it('should reject a version zero id without the zero prefix', () => {
      const id = new Uint8Array(28)
      id[0] = 1
      const [error] = Namespace.create(0, id)
      expect(error).toBeInstanceOf(InvalidNamespaceError)
    })

    it('should accept any id under the max version', () => {
      const [error, namespace] = Namespace.create(255, new Uint8Array(28).fill(7))
      expect(error).toBeUndefined()
      expect(namespace?.version).toBe(255)
    })

    it('should parse its own bytes', () => {
      const namespace = userNamespace([9])
      const [error, parsed] = Namespace.fromBytes(namespace.bytes)
      expect(error).toBeUndefined()
      expect(parsed?.equals(namespace)).toBe(true)
    })

    it('should reject raw bytes of the wrong length', () => {
      const [error] = Namespace.fromBytes(new Uint8Array(28))
      expect(error?.message).toBe('Invalid namespace length: 28. Must be 29 bytes')
    })
  })

  describe('reserved namespaces', () => {
    it('should encode the protocol constants', () => {
      expect(TX_NAMESPACE.toString()).toBe(`0x${'00'.repeat(28)}01`)
      expect(INTERMEDIATE_STATE_ROOTS_NAMESPACE.toString()).toBe(`0x${'00'.repeat(28)}02`)
      expect(PAY_FOR_BLOB_NAMESPACE.toString()).toBe(`0x${'00'.repeat(28)}04`)
      expect(PAY_FOR_FIBRE_NAMESPACE.toString()).toBe(`0x${'00'.repeat(28)}05`)
      expect(PRIMARY_RESERVED_PADDING_NAMESPACE.toString()).toBe(`0x${'00'.repeat(28)}ff`)
      expect(MIN_SECONDARY_RESERVED_NAMESPACE.toString()).toBe(`0x${'ff'.repeat(28)}00`)
      expect(TAIL_PADDING_NAMESPACE.toString()).toBe(`0x${'ff'.repeat(28)}fe`)
      expect(PARITY_SHARES_NAMESPACE.toString()).toBe(`0x${'ff'.repeat(29)}`)
    })

    it('should classify compact namespaces', () => {
      expect(TX_NAMESPACE.isCompact()).toBe(true)
      expect(PAY_FOR_BLOB_NAMESPACE.isCompact()).toBe(true)
      expect(PAY_FOR_FIBRE_NAMESPACE.isCompact()).toBe(true)
      expect(INTERMEDIATE_STATE_ROOTS_NAMESPACE.isCompact()).toBe(false)
      expect(userNamespace([1]).isCompact()).toBe(false)
    })

    it('should answer the reservation predicates', () => {
      const user = userNamespace([1])
      expect(TX_NAMESPACE.isPrimaryReserved()).toBe(true)
      expect(MAX_PRIMARY_RESERVED_NAMESPACE.isPrimaryReserved()).toBe(true)
      expect(user.isReserved()).toBe(false)
      expect(TAIL_PADDING_NAMESPACE.isSecondaryReserved()).toBe(true)
      expect(PARITY_SHARES_NAMESPACE.isParityShares()).toBe(true)
      expect(TAIL_PADDING_NAMESPACE.isUsableNamespace()).toBe(false)
      expect(PRIMARY_RESERVED_PADDING_NAMESPACE.isPrimaryReservedPadding()).toBe(true)
      expect(PAY_FOR_FIBRE_NAMESPACE.isPayForFibre()).toBe(true)
      expect(PAY_FOR_BLOB_NAMESPACE.isPayForFibre()).toBe(false)
    })
  })

  describe('ordering', () => {
    it('should order reserved and user namespaces', () => {
      const ordered = [
        TX_NAMESPACE,
        PAY_FOR_BLOB_NAMESPACE,
        PRIMARY_RESERVED_PADDING_NAMESPACE,
        userNamespace([1]),
        userNamespace([2]),
        TAIL_PADDING_NAMESPACE,
        PARITY_SHARES_NAMESPACE,
      ]
      for (let i = 1; i < ordered.length; i++) {
        expect(ordered[i - 1].isLessThan(ordered[i])).toBe(true)
        expect(ordered[i].isGreaterThan(ordered[i - 1])).toBe(true)
      }
    })

    it('should treat equal namespaces as neither less nor greater', () => {
      const a = userNamespace([5])
      const b = userNamespace([5])
      expect(a.compare(b)).toBe(0)
      expect(a.isLessOrEqualThan(b)).toBe(true)
      expect(a.isGreaterOrEqualThan(b)).toBe(true)
      expect(a.isLessThan(b)).toBe(false)
    })
  })

  describe('validation for use', () => {
    it('should accept a user namespace for blobs', () => {
      const [error] = userNamespace([1]).validateForBlob()
      expect(error).toBeUndefined()
    })

    it('should reject reserved namespaces for blobs', () => {
      const [error] = TX_NAMESPACE.validateForBlob()
      expect(error?.message).toBe(
        `Invalid data namespace (${TX_NAMESPACE.toString()}): reserved data is forbidden`,
      )
    })

    it('should reject tail padding for data', () => {
      const [error] = TAIL_PADDING_NAMESPACE.validateForData()
      expect(error).toBeInstanceOf(InvalidNamespaceError)
    })
  })

  describe('addInt', () => {
    it('should add and subtract as a big-endian integer', () => {
      const [, next] = userNamespace([1, 0xff]).addInt(1)
      expect(Array.from(next?.bytes.subarray(27) ?? [])).toEqual([2, 0])

      const [, previous] = TX_NAMESPACE.addInt(-1)
      expect(previous?.bytes.every((b) => b === 0)).toBe(true)
    })

    it('should fail on overflow', () => {
      const [error] = PARITY_SHARES_NAMESPACE.addInt(1)
      expect(error?.message).toBe('Namespace overflow')
    })
  })

  it('should repeat into independent copies', () => {
    const copies = TX_NAMESPACE.repeat(3)
    expect(copies).toHaveLength(3)
    copies[0].bytes[28] = 9
    expect(copies[1].isTx()).toBe(true)
    expect(TX_NAMESPACE.isTx()).toBe(true)
  })
})
