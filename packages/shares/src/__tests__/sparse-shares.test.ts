import { SequenceError } from '@dasquare/types'
import { describe, expect, it } from 'vitest'
import { Blob, sortBlobs } from '../blob'
import { Namespace, TX_NAMESPACE } from '../namespace'
import { parseBlobs } from '../parse'
import { ShareBuilder } from '../share-builder'
import { sparseSharesNeeded } from '../sequence'
import { SparseShareSplitter } from '../sparse-share-splitter'
import { splitBlobs } from '../split'
import { patterned, unwrap, userNamespace } from './helpers'

const SIGNER = new Uint8Array(20).fill(0xaa)
const COMMITMENT = new Uint8Array(32).fill(0xcc)

describe('sparseSharesNeeded', () => {
  it('should count shares at the capacity boundaries', () => {
    expect(sparseSharesNeeded(0)).toBe(0)
    expect(sparseSharesNeeded(1)).toBe(1)
    expect(sparseSharesNeeded(478)).toBe(1)
    expect(sparseSharesNeeded(479)).toBe(2)
    expect(sparseSharesNeeded(960)).toBe(2)
    expect(sparseSharesNeeded(961)).toBe(3)
    expect(sparseSharesNeeded(458, true)).toBe(1)
    expect(sparseSharesNeeded(459, true)).toBe(2)
    expect(sparseSharesNeeded(478, true)).toBe(2)
  })
})

describe('Blob', () => {
  const ns = userNamespace(1)

  it('should reject empty data', () => {
    const [error] = Blob.v0(ns, new Uint8Array(0))
    expect(error?.message).toBe('Data can not be empty')
  })

  it('should reject a signer on share version 0', () => {
    const [error] = Blob.create(ns, patterned(10), 0, SIGNER)
    expect(error?.message).toBe('Share version 0 does not support signer')
  })

  it('should require a 20 byte signer on share version 1', () => {
    const [error] = Blob.create(ns, patterned(10), 1)
    expect(error?.message).toBe('Share version 1 requires signer of size 20 bytes')
  })

  it('should require 36 bytes of data on share version 2', () => {
    const [error] = Blob.create(ns, patterned(40), 2, SIGNER)
    expect(error?.message).toBe(
      'Share version 2 requires data of size 36 bytes (fibre_blob_version + commitment), got 40',
    )
  })

  it('should reject a primary reserved namespace', () => {
    const reserved = unwrap(Namespace.v0(Uint8Array.from([3])))
    const [error] = Blob.v0(reserved, patterned(10))
    expect(error?.message).toBe(
      `Invalid blob namespace: Invalid data namespace (0x${'00'.repeat(28)}03): reserved data is forbidden`,
    )
  })

  it('should reject the transaction namespace', () => {
    const [error] = Blob.v1(TX_NAMESPACE, patterned(10), SIGNER)
    expect(error?.message).toBe(
      `Invalid blob namespace: Invalid data namespace (0x${'00'.repeat(28)}01): reserved data is forbidden`,
    )
  })

  it('should reject unknown share versions', () => {
    const [error] = Blob.create(ns, patterned(10), 3)
    expect(error?.message).toBe('Share version 3 not supported. Please use 0, 1, or 2')
  })

  it('should expose the fibre version and commitment of a version 2 blob', () => {
    const blob = unwrap(Blob.v2(ns, 7, COMMITMENT, SIGNER))
    expect(Array.from(blob.data.subarray(0, 4))).toEqual([0, 0, 0, 7])
    expect(unwrap(blob.fibreBlobVersion())).toBe(7)
    expect(unwrap(blob.commitment())).toEqual(COMMITMENT)
    expect(unwrap(Blob.v0(ns, patterned(4))).commitment()[0]).toBeInstanceOf(Error)
  })

  it('should sort by namespace and keep the order of equal namespaces', () => {
    const a = unwrap(Blob.v0(userNamespace(2), patterned(1, 1)))
    const b = unwrap(Blob.v0(userNamespace(1), patterned(1, 2)))
    const c = unwrap(Blob.v0(userNamespace(2), patterned(1, 3)))
    const input = [a, b, c]
    expect(sortBlobs(input)).toEqual([b, a, c])
    expect(input).toEqual([a, b, c])
  })
})

describe('SparseShareSplitter', () => {
  it('should round trip a version 0 blob over several shares', () => {
    const blob = unwrap(Blob.v0(userNamespace(1), patterned(1000)))
    const shares = unwrap(blob.toShares())
    expect(shares).toHaveLength(3)
    expect(shares[0].sequenceLen).toBe(1000)
    expect(shares[0].signer).toBeUndefined()

    const parsed = unwrap(parseBlobs(shares))
    expect(parsed).toHaveLength(1)
    expect(parsed[0].equals(blob)).toBe(true)
  })

  it('should put the signer in the first share of a version 1 blob', () => {
    const blob = unwrap(Blob.v1(userNamespace(1), patterned(600), SIGNER))
    const shares = unwrap(blob.toShares())
    expect(shares).toHaveLength(2)
    expect(shares[0].signer).toEqual(SIGNER)
    expect(shares[1].signer).toBeUndefined()
    expect(unwrap(parseBlobs(shares))[0].equals(blob)).toBe(true)
  })

  it('should write a version 2 blob as one share declaring the commitment size', () => {
    const blob = unwrap(Blob.v2(userNamespace(1), 1, COMMITMENT, SIGNER))
    const shares = unwrap(blob.toShares())
    expect(shares).toHaveLength(1)
    expect(shares[0].version).toBe(2)
    expect(shares[0].sequenceLen).toBe(32)

    const parsed = unwrap(parseBlobs(shares))
    expect(parsed[0].equals(blob)).toBe(true)
    expect(unwrap(parsed[0].fibreBlobVersion())).toBe(1)
  })

  it('should write blobs back to back', () => {
    const a = unwrap(Blob.v0(userNamespace(1), patterned(500, 1)))
    const b = unwrap(Blob.v0(userNamespace(2), patterned(20, 2)))
    const shares = unwrap(splitBlobs(a, b))
    expect(shares).toHaveLength(3)

    const parsed = unwrap(parseBlobs(shares))
    expect(parsed).toHaveLength(2)
    expect(parsed[0].equals(a)).toBe(true)
    expect(parsed[1].equals(b)).toBe(true)
  })

  it('should pad with the namespace and version of the last share', () => {
    const splitter = new SparseShareSplitter()
    const blob = unwrap(Blob.v1(userNamespace(4), patterned(10), SIGNER))
    unwrap(splitter.write(blob))
    unwrap(splitter.writeNamespacePaddingShares(2))
    expect(splitter.count()).toBe(3)

    const padding = splitter.export().slice(1)
    for (const share of padding) {
      expect(share.namespace.equals(userNamespace(4))).toBe(true)
      expect(share.version).toBe(1)
      expect(share.isNamespacePadding()).toBe(true)
    }
    expect(unwrap(parseBlobs(splitter.export()))).toHaveLength(1)
  })

  it('should refuse to pad before any blob is written', () => {
    const splitter = new SparseShareSplitter()
    const [error] = splitter.writeNamespacePaddingShares(1)
    expect(error?.message).toBe(
      'Cannot write namespace padding shares on an empty SparseShareSplitter',
    )
    expect(unwrap(splitter.writeNamespacePaddingShares(0))).toBeUndefined()
  })
})

describe('parseBlobs', () => {
  const a = unwrap(Blob.v0(userNamespace(1), patterned(1000, 1)))
  const b = unwrap(Blob.v0(userNamespace(2), patterned(1000, 2)))
  const aShares = unwrap(a.toShares())
  const bShares = unwrap(b.toShares())

  function expectKind(result: ReturnType<typeof parseBlobs>, kind: string): void {
    const [error] = result
    expect(error).toBeInstanceOf(SequenceError)
    expect(error instanceof SequenceError && error.kind).toBe(kind)
  }

  it('should reject a declared length longer than the shares hold', () => {
    const builder = unwrap(ShareBuilder.create(userNamespace(1), 0, true))
    unwrap(builder.writeSequenceLen(1000))
    builder.addData(patterned(10))
    builder.zeroPadIfNecessary()
    const share = unwrap(builder.build())
    expectKind(parseBlobs([share]), 'SequenceLengthExceedsData')
  })

  it('should reject a continuation share with no start share', () => {
    expectKind(parseBlobs(aShares.slice(1)), 'OrphanContinuation')
  })

  it('should reject a continuation share from another namespace', () => {
    expectKind(parseBlobs([aShares[0], bShares[1]]), 'ContinuationNamespaceMismatch')
  })
})
