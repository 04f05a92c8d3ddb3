import { InvalidShareError, type Safe, SHARE_SIZE } from '@dasquare/types'
import { describe, expect, it } from 'vitest'
import { Blob } from '../blob'
import { CompactShareSplitter } from '../compact-share-splitter'
import { InfoByte, parseInfoByte } from '../info-byte'
import { TX_NAMESPACE } from '../namespace'
import {
  namespacePaddingShare,
  reservedPaddingShares,
  tailPaddingShares,
} from '../padding'
import { newReservedBytes, parseReservedBytes } from '../reserved-bytes'
import { Share, sharesFromBytes, sharesToBytes } from '../share'
import { unwrap, userNamespace } from './helpers'

const SIGNER = new Uint8Array(20).fill(0x5a)

const namespace = () => userNamespace(1, 2)

function blobShares(blob: Safe<Blob>): Share[] {
  return unwrap(unwrap(blob).toShares())
}

describe('InfoByte', () => {
  it('should pack the version above the sequence start bit', () => {
    const [, infoByte] = InfoByte.create(127, true)
    expect(infoByte?.value).toBe(0xff)
    expect(infoByte?.version).toBe(127)
    expect(infoByte?.isSequenceStart).toBe(true)
  })

  it('should reject versions that do not fit in seven bits', () => {
    const [error] = InfoByte.create(128, false)
    expect(error?.message).toBe('Version 128 must be less than or equal to 127')
  })

  it('should parse a raw byte', () => {
    const [, infoByte] = parseInfoByte(3)
    expect(infoByte?.version).toBe(1)
    expect(infoByte?.isSequenceStart).toBe(true)
  })
})

describe('Reserved bytes', () => {
  it('should encode the index big-endian', () => {
    const [, bytes] = newReservedBytes(38)
    expect(Array.from(bytes ?? [])).toEqual([0, 0, 0, 38])
  })

  it('should reject indexes outside a share', () => {
    expect(newReservedBytes(SHARE_SIZE)[0]).toBeInstanceOf(InvalidShareError)
    expect(parseReservedBytes(Uint8Array.of(0, 0, 2, 0))[0]).toBeInstanceOf(
      InvalidShareError,
    )
  })

  it('should reject the wrong width', () => {
    const [error] = parseReservedBytes(Uint8Array.of(0, 38))
    expect(error?.message).toBe('Reserved bytes must be of length 4')
  })
})

describe('Share', () => {
  it('should require exactly 512 bytes', () => {
    const [error] = Share.create(new Uint8Array(511))
    expect(error?.message).toBe('Share data must be 512 bytes, got 511')
  })

  it('should hand out copies of its bytes', () => {
    const [share] = blobShares(Blob.v0(namespace(), new Uint8Array(10).fill(7)))
    const before = share.toBytes()
    share.toBytes().fill(0)
    share.namespace.bytes.fill(0xff)
    expect(share.toBytes()).toEqual(before)
    expect(share.namespace.equals(namespace())).toBe(true)
  })

  it('should read the fields of a version 0 sequence start share', () => {
    const [share] = blobShares(Blob.v0(namespace(), new Uint8Array(10).fill(7)))
    expect(share.namespace.equals(namespace())).toBe(true)
    expect(share.version).toBe(0)
    expect(share.isSequenceStart).toBe(true)
    expect(share.isCompactShare).toBe(false)
    expect(share.sequenceLen).toBe(10)
    expect(share.signer).toBeUndefined()
    expect(share.rawData().length).toBe(478)
    expect(Array.from(share.rawData().subarray(0, 11))).toEqual([
      7, 7, 7, 7, 7, 7, 7, 7, 7, 7, 0,
    ])
  })

  it('should expose the signer of a version 1 first share only', () => {
    const shares = blobShares(Blob.v1(namespace(), new Uint8Array(600).fill(3), SIGNER))
    expect(shares).toHaveLength(2)
    expect(Array.from(shares[0].signer ?? [])).toEqual(Array.from(SIGNER))
    expect(shares[0].rawData().length).toBe(458)
    expect(shares[1].signer).toBeUndefined()
    expect(shares[1].sequenceLen).toBe(0)
    expect(shares[1].rawData().length).toBe(482)
  })

  it('should use the reserved offset for compact shares', () => {
    const splitter = unwrap(CompactShareSplitter.create(TX_NAMESPACE))
    unwrap(splitter.writeTx(new Uint8Array(600).fill(1)))
    unwrap(splitter.writeTx(Uint8Array.of(9, 9)))
    const shares = unwrap(splitter.export())

    // the second share carries the tail of the first tx (600 + 2 - 474 = 128 bytes)
    const [error, raw] = shares[1].rawDataUsingReserved()
    expect(error).toBeUndefined()
    expect(Array.from(raw ?? [])).toEqual([
      2,
      9,
      9,
      ...new Array<number>(512 - 34 - 128 - 3).fill(0),
    ])
  })

  it('should return no data when no unit starts in a compact share', () => {
    const splitter = unwrap(CompactShareSplitter.create(TX_NAMESPACE))
    unwrap(splitter.writeTx(new Uint8Array(600)))
    const shares = unwrap(splitter.export())
    expect(unwrap(shares[1].rawDataUsingReserved()).length).toBe(0)
  })

  it('should recognise every kind of padding', () => {
    const nsPadding = unwrap(namespacePaddingShare(namespace(), 0))
    const [reserved] = unwrap(reservedPaddingShares(1))
    const [tail] = unwrap(tailPaddingShares(1))
    expect(nsPadding.isPadding()).toBe(true)
    expect(nsPadding.isNamespacePadding()).toBe(true)
    expect(nsPadding.sequenceLen).toBe(0)
    expect(reserved.isPadding()).toBe(true)
    expect(reserved.isNamespacePadding()).toBe(true)
    expect(tail.isPadding()).toBe(true)
    expect(tail.namespace.isTailPadding()).toBe(true)
  })

  it('should reject unsupported share versions', () => {
    const bytes = new Uint8Array(SHARE_SIZE)
    bytes[29] = 3 << 1
    const share = unwrap(Share.create(bytes))
    const [error] = share.checkVersionSupported()
    expect(error).toBeInstanceOf(InvalidShareError)
  })

  it('should convert to and from raw bytes', () => {
    const shares = blobShares(Blob.v0(namespace(), new Uint8Array(1000).fill(4)))
    const [error, parsed] = sharesFromBytes(sharesToBytes(shares))
    expect(error).toBeUndefined()
    expect(parsed?.every((share, i) => share.equals(shares[i]))).toBe(true)
  })
})
