/**
 * Data Square
 *
 * The original data square: `size * size` shares laid out as transactions,
 * index-wrapped pay-for-blob transactions, reserved padding, blobs in
 * namespace order, then tail padding.
 */

import { concatBytes, sha256Hash } from '@dasquare/core'
import { roundUpPowerOfTwo } from '@dasquare/inclusion'
import {
  type Blob,
  type CompactShareSplitter,
  getShareRangeForNamespace,
  isEmptyRange,
  offsetRange,
  PAY_FOR_BLOB_NAMESPACE,
  parseBlobs,
  parseTxs,
  reservedPaddingShares,
  type Share,
  type SparseShareSplitter,
  sparseSharesNeeded,
  TX_NAMESPACE,
  tailPaddingShares,
  versionHasSigner,
} from '@dasquare/shares'
import { marshalBlobTx, unmarshalIndexWrapper } from '@dasquare/tx'
import {
  BuilderError,
  EnvelopeError,
  InvalidShareError,
  InvariantViolationError,
  MIN_SHARE_COUNT,
  type PfbDecoder,
  type Safe,
  safeError,
  safeResult,
} from '@dasquare/types'

export class Square {
  constructor(readonly shares: readonly Share[]) {}

  /** Width of the square */
  size(): Safe<number> {
    return squareSize(this.shares.length)
  }

  equals(other: Square): boolean {
    return (
      this.shares.length === other.shares.length &&
      this.shares.every((share, i) => share.equals(other.shares[i]))
    )
  }

  isEmpty(): boolean {
    return this.equals(emptySquare())
  }

  /** Index-wrapped transactions stored in the pay-for-blob namespace */
  wrappedPfbs(): Safe<Uint8Array[]> {
    const range = getShareRangeForNamespace(this.shares, PAY_FOR_BLOB_NAMESPACE)
    if (isEmptyRange(range)) return safeResult([])
    return parseTxs(this.shares.slice(range.start, range.end))
  }

  /** All shares flattened into one buffer */
  toBytes(): Uint8Array {
    return concatBytes(this.shares.map((share) => share.toBytes()))
  }

  /** SHA-256 over the flattened shares */
  hash(): Uint8Array {
    return sha256Hash(this.toBytes())
  }
}

/**
 * Width of the smallest square holding `length` shares
 */
export function squareSize(length: number): Safe<number> {
  return roundUpPowerOfTwo(Math.ceil(Math.sqrt(length)))
}

/**
 * A 1x1 square holding a single tail padding share
 */
export function emptySquare(): Square {
  const [error, shares] = tailPaddingShares(MIN_SHARE_COUNT)
  if (error) {
    throw new InvariantViolationError(
      `Failed to build tail padding: ${error.message}`,
    )
  }
  return new Square(shares)
}

/**
 * Lay out exported shares into a square of width `size`
 *
 * Reserved padding fills the gap between the pay-for-blob shares and
 * `nonReservedStart`, where the first blob begins; tail padding fills the
 * square after the last blob.
 */
export function writeSquare(
  txWriter: CompactShareSplitter,
  pfbWriter: CompactShareSplitter,
  blobWriter: SparseShareSplitter,
  nonReservedStart: number,
  size: number,
): Safe<Square> {
  const totalShares = size * size
  const pfbStartIndex = txWriter.count()
  const paddingStartIndex = pfbStartIndex + pfbWriter.count()
  if (nonReservedStart < paddingStartIndex) {
    return safeError(
      new BuilderError(
        `nonReservedStart ${nonReservedStart} is too small to fit all PFBs and txs`,
      ),
    )
  }
  const endOfLastBlob = nonReservedStart + blobWriter.count()
  if (totalShares < endOfLastBlob) {
    return safeError(
      new BuilderError(`Square size ${totalShares} is too small to fit all blobs`),
    )
  }

  const [txError, txShares] = txWriter.export()
  if (txError) {
    return safeError(new Error(`Failed to export tx shares: ${txError.message}`))
  }
  const [pfbError, pfbShares] = pfbWriter.export()
  if (pfbError) {
    return safeError(new Error(`Failed to export pfb shares: ${pfbError.message}`))
  }
  const [paddingError, padding] = reservedPaddingShares(
    nonReservedStart - paddingStartIndex,
  )
  if (paddingError) return safeError(paddingError)
  const [tailError, tail] = tailPaddingShares(totalShares - endOfLastBlob)
  if (tailError) return safeError(tailError)

  const shares = [
    ...txShares,
    ...pfbShares,
    ...padding,
    ...blobWriter.export(),
    ...tail,
  ]
  if (shares.length !== totalShares) {
    throw new InvariantViolationError(
      `Square has ${shares.length} shares, expected ${totalShares}`,
    )
  }
  return safeResult(new Square(shares))
}

/**
 * Rebuild the ordered transaction list of a square: ordinary transactions,
 * then each wrapped pay-for-blob transaction re-joined with its blobs as a
 * blob transaction. `decoder` reads the blob sizes a pay-for-blob
 * transaction commits to.
 */
export function deconstruct(
  square: Square,
  decoder: PfbDecoder,
): Safe<Uint8Array[]> {
  if (square.isEmpty()) return safeResult([])
  const shares = square.shares

  const txRange = getShareRangeForNamespace(shares, TX_NAMESPACE)
  if (txRange.start !== 0) {
    return safeError(
      new InvalidShareError(
        `Expected txs to start at index 0, but got ${txRange.start}`,
      ),
    )
  }

  const relativePfbRange = getShareRangeForNamespace(
    shares.slice(txRange.end),
    PAY_FOR_BLOB_NAMESPACE,
  )
  if (isEmptyRange(relativePfbRange)) {
    return parseTxs(shares.slice(txRange.start, txRange.end))
  }
  if (relativePfbRange.start !== 0) {
    return safeError(
      new InvalidShareError(
        `Expected PFBs to start directly after non PFBs at index ${txRange.end}, but got ${relativePfbRange.start}`,
      ),
    )
  }
  const pfbRange = offsetRange(relativePfbRange, txRange.end)

  const [txError, txs] = parseTxs(shares.slice(txRange.start, txRange.end))
  if (txError) return safeError(txError)
  const [pfbError, wrappedPfbs] = parseTxs(
    shares.slice(pfbRange.start, pfbRange.end),
  )
  if (pfbError) return safeError(pfbError)

  for (const [i, wrappedPfb] of wrappedPfbs.entries()) {
    const [unwrapError, match] = unmarshalIndexWrapper(wrappedPfb)
    if (unwrapError) return safeError(unwrapError)
    if (!match.matched) {
      return safeError(new EnvelopeError(`Expected wrapped PFB at index ${i}`))
    }
    const { tx, shareIndexes } = match.value
    if (shareIndexes.length === 0) {
      return safeError(
        new EnvelopeError(`Wrapped PFB ${i} has no blobs attached`),
      )
    }

    const [decodeError, blobSizes] = decoder(tx)
    if (decodeError) return safeError(decodeError)
    if (blobSizes.length !== shareIndexes.length) {
      return safeError(
        new EnvelopeError(
          `Expected PFB to have ${shareIndexes.length} blob sizes, but got ${blobSizes.length}`,
        ),
      )
    }

    const blobs: Blob[] = []
    for (const [j, shareIndex] of shareIndexes.entries()) {
      const first = shares[shareIndex]
      if (!first) {
        return safeError(
          new EnvelopeError(
            `Share index ${shareIndex} is outside a square of ${shares.length} shares`,
          ),
        )
      }
      const end =
        shareIndex +
        sparseSharesNeeded(blobSizes[j], versionHasSigner(first.version))
      const [blobError, parsed] = parseBlobs(shares.slice(shareIndex, end))
      if (blobError) return safeError(blobError)
      if (parsed.length !== 1) {
        return safeError(
          new EnvelopeError(
            `Expected to parse a single blob, but got ${parsed.length}`,
          ),
        )
      }
      blobs.push(parsed[0])
    }

    const [marshalError, blobTx] = marshalBlobTx(tx, ...blobs)
    if (marshalError) return safeError(marshalError)
    txs.push(blobTx)
  }

  return safeResult(txs)
}
