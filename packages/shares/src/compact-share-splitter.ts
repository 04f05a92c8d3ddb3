/**
 * Compact Share Splitter
 *
 * Packs length-delimited units (transactions, wrapped pay-for-blob
 * transactions) back to back into the shares of one compact namespace.
 * Each share's reserved bytes record where the first unit starting in it
 * begins, so a reader handed any sub-range of shares can realign without
 * replaying the shares before it.
 */

import { type Hex, sha256Hex } from '@dasquare/core'
import { encodeDelimited } from '@dasquare/serialization'
import {
  CONTINUATION_COMPACT_SHARE_CONTENT_SIZE,
  FIRST_COMPACT_SHARE_CONTENT_SIZE,
  type Safe,
  SHARE_VERSION_ZERO,
  type ShareRange,
  safeError,
  safeResult,
} from '@dasquare/types'
import type { Namespace } from './namespace'
import { newRange, offsetRange } from './range'
import type { Share } from './share'
import { ShareBuilder } from './share-builder'

export class CompactShareSplitter {
  private readonly shares: Share[] = []
  private readonly ranges: { key: Hex; range: ShareRange }[] = []
  private exported: Share[] | undefined

  private constructor(
    readonly namespace: Namespace,
    readonly shareVersion: number,
    private pending: ShareBuilder,
  ) {}

  static create(
    namespace: Namespace,
    shareVersion: number = SHARE_VERSION_ZERO,
  ): Safe<CompactShareSplitter> {
    const [error, builder] = ShareBuilder.create(namespace, shareVersion, true)
    if (error) return safeError(error)
    return safeResult(new CompactShareSplitter(namespace, shareVersion, builder))
  }

  /**
   * Append one unit, prefixed with its varint length, and record the range
   * of shares it touches
   */
  writeTx(tx: Uint8Array): Safe<void> {
    const start = this.shares.length
    const [error] = this.write(encodeDelimited(tx))
    if (error) return safeError(error)
    this.ranges.push({ key: sha256Hex(tx), range: newRange(start, this.count()) })
    return safeResult(undefined)
  }

  /**
   * Finished shares: the pending share is zero padded and the total
   * sequence length is written into the first share. Calling this again
   * without further writes returns the same shares; later writes continue
   * from where the splitter left off.
   */
  export(): Safe<Share[]> {
    if (this.exported) return safeResult([...this.exported])
    if (this.isEmpty()) return safeResult([])

    const shares = [...this.shares]
    let bytesOfPadding = 0
    if (!this.pending.isEmptyShare()) {
      const last = this.pending.clone()
      bytesOfPadding = last.zeroPadIfNecessary()
      const [error, share] = last.build()
      if (error) return safeError(error)
      shares.push(share)
    }

    const [firstError, first] = ShareBuilder.create(
      this.namespace,
      this.shareVersion,
      true,
    )
    if (firstError) return safeError(firstError)
    first.importRawShare(shares[0].toBytes())
    const [lenError] = first.writeSequenceLen(
      this.sequenceLen(shares.length, bytesOfPadding),
    )
    if (lenError) return safeError(lenError)
    const [buildError, firstShare] = first.build()
    if (buildError) return safeError(buildError)
    shares[0] = firstShare

    this.exported = shares
    return safeResult([...shares])
  }

  /** Number of shares `export` would return */
  count(): number {
    return this.pending.isEmptyShare()
      ? this.shares.length
      : this.shares.length + 1
  }

  isEmpty(): boolean {
    return this.shares.length === 0 && this.pending.isEmptyShare()
  }

  /**
   * Share range of every unit written, keyed by the SHA-256 of the unit and
   * shifted by `offset`. A unit written twice keeps its last range.
   */
  shareRanges(offset = 0): Map<Hex, ShareRange> {
    const ranges = new Map<Hex, ShareRange>()
    for (const { key, range } of this.ranges) {
      ranges.set(key, offsetRange(range, offset))
    }
    return ranges
  }

  /** Share range of every unit in write order, shifted by `offset` */
  txRanges(offset = 0): ShareRange[] {
    return this.ranges.map(({ range }) => offsetRange(range, offset))
  }

  private sequenceLen(shareCount: number, bytesOfPadding: number): number {
    if (shareCount === 0) return 0
    return (
      FIRST_COMPACT_SHARE_CONTENT_SIZE +
      (shareCount - 1) * CONTINUATION_COMPACT_SHARE_CONTENT_SIZE -
      bytesOfPadding
    )
  }

  private write(rawData: Uint8Array): Safe<void> {
    this.exported = undefined

    const [reservedError] = this.pending.maybeWriteReservedBytes()
    if (reservedError) return safeError(reservedError)

    let remaining = this.pending.addData(rawData)
    while (remaining) {
      const [error] = this.stackPending()
      if (error) return safeError(error)
      remaining = this.pending.addData(remaining)
    }

    if (this.pending.availableBytes() === 0) return this.stackPending()
    return safeResult(undefined)
  }

  private stackPending(): Safe<void> {
    const [error, share] = this.pending.build()
    if (error) return safeError(error)
    this.shares.push(share)

    const [nextError, next] = ShareBuilder.create(
      this.namespace,
      this.shareVersion,
      false,
    )
    if (nextError) return safeError(nextError)
    this.pending = next
    return safeResult(undefined)
  }
}
