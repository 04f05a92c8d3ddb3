/**
 * Share Sequences
 *
 * A sequence is the run of shares carrying one logical transmission: one
 * blob, or all the units of one compact namespace. Its first share declares
 * the sequence length, and the number of shares present must match what
 * that length requires.
 */

import {
  CONTINUATION_COMPACT_SHARE_CONTENT_SIZE,
  CONTINUATION_SPARSE_SHARE_CONTENT_SIZE,
  FIBRE_BLOB_VERSION_SIZE,
  FIRST_COMPACT_SHARE_CONTENT_SIZE,
  FIRST_SPARSE_SHARE_CONTENT_SIZE,
  FIRST_SPARSE_SHARE_CONTENT_SIZE_WITH_SIGNER,
  type Safe,
  SequenceError,
  SHARE_VERSION_TWO,
  safeError,
  safeResult,
} from '@dasquare/types'
import type { Namespace } from './namespace'
import { type Share, versionHasSigner } from './share'

function sharesNeeded(
  sequenceLen: number,
  firstShareCapacity: number,
  continuationCapacity: number,
): number {
  if (sequenceLen === 0) return 0
  if (sequenceLen < firstShareCapacity) return 1
  return (
    1 + Math.ceil((sequenceLen - firstShareCapacity) / continuationCapacity)
  )
}

/**
 * Number of compact shares needed for `sequenceLen` bytes of
 * length-delimited units
 */
export function compactSharesNeeded(sequenceLen: number): number {
  return sharesNeeded(
    sequenceLen,
    FIRST_COMPACT_SHARE_CONTENT_SIZE,
    CONTINUATION_COMPACT_SHARE_CONTENT_SIZE,
  )
}

/**
 * Number of sparse shares needed for a blob of `sequenceLen` bytes. A signer
 * in the first share takes room away from the data.
 */
export function sparseSharesNeeded(
  sequenceLen: number,
  containsSigner = false,
): number {
  return sharesNeeded(
    sequenceLen,
    containsSigner
      ? FIRST_SPARSE_SHARE_CONTENT_SIZE_WITH_SIGNER
      : FIRST_SPARSE_SHARE_CONTENT_SIZE,
    CONTINUATION_SPARSE_SHARE_CONTENT_SIZE,
  )
}

/**
 * Bytes of payload a sequence start share describes. Version 2 shares
 * declare only the commitment; the fibre blob version precedes it.
 */
export function sequenceDataLength(
  shareVersion: number,
  sequenceLen: number,
): number {
  return shareVersion === SHARE_VERSION_TWO
    ? FIBRE_BLOB_VERSION_SIZE + sequenceLen
    : sequenceLen
}

export class Sequence {
  constructor(
    readonly namespace: Namespace,
    readonly shares: Share[],
  ) {}

  sequenceLen(): Safe<number> {
    const first = this.shares[0]
    if (!first) {
      return safeError(
        new SequenceError(
          'Invalid sequence length because the share sequence has no shares',
          'InvalidSequenceLength',
        ),
      )
    }
    return safeResult(first.sequenceLen)
  }

  /**
   * Concatenated payload of every share, trimmed of trailing padding
   */
  rawData(): Safe<Uint8Array> {
    const [error, sequenceLen] = this.sequenceLen()
    if (error) return safeError(error)

    const chunks = this.shares.map((share) => share.rawData())
    const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0)
    const data = new Uint8Array(total)
    let offset = 0
    for (const chunk of chunks) {
      data.set(chunk, offset)
      offset += chunk.length
    }

    const length = sequenceDataLength(this.shares[0].version, sequenceLen)
    if (length > data.length) {
      return safeError(
        new SequenceError(
          `Sequence length ${length} is greater than the number of bytes in the sequence ${data.length}`,
          'SequenceLengthExceedsData',
        ),
      )
    }
    return safeResult(data.subarray(0, length))
  }

  /**
   * A single padding share
   */
  isPadding(): boolean {
    return this.shares.length === 1 && this.shares[0].isPadding()
  }

  /**
   * Fail unless the declared length needs exactly the shares present
   */
  validSequenceLen(): Safe<void, SequenceError> {
    const first = this.shares[0]
    if (!first) {
      return safeError(
        new SequenceError(
          'Invalid sequence length because the share sequence has no shares',
          'InvalidSequenceLength',
        ),
      )
    }
    if (this.isPadding()) return safeResult(undefined)

    const length = sequenceDataLength(first.version, first.sequenceLen)
    const needed = first.isCompactShare
      ? compactSharesNeeded(length)
      : sparseSharesNeeded(length, versionHasSigner(first.version))
    if (this.shares.length !== needed) {
      return safeError(
        new SequenceError(
          `Share sequence has ${this.shares.length} shares but needed ${needed} shares`,
          'InvalidSequenceLength',
          { namespace: this.namespace.toString(), sequenceLen: first.sequenceLen },
        ),
      )
    }
    return safeResult(undefined)
  }
}
