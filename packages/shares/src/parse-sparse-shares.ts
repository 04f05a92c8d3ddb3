/**
 * Sparse share parsing
 *
 * Groups shares into blob sequences: a sequence start share opens one,
 * continuation shares extend the last one opened. Padding shares are
 * skipped. Each sequence is trimmed to its declared length and turned back
 * into a blob.
 */

import {
  type Safe,
  SequenceError,
  safeError,
  safeResult,
} from '@dasquare/types'
import { Blob } from './blob'
import type { Namespace } from './namespace'
import type { Share } from './share'
import { sequenceDataLength } from './sequence'

interface OpenSequence {
  namespace: Namespace
  shareVersion: number
  sequenceLen: number
  signer: Uint8Array | undefined
  chunks: Uint8Array[]
}

export function parseSparseShares(shares: readonly Share[]): Safe<Blob[]> {
  const sequences: OpenSequence[] = []

  for (const share of shares) {
    const [versionError] = share.checkVersionSupported()
    if (versionError) return safeError(versionError)

    if (share.isPadding()) continue

    if (share.isSequenceStart) {
      sequences.push({
        namespace: share.namespace,
        shareVersion: share.version,
        sequenceLen: share.sequenceLen,
        signer: share.signer?.slice(),
        chunks: [share.rawData()],
      })
      continue
    }

    const current = sequences[sequences.length - 1]
    if (!current) {
      return safeError(
        new SequenceError(
          'Continuation share without a sequence start share',
          'OrphanContinuation',
          { namespace: share.namespace.toString() },
        ),
      )
    }
    if (!share.namespace.equals(current.namespace)) {
      return safeError(
        new SequenceError(
          `Continuation share ${share.namespace.toString()} has a different namespace than the previous share ${current.namespace.toString()}`,
          'ContinuationNamespaceMismatch',
        ),
      )
    }
    current.chunks.push(share.rawData())
  }

  const blobs: Blob[] = []
  for (const sequence of sequences) {
    const available = sequence.chunks.reduce((sum, c) => sum + c.length, 0)
    const length = sequenceDataLength(sequence.shareVersion, sequence.sequenceLen)
    if (length > available) {
      return safeError(
        new SequenceError(
          `Sequence length ${length} is greater than the number of bytes in the sequence ${available}`,
          'SequenceLengthExceedsData',
          { namespace: sequence.namespace.toString() },
        ),
      )
    }

    const data = new Uint8Array(length)
    let offset = 0
    for (const chunk of sequence.chunks) {
      if (offset >= length) break
      const part = chunk.subarray(0, length - offset)
      data.set(part, offset)
      offset += part.length
    }

    const [error, blob] = Blob.create(
      sequence.namespace,
      data,
      sequence.shareVersion,
      sequence.signer,
    )
    if (error) return safeError(error)
    blobs.push(blob)
  }
  return safeResult(blobs)
}
