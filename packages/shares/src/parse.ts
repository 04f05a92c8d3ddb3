import {
  type Safe,
  SequenceError,
  safeError,
  safeResult,
} from '@dasquare/types'
import type { Blob } from './blob'
import { parseCompactShares } from './parse-compact-shares'
import { parseSparseShares } from './parse-sparse-shares'
import { Sequence } from './sequence'
import type { Share } from './share'

/**
 * Transactions stored in a run of compact shares
 */
export function parseTxs(shares: readonly Share[]): Safe<Uint8Array[]> {
  return parseCompactShares(shares)
}

/**
 * Blobs stored in a run of sparse shares
 */
export function parseBlobs(shares: readonly Share[]): Safe<Blob[]> {
  return parseSparseShares(shares)
}

/**
 * Group shares into sequences and check that each sequence holds exactly
 * the shares its declared length requires. With `ignorePadding`, sequences
 * made of a single padding share are dropped from the result.
 */
export function parseShares(
  shares: readonly Share[],
  ignorePadding: boolean,
): Safe<Sequence[]> {
  const sequences: Sequence[] = []
  let current: Sequence | undefined

  for (const share of shares) {
    const namespace = share.namespace
    if (share.isSequenceStart) {
      if (current) sequences.push(current)
      current = new Sequence(namespace, [share])
      continue
    }
    if (!current) {
      return safeError(
        new SequenceError(
          'Continuation share without a sequence start share',
          'OrphanContinuation',
          { namespace: namespace.toString() },
        ),
      )
    }
    if (!current.namespace.equals(namespace)) {
      return safeError(
        new SequenceError(
          `Share sequence ${current.namespace.toString()} has inconsistent namespace with share ${namespace.toString()}`,
          'ContinuationNamespaceMismatch',
        ),
      )
    }
    current.shares.push(share)
  }
  if (current) sequences.push(current)

  for (const sequence of sequences) {
    const [error] = sequence.validSequenceLen()
    if (error) return safeError(error)
  }

  return safeResult(
    ignorePadding ? sequences.filter((s) => !s.isPadding()) : sequences,
  )
}
