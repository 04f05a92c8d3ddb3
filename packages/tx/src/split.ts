import type { Hex } from '@dasquare/core'
import {
  CompactShareSplitter,
  PAY_FOR_BLOB_NAMESPACE,
  type Share,
  TX_NAMESPACE,
} from '@dasquare/shares'
import {
  type Safe,
  SHARE_VERSION_ZERO,
  type ShareRange,
  safeError,
  safeResult,
} from '@dasquare/types'
import { unmarshalIndexWrapper } from './index-wrapper'

export interface SplitTxsResult {
  txShares: Share[]
  pfbShares: Share[]
  /** Keyed by the SHA-256 of each transaction; pfb ranges follow the tx shares */
  shareRanges: Map<Hex, ShareRange>
}

/**
 * Write ordinary transactions into tx-namespace shares and index-wrapped
 * transactions into pay-for-blob shares
 */
export function splitTxs(txs: readonly Uint8Array[]): Safe<SplitTxsResult> {
  const [txError, txWriter] = CompactShareSplitter.create(
    TX_NAMESPACE,
    SHARE_VERSION_ZERO,
  )
  if (txError) return safeError(txError)
  const [pfbError, pfbWriter] = CompactShareSplitter.create(
    PAY_FOR_BLOB_NAMESPACE,
    SHARE_VERSION_ZERO,
  )
  if (pfbError) return safeError(pfbError)

  for (const tx of txs) {
    const [unwrapError, wrapper] = unmarshalIndexWrapper(tx)
    if (unwrapError) return safeError(unwrapError)
    const writer = wrapper.matched ? pfbWriter : txWriter
    const [writeError] = writer.writeTx(tx)
    if (writeError) return safeError(writeError)
  }

  const [txExportError, txShares] = txWriter.export()
  if (txExportError) return safeError(txExportError)
  const [pfbExportError, pfbShares] = pfbWriter.export()
  if (pfbExportError) return safeError(pfbExportError)

  const shareRanges = new Map([
    ...txWriter.shareRanges(0),
    ...pfbWriter.shareRanges(txShares.length),
  ])
  return safeResult({ txShares, pfbShares, shareRanges })
}

/**
 * Share indexes of every index-wrapped transaction, in order. Undefined when
 * a wrapper carries no indexes: a real blob always starts after at least
 * one transaction share, so such wrappers predate share indexes.
 */
export function extractShareIndexes(
  txs: readonly Uint8Array[],
): Safe<number[] | undefined> {
  const shareIndexes: number[] = []
  for (const tx of txs) {
    const [error, wrapper] = unmarshalIndexWrapper(tx)
    if (error) return safeError(error)
    if (!wrapper.matched) continue
    if (wrapper.value.shareIndexes.length === 0) return safeResult(undefined)
    shareIndexes.push(...wrapper.value.shareIndexes)
  }
  return safeResult(shareIndexes)
}
