import { subTreeWidth } from '@dasquare/inclusion'
import { type Blob, sparseSharesNeeded } from '@dasquare/shares'
import { type Safe, safeError, safeResult } from '@dasquare/types'

/**
 * A blob waiting to be placed, with the pay-for-blob transaction it belongs
 * to and the worst-case padding that may precede it
 */
export interface Element {
  blob: Blob
  /** Position of the paying transaction among the blob transactions */
  pfbIndex: number
  /** Position of the blob within its transaction */
  blobIndex: number
  numShares: number
  maxPadding: number
}

export function newElement(
  blob: Blob,
  pfbIndex: number,
  blobIndex: number,
  subtreeRootThreshold: number,
): Safe<Element> {
  const numShares = sparseSharesNeeded(blob.dataLen, blob.hasSigner())
  const [error, width] = subTreeWidth(numShares, subtreeRootThreshold)
  if (error) return safeError(error)
  // A blob aligned to width w starts at most w - 1 shares after the cursor
  return safeResult({
    blob,
    pfbIndex,
    blobIndex,
    numShares,
    maxPadding: width - 1,
  })
}

/** Shares the blob can cost, padding included */
export function maxShareOffset(element: Element): number {
  return element.numShares + element.maxPadding
}
