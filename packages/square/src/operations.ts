/**
 * Square operations over raw transaction lists
 */

import { newRange } from '@dasquare/shares'
import { unmarshalBlobTx } from '@dasquare/tx'
import {
  BuilderError,
  type Safe,
  type ShareRange,
  safeError,
  safeResult,
} from '@dasquare/types'
import { SquareBuilder } from './builder'
import type { Square } from './square'

export interface BuildResult {
  square: Square
  /** Transactions that made it into the square: ordinary ones, then blob transactions */
  orderedTxs: Uint8Array[]
}

/**
 * Pack as many of the prioritised `txs` as fit into a square no wider than
 * `maxSquareSize`. Transactions that do not fit are left out. The validity
 * of the transactions themselves is not checked.
 */
export function build(
  txs: readonly Uint8Array[],
  maxSquareSize: number,
  subtreeRootThreshold: number,
): Safe<BuildResult> {
  const [error, builder] = SquareBuilder.create(
    maxSquareSize,
    subtreeRootThreshold,
  )
  if (error) return safeError(error)

  const normalTxs: Uint8Array[] = []
  const blobTxs: Uint8Array[] = []
  for (const [index, tx] of txs.entries()) {
    const [unmarshalError, match] = unmarshalBlobTx(tx)
    if (unmarshalError) {
      return safeError(
        new BuilderError(
          `Unmarshalling blob tx at index ${index}: ${unmarshalError.message}`,
        ),
      )
    }
    if (match.matched) {
      const [appendError, appended] = builder.appendBlobTx(match.value)
      if (appendError) {
        return safeError(
          new BuilderError(
            `Appending blob tx at index ${index}: ${appendError.message}`,
          ),
        )
      }
      if (appended) blobTxs.push(tx)
    } else if (builder.appendTx(tx)) {
      normalTxs.push(tx)
    }
  }

  const [exportError, exported] = builder.export()
  if (exportError) return safeError(exportError)
  return safeResult({
    square: exported.square,
    orderedTxs: [...normalTxs, ...blobTxs],
  })
}

/**
 * Square holding exactly `txs`, in order. Fails if a transaction does not
 * fit or an ordinary transaction follows a blob transaction.
 */
export function construct(
  txs: readonly Uint8Array[],
  maxSquareSize: number,
  subtreeRootThreshold: number,
): Safe<Square> {
  const [error, builder] = SquareBuilder.create(
    maxSquareSize,
    subtreeRootThreshold,
    ...txs,
  )
  if (error) return safeError(error)
  const [exportError, exported] = builder.export()
  if (exportError) return safeError(exportError)
  return safeResult(exported.square)
}

/**
 * Range of shares the transaction at `txIndex` occupies in the square
 * constructed from `txs`
 */
export function txShareRange(
  txs: readonly Uint8Array[],
  txIndex: number,
  maxSquareSize: number,
  subtreeRootThreshold: number,
): Safe<ShareRange> {
  const [error, builder] = SquareBuilder.create(
    maxSquareSize,
    subtreeRootThreshold,
    ...txs,
  )
  if (error) return safeError(error)
  return builder.findTxShareRange(txIndex)
}

/**
 * Range of shares a blob occupies in the square constructed from `txs`.
 * `txIndex` is the position of its blob transaction in `txs`.
 */
export function blobShareRange(
  txs: readonly Uint8Array[],
  txIndex: number,
  blobIndex: number,
  maxSquareSize: number,
  subtreeRootThreshold: number,
): Safe<ShareRange> {
  const [error, builder] = SquareBuilder.create(
    maxSquareSize,
    subtreeRootThreshold,
    ...txs,
  )
  if (error) return safeError(error)

  const [startError, start] = builder.findBlobStartingIndex(txIndex, blobIndex)
  if (startError) return safeError(startError)
  const [lengthError, length] = builder.blobShareLength(txIndex, blobIndex)
  if (lengthError) return safeError(lengthError)
  return safeResult(newRange(start, start + length))
}
