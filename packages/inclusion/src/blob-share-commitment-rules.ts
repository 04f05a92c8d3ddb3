/**
 * Blob Placement Rules
 *
 * Non-interactive default rules for where a blob may start in the square.
 * Each blob is aligned to the width of the first subtree of its share
 * commitment, so the commitment covers whole subtrees of the row roots
 * without needing siblings from outside the blob.
 */

import { type Safe, safeError, safeResult } from '@dasquare/types'

/**
 * Total shares used by blobs of the given share lengths, placed one after
 * another from `cursor`, and the starting index of each blob
 */
export function blobSharesUsedNonInteractiveDefaults(
  cursor: number,
  subtreeRootThreshold: number,
  ...blobShareLens: number[]
): Safe<{ sharesUsed: number; indexes: number[] }> {
  const start = cursor
  const indexes: number[] = []
  let next = cursor
  for (const blobLen of blobShareLens) {
    const [error, index] = nextShareIndex(next, blobLen, subtreeRootThreshold)
    if (error) {
      return safeError(
        new Error(`Failed to calculate next share index: ${error.message}`),
      )
    }
    indexes.push(index)
    next = index + blobLen
  }
  return safeResult({ sharesUsed: next - start, indexes })
}

/**
 * First index at or after `cursor` where a blob of `blobShareLen` shares may
 * start. `cursor` is the index right after the previous blob.
 */
export function nextShareIndex(
  cursor: number,
  blobShareLen: number,
  subtreeRootThreshold: number,
): Safe<number> {
  const [widthError, treeWidth] = subTreeWidth(
    blobShareLen,
    subtreeRootThreshold,
  )
  if (widthError) {
    return safeError(
      new Error(
        `Failed to calculate subtree width for blobShareLen ${blobShareLen}: ${widthError.message}`,
      ),
    )
  }
  return roundUpByMultipleOf(cursor, treeWidth)
}

/**
 * Round `cursor` up to the next multiple of `v`
 */
export function roundUpByMultipleOf(cursor: number, v: number): Safe<number> {
  if (v === 0) return safeError(new Error('v cannot be 0'))
  if (cursor % v === 0) return safeResult(cursor)
  return safeResult((Math.floor(cursor / v) + 1) * v)
}

/**
 * Smallest power of two greater than or equal to `input`
 */
export function roundUpPowerOfTwo(input: number): Safe<number> {
  if (input <= 1) return safeResult(1)
  let result = 1
  while (result < input) result *= 2
  if (result > Number.MAX_SAFE_INTEGER) {
    return safeError(new Error(`Cannot round up ${input}: result overflows`))
  }
  return safeResult(result)
}

/**
 * Largest power of two less than or equal to `input`
 */
export function roundDownPowerOfTwo(input: number): Safe<number> {
  if (input <= 0) {
    return safeError(new Error(`Input ${input} must be positive`))
  }
  let result = 1
  while (result * 2 <= input) result *= 2
  return safeResult(result)
}

export function isPowerOfTwo(input: number): boolean {
  return Number.isInteger(input) && input > 0 && (input & (input - 1)) === 0
}

/**
 * Smallest square width whose square holds `shareCount` shares
 */
export function blobMinSquareSize(shareCount: number): Safe<number> {
  return roundUpPowerOfTwo(Math.ceil(Math.sqrt(shareCount)))
}

/**
 * Widest subtree allowed in the commitment over a blob of `shareCount`
 * shares: `ceil(shareCount / threshold)` rounded up to a power of two,
 * capped by the smallest square the blob fits in
 */
export function subTreeWidth(
  shareCount: number,
  subtreeRootThreshold: number,
): Safe<number> {
  if (subtreeRootThreshold < 1) {
    return safeError(
      new Error(
        `Subtree root threshold must be positive, got ${subtreeRootThreshold}`,
      ),
    )
  }
  const [roundError, width] = roundUpPowerOfTwo(
    Math.ceil(shareCount / subtreeRootThreshold),
  )
  if (roundError) return safeError(roundError)
  const [sizeError, minSquareSize] = blobMinSquareSize(shareCount)
  if (sizeError) return safeError(sizeError)
  return safeResult(Math.min(width, minSquareSize))
}
