/**
 * Padding shares: sequence start shares that declare a length of zero.
 */

import {
  type Safe,
  SHARE_VERSION_ZERO,
  safeError,
  safeResult,
} from '@dasquare/types'
import {
  type Namespace,
  PRIMARY_RESERVED_PADDING_NAMESPACE,
  TAIL_PADDING_NAMESPACE,
} from './namespace'
import type { Share } from './share'
import { ShareBuilder } from './share-builder'

export function namespacePaddingShare(
  namespace: Namespace,
  shareVersion: number,
): Safe<Share> {
  const [error, builder] = ShareBuilder.create(namespace, shareVersion, true)
  if (error) return safeError(error)
  const [lenError] = builder.writeSequenceLen(0)
  if (lenError) return safeError(lenError)
  builder.zeroPadIfNecessary()
  return builder.build()
}

export function namespacePaddingShares(
  namespace: Namespace,
  shareVersion: number,
  count: number,
): Safe<Share[]> {
  if (count < 0) {
    return safeError(new Error('Cannot create a negative number of padding shares'))
  }
  if (count === 0) return safeResult([])
  const [error, share] = namespacePaddingShare(namespace, shareVersion)
  if (error) return safeError(error)
  return safeResult(Array.from({ length: count }, () => share))
}

/** Padding between the reserved shares and the first blob */
export function reservedPaddingShares(count: number): Safe<Share[]> {
  return namespacePaddingShares(
    PRIMARY_RESERVED_PADDING_NAMESPACE,
    SHARE_VERSION_ZERO,
    count,
  )
}

/** Padding after the last blob, up to the end of the square */
export function tailPaddingShares(count: number): Safe<Share[]> {
  return namespacePaddingShares(TAIL_PADDING_NAMESPACE, SHARE_VERSION_ZERO, count)
}
