/**
 * Reserved bytes of a compact share: the index, within the share, of the
 * first unit that starts there. Zero means no unit starts in the share.
 */

import { decodeUint32BE, encodeUint32BE } from '@dasquare/core'
import {
  InvalidShareError,
  type Safe,
  SHARE_RESERVED_BYTES,
  SHARE_SIZE,
  safeError,
  safeResult,
} from '@dasquare/types'

export function newReservedBytes(byteIndex: number): Safe<Uint8Array> {
  if (!Number.isInteger(byteIndex) || byteIndex < 0 || byteIndex >= SHARE_SIZE) {
    return safeError(
      new InvalidShareError(
        `Byte index ${byteIndex} must be less than share size ${SHARE_SIZE}`,
      ),
    )
  }
  return safeResult(encodeUint32BE(byteIndex))
}

export function parseReservedBytes(reservedBytes: Uint8Array): Safe<number> {
  if (reservedBytes.length !== SHARE_RESERVED_BYTES) {
    return safeError(
      new InvalidShareError(
        `Reserved bytes must be of length ${SHARE_RESERVED_BYTES}`,
      ),
    )
  }
  const byteIndex = decodeUint32BE(reservedBytes)
  if (byteIndex >= SHARE_SIZE) {
    return safeError(
      new InvalidShareError(
        `Reserved byte index ${byteIndex} must be less than share size ${SHARE_SIZE}`,
        { byteIndex },
      ),
    )
  }
  return safeResult(byteIndex)
}
