/**
 * Compact share parsing
 *
 * Recovers the length-delimited units stored in a run of compact shares.
 * The first share is read from its reserved-bytes offset, so a run sliced
 * out of the middle of a sequence skips the tail of the unit that began
 * before it. Reading stops at the first delimiter that is zero or that
 * claims more bytes than remain: what follows is padding, or a unit that
 * continues past the end of the run.
 */

import { MAX_VARINT_LEN_64, decodeUvarint, uvarintSize } from '@dasquare/serialization'
import {
  InvalidShareError,
  type Safe,
  SHARE_VERSION_ZERO,
  safeError,
  safeResult,
} from '@dasquare/types'
import type { Share } from './share'

export function parseCompactShares(shares: readonly Share[]): Safe<Uint8Array[]> {
  if (shares.length === 0) return safeResult([])

  for (const share of shares) {
    if (share.version !== SHARE_VERSION_ZERO) {
      return safeError(
        new InvalidShareError(
          `Unsupported share version for compact shares ${share.version}`,
          { version: share.version },
        ),
      )
    }
  }

  const [error, rawData] = extractRawData(shares)
  if (error) return safeError(error)
  return parseRawData(rawData)
}

function extractRawData(shares: readonly Share[]): Safe<Uint8Array> {
  const chunks: Uint8Array[] = []
  for (const [i, share] of shares.entries()) {
    if (i === 0) {
      const [error, raw] = share.rawDataUsingReserved()
      if (error) return safeError(error)
      chunks.push(raw)
    } else {
      chunks.push(share.rawData())
    }
  }
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0)
  const out = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    out.set(chunk, offset)
    offset += chunk.length
  }
  return safeResult(out)
}

function parseRawData(rawData: Uint8Array): Safe<Uint8Array[]> {
  const units: Uint8Array[] = []
  let rest = rawData
  for (;;) {
    const [error, delimited] = parseDelimiter(rest)
    if (error) return safeError(error)
    const { unitLen, data } = delimited
    if (unitLen === 0n) return safeResult(units)
    if (unitLen > BigInt(data.length)) return safeResult(units)
    const length = Number(unitLen)
    units.push(data.subarray(0, length))
    rest = data.subarray(length)
  }
}

/**
 * Read the varint at the head of `input`. A delimiter cut short by the end
 * of the input is read as if zero padded.
 */
function parseDelimiter(
  input: Uint8Array,
): Safe<{ unitLen: bigint; data: Uint8Array }> {
  if (input.length === 0) return safeResult({ unitLen: 0n, data: input })

  const window = new Uint8Array(MAX_VARINT_LEN_64)
  window.set(input.subarray(0, MAX_VARINT_LEN_64), 0)
  const [error, decoded] = decodeUvarint(window)
  if (error) {
    return safeError(
      new InvalidShareError(`Invalid unit length delimiter: ${error.message}`),
    )
  }
  const delimiterLen = Math.min(uvarintSize(decoded.value), input.length)
  return safeResult({ unitLen: decoded.value, data: input.subarray(delimiterLen) })
}
