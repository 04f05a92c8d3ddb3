/**
 * Shares
 *
 * A share is exactly 512 bytes. Its fields are never stored separately;
 * every accessor slices them out of the raw buffer:
 *
 * | field            | bytes | present                                     |
 * |------------------|-------|---------------------------------------------|
 * | namespace        | 29    | always                                      |
 * | info byte        | 1     | always                                      |
 * | sequence length  | 4     | sequence start shares                       |
 * | reserved bytes   | 4     | compact namespaces                          |
 * | signer           | 20    | sequence start shares of versions 1 and 2   |
 * | payload          | rest  | always, zero padded                         |
 */

import { bytesEqual, decodeUint32BE, toHex } from '@dasquare/core'
import {
  InvalidShareError,
  NAMESPACE_SIZE,
  type Safe,
  SEQUENCE_LEN_BYTES,
  SHARE_INFO_BYTES,
  SHARE_RESERVED_BYTES,
  SHARE_SIZE,
  SHARE_VERSION_ONE,
  SHARE_VERSION_TWO,
  SIGNER_SIZE,
  SUPPORTED_SHARE_VERSIONS,
  safeError,
  safeResult,
} from '@dasquare/types'
import { InfoByte } from './info-byte'
import { Namespace } from './namespace'
import { parseReservedBytes } from './reserved-bytes'

/**
 * Share versions whose sequence start share carries a signer
 */
export function versionHasSigner(version: number): boolean {
  return version === SHARE_VERSION_ONE || version === SHARE_VERSION_TWO
}

export class Share {
  private constructor(private readonly data: Uint8Array) {}

  static create(bytes: Uint8Array): Safe<Share, InvalidShareError> {
    if (bytes.length !== SHARE_SIZE) {
      return safeError(
        new InvalidShareError(
          `Share data must be ${SHARE_SIZE} bytes, got ${bytes.length}`,
          { length: bytes.length },
        ),
      )
    }
    return safeResult(new Share(bytes.slice()))
  }

  get namespace(): Namespace {
    return Namespace.wrap(this.data.slice(0, NAMESPACE_SIZE))
  }

  get infoByte(): InfoByte {
    return InfoByte.fromByte(this.data[NAMESPACE_SIZE])
  }

  get version(): number {
    return this.infoByte.version
  }

  get isSequenceStart(): boolean {
    return this.infoByte.isSequenceStart
  }

  get isCompactShare(): boolean {
    return this.namespace.isCompact()
  }

  /** Declared sequence length; 0 for continuation shares */
  get sequenceLen(): number {
    if (!this.isSequenceStart) return 0
    return decodeUint32BE(this.data, NAMESPACE_SIZE + SHARE_INFO_BYTES)
  }

  /** Signer of a version 1 or 2 sequence start share */
  get signer(): Uint8Array | undefined {
    if (!this.isSequenceStart || !versionHasSigner(this.version)) {
      return undefined
    }
    const start = NAMESPACE_SIZE + SHARE_INFO_BYTES + SEQUENCE_LEN_BYTES
    return this.data.slice(start, start + SIGNER_SIZE)
  }

  checkVersionSupported(): Safe<void, InvalidShareError> {
    if (!SUPPORTED_SHARE_VERSIONS.includes(this.version)) {
      return safeError(
        new InvalidShareError(
          `Unsupported share version ${this.version} is not present in the list of supported share versions ${SUPPORTED_SHARE_VERSIONS.join(', ')}`,
          { version: this.version },
        ),
      )
    }
    return safeResult(undefined)
  }

  /**
   * Namespace padding, tail padding or primary reserved padding
   */
  isPadding(): boolean {
    return (
      this.isNamespacePadding() ||
      this.namespace.isTailPadding() ||
      this.namespace.isPrimaryReservedPadding()
    )
  }

  isNamespacePadding(): boolean {
    return this.isSequenceStart && this.sequenceLen === 0
  }

  /**
   * Payload bytes, after every header field the share carries. A view
   * into the share: readers only.
   */
  rawData(): Uint8Array {
    return this.data.subarray(this.rawDataStartIndex())
  }

  /**
   * Payload bytes of a compact share starting at the first unit that begins
   * in it, skipping the tail of a unit carried over from an earlier share.
   * Empty when no unit begins in the share.
   */
  rawDataUsingReserved(): Safe<Uint8Array> {
    if (!this.isCompactShare) return safeResult(this.rawData())

    const reservedIndex = this.headerSizeBeforeReserved()
    const [error, byteIndex] = parseReservedBytes(
      this.data.subarray(reservedIndex, reservedIndex + SHARE_RESERVED_BYTES),
    )
    if (error) return safeError(error)
    if (byteIndex === 0) return safeResult(new Uint8Array(0))
    if (byteIndex < reservedIndex + SHARE_RESERVED_BYTES) {
      return safeError(
        new InvalidShareError(
          `Reserved byte index ${byteIndex} points into the share header`,
          { byteIndex },
        ),
      )
    }
    return safeResult(this.data.subarray(byteIndex))
  }

  /** A copy of the 512 bytes; writing to it leaves the share unchanged */
  toBytes(): Uint8Array {
    return this.data.slice()
  }

  equals(other: Share): boolean {
    return bytesEqual(this.data, other.data)
  }

  toString(): string {
    return toHex(this.data)
  }

  private headerSizeBeforeReserved(): number {
    return (
      NAMESPACE_SIZE +
      SHARE_INFO_BYTES +
      (this.isSequenceStart ? SEQUENCE_LEN_BYTES : 0)
    )
  }

  private rawDataStartIndex(): number {
    let index = this.headerSizeBeforeReserved()
    if (this.isCompactShare) index += SHARE_RESERVED_BYTES
    if (this.isSequenceStart && versionHasSigner(this.version)) {
      index += SIGNER_SIZE
    }
    return index
  }
}

export function sharesToBytes(shares: readonly Share[]): Uint8Array[] {
  return shares.map((share) => share.toBytes())
}

export function sharesFromBytes(bytes: readonly Uint8Array[]): Safe<Share[]> {
  const shares: Share[] = []
  for (const raw of bytes) {
    const [error, share] = Share.create(raw)
    if (error) return safeError(error)
    shares.push(share)
  }
  return safeResult(shares)
}
