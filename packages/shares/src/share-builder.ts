/**
 * Share Builder
 *
 * Fills one share's bytes incrementally. The layout variant is fixed when
 * the builder is created: compact namespaces get reserved bytes after the
 * (optional) sequence length, every other namespace uses the sparse layout.
 */

import { encodeUint32BE } from '@dasquare/core'
import {
  FIBRE_COMMITMENT_SIZE,
  InvalidShareError,
  InvariantViolationError,
  NAMESPACE_SIZE,
  type Safe,
  SEQUENCE_LEN_BYTES,
  SHARE_INFO_BYTES,
  SHARE_RESERVED_BYTES,
  SHARE_SIZE,
  SHARE_VERSION_TWO,
  safeError,
  safeResult,
} from '@dasquare/types'
import { InfoByte } from './info-byte'
import type { Namespace } from './namespace'
import { newReservedBytes, parseReservedBytes } from './reserved-bytes'
import { Share, versionHasSigner } from './share'

export type ShareLayout = 'compact' | 'sparse'

export class ShareBuilder {
  private buffer = new Uint8Array(SHARE_SIZE)
  private length = 0

  private constructor(
    readonly namespace: Namespace,
    readonly shareVersion: number,
    readonly isFirstShare: boolean,
    readonly layout: ShareLayout,
  ) {}

  /**
   * Start a share: namespace, info byte, a placeholder sequence length on
   * the first share and placeholder reserved bytes on compact shares.
   */
  static create(
    namespace: Namespace,
    shareVersion: number,
    isFirstShare: boolean,
  ): Safe<ShareBuilder> {
    const [error, infoByte] = InfoByte.create(shareVersion, isFirstShare)
    if (error) return safeError(error)

    const builder = new ShareBuilder(
      namespace,
      shareVersion,
      isFirstShare,
      namespace.isCompact() ? 'compact' : 'sparse',
    )
    builder.append(namespace.bytes)
    builder.append(Uint8Array.of(infoByte.value))
    if (isFirstShare) builder.append(new Uint8Array(SEQUENCE_LEN_BYTES))
    if (builder.layout === 'compact') {
      builder.append(new Uint8Array(SHARE_RESERVED_BYTES))
    }
    return safeResult(builder)
  }

  availableBytes(): number {
    return SHARE_SIZE - this.length
  }

  /**
   * Append as much of `data` as fits. Returns the part that did not fit,
   * or undefined when everything was written.
   */
  addData(data: Uint8Array): Uint8Array | undefined {
    const available = this.availableBytes()
    if (data.length <= available) {
      this.append(data)
      return undefined
    }
    this.append(data.subarray(0, available))
    return data.subarray(available)
  }

  /**
   * Replace the builder's content with an already-built share's bytes
   */
  importRawShare(raw: Uint8Array): this {
    if (raw.length > SHARE_SIZE) {
      throw new InvariantViolationError(
        `Imported share of ${raw.length} bytes exceeds ${SHARE_SIZE}`,
      )
    }
    this.buffer = new Uint8Array(SHARE_SIZE)
    this.buffer.set(raw, 0)
    this.length = raw.length
    return this
  }

  writeSequenceLen(sequenceLen: number): Safe<void> {
    if (!this.isFirstShare) {
      return safeError(new InvalidShareError('Not the first share'))
    }
    const offset = NAMESPACE_SIZE + SHARE_INFO_BYTES
    if (this.length < offset + SEQUENCE_LEN_BYTES) {
      return safeError(
        new InvalidShareError('Share is too short to hold a sequence length'),
      )
    }
    this.buffer.set(encodeUint32BE(sequenceLen), offset)
    return safeResult(undefined)
  }

  /** Writes the signer on the first share of versions 1 and 2 only */
  writeSigner(signer: Uint8Array): void {
    if (!this.isFirstShare || !versionHasSigner(this.shareVersion)) return
    this.append(signer)
  }

  /** Version 2 first shares only */
  writeFibreBlobVersion(fibreBlobVersion: number): void {
    if (!this.isFirstShare || this.shareVersion !== SHARE_VERSION_TWO) return
    this.append(encodeUint32BE(fibreBlobVersion))
  }

  /** Version 2 first shares only; commitments of the wrong size are skipped */
  writeCommitment(commitment: Uint8Array): void {
    if (!this.isFirstShare || this.shareVersion !== SHARE_VERSION_TWO) return
    if (commitment.length !== FIBRE_COMMITMENT_SIZE) return
    this.append(commitment)
  }

  /**
   * Record where the next unit starts, unless the reserved bytes already
   * point at an earlier unit.
   */
  maybeWriteReservedBytes(): Safe<void> {
    if (this.layout !== 'compact') {
      return safeError(new InvalidShareError('This is not a compact share'))
    }
    const index = this.indexOfReservedBytes()
    const [parseError, current] = parseReservedBytes(
      this.buffer.subarray(index, index + SHARE_RESERVED_BYTES),
    )
    if (parseError) return safeError(parseError)
    if (current !== 0) return safeResult(undefined)

    const [error, reserved] = newReservedBytes(this.length)
    if (error) return safeError(error)
    this.buffer.set(reserved, index)
    return safeResult(undefined)
  }

  /**
   * Fill the rest of the share with zeros
   *
   * @returns Number of padding bytes written
   */
  zeroPadIfNecessary(): number {
    const padding = this.availableBytes()
    this.buffer.fill(0, this.length)
    this.length = SHARE_SIZE
    return padding
  }

  flipSequenceStart(): void {
    this.buffer[NAMESPACE_SIZE] ^= 0x01
  }

  /** Nothing but the header has been written */
  isEmptyShare(): boolean {
    let expected = NAMESPACE_SIZE + SHARE_INFO_BYTES
    if (this.layout === 'compact') expected += SHARE_RESERVED_BYTES
    if (this.isFirstShare) expected += SEQUENCE_LEN_BYTES
    return this.length === expected
  }

  clone(): ShareBuilder {
    const copy = new ShareBuilder(
      this.namespace,
      this.shareVersion,
      this.isFirstShare,
      this.layout,
    )
    return copy.importRawShare(this.buffer.subarray(0, this.length))
  }

  build(): Safe<Share> {
    return Share.create(this.buffer.subarray(0, this.length))
  }

  private indexOfReservedBytes(): number {
    return (
      NAMESPACE_SIZE +
      SHARE_INFO_BYTES +
      (this.isFirstShare ? SEQUENCE_LEN_BYTES : 0)
    )
  }

  private append(bytes: Uint8Array): void {
    if (bytes.length > this.availableBytes()) {
      throw new InvariantViolationError(
        `Writing ${bytes.length} bytes overflows the share`,
        { available: this.availableBytes() },
      )
    }
    this.buffer.set(bytes, this.length)
    this.length += bytes.length
  }
}
