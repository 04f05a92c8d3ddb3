/**
 * Sparse Share Splitter
 *
 * Writes blobs into shares, one sequence per blob. Between blobs the
 * square builder may ask for namespace padding shares so that the next
 * blob starts at an index allowed by the placement rules.
 */

import {
  FIBRE_COMMITMENT_SIZE,
  InvalidShareError,
  type Safe,
  SHARE_VERSION_TWO,
  SUPPORTED_SHARE_VERSIONS,
  safeError,
  safeResult,
} from '@dasquare/types'
import type { Blob } from './blob'
import { namespacePaddingShares } from './padding'
import { type Share, versionHasSigner } from './share'
import { ShareBuilder } from './share-builder'

export class SparseShareSplitter {
  private readonly shares: Share[] = []

  write(blob: Blob): Safe<void> {
    if (!SUPPORTED_SHARE_VERSIONS.includes(blob.shareVersion)) {
      return safeError(
        new InvalidShareError(`Unsupported share version: ${blob.shareVersion}`),
      )
    }

    const [error, first] = ShareBuilder.create(
      blob.namespace,
      blob.shareVersion,
      true,
    )
    if (error) return safeError(error)

    const isFibre = blob.shareVersion === SHARE_VERSION_TWO
    const [lenError] = first.writeSequenceLen(
      isFibre ? FIBRE_COMMITMENT_SIZE : blob.dataLen,
    )
    if (lenError) return safeError(lenError)

    if (versionHasSigner(blob.shareVersion) && blob.signer) {
      first.writeSigner(blob.signer)
    }

    if (isFibre) {
      const [versionError, fibreBlobVersion] = blob.fibreBlobVersion()
      if (versionError) return safeError(versionError)
      const [commitmentError, commitment] = blob.commitment()
      if (commitmentError) return safeError(commitmentError)
      first.writeFibreBlobVersion(fibreBlobVersion)
      first.writeCommitment(commitment)
      first.zeroPadIfNecessary()
      return this.push(first)
    }

    let builder = first
    let remaining: Uint8Array | undefined = blob.data
    while (remaining) {
      remaining = builder.addData(remaining)
      if (!remaining) builder.zeroPadIfNecessary()
      const [pushError] = this.push(builder)
      if (pushError) return safeError(pushError)
      if (!remaining) break

      const [nextError, next] = ShareBuilder.create(
        blob.namespace,
        blob.shareVersion,
        false,
      )
      if (nextError) return safeError(nextError)
      builder = next
    }
    return safeResult(undefined)
  }

  /**
   * Append `count` padding shares carrying the namespace and version of the
   * last written share
   */
  writeNamespacePaddingShares(count: number): Safe<void> {
    if (count < 0) {
      return safeError(new Error('Cannot write negative namespaced shares'))
    }
    if (count === 0) return safeResult(undefined)
    const last = this.shares[this.shares.length - 1]
    if (!last) {
      return safeError(
        new Error(
          'Cannot write namespace padding shares on an empty SparseShareSplitter',
        ),
      )
    }
    const [error, padding] = namespacePaddingShares(
      last.namespace,
      last.version,
      count,
    )
    if (error) return safeError(error)
    this.shares.push(...padding)
    return safeResult(undefined)
  }

  export(): Share[] {
    return [...this.shares]
  }

  count(): number {
    return this.shares.length
  }

  private push(builder: ShareBuilder): Safe<void> {
    const [error, share] = builder.build()
    if (error) return safeError(error)
    this.shares.push(share)
    return safeResult(undefined)
  }
}
