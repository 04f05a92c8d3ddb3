/**
 * Blobs
 *
 * A blob is a namespaced payload submitted by a user. Each share version
 * has its own signer rule:
 * - version 0: no signer
 * - version 1: a 20-byte signer
 * - version 2: a 20-byte signer, and data that is exactly a 4-byte
 *   big-endian fibre blob version followed by a 32-byte commitment
 */

import { bytesEqual, decodeUint32BE, encodeUint32BE } from '@dasquare/core'
import {
  FIBRE_BLOB_VERSION_SIZE,
  FIBRE_COMMITMENT_SIZE,
  InvalidBlobError,
  NAMESPACE_VERSION_ZERO,
  type Safe,
  SHARE_VERSION_ONE,
  SHARE_VERSION_TWO,
  SHARE_VERSION_ZERO,
  SIGNER_SIZE,
  safeError,
  safeResult,
} from '@dasquare/types'
import type { Namespace } from './namespace'
import type { Share } from './share'
import { SparseShareSplitter } from './sparse-share-splitter'

export class Blob {
  private constructor(
    readonly namespace: Namespace,
    readonly data: Uint8Array,
    readonly shareVersion: number,
    readonly signer: Uint8Array | undefined,
  ) {}

  static create(
    namespace: Namespace,
    data: Uint8Array,
    shareVersion: number,
    signer?: Uint8Array,
  ): Safe<Blob, InvalidBlobError> {
    if (data.length === 0) {
      return safeError(new InvalidBlobError('Data can not be empty'))
    }
    if (namespace.version !== NAMESPACE_VERSION_ZERO) {
      return safeError(
        new InvalidBlobError(
          `Namespace version must be ${NAMESPACE_VERSION_ZERO} got ${namespace.version}`,
        ),
      )
    }
    const [namespaceError] = namespace.validateForBlob()
    if (namespaceError) {
      return safeError(
        new InvalidBlobError(`Invalid blob namespace: ${namespaceError.message}`, {
          namespace: namespace.toString(),
        }),
      )
    }

    switch (shareVersion) {
      case SHARE_VERSION_ZERO:
        if (signer !== undefined) {
          return safeError(
            new InvalidBlobError('Share version 0 does not support signer'),
          )
        }
        break
      case SHARE_VERSION_ONE:
      case SHARE_VERSION_TWO: {
        if (signer?.length !== SIGNER_SIZE) {
          return safeError(
            new InvalidBlobError(
              `Share version ${shareVersion} requires signer of size ${SIGNER_SIZE} bytes`,
            ),
          )
        }
        const expected = FIBRE_BLOB_VERSION_SIZE + FIBRE_COMMITMENT_SIZE
        if (shareVersion === SHARE_VERSION_TWO && data.length !== expected) {
          return safeError(
            new InvalidBlobError(
              `Share version 2 requires data of size ${expected} bytes (fibre_blob_version + commitment), got ${data.length}`,
            ),
          )
        }
        break
      }
      default:
        return safeError(
          new InvalidBlobError(
            `Share version ${shareVersion} not supported. Please use 0, 1, or 2`,
          ),
        )
    }

    return safeResult(new Blob(namespace, data, shareVersion, signer))
  }

  static v0(namespace: Namespace, data: Uint8Array): Safe<Blob, InvalidBlobError> {
    return Blob.create(namespace, data, SHARE_VERSION_ZERO)
  }

  static v1(
    namespace: Namespace,
    data: Uint8Array,
    signer: Uint8Array,
  ): Safe<Blob, InvalidBlobError> {
    return Blob.create(namespace, data, SHARE_VERSION_ONE, signer)
  }

  static v2(
    namespace: Namespace,
    fibreBlobVersion: number,
    commitment: Uint8Array,
    signer: Uint8Array,
  ): Safe<Blob, InvalidBlobError> {
    if (commitment.length !== FIBRE_COMMITMENT_SIZE) {
      return safeError(
        new InvalidBlobError(
          `Commitment must be ${FIBRE_COMMITMENT_SIZE} bytes, got ${commitment.length}`,
        ),
      )
    }
    const data = new Uint8Array(FIBRE_BLOB_VERSION_SIZE + FIBRE_COMMITMENT_SIZE)
    data.set(encodeUint32BE(fibreBlobVersion), 0)
    data.set(commitment, FIBRE_BLOB_VERSION_SIZE)
    return Blob.create(namespace, data, SHARE_VERSION_TWO, signer)
  }

  get dataLen(): number {
    return this.data.length
  }

  hasSigner(): boolean {
    return this.signer !== undefined
  }

  /** Order by namespace */
  compare(other: Blob): -1 | 0 | 1 {
    return this.namespace.compare(other.namespace)
  }

  equals(other: Blob): boolean {
    return (
      this.namespace.equals(other.namespace) &&
      this.shareVersion === other.shareVersion &&
      bytesEqual(this.data, other.data) &&
      (this.signer === undefined
        ? other.signer === undefined
        : other.signer !== undefined && bytesEqual(this.signer, other.signer))
    )
  }

  toShares(): Safe<Share[]> {
    const splitter = new SparseShareSplitter()
    const [error] = splitter.write(this)
    if (error) return safeError(error)
    return safeResult(splitter.export())
  }

  fibreBlobVersion(): Safe<number, InvalidBlobError> {
    if (this.shareVersion !== SHARE_VERSION_TWO) {
      return safeError(
        new InvalidBlobError(
          `Fibre blob version is only available for share version 2, got version ${this.shareVersion}`,
        ),
      )
    }
    return safeResult(decodeUint32BE(this.data, 0))
  }

  commitment(): Safe<Uint8Array, InvalidBlobError> {
    if (this.shareVersion !== SHARE_VERSION_TWO) {
      return safeError(
        new InvalidBlobError(
          `Commitment is only available for share version 2, got version ${this.shareVersion}`,
        ),
      )
    }
    return safeResult(this.data.slice(FIBRE_BLOB_VERSION_SIZE))
  }
}

/**
 * Stable sort by namespace, returning a new array
 */
export function sortBlobs(blobs: readonly Blob[]): Blob[] {
  return [...blobs].sort((a, b) => a.compare(b))
}
