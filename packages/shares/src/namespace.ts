/**
 * Namespaces
 *
 * A namespace is a version byte followed by a 28-byte id. Namespaces are
 * totally ordered by byte-wise comparison of `version ‖ id`, and the square
 * is laid out in that order. The lowest values (version 0, id prefix all
 * zero) and the highest (version 255) are reserved for the protocol.
 */

import { bytesEqual, compareBytes, toHex } from '@dasquare/core'
import {
  InvalidNamespaceError,
  NAMESPACE_ID_SIZE,
  NAMESPACE_SIZE,
  NAMESPACE_VERSION_INDEX,
  NAMESPACE_VERSION_MAX,
  NAMESPACE_VERSION_SIZE,
  NAMESPACE_VERSION_ZERO,
  NAMESPACE_VERSION_ZERO_ID_SIZE,
  NAMESPACE_VERSION_ZERO_PREFIX_SIZE,
  type Safe,
  SUPPORTED_BLOB_NAMESPACE_VERSIONS,
  safeError,
  safeResult,
} from '@dasquare/types'

const NAMESPACE_SPACE = 2n ** BigInt(NAMESPACE_SIZE * 8)

export class Namespace {
  private constructor(private readonly data: Uint8Array) {}

  /**
   * Build a namespace from a version and id, validating both
   */
  static create(version: number, id: Uint8Array): Safe<Namespace> {
    if (!Number.isInteger(version) || version < 0 || version > 0xff) {
      return safeError(
        new InvalidNamespaceError(`Namespace version out of range: ${version}`),
      )
    }
    const data = new Uint8Array(NAMESPACE_VERSION_SIZE + id.length)
    data[NAMESPACE_VERSION_INDEX] = version
    data.set(id, NAMESPACE_VERSION_SIZE)
    return Namespace.validated(data)
  }

  /**
   * Parse a namespace from its 29-byte encoding
   */
  static fromBytes(bytes: Uint8Array): Safe<Namespace> {
    if (bytes.length !== NAMESPACE_SIZE) {
      return safeError(
        new InvalidNamespaceError(
          `Invalid namespace length: ${bytes.length}. Must be ${NAMESPACE_SIZE} bytes`,
          { length: bytes.length },
        ),
      )
    }
    return Namespace.validated(bytes.slice())
  }

  /**
   * Version zero namespace with `subId` left-padded to 10 bytes
   */
  static v0(subId: Uint8Array): Safe<Namespace> {
    if (subId.length > NAMESPACE_VERSION_ZERO_ID_SIZE) {
      return safeError(
        new InvalidNamespaceError(
          `subID must be <= ${NAMESPACE_VERSION_ZERO_ID_SIZE} bytes, but it was ${subId.length} bytes`,
        ),
      )
    }
    const data = new Uint8Array(NAMESPACE_SIZE)
    data.set(subId, NAMESPACE_SIZE - subId.length)
    return Namespace.validated(data)
  }

  /**
   * Wrap bytes that are already known to frame a namespace, such as the
   * first bytes of a share or a protocol constant. No validation happens.
   */
  static wrap(bytes: Uint8Array): Namespace {
    return new Namespace(bytes)
  }

  private static validated(data: Uint8Array): Safe<Namespace> {
    const namespace = new Namespace(data)
    const [error] = namespace.validate()
    if (error) return safeError(error)
    return safeResult(namespace)
  }

  get version(): number {
    return this.data[NAMESPACE_VERSION_INDEX]
  }

  get id(): Uint8Array {
    return this.data.subarray(NAMESPACE_VERSION_SIZE)
  }

  get bytes(): Uint8Array {
    return this.data
  }

  toString(): string {
    return toHex(this.data)
  }

  validate(): Safe<void, InvalidNamespaceError> {
    if (
      this.version !== NAMESPACE_VERSION_ZERO &&
      this.version !== NAMESPACE_VERSION_MAX
    ) {
      return safeError(
        new InvalidNamespaceError(
          `Unsupported namespace version ${this.version}`,
          { version: this.version },
        ),
      )
    }
    if (this.id.length !== NAMESPACE_ID_SIZE) {
      return safeError(
        new InvalidNamespaceError(
          `Unsupported namespace id length: id must be ${NAMESPACE_ID_SIZE} bytes but it was ${this.id.length} bytes`,
          { length: this.id.length },
        ),
      )
    }
    if (
      this.version === NAMESPACE_VERSION_ZERO &&
      this.id.subarray(0, NAMESPACE_VERSION_ZERO_PREFIX_SIZE).some((b) => b !== 0)
    ) {
      return safeError(
        new InvalidNamespaceError(
          `Unsupported namespace id with version ${this.version}: id must start with ${NAMESPACE_VERSION_ZERO_PREFIX_SIZE} leading zeros`,
          { namespace: this.toString() },
        ),
      )
    }
    return safeResult(undefined)
  }

  /**
   * Valid and holding real data, i.e. neither parity nor tail padding
   */
  validateForData(): Safe<void, InvalidNamespaceError> {
    const [error] = this.validate()
    if (error) return safeError(error)
    if (!this.isUsableNamespace()) {
      return safeError(
        new InvalidNamespaceError(
          `Invalid data namespace (${this.toString()}): parity and tail padding namespace are forbidden`,
        ),
      )
    }
    return safeResult(undefined)
  }

  /**
   * Usable for a user blob: a data namespace outside both reserved ranges
   * with a supported blob namespace version
   */
  validateForBlob(): Safe<void, InvalidNamespaceError> {
    const [error] = this.validateForData()
    if (error) return safeError(error)
    if (this.isReserved()) {
      return safeError(
        new InvalidNamespaceError(
          `Invalid data namespace (${this.toString()}): reserved data is forbidden`,
        ),
      )
    }
    if (!SUPPORTED_BLOB_NAMESPACE_VERSIONS.includes(this.version)) {
      return safeError(
        new InvalidNamespaceError(
          `Blob namespace version ${this.version} is not supported`,
        ),
      )
    }
    return safeResult(undefined)
  }

  isReserved(): boolean {
    return this.isPrimaryReserved() || this.isSecondaryReserved()
  }

  isPrimaryReserved(): boolean {
    return this.isLessOrEqualThan(MAX_PRIMARY_RESERVED_NAMESPACE)
  }

  isSecondaryReserved(): boolean {
    return this.isGreaterOrEqualThan(MIN_SECONDARY_RESERVED_NAMESPACE)
  }

  /** Neither parity shares nor tail padding */
  isUsableNamespace(): boolean {
    return !this.isParityShares() && !this.isTailPadding()
  }

  isParityShares(): boolean {
    return this.equals(PARITY_SHARES_NAMESPACE)
  }

  isTailPadding(): boolean {
    return this.equals(TAIL_PADDING_NAMESPACE)
  }

  isPrimaryReservedPadding(): boolean {
    return this.equals(PRIMARY_RESERVED_PADDING_NAMESPACE)
  }

  isTx(): boolean {
    return this.equals(TX_NAMESPACE)
  }

  isPayForBlob(): boolean {
    return this.equals(PAY_FOR_BLOB_NAMESPACE)
  }

  isPayForFibre(): boolean {
    return this.equals(PAY_FOR_FIBRE_NAMESPACE)
  }

  /** Namespaces whose shares use the compact layout */
  isCompact(): boolean {
    return this.isTx() || this.isPayForBlob() || this.isPayForFibre()
  }

  compare(other: Namespace): -1 | 0 | 1 {
    return compareBytes(this.data, other.data)
  }

  equals(other: Namespace): boolean {
    return bytesEqual(this.data, other.data)
  }

  isLessThan(other: Namespace): boolean {
    return this.compare(other) === -1
  }

  isLessOrEqualThan(other: Namespace): boolean {
    return this.compare(other) < 1
  }

  isGreaterThan(other: Namespace): boolean {
    return this.compare(other) === 1
  }

  isGreaterOrEqualThan(other: Namespace): boolean {
    return this.compare(other) > -1
  }

  /**
   * Add `value` (which may be negative) to the namespace read as a
   * big-endian integer. Handy for deriving adjacent namespaces.
   */
  addInt(value: number): Safe<Namespace, InvalidNamespaceError> {
    if (value === 0) return safeResult(this)
    const sum = bytesToBigInt(this.data) + BigInt(value)
    if (sum < 0n || sum >= NAMESPACE_SPACE) {
      return safeError(new InvalidNamespaceError('Namespace overflow'))
    }
    return safeResult(new Namespace(bigIntToBytes(sum, NAMESPACE_SIZE)))
  }

  /** `times` independent copies of this namespace */
  repeat(times: number): Namespace[] {
    return Array.from({ length: times }, () => new Namespace(this.data.slice()))
  }
}

function bytesToBigInt(bytes: Uint8Array): bigint {
  let value = 0n
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte)
  }
  return value
}

function bigIntToBytes(value: bigint, size: number): Uint8Array {
  const out = new Uint8Array(size)
  let remaining = value
  for (let i = size - 1; i >= 0; i--) {
    out[i] = Number(remaining & 0xffn)
    remaining >>= 8n
  }
  return out
}

function primaryReservedNamespace(lastByte: number): Namespace {
  const data = new Uint8Array(NAMESPACE_SIZE)
  data[NAMESPACE_VERSION_INDEX] = NAMESPACE_VERSION_ZERO
  data[NAMESPACE_SIZE - 1] = lastByte
  return Namespace.wrap(data)
}

function secondaryReservedNamespace(lastByte: number): Namespace {
  const data = new Uint8Array(NAMESPACE_SIZE).fill(0xff)
  data[NAMESPACE_VERSION_INDEX] = NAMESPACE_VERSION_MAX
  data[NAMESPACE_SIZE - 1] = lastByte
  return Namespace.wrap(data)
}

/** Ordinary transactions */
export const TX_NAMESPACE = primaryReservedNamespace(0x01)

/** Intermediate state roots */
export const INTERMEDIATE_STATE_ROOTS_NAMESPACE = primaryReservedNamespace(0x02)

/** Index-wrapped pay-for-blob transactions */
export const PAY_FOR_BLOB_NAMESPACE = primaryReservedNamespace(0x04)

/** Pay-for-fibre transactions */
export const PAY_FOR_FIBRE_NAMESPACE = primaryReservedNamespace(0x05)

/** Padding after the primary reserved namespaces */
export const PRIMARY_RESERVED_PADDING_NAMESPACE = primaryReservedNamespace(0xff)

/** Highest primary reserved namespace */
export const MAX_PRIMARY_RESERVED_NAMESPACE = primaryReservedNamespace(0xff)

/** Lowest secondary reserved namespace */
export const MIN_SECONDARY_RESERVED_NAMESPACE = secondaryReservedNamespace(0x00)

/** Padding after the last blob, up to the end of the square */
export const TAIL_PADDING_NAMESPACE = secondaryReservedNamespace(0xfe)

/** Erasure coded data */
export const PARITY_SHARES_NAMESPACE = secondaryReservedNamespace(0xff)
