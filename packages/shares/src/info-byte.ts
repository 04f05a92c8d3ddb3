import {
  InvalidShareError,
  MAX_SHARE_VERSION,
  type Safe,
  safeError,
  safeResult,
} from '@dasquare/types'

/**
 * The byte after the namespace: share version in the upper seven bits,
 * sequence start flag in the lowest bit.
 */
export class InfoByte {
  private constructor(readonly value: number) {}

  static create(version: number, isSequenceStart: boolean): Safe<InfoByte> {
    if (!Number.isInteger(version) || version < 0 || version > MAX_SHARE_VERSION) {
      return safeError(
        new InvalidShareError(
          `Version ${version} must be less than or equal to ${MAX_SHARE_VERSION}`,
          { version },
        ),
      )
    }
    return safeResult(new InfoByte((version << 1) | (isSequenceStart ? 1 : 0)))
  }

  /** Read a raw byte; every byte value is a well-formed info byte */
  static fromByte(byte: number): InfoByte {
    return new InfoByte(byte & 0xff)
  }

  get version(): number {
    return this.value >> 1
  }

  get isSequenceStart(): boolean {
    return (this.value & 1) === 1
  }
}

export function parseInfoByte(byte: number): Safe<InfoByte> {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
    return safeError(new InvalidShareError(`Info byte out of range: ${byte}`))
  }
  return safeResult(InfoByte.fromByte(byte))
}
