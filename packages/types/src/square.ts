/**
 * Square Layout Types
 *
 * Interfaces shared between the share codec, the envelope codec and the
 * square packer.
 */

import type { Safe } from './safe'

/**
 * End-exclusive interval of share indexes
 */
export interface ShareRange {
  /** Index of the first share occupied */
  start: number
  /** Index after the last share occupied */
  end: number
}

/**
 * Parameters fixed for the lifetime of a square builder
 */
export interface SquareConfig {
  /** Largest allowed square width, a power of two */
  maxSquareSize: number
  /** Subtree root threshold of the non-interactive default rules */
  subtreeRootThreshold: number
}

/**
 * Phases of a square builder
 *
 * - empty: nothing appended yet
 * - accumulating: transactions are being admitted
 * - sized: the square width has been decided, shares not yet written
 * - exported: the square has been materialized and cached
 */
export type SquareBuilderPhase = 'empty' | 'accumulating' | 'sized' | 'exported'

/**
 * Outcome of decoding bytes that may or may not be a given envelope.
 *
 * `matched: false` means the bytes are some other transaction. Bytes that
 * carry the envelope's magic but are malformed surface as an error instead.
 */
export type EnvelopeMatch<T> =
  | { matched: true; value: T }
  | { matched: false }

/**
 * Returns the blob data lengths a pay-for-blob transaction commits to, in
 * the order its blobs were placed.
 */
export type PfbDecoder = (tx: Uint8Array) => Safe<number[]>
