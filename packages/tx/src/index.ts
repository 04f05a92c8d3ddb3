/**
 * Transaction Envelopes
 *
 * Protobuf envelopes that carry blobs alongside a transaction, or record
 * where those blobs landed in the square.
 */

export * from './blob-proto'
export * from './blob-tx'
export * from './index-wrapper'
export * from './split'
