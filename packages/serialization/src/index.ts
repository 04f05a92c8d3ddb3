/**
 * Serialization Package
 *
 * Unsigned varints and the subset of the protobuf wire format used by the
 * transaction envelopes.
 */

export * from './core/protobuf'
export * from './core/varint'
