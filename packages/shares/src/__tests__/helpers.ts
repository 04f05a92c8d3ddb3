import type { Safe } from '@dasquare/types'
import { Namespace } from '../namespace'

export function unwrap<T>(result: Safe<T, Error>): T {
  const [error, value] = result
  if (error) throw error
  return value
}

/**
 * Version zero namespace above the primary reserved range: the sub id is
 * right-aligned in 10 bytes whose first byte is 1
 */
export function userNamespace(...subId: number[]): Namespace {
  const padded = new Uint8Array(10)
  padded[0] = 1
  padded.set(subId, padded.length - subId.length)
  return unwrap(Namespace.v0(padded))
}

/** Deterministic filler so truncation bugs show up as wrong bytes */
export function patterned(length: number, seed = 0): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (i + seed) % 251)
}
