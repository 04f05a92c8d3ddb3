/**
 * Hashing helpers
 */

import { sha256 } from '@noble/hashes/sha2'
import { bytesToHex, type Hex } from 'viem'

export function sha256Hash(data: Uint8Array): Uint8Array {
  return sha256(data)
}

/**
 * SHA-256 of `data` as a 0x-prefixed hex string, usable as a map key
 */
export function sha256Hex(data: Uint8Array): Hex {
  return bytesToHex(sha256(data))
}
