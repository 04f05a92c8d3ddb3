import { type Safe, safeError, safeResult } from '@dasquare/types'
import type { Blob } from './blob'
import type { Share } from './share'
import { SparseShareSplitter } from './sparse-share-splitter'

/**
 * Blobs written one after another, with no padding between them
 */
export function splitBlobs(...blobs: Blob[]): Safe<Share[]> {
  const writer = new SparseShareSplitter()
  for (const blob of blobs) {
    const [error] = writer.write(blob)
    if (error) return safeError(error)
  }
  return safeResult(writer.export())
}
