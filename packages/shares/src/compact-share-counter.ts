/**
 * Compact Share Counter
 *
 * Mirrors the share arithmetic of `CompactShareSplitter` without writing
 * any bytes, so the square builder can test whether a transaction fits in
 * constant time and undo the test when it does not.
 */

import { uvarintSize } from '@dasquare/serialization'
import {
  CONTINUATION_COMPACT_SHARE_CONTENT_SIZE,
  FIRST_COMPACT_SHARE_CONTENT_SIZE,
} from '@dasquare/types'

export class CompactShareCounter {
  private shares = 0
  private remainderBytes = 0
  private readonly history: { shares: number; remainder: number }[] = []

  /**
   * Count a unit of `dataLen` bytes plus its length delimiter
   *
   * @returns How many shares the total grew by
   */
  add(dataLen: number): number {
    let remaining = dataLen + uvarintSize(dataLen)
    const lastShares = this.shares
    const lastRemainder = this.remainderBytes
    this.history.push({ shares: lastShares, remainder: lastRemainder })

    if (this.shares === 0) {
      const room = FIRST_COMPACT_SHARE_CONTENT_SIZE - this.remainderBytes
      if (remaining >= room) {
        remaining -= room
        this.shares++
        this.remainderBytes = 0
      } else {
        this.remainderBytes += remaining
        remaining = 0
      }
    }

    const room = CONTINUATION_COMPACT_SHARE_CONTENT_SIZE - this.remainderBytes
    if (remaining >= room) {
      remaining -= room
      this.shares++
      this.remainderBytes = 0
    } else {
      this.remainderBytes += remaining
      remaining = 0
    }

    if (remaining > 0) {
      this.shares += Math.floor(
        remaining / CONTINUATION_COMPACT_SHARE_CONTENT_SIZE,
      )
      this.remainderBytes = remaining % CONTINUATION_COMPACT_SHARE_CONTENT_SIZE
    }

    return this.size() - lastShares - (lastRemainder > 0 ? 1 : 0)
  }

  /** Undo the most recent `add` not yet undone */
  revert(): void {
    const last = this.history.pop()
    if (!last) return
    this.shares = last.shares
    this.remainderBytes = last.remainder
  }

  /** Shares the units counted so far occupy */
  size(): number {
    return this.remainderBytes === 0 ? this.shares : this.shares + 1
  }

  /** Bytes used in the last, partially filled share */
  remainder(): number {
    return this.remainderBytes
  }
}
