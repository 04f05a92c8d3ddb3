import type { ShareRange } from '@dasquare/types'
import type { Namespace } from './namespace'
import type { Share } from './share'

export function newRange(start: number, end: number): ShareRange {
  return { start, end }
}

export function emptyRange(): ShareRange {
  return { start: 0, end: 0 }
}

export function isEmptyRange(range: ShareRange): boolean {
  return range.start === 0 && range.end === 0
}

/** Shift both ends of a range by `offset` */
export function offsetRange(range: ShareRange, offset: number): ShareRange {
  return { start: range.start + offset, end: range.end + offset }
}

/**
 * End-exclusive range of the shares belonging to `namespace`, assuming the
 * shares are sorted by namespace. Empty when the namespace is absent.
 */
export function getShareRangeForNamespace(
  shares: readonly Share[],
  namespace: Namespace,
): ShareRange {
  const first = shares[0]
  const last = shares[shares.length - 1]
  if (!first || !last) return emptyRange()
  if (namespace.isLessThan(first.namespace)) return emptyRange()
  if (namespace.isGreaterThan(last.namespace)) return emptyRange()

  let start = -1
  for (let i = 0; i < shares.length; i++) {
    const shareNamespace = shares[i].namespace
    if (start !== -1 && shareNamespace.isGreaterThan(namespace)) {
      return newRange(start, i)
    }
    if (start === -1 && namespace.equals(shareNamespace)) start = i
  }
  if (start === -1) return emptyRange()
  return newRange(start, shares.length)
}
