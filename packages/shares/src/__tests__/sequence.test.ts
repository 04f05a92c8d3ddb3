import { SequenceError } from '@dasquare/types'
import { describe, expect, it } from 'vitest'
import { Blob } from '../blob'
import { compactSharesNeeded } from '../sequence'
import { parseShares } from '../parse'
import { tailPaddingShares } from '../padding'
import { getShareRangeForNamespace, isEmptyRange, newRange } from '../range'
import { splitBlobs } from '../split'
import { patterned, unwrap, userNamespace } from './helpers'

describe('compactSharesNeeded', () => {
  it('should count shares at the capacity boundaries', () => {
    expect(compactSharesNeeded(0)).toBe(0)
    expect(compactSharesNeeded(1)).toBe(1)
    expect(compactSharesNeeded(474)).toBe(1)
    expect(compactSharesNeeded(475)).toBe(2)
    expect(compactSharesNeeded(952)).toBe(2)
    expect(compactSharesNeeded(953)).toBe(3)
  })
})

describe('parseShares', () => {
  const blob = unwrap(Blob.v0(userNamespace(1), patterned(1000)))
  const shares = unwrap(blob.toShares())
  const tail = unwrap(tailPaddingShares(2))

  it('should group shares into sequences', () => {
    const sequences = unwrap(parseShares([...shares, ...tail], false))
    expect(sequences).toHaveLength(3)
    expect(sequences[0].shares).toHaveLength(3)
    expect(unwrap(sequences[0].rawData())).toEqual(blob.data)
    expect(sequences[1].isPadding()).toBe(true)
  })

  it('should drop padding sequences on request', () => {
    const sequences = unwrap(parseShares([...shares, ...tail], true))
    expect(sequences).toHaveLength(1)
    expect(sequences[0].namespace.equals(userNamespace(1))).toBe(true)
  })

  it('should reject a sequence missing shares', () => {
    const [error] = parseShares(shares.slice(0, 2), false)
    expect(error).toBeInstanceOf(SequenceError)
    expect(error?.message).toBe('Share sequence has 2 shares but needed 3 shares')
  })

  it('should reject a leading continuation share', () => {
    const [error] = parseShares(shares.slice(1), false)
    expect(error instanceof SequenceError && error.kind).toBe('OrphanContinuation')
  })
})

describe('getShareRangeForNamespace', () => {
  const shares = unwrap(
    splitBlobs(
      unwrap(Blob.v0(userNamespace(1), patterned(1000))),
      unwrap(Blob.v0(userNamespace(3), patterned(10))),
    ),
  )

  it('should find the shares of each namespace', () => {
    expect(getShareRangeForNamespace(shares, userNamespace(1))).toEqual(newRange(0, 3))
    expect(getShareRangeForNamespace(shares, userNamespace(3))).toEqual(newRange(3, 4))
  })

  it('should return an empty range for an absent namespace', () => {
    expect(isEmptyRange(getShareRangeForNamespace(shares, userNamespace(2)))).toBe(true)
    expect(isEmptyRange(getShareRangeForNamespace(shares, userNamespace(4)))).toBe(true)
    expect(isEmptyRange(getShareRangeForNamespace([], userNamespace(1)))).toBe(true)
  })
})
