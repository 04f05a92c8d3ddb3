/**
 * Square Builder
 *
 * Admits transactions one at a time while tracking an upper bound on the
 * shares they need, then lays them out into the smallest square that holds
 * them.
 *
 * Admission is arithmetic only: compact share counters stand in for the
 * splitters, and each blob is charged its shares plus the most padding the
 * placement rules could put in front of it. Index wrappers are sized with
 * the largest share index a square can have. The real layout is computed
 * once, on export.
 */

import { logger } from '@dasquare/core'
import {
  blobMinSquareSize,
  isPowerOfTwo,
  nextShareIndex,
} from '@dasquare/inclusion'
import {
  CompactShareCounter,
  CompactShareSplitter,
  newRange,
  PAY_FOR_BLOB_NAMESPACE,
  SparseShareSplitter,
  TX_NAMESPACE,
} from '@dasquare/shares'
import {
  type BlobTx,
  encodeIndexWrapper,
  type IndexWrapper,
  indexWrapperSize,
  newIndexWrapper,
  unmarshalBlobTx,
} from '@dasquare/tx'
import {
  assertInvariant,
  BuilderError,
  InvariantViolationError,
  type Safe,
  SHARE_VERSION_ZERO,
  SQUARE_SIZE_UPPER_BOUND,
  type ShareRange,
  type SquareBuilderPhase,
  safeError,
  safeResult,
} from '@dasquare/types'
import { type Element, maxShareOffset, newElement } from './element'
import { Square, emptySquare, writeSquare } from './square'

export interface ExportResult {
  square: Square
  /** Share range of every transaction: ordinary ones first, then blob transactions */
  txRanges: ShareRange[]
}

export class SquareBuilder {
  private currentSizeValue = 0

  private readonly txs: Uint8Array[] = []
  private readonly pfbs: IndexWrapper[] = []
  private blobs: Element[] = []

  private readonly txCounter = new CompactShareCounter()
  private readonly pfbCounter = new CompactShareCounter()

  private lastTxSizeChange = 0
  private lastBlobTxSizeChange = 0
  private txReverted = false
  private blobTxReverted = false

  private state: SquareBuilderPhase = 'empty'
  private exported: ExportResult | undefined

  private constructor(
    readonly maxSquareSize: number,
    readonly subtreeRootThreshold: number,
  ) {}

  /**
   * Create a builder and append `txs` in order. Every transaction must fit,
   * and no ordinary transaction may follow a blob transaction.
   */
  static create(
    maxSquareSize: number,
    subtreeRootThreshold: number,
    ...txs: Uint8Array[]
  ): Safe<SquareBuilder> {
    if (maxSquareSize <= 0) {
      return safeError(
        new BuilderError('Max square size must be strictly positive'),
      )
    }
    if (!isPowerOfTwo(maxSquareSize)) {
      return safeError(
        new BuilderError('Max square size must be a power of two', {
          maxSquareSize,
        }),
      )
    }
    if (!Number.isInteger(subtreeRootThreshold) || subtreeRootThreshold < 1) {
      return safeError(
        new BuilderError('Subtree root threshold must be a positive integer', {
          subtreeRootThreshold,
        }),
      )
    }

    const builder = new SquareBuilder(maxSquareSize, subtreeRootThreshold)
    let seenFirstBlobTx = false
    for (const [index, tx] of txs.entries()) {
      const [error, match] = unmarshalBlobTx(tx)
      if (error) {
        return safeError(
          new BuilderError(
            `Unmarshalling blob tx at index ${index}: ${error.message}`,
          ),
        )
      }
      if (match.matched) {
        seenFirstBlobTx = true
        const [appendError, appended] = builder.appendBlobTx(match.value)
        if (appendError) return safeError(appendError)
        if (!appended) {
          return safeError(
            new BuilderError(
              `Not enough space to append blob tx at index ${index}`,
            ),
          )
        }
        continue
      }
      if (seenFirstBlobTx) {
        return safeError(
          new BuilderError(
            `Normal tx at index ${index} can not be appended after blob tx`,
          ),
        )
      }
      if (!builder.appendTx(tx)) {
        return safeError(
          new BuilderError(`Not enough space to append tx at index ${index}`),
        )
      }
    }
    return safeResult(builder)
  }

  get phase(): SquareBuilderPhase {
    return this.state
  }

  /**
   * Admit an ordinary transaction if the square still has room for it
   *
   * @returns false when the transaction would overflow the square
   */
  appendTx(tx: Uint8Array): boolean {
    this.assertAccumulating('appendTx')
    const lenChange = this.txCounter.add(tx.length)
    if (!this.canFit(lenChange)) {
      this.txCounter.revert()
      logger.debug('Transaction rejected: square is full', {
        txLength: tx.length,
        currentSize: this.currentSizeValue,
        maxSquareSize: this.maxSquareSize,
      })
      return false
    }

    this.txs.push(tx)
    this.currentSizeValue += lenChange
    this.lastTxSizeChange = lenChange
    this.txReverted = false
    this.state = 'accumulating'
    return true
  }

  /**
   * Admit a blob transaction together with all of its blobs, or none of it
   *
   * @returns false when the transaction would overflow the square
   */
  appendBlobTx(blobTx: BlobTx): Safe<boolean> {
    this.assertAccumulating('appendBlobTx')
    if (blobTx.blobs.length === 0) {
      return safeError(new BuilderError('Blob transaction has no blobs'))
    }

    const worstCaseIndex = SQUARE_SIZE_UPPER_BOUND * SQUARE_SIZE_UPPER_BOUND
    const wrapper = newIndexWrapper(
      blobTx.tx,
      ...blobTx.blobs.map(() => worstCaseIndex),
    )

    const elements: Element[] = []
    let maxBlobShareCount = 0
    for (const [blobIndex, blob] of blobTx.blobs.entries()) {
      const [error, element] = newElement(
        blob,
        this.pfbs.length,
        blobIndex,
        this.subtreeRootThreshold,
      )
      if (error) return safeError(error)
      elements.push(element)
      maxBlobShareCount += maxShareOffset(element)
    }

    const pfbShareDiff = this.pfbCounter.add(indexWrapperSize(wrapper))
    const totalSizeChange = pfbShareDiff + maxBlobShareCount
    if (!this.canFit(totalSizeChange)) {
      this.pfbCounter.revert()
      logger.debug('Blob transaction rejected: square is full', {
        blobs: blobTx.blobs.length,
        sharesNeeded: totalSizeChange,
        currentSize: this.currentSizeValue,
        maxSquareSize: this.maxSquareSize,
      })
      return safeResult(false)
    }

    this.blobs.push(...elements)
    this.pfbs.push(wrapper)
    this.currentSizeValue += totalSizeChange
    this.lastBlobTxSizeChange = totalSizeChange
    this.blobTxReverted = false
    this.state = 'accumulating'
    return safeResult(true)
  }

  /**
   * Remove the most recently appended ordinary transaction. Only one step
   * back is possible between appends.
   */
  revertLastTx(): Safe<void> {
    this.assertAccumulating('revertLastTx')
    if (this.txs.length === 0) {
      return safeError(new BuilderError('No transactions to revert'))
    }
    if (this.txReverted) {
      return safeError(
        new BuilderError(
          'Cannot revert: last transaction has already been reverted',
        ),
      )
    }

    this.txs.pop()
    this.txCounter.revert()
    this.currentSizeValue -= this.lastTxSizeChange
    this.txReverted = true
    this.state = this.isEmpty() ? 'empty' : 'accumulating'
    return safeResult(undefined)
  }

  /**
   * Remove the most recently appended blob transaction and its blobs. Only
   * one step back is possible between appends.
   */
  revertLastBlobTx(): Safe<void> {
    this.assertAccumulating('revertLastBlobTx')
    if (this.pfbs.length === 0) {
      return safeError(new BuilderError('No blob transactions to revert'))
    }
    if (this.blobTxReverted) {
      return safeError(
        new BuilderError(
          'Cannot revert: last blob transaction has already been reverted',
        ),
      )
    }

    const lastPfbIndex = this.pfbs.length - 1
    this.blobs = this.blobs.filter((blob) => blob.pfbIndex !== lastPfbIndex)
    this.pfbs.pop()
    this.pfbCounter.revert()
    this.currentSizeValue -= this.lastBlobTxSizeChange
    this.blobTxReverted = true
    this.state = this.isEmpty() ? 'empty' : 'accumulating'
    return safeResult(undefined)
  }

  /**
   * Lay out the square. The first call fixes the layout and records the
   * share index of every blob in its index wrapper; later calls return the
   * same result. No further appends are accepted afterwards.
   */
  export(): Safe<ExportResult> {
    if (this.exported) return safeResult(this.exported)

    if (this.isEmpty()) {
      this.exported = { square: emptySquare(), txRanges: [] }
      this.state = 'exported'
      return safeResult(this.exported)
    }

    const [sizeError, squareSize] = blobMinSquareSize(this.currentSizeValue)
    if (sizeError) return safeError(sizeError)
    this.state = 'sized'
    logger.debug('Square size chosen', {
      squareSize,
      sharesReserved: this.currentSizeValue,
    })

    const [error, result] = this.materialize(squareSize)
    if (error) {
      logger.error('Square export failed', error, { squareSize })
      this.state = 'accumulating'
      return safeError(error)
    }
    this.exported = result
    this.state = 'exported'
    return safeResult(result)
  }

  /**
   * Share range of the transaction at `txIndex`, counting ordinary
   * transactions first and blob transactions after them
   */
  findTxShareRange(txIndex: number): Safe<ShareRange> {
    const [exportError] = this.export()
    if (exportError) {
      return safeError(
        new BuilderError(`Building square: ${exportError.message}`),
      )
    }
    if (txIndex < 0) {
      return safeError(
        new BuilderError(`txIndex ${txIndex} must not be negative`),
      )
    }
    if (txIndex >= this.numTxs()) {
      return safeError(new BuilderError(`txIndex ${txIndex} out of range`))
    }

    const txCounter = new CompactShareCounter()
    const pfbCounter = new CompactShareCounter()
    for (let i = 0; i < txIndex; i++) {
      if (i < this.txs.length) {
        txCounter.add(this.txs[i].length)
      } else {
        pfbCounter.add(indexWrapperSize(this.pfbs[i - this.txs.length]))
      }
    }

    let start = txCounter.size() + pfbCounter.size() - 1
    if (txIndex < this.txs.length) {
      // a filled share means the tx begins on the next one
      if (txCounter.remainder() === 0) start++
      txCounter.add(this.txs[txIndex].length)
    } else {
      if (pfbCounter.remainder() === 0) start++
      pfbCounter.add(indexWrapperSize(this.pfbs[txIndex - this.txs.length]))
    }
    const end = txCounter.size() + pfbCounter.size()
    return safeResult(newRange(start, end))
  }

  /**
   * Share index where a blob starts. `pfbIndex` counts every transaction,
   * ordinary ones included.
   */
  findBlobStartingIndex(pfbIndex: number, blobIndex: number): Safe<number> {
    const [indexError, wrapperIndex] = this.wrapperIndex(pfbIndex, blobIndex)
    if (indexError) return safeError(indexError)

    const [exportError] = this.export()
    if (exportError) {
      return safeError(
        new BuilderError(`Building square: ${exportError.message}`),
      )
    }

    const shareIndexes = this.pfbs[wrapperIndex].shareIndexes
    if (blobIndex >= shareIndexes.length) {
      return safeError(new BuilderError(`blobIndex ${blobIndex} out of range`))
    }
    return safeResult(shareIndexes[blobIndex])
  }

  /**
   * Shares a blob occupies. `pfbIndex` counts every transaction, ordinary
   * ones included.
   */
  blobShareLength(pfbIndex: number, blobIndex: number): Safe<number> {
    const [indexError, wrapperIndex] = this.wrapperIndex(pfbIndex, blobIndex)
    if (indexError) return safeError(indexError)

    const element = this.blobs.find(
      (blob) => blob.pfbIndex === wrapperIndex && blob.blobIndex === blobIndex,
    )
    if (!element) return safeError(new BuilderError('Blob not found'))
    return safeResult(element.numShares)
  }

  /**
   * Index wrapper of the blob transaction at `txIndex`, carrying the share
   * indexes of its blobs
   */
  getWrappedPfb(txIndex: number): Safe<IndexWrapper> {
    if (txIndex < 0) {
      return safeError(
        new BuilderError(`txIndex ${txIndex} must not be negative`),
      )
    }
    if (txIndex < this.txs.length) {
      return safeError(
        new BuilderError(`txIndex ${txIndex} does not match a pfb`),
      )
    }
    if (txIndex >= this.numTxs()) {
      return safeError(new BuilderError(`txIndex ${txIndex} out of range`))
    }

    const [exportError] = this.export()
    if (exportError) {
      return safeError(
        new BuilderError(`Building square: ${exportError.message}`),
      )
    }
    const wrapper = this.pfbs[txIndex - this.txs.length]
    // copied so the cached export cannot be changed through the result
    return safeResult({
      ...wrapper,
      tx: wrapper.tx.slice(),
      shareIndexes: [...wrapper.shareIndexes],
    })
  }

  /** Upper bound on the shares used by everything admitted so far */
  currentSize(): number {
    return this.currentSizeValue
  }

  /** Ordinary and blob transactions admitted */
  numTxs(): number {
    return this.txs.length + this.pfbs.length
  }

  numPfbs(): number {
    return this.pfbs.length
  }

  isEmpty(): boolean {
    return this.txCounter.size() === 0 && this.pfbCounter.size() === 0
  }

  private canFit(shareNum: number): boolean {
    return (
      this.currentSizeValue + shareNum <=
      this.maxSquareSize * this.maxSquareSize
    )
  }

  private assertAccumulating(operation: string): void {
    if (this.state !== 'empty' && this.state !== 'accumulating') {
      throw new InvariantViolationError(
        `${operation} is not allowed once the square is ${this.state}`,
        { phase: this.state },
      )
    }
  }

  private wrapperIndex(pfbIndex: number, blobIndex: number): Safe<number> {
    if (pfbIndex < this.txs.length) {
      return safeError(
        new BuilderError(`pfbIndex ${pfbIndex} does not match a pfb`),
      )
    }
    const wrapperIndex = pfbIndex - this.txs.length
    if (wrapperIndex >= this.pfbs.length) {
      return safeError(new BuilderError(`pfbIndex ${pfbIndex} out of range`))
    }
    if (blobIndex < 0) {
      return safeError(
        new BuilderError(`blobIndex ${blobIndex} must not be negative`),
      )
    }
    return safeResult(wrapperIndex)
  }

  private materialize(squareSize: number): Safe<ExportResult> {
    // stable: blobs of one namespace keep their admission order
    const elements = [...this.blobs].sort((a, b) => a.blob.compare(b.blob))

    const [txWriterError, txWriter] = CompactShareSplitter.create(
      TX_NAMESPACE,
      SHARE_VERSION_ZERO,
    )
    if (txWriterError) return safeError(txWriterError)
    for (const tx of this.txs) {
      const [error] = txWriter.writeTx(tx)
      if (error) {
        return safeError(
          new Error(`Writing tx into compact shares: ${error.message}`),
        )
      }
    }

    let nonReservedStart = this.txCounter.size() + this.pfbCounter.size()
    let cursor = nonReservedStart
    let endOfLastBlob = nonReservedStart
    const blobWriter = new SparseShareSplitter()
    for (const [i, element] of elements.entries()) {
      const [indexError, index] = nextShareIndex(
        cursor,
        element.numShares,
        this.subtreeRootThreshold,
      )
      if (indexError) return safeError(indexError)
      cursor = index
      if (i === 0) nonReservedStart = cursor

      const padding = cursor - endOfLastBlob
      assertInvariant(
        padding <= element.maxPadding,
        `Blob has ${padding} padding shares, but ${element.maxPadding} was the max possible`,
      )

      this.pfbs[element.pfbIndex].shareIndexes[element.blobIndex] = cursor
      if (i > 0 && padding > 0) {
        const [paddingError] = blobWriter.writeNamespacePaddingShares(padding)
        if (paddingError) {
          return safeError(
            new Error(
              `Writing padding into sparse shares: ${paddingError.message}`,
            ),
          )
        }
        logger.debug('Namespace padding inserted', { padding, before: cursor })
      }

      const [writeError] = blobWriter.write(element.blob)
      if (writeError) {
        return safeError(
          new Error(`Writing blob into sparse shares: ${writeError.message}`),
        )
      }
      cursor += element.numShares
      endOfLastBlob = cursor
    }

    // written after placement so each wrapper carries real share indexes
    const [pfbWriterError, pfbWriter] = CompactShareSplitter.create(
      PAY_FOR_BLOB_NAMESPACE,
      SHARE_VERSION_ZERO,
    )
    if (pfbWriterError) return safeError(pfbWriterError)
    for (const wrapper of this.pfbs) {
      const [error] = pfbWriter.writeTx(encodeIndexWrapper(wrapper))
      if (error) {
        return safeError(
          new Error(
            `Writing pay for blob tx into compact shares: ${error.message}`,
          ),
        )
      }
    }

    assertInvariant(
      this.pfbCounter.size() >= pfbWriter.count(),
      `pfbCounter.size() < pfbWriter.count(): ${this.pfbCounter.size()} < ${pfbWriter.count()}`,
    )

    const [squareError, square] = writeSquare(
      txWriter,
      pfbWriter,
      blobWriter,
      nonReservedStart,
      squareSize,
    )
    if (squareError) {
      return safeError(new Error(`Writing square: ${squareError.message}`))
    }
    assertNamespaceOrder(square)

    return safeResult({
      square,
      txRanges: [
        ...txWriter.txRanges(0),
        ...pfbWriter.txRanges(txWriter.count()),
      ],
    })
  }
}

/**
 * Transactions, then pay-for-blob transactions, then blobs by ascending
 * namespace. Padding shares carry a namespace that keeps the order.
 */
function assertNamespaceOrder(square: Square): void {
  for (let i = 1; i < square.shares.length; i++) {
    const previous = square.shares[i - 1].namespace
    const current = square.shares[i].namespace
    assertInvariant(
      previous.isLessOrEqualThan(current),
      `Share ${i} in namespace ${current.toString()} follows namespace ${previous.toString()}`,
    )
  }
}
