/**
 * Error classes shared by the share codec and the square packer.
 *
 * Malformed input and structural problems are returned through `Safe`
 * tuples carrying one of these. `InvariantViolationError` is the exception:
 * it is thrown, because it means the packer and the parser disagree.
 */

export enum SquareErrorCode {
  INVALID_NAMESPACE = 'INVALID_NAMESPACE',
  INVALID_SHARE = 'INVALID_SHARE',
  INVALID_BLOB = 'INVALID_BLOB',
  SEQUENCE_ERROR = 'SEQUENCE_ERROR',
  ENVELOPE_ERROR = 'ENVELOPE_ERROR',
  BUILDER_ERROR = 'BUILDER_ERROR',
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',
}

export class SquareError extends Error {
  constructor(
    message: string,
    public code: SquareErrorCode,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'SquareError'
  }
}

export class InvalidNamespaceError extends SquareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, SquareErrorCode.INVALID_NAMESPACE, context)
    this.name = 'InvalidNamespaceError'
  }
}

export class InvalidShareError extends SquareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, SquareErrorCode.INVALID_SHARE, context)
    this.name = 'InvalidShareError'
  }
}

export class InvalidBlobError extends SquareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, SquareErrorCode.INVALID_BLOB, context)
    this.name = 'InvalidBlobError'
  }
}

/**
 * Structural problems only visible once a whole sequence has been collected
 */
export type SequenceErrorKind =
  | 'ContinuationNamespaceMismatch'
  | 'OrphanContinuation'
  | 'SequenceLengthExceedsData'
  | 'InvalidSequenceLength'

export class SequenceError extends SquareError {
  constructor(
    message: string,
    public kind: SequenceErrorKind,
    context?: Record<string, unknown>,
  ) {
    super(message, SquareErrorCode.SEQUENCE_ERROR, { kind, ...context })
    this.name = 'SequenceError'
  }
}

export class EnvelopeError extends SquareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, SquareErrorCode.ENVELOPE_ERROR, context)
    this.name = 'EnvelopeError'
  }
}

export class BuilderError extends SquareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, SquareErrorCode.BUILDER_ERROR, context)
    this.name = 'BuilderError'
  }
}

export class InvariantViolationError extends SquareError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, SquareErrorCode.INVARIANT_VIOLATION, context)
    this.name = 'InvariantViolationError'
  }
}

/**
 * Throw an InvariantViolationError when the condition does not hold.
 */
export function assertInvariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>,
): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message, context)
  }
}
