import * as _ from 'radash'

/**
 * Result tuples for fallible operations.
 *
 * Every decoder and splitter in the workspace returns one of these instead of
 * throwing, so callers destructure `[error, value]` and branch once.
 */

export type Safe<T, E extends Error = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

/**
 * Run a throwing function and capture its outcome as a Safe tuple.
 */
export function safeTry<T>(fn: () => T): Safe<T> {
  const attempt = _.try((): { value: T } => ({ value: fn() }))
  const [error, result] = attempt()
  if (error) return safeError(error)
  return safeResult(result.value)
}
