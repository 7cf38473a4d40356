import * as _ from 'radash'

/**
 * Set of functions to wrap around promises to make them safe
 * Also works to wrap around try catch statements
 */

export type SafePromise<T, E extends Error | string = Error> = Promise<
  SafeError<E> | SafeResult<T>
>

export type Safe<T, E extends Error | string = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error | string> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

/**
 * Normalise anything caught in a `catch` clause into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

export async function safeTry<T>(promise: Promise<T>): SafePromise<T> {
  return _.try(() => promise)()
}

/**
 * Synchronous counterpart of safeTry for blocking calls
 */
export function safeTrySync<T>(fn: () => T): Safe<T> {
  // Boxed so radash sees a result that is never a promise
  const [error, boxed] = _.try(() => ({ value: fn() }))()
  if (error) {
    return safeError(toError(error))
  }
  return safeResult(boxed.value)
}
