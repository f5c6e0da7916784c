import * as _ from 'radash'

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

// Results are boxed: `_.try` picks its return type by whether the callback
// returns a promise, which an unboxed generic T leaves undecided.

export async function safeTry<T>(promise: () => Promise<T>): SafePromise<T> {
  const [err, box] = await _.try(() => promise().then((value) => ({ value })))()
  return err ? safeError(err) : safeResult(box.value)
}

export function safeSyncTry<T>(callBack: () => T): Safe<T> {
  const [err, box] = _.try(() => ({ value: callBack() }))()
  return err ? safeError(err) : safeResult(box.value)
}
