import { isTimeoutError, toError } from '@fm-synth/utils/errors'
import { createLogger } from '@fm-synth/utils/logger'

const log = createLogger('Retry')

const timeouts = new WeakSet<Error>()

export interface RetryOptions {
  /** Attempts after the first */
  maxRetries: number
  /** Budget of each attempt */
  timeoutMs: number
  /** Caller cancellation; an aborted call is not retried */
  signal?: AbortSignal
  /** Used in log lines */
  label: string
  /** Rejection for an attempt that ran out of time */
  timeoutError: (timeoutMs: number) => Error
}

export type RetryOutcome<T> =
  | { ok: true, value: T, attempts: number }
  | { ok: false, error: Error, attempts: number, timedOut: boolean, cancelled: boolean }

/**
 * Run `fn` once under a timeout. The attempt rejects when the timer fires
 * even if `fn` ignores the signal it was handed.
 */
function attemptOnce<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { signal, timeoutMs } = options
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(toError(signal.reason))
      return
    }
    const controller = new AbortController()
    const onAbort = (): void => {
      controller.abort(signal?.reason)
      cleanup()
      reject(toError(signal?.reason))
    }
    const timer = setTimeout(() => {
      const error = options.timeoutError(timeoutMs)
      timeouts.add(error)
      controller.abort(error)
      cleanup()
      reject(error)
    }, timeoutMs)
    const cleanup = (): void => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    fn(controller.signal).then(
      (value) => {
        cleanup()
        resolve(value)
      },
      (error: unknown) => {
        cleanup()
        reject(toError(error))
      },
    )
  })
}

/**
 * Call `fn` up to `maxRetries + 1` times, each attempt under its own timeout.
 * Failures come back as data; nothing is thrown.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const total = options.maxRetries + 1
  let lastError: Error = new Error(`${options.label} was not attempted`)
  for (let attempt = 1; attempt <= total; attempt++) {
    try {
      const value = await attemptOnce(fn, options)
      return { ok: true, value, attempts: attempt }
    }
    catch (error) {
      lastError = toError(error)
      if (options.signal?.aborted)
        return { ok: false, error: lastError, attempts: attempt, timedOut: false, cancelled: true }
      log.warn(`${options.label} attempt ${attempt}/${total} failed: ${lastError.message}`)
    }
  }
  return { ok: false, error: lastError, attempts: total, timedOut: timeouts.has(lastError) || isTimeoutError(lastError), cancelled: false }
}
