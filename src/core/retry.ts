import { CancelledError } from './errors.ts'
import type { TBackoffOptions } from './types.ts'

/** Delay before retrying after failed attempt `attempt` (1-based): doubling, capped, plus jitter. */
export function backoffDelay(
  attempt: number,
  options: Pick<TBackoffOptions, 'baseDelayInMilliseconds' | 'maximumDelayInMilliseconds'>,
): number {
  const exponential = Math.min(
    options.maximumDelayInMilliseconds,
    options.baseDelayInMilliseconds * 2 ** (attempt - 1),
  )
  return exponential + Math.random() * 0.25 * exponential
}

/**
 * Waits `ms` between attempts. The timer stays referenced so a pending retry keeps the
 * process alive. Rejects with `CancelledError` once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new CancelledError())

  return new Promise((resolve, reject) => {
    const cancel = () => {
      clearTimeout(timer)
      reject(new CancelledError())
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', cancel)
      resolve()
    }, ms)
    signal?.addEventListener('abort', cancel, { once: true })
  })
}
