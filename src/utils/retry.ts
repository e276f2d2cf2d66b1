/**
 * Backoff helpers for outbound API calls
 */

export interface BackoffOptions {
  baseMs: number
  capMs: number
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>

/**
 * Equal-jitter exponential backoff for the given 1-based attempt:
 * half of `min(cap, base * 2^(attempt-1))` fixed, the other half random.
 */
export function backoffDelay(attempt: number, options: BackoffOptions, random: () => number = Math.random): number {
  const ceiling = Math.min(options.capMs, options.baseMs * Math.pow(2, Math.max(0, attempt - 1)))
  const half = ceiling / 2
  return Math.round(half + random() * half)
}

/**
 * Resolves `true` after `ms`, or `false` as soon as the signal aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false)
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve(false)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
