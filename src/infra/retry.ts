/**
 * Generic retry utility with exponential backoff, jitter, and error classification.
 *
 * Usage:
 *   await retry(() => git.fetch())
 *   await retry(() => git.fetch(), { maxAttempts: 5, onRetry })
 */

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export interface RetryOptions {
  /** Maximum number of attempts (including the first). Default: 3 */
  maxAttempts?: number
  /** Initial delay between retries in ms. Default: 1000 */
  baseDelayMs?: number
  /** Maximum delay between retries in ms. Default: 30000 */
  maxDelayMs?: number
  /** Backoff multiplier per attempt. Default: 2 */
  backoffMultiplier?: number
  /** Add random jitter to delays. Default: true */
  jitter?: boolean
  /** Custom predicate: should we retry this error? Default: isTransientError */
  shouldRetry?: (error: unknown, attempt: number) => boolean
  /** Called before each retry (for logging). */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
  /** Injected for tests. Default: setTimeout-based sleep */
  sleep?: (ms: number) => Promise<void>
}

/* ------------------------------------------------------------------ */
/*  Core retry function                                                */
/* ------------------------------------------------------------------ */

/**
 * Retry an async function with exponential backoff.
 *
 * @returns  The result of `fn` on success
 * @throws   The last error if all attempts fail
 */
export async function retry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? 3)
  const baseDelayMs = options?.baseDelayMs ?? 1000
  const maxDelayMs = options?.maxDelayMs ?? 30000
  const backoffMultiplier = options?.backoffMultiplier ?? 2
  const jitter = options?.jitter ?? true
  const shouldRetry = options?.shouldRetry ?? isTransientError
  const wait = options?.sleep ?? sleep

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error
      }

      let delay = Math.min(baseDelayMs * backoffMultiplier ** (attempt - 1), maxDelayMs)

      // +/- 25% randomness
      if (jitter) {
        const jitterRange = delay * 0.25
        delay += Math.random() * jitterRange * 2 - jitterRange
      }

      delay = Math.round(delay)
      options?.onRetry?.(error, attempt, delay)

      await wait(delay)
    }
  }
}

/* ------------------------------------------------------------------ */
/*  Error classification                                               */
/* ------------------------------------------------------------------ */

const NETWORK_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']

const TRANSIENT_MESSAGES = [
  'could not read from remote repository',
  'connection timed out',
  'operation timed out',
  'timed out',
  'the remote end hung up unexpectedly',
  'early eof',
  'could not resolve host',
  'temporary failure in name resolution',
  'failed to connect',
  'connection reset',
  'rpc failed',
]

/**
 * Default error classifier: true for network-level failures a later attempt may not hit.
 *
 * Retryable:
 *   - Node network codes: ECONNRESET, ETIMEDOUT, ECONNREFUSED, ENOTFOUND, EAI_AGAIN, EPIPE
 *   - git transport messages: "Could not read from remote repository", "early EOF", ...
 *
 * Not retryable:
 *   - authentication failures, unknown remotes, everything else
 */
export function isTransientError(error: unknown): boolean {
  if (!error) return false

  const code = getErrorCode(error)
  if (code && NETWORK_CODES.includes(code)) return true

  const message = (error instanceof Error ? error.message : String(error)).toLowerCase()
  if (message.includes('authentication failed') || message.includes('permission denied')) {
    return false
  }
  for (const networkCode of NETWORK_CODES) {
    if (message.includes(networkCode.toLowerCase())) return true
  }
  return TRANSIENT_MESSAGES.some((fragment) => message.includes(fragment))
}

/* ------------------------------------------------------------------ */
/*  Internal helpers                                                   */
/* ------------------------------------------------------------------ */

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function getErrorCode(error: unknown): string | null {
  if (!error || typeof error !== 'object' || !('code' in error)) return null
  return typeof error.code === 'string' ? error.code : null
}
