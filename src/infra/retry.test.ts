import { describe, expect, it, vi } from 'vitest'
import { isTransientError, retry } from './retry.js'

function networkError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code })
}

describe('retry', () => {
  it('retries transient failures with exponential backoff', async () => {
    const delays: number[] = []
    const onRetry = vi.fn()
    let calls = 0

    const result = await retry(
      async () => {
        calls++
        if (calls < 3) throw networkError('ECONNRESET')
        return 'fetched'
      },
      {
        baseDelayMs: 10,
        jitter: false,
        onRetry,
        sleep: async (ms) => {
          delays.push(ms)
        },
      },
    )

    expect(result).toBe('fetched')
    expect(calls).toBe(3)
    expect(delays).toEqual([10, 20])
    expect(onRetry.mock.calls.map((call) => call[1])).toEqual([1, 2])
  })

  it('caps delays at maxDelayMs', async () => {
    const delays: number[] = []
    await expect(
      retry(
        async () => {
          throw networkError('ETIMEDOUT')
        },
        {
          maxAttempts: 4,
          baseDelayMs: 100,
          maxDelayMs: 150,
          jitter: false,
          sleep: async (ms) => {
            delays.push(ms)
          },
        },
      ),
    ).rejects.toThrow('connect ETIMEDOUT')
    expect(delays).toEqual([100, 150, 150])
  })

  it('does not retry errors the classifier rejects', async () => {
    const fn = vi.fn(async () => {
      throw new Error('fatal: Authentication failed for origin')
    })
    await expect(retry(fn, { sleep: async () => {} })).rejects.toThrow('Authentication failed')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('makes at least one attempt', async () => {
    const fn = vi.fn(async () => 'ok')
    await expect(retry(fn, { maxAttempts: 0 })).resolves.toBe('ok')
    expect(fn).toHaveBeenCalledTimes(1)
  })
})

describe('isTransientError', () => {
  it('recognises network error codes', () => {
    expect(isTransientError({ code: 'ECONNREFUSED' })).toBe(true)
    expect(isTransientError(networkError('EAI_AGAIN'))).toBe(true)
  })

  it('recognises git transport failures', () => {
    expect(isTransientError(new Error('fatal: Could not read from remote repository.'))).toBe(true)
    expect(isTransientError(new Error('fetch-pack: unexpected disconnect: early EOF'))).toBe(true)
  })

  it('rejects authentication and unrelated failures', () => {
    expect(isTransientError(new Error('Permission denied (publickey). Could not read from remote repository.'))).toBe(
      false,
    )
    expect(isTransientError(new Error("fatal: 'origin' does not appear to be a git repository"))).toBe(false)
    expect(isTransientError(null)).toBe(false)
  })
})
