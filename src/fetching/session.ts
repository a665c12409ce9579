import { describeError, log } from '../plumbing/logger.ts'
import {
  DEFAULT_BACKOFF_FACTOR_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT_MS,
} from './config.ts'
import type { QueryParams } from './types/query-params.ts'

/** Statuses worth another attempt: rate limiting and upstream 5xx hiccups. */
export const RETRY_STATUS_CODES: ReadonlySet<number> = new Set([
  429, 500, 502, 503, 504,
])

const RETRY_AFTER_STATUS_CODES: ReadonlySet<number> = new Set([429, 503])

export class HttpStatusError extends Error {
  readonly status: number

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}`)
    this.name = 'HttpStatusError'
    this.status = status
  }
}

export class RetryExhaustedError extends Error {
  readonly attempts: number

  constructor(attempts: number, cause: unknown) {
    super(
      `Retry exhausted after ${attempts} attempts: ${describeError(cause)}`,
      { cause },
    )
    this.name = 'RetryExhaustedError'
    this.attempts = attempts
  }
}

export interface ApiSessionOptions {
  timeoutMs?: number
  /** Retries after the first request; 3 means at most 4 requests. */
  maxRetries?: number
  /** Delay before retry n is backoffFactorMs * 2^(n - 1). */
  backoffFactorMs?: number
  sleep?: (ms: number) => Promise<void>
}

/**
 * Shared HTTP session for the persons API. Holds configuration only, so one
 * instance can serve any number of concurrent batches.
 */
export interface ApiSession {
  getJson: (url: string, params: QueryParams) => Promise<unknown>
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms)
  })

const parseRetryAfterMs = (response: Response): number | null => {
  if (!RETRY_AFTER_STATUS_CODES.has(response.status)) {
    return null
  }
  const header = response.headers.get('retry-after')
  if (!header) {
    return null
  }
  const seconds = Number(header)
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null
}

export const buildUrl = (url: string, params: QueryParams): string => {
  const target = new URL(url)
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value))
  }
  return target.toString()
}

export const createApiSession = (
  options: ApiSessionOptions = {},
): ApiSession => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES
  const backoffFactorMs = options.backoffFactorMs ?? DEFAULT_BACKOFF_FACTOR_MS
  const sleep = options.sleep ?? defaultSleep

  const backoffDelay = (retry: number): number =>
    backoffFactorMs * 2 ** (retry - 1)

  const getJson = async (
    url: string,
    params: QueryParams,
  ): Promise<unknown> => {
    const target = buildUrl(url, params)
    let retry = 0

    while (true) {
      let response: Response
      try {
        response = await fetch(target, {
          headers: { accept: 'application/json' },
          signal: AbortSignal.timeout(timeoutMs),
        })
      } catch (error) {
        // Network failures and timeouts are transient
        if (retry >= maxRetries) {
          throw new RetryExhaustedError(retry + 1, error)
        }
        retry += 1
        const delayMs = backoffDelay(retry)
        log({
          message: 'Request failed, retrying',
          level: 'warn',
          error: describeError(error),
          retry,
          delayMs,
        })
        await sleep(delayMs)
        continue
      }

      if (response.ok) {
        return await response.json()
      }

      const statusError = new HttpStatusError(
        response.status,
        response.statusText,
      )
      // Release the connection; the body of an error response is never read
      await response.body?.cancel()
      if (!RETRY_STATUS_CODES.has(response.status)) {
        throw statusError
      }
      if (retry >= maxRetries) {
        throw new RetryExhaustedError(retry + 1, statusError)
      }

      retry += 1
      const delayMs = parseRetryAfterMs(response) ?? backoffDelay(retry)
      log({
        message: 'Transient HTTP status, retrying',
        level: 'warn',
        status: response.status,
        retry,
        delayMs,
      })
      await sleep(delayMs)
    }
  }

  return { getJson }
}
