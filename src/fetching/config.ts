import { parseNumber } from '../plumbing/parse-number.ts'
import type { FetchConfig } from './types/fetch-config.ts'

export const PERSONS_API_URL = 'https://fakerapi.it/api/v2/persons'

/** Largest _quantity the persons API serves in one response. */
export const MAX_BATCH_SIZE = 1000

export const DEFAULT_CONCURRENCY = 10
export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_MAX_RETRIES = 3
export const DEFAULT_BACKOFF_FACTOR_MS = 1_000

export const getFetchConfig = (): FetchConfig => {
  const apiUrl = process.env.FAKER_API_URL || PERSONS_API_URL
  const quantity = parseNumber(process.env.FETCH_QUANTITY, 30_000, {
    integer: true,
    min: 1,
  })
  const maxBatchSize = parseNumber(
    process.env.FETCH_MAX_BATCH_SIZE,
    MAX_BATCH_SIZE,
    { integer: true, min: 1, max: MAX_BATCH_SIZE },
  )
  const concurrency = parseNumber(
    process.env.FETCH_CONCURRENCY,
    DEFAULT_CONCURRENCY,
    { integer: true, min: 1 },
  )
  const timeoutMs = parseNumber(
    process.env.FETCH_TIMEOUT_MS,
    DEFAULT_TIMEOUT_MS,
    { min: 1 },
  )
  const maxRetries = parseNumber(
    process.env.FETCH_MAX_RETRIES,
    DEFAULT_MAX_RETRIES,
    { integer: true, min: 0 },
  )
  const backoffFactorMs = parseNumber(
    process.env.FETCH_BACKOFF_FACTOR_MS,
    DEFAULT_BACKOFF_FACTOR_MS,
    { min: 0 },
  )

  return {
    apiUrl,
    quantity,
    maxBatchSize,
    concurrency,
    timeoutMs,
    maxRetries,
    backoffFactorMs,
  }
}
