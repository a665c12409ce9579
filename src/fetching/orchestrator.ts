import type { Person } from '../persons/types/person.ts'
import { describeError, log } from '../plumbing/logger.ts'
import { fetchBatch } from './batch.ts'
import { getFetchConfig, MAX_BATCH_SIZE } from './config.ts'
import { type ApiSession, createApiSession } from './session.ts'
import { runWithConcurrency } from './worker-pool.ts'

export interface FetchPersonsOptions {
  session?: ApiSession
  apiUrl?: string
  maxBatchSize?: number
  concurrency?: number
}

export interface FetchSummary {
  requested: number
  batches: number
  failedBatches: number
  fetched: number
}

/**
 * Split a quantity into batch sizes: full batches of `maxBatchSize` followed
 * by one batch holding the remainder (2500 -> [1000, 1000, 500]).
 */
export const planBatches = (
  quantity: number,
  maxBatchSize: number = MAX_BATCH_SIZE,
): number[] => {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new RangeError(
      `Quantity must be a positive integer, got ${quantity}`,
    )
  }
  if (
    !Number.isInteger(maxBatchSize) ||
    maxBatchSize < 1 ||
    maxBatchSize > MAX_BATCH_SIZE
  ) {
    throw new RangeError(
      `Batch size must be an integer between 1 and ${MAX_BATCH_SIZE}, got ${maxBatchSize}`,
    )
  }

  const batchCount = Math.ceil(quantity / maxBatchSize)
  return Array.from({ length: batchCount }, (_, i) =>
    Math.min(maxBatchSize, quantity - i * maxBatchSize),
  )
}

/**
 * Fetch `quantity` persons in concurrent batches.
 *
 * Persons are merged in batch completion order, so ordering across batches is
 * not stable. A batch that fails after its retries is logged and dropped; the
 * remaining batches still contribute. Every batch failing yields an empty list.
 */
export const fetchPersonsWithSummary = async (
  quantity: number,
  options: FetchPersonsOptions = {},
): Promise<{ persons: Person[]; summary: FetchSummary }> => {
  const config = getFetchConfig()
  const maxBatchSize = options.maxBatchSize ?? config.maxBatchSize
  const concurrency = options.concurrency ?? config.concurrency
  const apiUrl = options.apiUrl ?? config.apiUrl
  const session =
    options.session ??
    createApiSession({
      timeoutMs: config.timeoutMs,
      maxRetries: config.maxRetries,
      backoffFactorMs: config.backoffFactorMs,
    })

  const batchSizes = planBatches(quantity, maxBatchSize)
  log({
    message: 'Fetching persons in parallel batches',
    quantity,
    batches: batchSizes.length,
    concurrency,
  })

  const tasks = batchSizes.map(
    (size, i) => () =>
      fetchBatch(session, size, { batchNumber: i + 1, apiUrl }),
  )

  const persons: Person[] = []
  let failedBatches = 0

  await runWithConcurrency(tasks, concurrency, (outcome) => {
    if (outcome.status === 'fulfilled') {
      persons.push(...outcome.value)
      return
    }
    failedBatches += 1
    log({
      message: 'Error in batch processing',
      level: 'error',
      batchNumber: outcome.index + 1,
      error: describeError(outcome.reason),
    })
  })

  const summary: FetchSummary = {
    requested: quantity,
    batches: batchSizes.length,
    failedBatches,
    fetched: persons.length,
  }
  log({ message: 'Total valid persons fetched', ...summary })

  return { persons, summary }
}

export const fetchPersons = async (
  quantity: number,
  options: FetchPersonsOptions = {},
): Promise<Person[]> => {
  const { persons } = await fetchPersonsWithSummary(quantity, options)
  return persons
}
