import type { Person } from '../persons/types/person.ts'
import { validatePerson } from '../persons/validator.ts'
import { isRecord } from '../plumbing/is-record.ts'
import { describeError, log } from '../plumbing/logger.ts'
import { MAX_BATCH_SIZE, PERSONS_API_URL } from './config.ts'
import type { ApiSession } from './session.ts'

/** Oldest birthday requested, so every age bracket up to [120-130] can occur. */
export const BIRTHDAY_START = '1900-01-01'

export class BatchFetchError extends Error {
  readonly batchNumber: number

  constructor(batchNumber: number, cause: unknown) {
    super(`Batch ${batchNumber}: ${describeError(cause)}`, { cause })
    this.name = 'BatchFetchError'
    this.batchNumber = batchNumber
  }
}

/**
 * Validate a persons API response and extract the persons that pass validation.
 *
 * A non-"OK" status or a `data` field that is not an array yields no persons.
 * Otherwise each element is validated on its own; invalid ones are skipped and
 * valid ones are returned in their original order.
 */
export const validateResponse = (body: unknown): Person[] => {
  if (!isRecord(body) || body.status !== 'OK') {
    log({
      message: 'API returned error status',
      level: 'error',
      status: isRecord(body) ? String(body.status) : typeof body,
    })
    return []
  }

  const { data } = body
  if (!Array.isArray(data)) {
    log({
      message: 'API returned invalid data format',
      level: 'error',
      dataType: typeof data,
    })
    return []
  }

  const persons: Person[] = []
  for (const raw of data) {
    const result = validatePerson(raw)
    if (result.accepted) {
      persons.push(result.person)
    }
  }

  const rejected = data.length - persons.length
  if (rejected > 0) {
    log({
      message: 'Skipped invalid person data',
      level: 'warn',
      rejected,
      received: data.length,
    })
  }

  return persons
}

export interface FetchBatchOptions {
  batchNumber?: number
  apiUrl?: string
}

/**
 * Fetch one batch of at most MAX_BATCH_SIZE persons.
 * Request failures (after the session's own retries) throw BatchFetchError;
 * a short or empty batch is a normal result.
 */
export const fetchBatch = async (
  session: ApiSession,
  size: number,
  options: FetchBatchOptions = {},
): Promise<Person[]> => {
  const batchNumber = options.batchNumber ?? 1
  const apiUrl = options.apiUrl ?? PERSONS_API_URL

  if (!Number.isInteger(size) || size < 1 || size > MAX_BATCH_SIZE) {
    throw new RangeError(
      `Batch size must be an integer between 1 and ${MAX_BATCH_SIZE}, got ${size}`,
    )
  }

  log({ message: 'Fetching batch', batchNumber, size })

  let body: unknown
  try {
    body = await session.getJson(apiUrl, {
      _quantity: size,
      _birthday_start: BIRTHDAY_START,
    })
  } catch (error) {
    log({
      message: 'Error fetching data from persons API',
      level: 'error',
      batchNumber,
      error: describeError(error),
    })
    throw new BatchFetchError(batchNumber, error)
  }

  const persons = validateResponse(body)
  log({
    message: 'Fetched batch',
    batchNumber,
    requested: size,
    valid: persons.length,
  })
  return persons
}
