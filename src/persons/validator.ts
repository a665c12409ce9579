import { isRecord } from '../plumbing/is-record.ts'
import { log } from '../plumbing/logger.ts'
import { parseBirthday } from './birthday.ts'
import { addressSchema, formatIssues, personFieldsSchema } from './schemas.ts'
import type { Address, RawRecord, ValidationResult } from './types/person.ts'

const reject = (reason: string): ValidationResult => {
  log({
    message: 'Invalid person data',
    level: 'warn',
    reason,
  })
  return { accepted: false, reason }
}

/**
 * Check one raw API record against the person/address shape.
 *
 * Checks run in order and stop at the first failure: birthday format, then the
 * nested address, then the remaining person fields. Unknown fields are dropped.
 * A rejection is logged and returned, never thrown.
 */
export const validatePerson = (raw: RawRecord): ValidationResult => {
  if (!isRecord(raw)) {
    return reject('record is not an object')
  }

  if (raw.birthday === undefined) {
    return reject('birthday: Required')
  }
  if (!parseBirthday(raw.birthday)) {
    return reject('birthday: Expected a calendar date in YYYY-MM-DD format')
  }

  const addressResult = addressSchema.safeParse(raw.address)
  if (!addressResult.success) {
    return reject(formatIssues(addressResult.error, 'address'))
  }
  const address: Address = addressResult.data

  const fieldsResult = personFieldsSchema.safeParse(raw)
  if (!fieldsResult.success) {
    return reject(formatIssues(fieldsResult.error))
  }

  return {
    accepted: true,
    person: { ...fieldsResult.data, address },
  }
}
