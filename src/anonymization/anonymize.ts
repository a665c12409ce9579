import { describeError, log } from '../plumbing/logger.ts'
import type { Person } from '../persons/types/person.ts'
import { calculateAgeGroup, FutureBirthdayError } from './age-group.ts'
import { extractEmailDomain } from './email-domain.ts'
import type { AnonymizedPerson } from './types/anonymized-person.ts'

export const anonymizePerson = (
  person: Person,
  now: Date = new Date(),
): AnonymizedPerson => ({
  age_group: calculateAgeGroup(person.birthday, now),
  email_domain: extractEmailDomain(person.email),
  country: person.address.country,
  city: person.address.city,
})

/**
 * Anonymize a fetched list. Persons with a birthday in the future are logged
 * and left out; any other error propagates.
 */
export const anonymizePersons = (
  persons: readonly Person[],
  now: Date = new Date(),
): AnonymizedPerson[] => {
  const anonymized: AnonymizedPerson[] = []
  let skipped = 0

  for (const person of persons) {
    try {
      anonymized.push(anonymizePerson(person, now))
    } catch (error) {
      if (!(error instanceof FutureBirthdayError)) {
        throw error
      }
      skipped += 1
      log({
        message: 'Skipping person with future birthday',
        level: 'warn',
        error: describeError(error),
      })
    }
  }

  log({
    message: 'Anonymized persons',
    anonymized: anonymized.length,
    skipped,
  })
  return anonymized
}
