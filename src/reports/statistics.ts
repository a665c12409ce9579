import { parseAgeGroupLowerBound } from '../anonymization/age-group.ts'
import type { AnonymizedPerson } from '../anonymization/types/anonymized-person.ts'
import type { CountryCount } from './types/report.ts'

/**
 * Percentage (0-100) of `country`'s records whose email domain is `domain`.
 * 0 when the country has no records at all.
 */
export const calculateDomainPercentage = (
  persons: readonly AnonymizedPerson[],
  country: string,
  domain: string,
): number => {
  const inCountry = persons.filter((person) => person.country === country)
  if (inCountry.length === 0) {
    return 0
  }

  const withDomain = inCountry.filter(
    (person) => person.email_domain === domain,
  )
  return (withDomain.length / inCountry.length) * 100
}

/**
 * Countries ranked by how many records use `domain`, most first. Every country
 * tied with the n-th count is included, so the result can be longer than n.
 * Equal counts are ordered by country name.
 */
export const getTopCountriesByDomain = (
  persons: readonly AnonymizedPerson[],
  domain: string,
  n = 3,
): CountryCount[] => {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(
      `Number of countries must be a positive integer, got ${n}`,
    )
  }

  const counts = new Map<string, number>()
  for (const person of persons) {
    if (person.email_domain === domain) {
      counts.set(person.country, (counts.get(person.country) ?? 0) + 1)
    }
  }

  const ranked = [...counts.entries()].sort(
    ([countryA, countA], [countryB, countB]) =>
      countB - countA || countryA.localeCompare(countryB),
  )
  if (ranked.length <= n) {
    return ranked
  }

  const cutoff = ranked[n - 1][1]
  return ranked.filter(([, count]) => count >= cutoff)
}

/** Records using `domain` whose age bracket starts at `minLowerBound` or later. */
export const countByDomainAtOrAboveAgeGroup = (
  persons: readonly AnonymizedPerson[],
  domain: string,
  minLowerBound: number,
): number =>
  persons.filter((person) => {
    if (person.email_domain !== domain) {
      return false
    }
    const lowerBound = parseAgeGroupLowerBound(person.age_group)
    return lowerBound !== null && lowerBound >= minLowerBound
  }).length
