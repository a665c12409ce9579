import { describe, expect, it } from 'vitest'
import type { AnonymizedPerson } from '../../anonymization/types/anonymized-person.ts'
import {
  calculateDomainPercentage,
  countByDomainAtOrAboveAgeGroup,
  getTopCountriesByDomain,
} from '../statistics.ts'

const person = (
  country: string,
  emailDomain: string | null,
  ageGroup: string | null = '[30-40]',
): AnonymizedPerson => ({
  age_group: ageGroup,
  email_domain: emailDomain,
  country,
  city: 'Testville',
})

const repeat = (count: number, build: () => AnonymizedPerson) =>
  Array.from({ length: count }, build)

describe('calculateDomainPercentage', () => {
  it('should compute the share of a country using the domain', () => {
    const persons = [
      person('Germany', 'gmail.com'),
      person('Germany', 'gmail.com'),
      person('Germany', 'outlook.com'),
      person('Germany', null),
      person('France', 'gmail.com'),
    ]

    expect(calculateDomainPercentage(persons, 'Germany', 'gmail.com')).toBe(50)
  })

  it('should return 0 when the country has no records', () => {
    const persons = [
      person('France', 'gmail.com'),
      person('Spain', 'gmail.com'),
    ]

    expect(calculateDomainPercentage(persons, 'Germany', 'gmail.com')).toBe(0)
  })

  it('should return 0 for an empty store', () => {
    expect(calculateDomainPercentage([], 'Germany', 'gmail.com')).toBe(0)
  })

  it('should return 0 when nobody in the country uses the domain', () => {
    const persons = [person('Germany', 'web.de'), person('Germany', 'gmx.de')]

    expect(calculateDomainPercentage(persons, 'Germany', 'gmail.com')).toBe(0)
  })
})

describe('getTopCountriesByDomain', () => {
  const tiedPersons = [
    ...repeat(3, () => person('USA', 'gmail.com')),
    ...repeat(3, () => person('Germany', 'gmail.com')),
    ...repeat(2, () => person('France', 'gmail.com')),
    ...repeat(2, () => person('UK', 'gmail.com')),
    ...repeat(1, () => person('Spain', 'gmail.com')),
    ...repeat(5, () => person('Italy', 'yahoo.com')),
  ]

  it('should include every country tied with the last place', () => {
    expect(getTopCountriesByDomain(tiedPersons, 'gmail.com', 3)).toEqual([
      ['Germany', 3],
      ['USA', 3],
      ['France', 2],
      ['UK', 2],
    ])
  })

  it('should return exactly n countries when there is no tie at the cutoff', () => {
    expect(getTopCountriesByDomain(tiedPersons, 'gmail.com', 2)).toEqual([
      ['Germany', 3],
      ['USA', 3],
    ])
  })

  it('should return every country when there are fewer than n', () => {
    const persons = [
      person('Spain', 'gmail.com'),
      person('Spain', 'gmail.com'),
      person('Chile', 'gmail.com'),
    ]

    expect(getTopCountriesByDomain(persons, 'gmail.com')).toEqual([
      ['Spain', 2],
      ['Chile', 1],
    ])
  })

  it('should return an empty list when nobody uses the domain', () => {
    expect(getTopCountriesByDomain(tiedPersons, 'proton.me')).toEqual([])
  })

  it('should reject a non-positive count', () => {
    expect(() => getTopCountriesByDomain(tiedPersons, 'gmail.com', 0)).toThrow(
      RangeError,
    )
  })
})

describe('countByDomainAtOrAboveAgeGroup', () => {
  const persons = [
    person('Germany', 'gmail.com', '[50-60]'),
    person('Germany', 'gmail.com', '[60-70]'),
    person('USA', 'gmail.com', '[70-80]'),
    person('USA', 'gmail.com', '[100-110]'),
    person('France', 'gmail.com', null),
    person('UK', 'outlook.com', '[90-100]'),
  ]

  it('should count brackets starting at or above the threshold', () => {
    expect(countByDomainAtOrAboveAgeGroup(persons, 'gmail.com', 60)).toBe(3)
  })

  it('should skip records without an age group', () => {
    expect(countByDomainAtOrAboveAgeGroup(persons, 'gmail.com', 0)).toBe(4)
  })

  it('should only count the requested domain', () => {
    expect(countByDomainAtOrAboveAgeGroup(persons, 'outlook.com', 60)).toBe(1)
  })

  it('should exclude a bracket that starts below an uneven threshold', () => {
    expect(countByDomainAtOrAboveAgeGroup(persons, 'gmail.com', 65)).toBe(2)
  })
})
