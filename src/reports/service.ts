import type { AnonymizedPerson } from '../anonymization/types/anonymized-person.ts'
import { log } from '../plumbing/logger.ts'
import {
  calculateDomainPercentage,
  countByDomainAtOrAboveAgeGroup,
  getTopCountriesByDomain,
} from './statistics.ts'
import type { Report, ReportOptions } from './types/report.ts'

export interface PersonStore {
  readPersons: () => Promise<AnonymizedPerson[]>
}

export const generateReport = async (
  store: PersonStore,
  options: ReportOptions,
): Promise<Report> => {
  const persons = await store.readPersons()

  const report: Report = {
    options,
    totalPersons: persons.length,
    domainPercentageInCountry: calculateDomainPercentage(
      persons,
      options.country,
      options.emailDomain,
    ),
    topCountriesByDomain: getTopCountriesByDomain(
      persons,
      options.emailDomain,
      options.topCountries,
    ),
    domainCountAtOrAboveMinAge: countByDomainAtOrAboveAgeGroup(
      persons,
      options.emailDomain,
      options.minAge,
    ),
  }

  log({ message: 'Report generated', totalPersons: report.totalPersons })
  return report
}
