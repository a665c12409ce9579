import type { Report } from './types/report.ts'

export const renderReport = (report: Report): string => {
  const { country, emailDomain, minAge } = report.options

  const topCountries =
    report.topCountriesByDomain.length > 0
      ? report.topCountriesByDomain.map(
          ([name, count]) => `   - ${name}: ${count} users`,
        )
      : ['   (none)']

  return [
    'Anonymized Data Statistics Report',
    '=================================',
    '',
    `1. Percentage of users in ${country} using ${emailDomain}:`,
    `   ${report.domainPercentageInCountry.toFixed(2)}%`,
    '',
    `2. Top countries using ${emailDomain} (including ties):`,
    ...topCountries,
    '',
    `3. Number of users aged ${minAge} or over using ${emailDomain}:`,
    `   ${report.domainCountAtOrAboveMinAge} users`,
    '',
  ].join('\n')
}
