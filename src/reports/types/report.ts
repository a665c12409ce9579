export interface ReportOptions {
  country: string
  emailDomain: string
  topCountries: number
  /** Lowest age bracket lower bound counted as "at or above" */
  minAge: number
}

export type CountryCount = [country: string, count: number]

export interface Report {
  options: ReportOptions
  totalPersons: number
  domainPercentageInCountry: number
  topCountriesByDomain: CountryCount[]
  domainCountAtOrAboveMinAge: number
}
