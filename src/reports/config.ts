import { AGE_GROUP_WIDTH } from '../anonymization/age-group.ts'
import { log } from '../plumbing/logger.ts'
import { parseNumber } from '../plumbing/parse-number.ts'
import type { ReportOptions } from './types/report.ts'

export const getReportOptions = (): ReportOptions => {
  const requestedMinAge = parseNumber(process.env.REPORT_MIN_AGE, 60, {
    integer: true,
    min: 0,
  })
  // Ages are stored as brackets; the threshold must start one
  const minAge = Math.ceil(requestedMinAge / AGE_GROUP_WIDTH) * AGE_GROUP_WIDTH
  if (minAge !== requestedMinAge) {
    log({
      message: 'Report age threshold moved to the next age group',
      level: 'warn',
      requested: requestedMinAge,
      used: minAge,
    })
  }

  return {
    country: process.env.REPORT_COUNTRY || 'Germany',
    emailDomain: (process.env.REPORT_EMAIL_DOMAIN || 'gmail.com').toLowerCase(),
    topCountries: parseNumber(process.env.REPORT_TOP_COUNTRIES, 3, {
      integer: true,
      min: 1,
    }),
    minAge,
  }
}
