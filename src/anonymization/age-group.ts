import { log } from '../plumbing/logger.ts'
import {
  compareCalendarDates,
  parseBirthday,
  toCalendarDate,
} from '../persons/birthday.ts'

export const AGE_GROUP_WIDTH = 10

const AGE_GROUP_PATTERN = /^\[(\d+)-(\d+)\]$/

export class FutureBirthdayError extends Error {
  readonly birthday: string

  constructor(birthday: string) {
    super(`Birthday ${birthday} is in the future`)
    this.name = 'FutureBirthdayError'
    this.birthday = birthday
  }
}

/**
 * Age bracket for a YYYY-MM-DD birthday, relative to `now`.
 * Returns null when the birthday cannot be parsed and throws FutureBirthdayError
 * when it falls after today. A birthday of today is age 0.
 */
export const calculateAgeGroup = (
  birthday: string,
  now: Date = new Date(),
): string | null => {
  const birthDate = parseBirthday(birthday)
  if (!birthDate) {
    log({
      message: 'Error calculating age group: unparseable birthday',
      level: 'warn',
    })
    return null
  }

  const today = toCalendarDate(now)
  if (compareCalendarDates(birthDate, today) > 0) {
    throw new FutureBirthdayError(birthday)
  }

  const hadBirthdayThisYear =
    today.month > birthDate.month ||
    (today.month === birthDate.month && today.day >= birthDate.day)
  const age = today.year - birthDate.year - (hadBirthdayThisYear ? 0 : 1)

  const lowerBound = Math.floor(age / AGE_GROUP_WIDTH) * AGE_GROUP_WIDTH
  return `[${lowerBound}-${lowerBound + AGE_GROUP_WIDTH}]`
}

/** Lower bound of an "[L-U]" bracket, or null for anything else. */
export const parseAgeGroupLowerBound = (
  ageGroup: string | null,
): number | null => {
  if (!ageGroup) {
    return null
  }
  const match = AGE_GROUP_PATTERN.exec(ageGroup)
  return match ? Number(match[1]) : null
}
