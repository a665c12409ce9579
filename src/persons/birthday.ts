export interface CalendarDate {
  year: number
  month: number
  day: number
}

const BIRTHDAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Parse a YYYY-MM-DD string into a calendar date.
 * Returns null for any other format and for dates that do not exist (2023-02-30).
 */
export const parseBirthday = (value: unknown): CalendarDate | null => {
  if (typeof value !== 'string') {
    return null
  }

  const match = BIRTHDAY_PATTERN.exec(value)
  if (!match) {
    return null
  }

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  if (month < 1 || month > 12 || day < 1) {
    return null
  }

  // Day 0 of the following month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate()
  if (day > daysInMonth) {
    return null
  }

  return { year, month, day }
}

export const compareCalendarDates = (
  a: CalendarDate,
  b: CalendarDate,
): number =>
  a.year - b.year || a.month - b.month || a.day - b.day

export const toCalendarDate = (date: Date): CalendarDate => ({
  year: date.getFullYear(),
  month: date.getMonth() + 1,
  day: date.getDate(),
})
