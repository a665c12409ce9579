export interface ParseNumberOptions {
  min?: number
  max?: number
  integer?: boolean
}

/**
 * Safely parse a string to a number. Returns fallback for empty, invalid, or non-finite values.
 * With `integer`, fractional values are rejected. Values outside `min`/`max` are clamped.
 */
export const parseNumber = (
  value: string | undefined,
  fallback: number,
  options: ParseNumberOptions = {},
): number => {
  if (!value || value.trim() === '') {
    return fallback
  }

  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    return fallback
  }

  if (options.integer && !Number.isInteger(parsed)) {
    return fallback
  }

  if (options.min !== undefined && parsed < options.min) {
    return options.min
  }
  if (options.max !== undefined && parsed > options.max) {
    return options.max
  }

  return parsed
}
