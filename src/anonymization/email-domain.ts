import { emailSchema } from '../persons/schemas.ts'

/**
 * Domain part of a strictly valid email address, lower-cased.
 * Addresses with IP-literal or dotless domains, leading or doubled dots, or more
 * than one "@" are treated as invalid.
 */
export const extractEmailDomain = (email: unknown): string | null => {
  const result = emailSchema.safeParse(email)
  if (!result.success) {
    return null
  }

  const address = result.data
  return address.slice(address.lastIndexOf('@') + 1).toLowerCase()
}
