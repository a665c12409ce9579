import { z } from 'zod'
import type { PresentValue } from './types/person.ts'

// Identifying fields only need to be present; anonymization drops them
const presentSchema = z.custom<PresentValue>(
  (value) => value !== undefined,
  'Required',
)

// Numbers, or numeric strings such as "52.52", must convert to a finite float
const coordinateSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite())

export const addressSchema = z.object({
  id: presentSchema,
  street: presentSchema,
  streetName: presentSchema,
  buildingNumber: presentSchema,
  city: z.string(),
  zipcode: presentSchema,
  country: z.string(),
  country_code: presentSchema,
  latitude: coordinateSchema,
  longitude: coordinateSchema,
})

/** Top-level person fields. The nested address is validated separately, first. */
export const personFieldsSchema = z.object({
  id: presentSchema,
  firstname: presentSchema,
  lastname: presentSchema,
  email: presentSchema,
  phone: presentSchema,
  birthday: z.string(),
  gender: presentSchema,
  website: presentSchema,
  image: presentSchema,
})

export const emailSchema = z.string().email()

export const formatIssues = (error: z.ZodError, prefix?: string): string =>
  error.issues
    .map((issue) => {
      const path = [prefix, ...issue.path].filter(
        (segment) => segment !== undefined,
      )
      return path.length > 0
        ? `${path.join('.')}: ${issue.message}`
        : issue.message
    })
    .join('; ')
