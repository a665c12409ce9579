/** A record exactly as received from the API. Nothing about its shape is guaranteed. */
export type RawRecord = unknown

/** Any value other than undefined; the API may send numbers or null here. */
export type PresentValue = NonNullable<unknown> | null

export interface Address {
  id: PresentValue
  street: PresentValue
  streetName: PresentValue
  buildingNumber: PresentValue
  city: string
  zipcode: PresentValue
  country: string
  country_code: PresentValue
  latitude: number
  longitude: number
}

/**
 * A validated person. Holds direct identifiers, so it only lives for the
 * duration of a fetch and is never written to storage.
 */
export interface Person {
  id: PresentValue
  firstname: PresentValue
  lastname: PresentValue
  email: PresentValue
  phone: PresentValue
  /** YYYY-MM-DD */
  birthday: string
  gender: PresentValue
  address: Address
  website: PresentValue
  image: PresentValue
}

export type ValidationResult =
  | { accepted: true; person: Person }
  | { accepted: false; reason: string }
