/**
 * The only projection of a person that is ever persisted.
 * Holds no name, email address, phone number, street or coordinates.
 */
export interface AnonymizedPerson {
  /** "[L-U]" with L a multiple of 10 and U = L + 10; null if the birthday was unusable */
  age_group: string | null
  /** Domain of a valid email address, lower-cased; null if the address was invalid */
  email_domain: string | null
  country: string
  city: string
}

export interface StoredAnonymizedPerson extends AnonymizedPerson {
  person_id: string
  created_at: Date
}
