import { randomUUID } from 'node:crypto'
import type { Client, types } from 'cassandra-driver'
import type {
  AnonymizedPerson,
  StoredAnonymizedPerson,
} from '../anonymization/types/anonymized-person.ts'
import { getDatabaseClient } from '../database/client.ts'
import { getDatabaseConfig } from '../database/config.ts'
import {
  getCommittedTransactionIds,
  isTransactionCommitted,
  withTransaction,
} from '../database/transaction.ts'
import { log } from '../plumbing/logger.ts'

const READ_PAGE_SIZE = 5000
const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

const getClient = (): Client => {
  return getDatabaseClient()
}

const getKeyspace = (): string => {
  const config = getDatabaseConfig()
  return config.keyspace
}

const mapRow = (row: types.Row): StoredAnonymizedPerson => ({
  person_id: String(row.person_id),
  age_group: (row.age_group as string | null) ?? null,
  email_domain: (row.email_domain as string | null) ?? null,
  country: row.country as string,
  city: row.city as string,
  created_at: row.created_at as Date,
})

/**
 * Bulk insert inside one transaction. Returns the generated person ids in
 * input order; nothing is visible to readers unless every row is written.
 */
export const writePersons = async (
  persons: AnonymizedPerson[],
): Promise<string[]> => {
  const keyspace = getKeyspace()

  const ids = await withTransaction((scope) => {
    const createdAt = new Date()
    return persons.map((person) => {
      const personId = randomUUID()
      scope.stage(
        {
          query: `INSERT INTO ${keyspace}.anonymized_persons
           (person_id, transaction_id, age_group, email_domain, country, city, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
          params: [
            personId,
            scope.transactionId,
            person.age_group,
            person.email_domain,
            person.country,
            person.city,
            createdAt,
          ],
        },
        {
          query: `DELETE FROM ${keyspace}.anonymized_persons WHERE person_id = ?`,
          params: [personId],
        },
      )
      return personId
    })
  })

  log({ message: 'Stored anonymized persons', count: ids.length })
  return ids
}

/** Every stored person whose write transaction committed. */
export const readPersons = async (): Promise<StoredAnonymizedPerson[]> => {
  const client = getClient()
  const keyspace = getKeyspace()
  const committed = await getCommittedTransactionIds(client)

  const persons: StoredAnonymizedPerson[] = []
  let pageState: string | undefined

  do {
    const result = await client.execute(
      `SELECT person_id, transaction_id, age_group, email_domain, country, city, created_at
       FROM ${keyspace}.anonymized_persons`,
      [],
      { prepare: true, fetchSize: READ_PAGE_SIZE, pageState },
    )

    for (const row of result.rows) {
      if (committed.has(String(row.transaction_id))) {
        persons.push(mapRow(row))
      }
    }

    pageState = result.pageState ?? undefined
  } while (pageState)

  return persons
}

export const getPerson = async (
  personId: string,
): Promise<StoredAnonymizedPerson | null> => {
  if (!UUID_PATTERN.test(personId)) {
    return null
  }

  const client = getClient()
  const keyspace = getKeyspace()

  const result = await client.execute(
    `SELECT person_id, transaction_id, age_group, email_domain, country, city, created_at
     FROM ${keyspace}.anonymized_persons WHERE person_id = ?`,
    [personId],
    { prepare: true },
  )

  if (result.rows.length === 0) {
    return null
  }

  const row = result.rows[0]
  if (!(await isTransactionCommitted(client, String(row.transaction_id)))) {
    return null
  }

  return mapRow(row)
}
