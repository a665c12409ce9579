import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '003',
  name: 'create_anonymized_persons_table',
  description: 'Create anonymized_persons table holding the non-identifying projection',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${config.keyspace}.anonymized_persons (
        person_id UUID,
        transaction_id UUID,
        age_group TEXT,
        email_domain TEXT,
        country TEXT,
        city TEXT,
        created_at TIMESTAMP,
        PRIMARY KEY (person_id)
      )
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(
      `DROP TABLE IF EXISTS ${config.keyspace}.anonymized_persons`,
    )
  },
}
