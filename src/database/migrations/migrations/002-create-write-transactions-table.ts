import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '002',
  name: 'create_write_transactions_table',
  description:
    'Create write_transactions table; rows of uncommitted transactions are hidden from readers',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${config.keyspace}.write_transactions (
        transaction_id UUID,
        status TEXT,
        statement_count INT,
        created_at TIMESTAMP,
        committed_at TIMESTAMP,
        PRIMARY KEY (transaction_id)
      )
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(
      `DROP TABLE IF EXISTS ${config.keyspace}.write_transactions`,
    )
  },
}
