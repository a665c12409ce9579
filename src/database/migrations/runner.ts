import type { Client } from 'cassandra-driver'
import { describeError, log } from '../../plumbing/logger.ts'
import { getDatabaseClient } from '../client.ts'
import { getDatabaseConfig } from '../config.ts'
import type { Migration, MigrationDirection } from './types.ts'

export interface MigrationHistoryRow {
  version: string
  applied_at: Date | null
  rolled_back_at: Date | null
}

const historyTable = (): string =>
  `${getDatabaseConfig().keyspace}.migration_history`

export const ensureMigrationHistory = async (client: Client): Promise<void> => {
  const config = getDatabaseConfig()

  // The keyspace may not exist yet on a fresh cluster
  await client.execute(`
    CREATE KEYSPACE IF NOT EXISTS ${config.keyspace}
    WITH REPLICATION = {
      'class': 'SimpleStrategy',
      'replication_factor': 1
    }
  `)

  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${historyTable()} (
      version TEXT PRIMARY KEY,
      name TEXT,
      description TEXT,
      applied_at TIMESTAMP,
      rolled_back_at TIMESTAMP
    )
  `)
}

/**
 * Every history row, including rolled-back ones.
 */
export const getMigrationHistory = async (
  client: Client,
): Promise<MigrationHistoryRow[]> => {
  const result = await client.execute(
    `SELECT version, applied_at, rolled_back_at FROM ${historyTable()}`,
  )
  return result.rows.map((row) => ({
    version: row.version as string,
    applied_at: (row.applied_at as Date | null) ?? null,
    rolled_back_at: (row.rolled_back_at as Date | null) ?? null,
  }))
}

export const getAppliedMigrations = async (
  client: Client,
): Promise<string[]> => {
  // CQL has no IS NULL filter, so rolled-back rows are dropped here
  const history = await getMigrationHistory(client)
  return history
    .filter((row) => row.rolled_back_at === null)
    .map((row) => row.version)
}

export const recordMigration = async (
  client: Client,
  migration: Migration,
  direction: MigrationDirection,
): Promise<void> => {
  const now = new Date()

  if (direction === 'up') {
    await client.execute(
      `INSERT INTO ${historyTable()} (version, name, description, applied_at, rolled_back_at)
       VALUES (?, ?, ?, ?, ?)`,
      [migration.version, migration.name, migration.description, now, null],
      { prepare: true },
    )
  } else {
    await client.execute(
      `UPDATE ${historyTable()} SET rolled_back_at = ? WHERE version = ?`,
      [now, migration.version],
      { prepare: true },
    )
  }
}

const applyMigration = async (
  client: Client,
  migration: Migration,
  direction: MigrationDirection,
): Promise<void> => {
  log({
    message:
      direction === 'up' ? 'Running migration' : 'Rolling back migration',
    version: migration.version,
    name: migration.name,
  })

  try {
    await migration[direction](client)
    await recordMigration(client, migration, direction)
  } catch (error) {
    log({
      message:
        direction === 'up' ? 'Migration failed' : 'Migration rollback failed',
      level: 'error',
      version: migration.version,
      error: describeError(error),
    })
    throw error
  }

  log({
    message:
      direction === 'up' ? 'Migration completed' : 'Migration rolled back',
    version: migration.version,
  })
}

/**
 * `up` applies every pending migration in version order; `down` rolls back
 * only the most recent applied one.
 */
export const runMigrations = async (
  migrations: Migration[],
  direction: MigrationDirection = 'up',
): Promise<void> => {
  const client = getDatabaseClient()

  await ensureMigrationHistory(client)
  const appliedMigrations = await getAppliedMigrations(client)

  if (direction === 'up') {
    const pendingMigrations = migrations
      .filter((m) => !appliedMigrations.includes(m.version))
      .sort((a, b) => a.version.localeCompare(b.version))

    for (const migration of pendingMigrations) {
      await applyMigration(client, migration, 'up')
    }
    return
  }

  const [lastMigration] = migrations
    .filter((m) => appliedMigrations.includes(m.version))
    .sort((a, b) => b.version.localeCompare(a.version))

  if (!lastMigration) {
    log('No migrations to rollback')
    return
  }

  await applyMigration(client, lastMigration, 'down')
}
