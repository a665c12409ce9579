import { getDatabaseClient } from '../client.ts'
import { getMigrationHistory } from './runner.ts'
import type { Migration, MigrationStatus } from './types.ts'

export const getMigrationStatus = async (
  migrations: Migration[],
): Promise<MigrationStatus[]> => {
  const client = getDatabaseClient()
  const history = new Map(
    (await getMigrationHistory(client)).map((row) => [row.version, row]),
  )

  return migrations.map((migration) => {
    const row = history.get(migration.version)
    return {
      version: migration.version,
      name: migration.name,
      applied: row !== undefined && row.rolled_back_at === null,
      appliedAt: row?.applied_at ?? undefined,
      rolledBackAt: row?.rolled_back_at ?? undefined,
    }
  })
}
