#!/usr/bin/env node
import 'dotenv/config'
import { withDatabase } from '../client.ts'
import { loadMigrations } from './loader.ts'
import { runMigrations } from './runner.ts'
import { getMigrationStatus } from './status.ts'

const command = process.argv[2]

const printUsage = (): void => {
  console.log('Usage: migrate [up|down|status]')
  console.log('  up     - Apply pending migrations')
  console.log('  down   - Rollback last migration')
  console.log('  status - Show migration status')
}

const main = async (): Promise<void> => {
  if (command !== 'up' && command !== 'down' && command !== 'status') {
    printUsage()
    process.exitCode = 1
    return
  }

  const migrations = loadMigrations()

  // Connect without keyspace to allow migrations to create it
  await withDatabase(
    async () => {
      if (command === 'status') {
        const status = await getMigrationStatus(migrations)
        console.table(
          status.map((s) => ({
            version: s.version,
            name: s.name,
            applied: s.applied ? '✓' : '✗',
            appliedAt: s.appliedAt?.toISOString() ?? '-',
            rolledBackAt: s.rolledBackAt?.toISOString() ?? '-',
          })),
        )
        return
      }

      await runMigrations(migrations, command)
      console.log(
        command === 'up'
          ? 'Migrations applied successfully'
          : 'Migration rolled back successfully',
      )
    },
    { skipKeyspace: true },
  )
}

main().catch((error) => {
  console.error('Migration error:', error)
  process.exitCode = 1
})
