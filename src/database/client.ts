import { Client, type ClientOptions } from 'cassandra-driver'
import { describeError, log } from '../plumbing/logger.ts'
import { getDatabaseConfig } from './config.ts'

type CassandraClient = Client

let databaseClient: CassandraClient | null = null

export const isDatabaseEnabledForEnv = (): boolean => {
  const isExplicitlyDisabled = process.env.SCYLLA_DISABLED === 'true'
  if (isExplicitlyDisabled) {
    return false
  }

  // Tests never open real connections unless asked to
  if (
    process.env.NODE_ENV === 'test' &&
    process.env.SCYLLA_ENABLE_IN_TESTS !== 'true'
  ) {
    return false
  }

  return true
}

const createCassandraClient = (options?: {
  skipKeyspace?: boolean
}): CassandraClient => {
  const config = getDatabaseConfig()
  const contactPoints = config.hosts.map((host) => `${host}:${config.port}`)

  const clientOptions: ClientOptions = {
    contactPoints,
    localDataCenter: config.localDataCenter,
    // Migrations connect without a keyspace so that they can create it
    keyspace: options?.skipKeyspace ? undefined : config.keyspace,
    credentials:
      config.username && config.password
        ? {
            username: config.username,
            password: config.password,
          }
        : undefined,
    sslOptions: config.isSslEnabled ? { rejectUnauthorized: true } : undefined,
    socketOptions: {
      connectTimeout: config.connectTimeoutMs,
    },
  }

  return new Client(clientOptions)
}

export const getDatabaseClient = (): CassandraClient => {
  if (!databaseClient) {
    throw new Error(
      'Database client not initialized. Call initializeDatabase() first.',
    )
  }

  return databaseClient
}

export const initializeDatabase = async (options?: {
  skipKeyspace?: boolean
}): Promise<void> => {
  if (!isDatabaseEnabledForEnv()) {
    log('Database initialization skipped for current environment')
    return
  }

  if (databaseClient) {
    log('Database client already initialized')
    return
  }

  const config = getDatabaseConfig()
  let attempt = 0

  while (true) {
    attempt += 1

    try {
      databaseClient = createCassandraClient({
        skipKeyspace: options?.skipKeyspace,
      })
      await databaseClient.connect()

      log({
        message: 'Database connection established',
        hosts: config.hosts.map((host) => `${host}:${config.port}`),
        keyspace: options?.skipKeyspace
          ? '(none - for migrations)'
          : config.keyspace,
        attempt,
      })

      break
    } catch (error) {
      log({
        message: 'Failed to connect to database',
        level: 'error',
        error: describeError(error),
        attempt,
      })
      const failedClient = databaseClient
      databaseClient = null
      if (failedClient) {
        try {
          await failedClient.shutdown()
        } catch (shutdownError) {
          log({
            message: 'Error shutting down failed client',
            level: 'error',
            error: describeError(shutdownError),
          })
        }
      }

      if (attempt >= config.connectRetries) {
        throw error instanceof Error
          ? error
          : new Error(String(error ?? 'Unknown database connection error'))
      }

      await new Promise((resolve) => {
        setTimeout(resolve, config.connectRetryDelayMs)
      })
    }
  }
}

export const shutdownDatabase = async (): Promise<void> => {
  const client = databaseClient
  databaseClient = null

  if (!client) {
    return
  }

  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    log({
      message: 'Error while closing database connection',
      level: 'error',
      error: describeError(error),
    })
  }
}

/**
 * Connect, run `fn` with the client, and always shut the connection down.
 */
export const withDatabase = async <T>(
  fn: (client: CassandraClient) => Promise<T>,
  options?: { skipKeyspace?: boolean },
): Promise<T> => {
  await initializeDatabase(options)
  try {
    return await fn(getDatabaseClient())
  } finally {
    await shutdownDatabase()
  }
}
