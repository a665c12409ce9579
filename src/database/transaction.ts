import { randomUUID } from 'node:crypto'
import { type Client, concurrent, type types } from 'cassandra-driver'
import { describeError, log } from '../plumbing/logger.ts'
import { getDatabaseClient } from './client.ts'
import { getDatabaseConfig } from './config.ts'
import type {
  Statement,
  WriteTransaction,
  WriteTransactionStatus,
} from './types/write-transaction.ts'

const WRITE_CONCURRENCY = 64
const READ_PAGE_SIZE = 5000

/**
 * Statements staged inside `withTransaction`. Nothing reaches the database
 * until the callback returns; each write is paired with the statement that
 * undoes it.
 */
export class TransactionScope {
  readonly transactionId: string
  private readonly writes: Statement[] = []
  private readonly undos: Statement[] = []

  constructor(transactionId: string = randomUUID()) {
    this.transactionId = transactionId
  }

  stage(write: Statement, undo: Statement): void {
    this.writes.push(write)
    this.undos.push(undo)
  }

  get size(): number {
    return this.writes.length
  }

  get stagedWrites(): readonly Statement[] {
    return this.writes
  }

  get stagedUndos(): readonly Statement[] {
    return this.undos
  }
}

const transactionsTable = (): string =>
  `${getDatabaseConfig().keyspace}.write_transactions`

const setStatus = async (
  client: Client,
  scope: TransactionScope,
  status: Exclude<WriteTransactionStatus, 'pending'>,
): Promise<void> => {
  await client.execute(
    `UPDATE ${transactionsTable()} SET status = ?, committed_at = ? WHERE transaction_id = ?`,
    [status, status === 'committed' ? new Date() : null, scope.transactionId],
    { prepare: true },
  )
}

const rollback = async (
  client: Client,
  scope: TransactionScope,
  cause: unknown,
): Promise<void> => {
  log({
    message: 'Rolling back transaction',
    level: 'error',
    transactionId: scope.transactionId,
    statements: scope.size,
    error: describeError(cause),
  })
  try {
    await concurrent.executeConcurrent(client, [...scope.stagedUndos], {
      concurrencyLevel: WRITE_CONCURRENCY,
    })
    await setStatus(client, scope, 'rolled_back')
  } catch (rollbackError) {
    // Rows left behind stay invisible: their transaction never reached 'committed'
    log({
      message: 'Transaction rollback failed',
      level: 'error',
      transactionId: scope.transactionId,
      error: describeError(rollbackError),
    })
  }
}

const commit = async (
  client: Client,
  scope: TransactionScope,
): Promise<void> => {
  await client.execute(
    `INSERT INTO ${transactionsTable()} (transaction_id, status, statement_count, created_at, committed_at)
     VALUES (?, ?, ?, ?, ?)`,
    [
      scope.transactionId,
      'pending' satisfies WriteTransactionStatus,
      scope.size,
      new Date(),
      null,
    ],
    { prepare: true },
  )

  try {
    if (scope.size > 0) {
      await concurrent.executeConcurrent(client, [...scope.stagedWrites], {
        concurrencyLevel: WRITE_CONCURRENCY,
      })
    }
    await setStatus(client, scope, 'committed')
  } catch (error) {
    await rollback(client, scope, error)
    throw error
  }
}

/**
 * Run `fn` as one unit of work. Staged statements are written and the
 * transaction marked committed when `fn` returns; if `fn` or any write fails,
 * every staged write is undone and the error is rethrown.
 */
export const withTransaction = async <T>(
  fn: (scope: TransactionScope) => Promise<T> | T,
): Promise<T> => {
  const client = getDatabaseClient()
  const scope = new TransactionScope()

  let result: T
  try {
    result = await fn(scope)
  } catch (error) {
    log({
      message: 'Transaction aborted before commit',
      level: 'error',
      transactionId: scope.transactionId,
      error: describeError(error),
    })
    throw error
  }

  await commit(client, scope)
  log({
    message: 'Transaction committed',
    transactionId: scope.transactionId,
    statements: scope.size,
  })
  return result
}

const mapTransactionRow = (row: types.Row): WriteTransaction => ({
  transaction_id: String(row.transaction_id),
  status: row.status as WriteTransactionStatus,
  statement_count: row.statement_count as number,
  created_at: row.created_at as Date,
  committed_at: (row.committed_at as Date | null) ?? null,
})

/** Transaction ids whose writes are visible to readers. */
export const getCommittedTransactionIds = async (
  client: Client,
): Promise<Set<string>> => {
  const committed = new Set<string>()
  let pageState: string | undefined

  // Status is not part of the key, so filter in code
  do {
    const result = await client.execute(
      `SELECT transaction_id, status FROM ${transactionsTable()}`,
      [],
      { prepare: true, fetchSize: READ_PAGE_SIZE, pageState },
    )

    for (const row of result.rows) {
      if (row.status === 'committed') {
        committed.add(String(row.transaction_id))
      }
    }

    pageState = result.pageState ?? undefined
  } while (pageState)

  return committed
}

export const getWriteTransaction = async (
  client: Client,
  transactionId: string,
): Promise<WriteTransaction | null> => {
  const result = await client.execute(
    `SELECT transaction_id, status, statement_count, created_at, committed_at
     FROM ${transactionsTable()} WHERE transaction_id = ?`,
    [transactionId],
    { prepare: true },
  )
  return result.rows.length > 0 ? mapTransactionRow(result.rows[0]) : null
}

export const isTransactionCommitted = async (
  client: Client,
  transactionId: string,
): Promise<boolean> => {
  const transaction = await getWriteTransaction(client, transactionId)
  return transaction?.status === 'committed'
}
