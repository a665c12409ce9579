export type WriteTransactionStatus = 'pending' | 'committed' | 'rolled_back'

export interface Statement {
  query: string
  params: unknown[]
}

export interface WriteTransaction {
  transaction_id: string
  status: WriteTransactionStatus
  statement_count: number
  created_at: Date
  committed_at: Date | null
}
