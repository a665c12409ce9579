export interface FetchConfig {
  apiUrl: string
  quantity: number
  maxBatchSize: number
  concurrency: number
  timeoutMs: number
  maxRetries: number
  backoffFactorMs: number
}
