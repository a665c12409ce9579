#!/usr/bin/env node
import 'dotenv/config'
import { withDatabase } from './database/client.ts'
import { getFetchConfig } from './fetching/config.ts'
import { describeError, log } from './plumbing/logger.ts'
import { runPipeline } from './pipeline/run.ts'
import { getReportOptions } from './reports/config.ts'
import { renderReport } from './reports/render.ts'

const main = async (): Promise<void> => {
  const fetchConfig = getFetchConfig()

  const result = await withDatabase(() =>
    runPipeline({
      quantity: fetchConfig.quantity,
      report: getReportOptions(),
    }),
  )

  console.log(renderReport(result.report))
  log({
    message: 'Run finished',
    fetched: result.fetched,
    stored: result.stored,
  })
}

main().catch((error) => {
  log({
    message: 'Run failed',
    level: 'error',
    error: describeError(error),
  })
  process.exitCode = 1
})
