import { anonymizePersons } from '../anonymization/anonymize.ts'
import type { AnonymizedPerson } from '../anonymization/types/anonymized-person.ts'
import * as storage from '../anonymized-persons/storage.ts'
import {
  type FetchPersonsOptions,
  fetchPersons,
} from '../fetching/orchestrator.ts'
import type { Person } from '../persons/types/person.ts'
import { log } from '../plumbing/logger.ts'
import { generateReport } from '../reports/service.ts'
import type { Report, ReportOptions } from '../reports/types/report.ts'

export class NoDataFetchedError extends Error {
  readonly requested: number

  constructor(requested: number) {
    super(`No valid person data fetched from API (requested ${requested})`)
    this.name = 'NoDataFetchedError'
    this.requested = requested
  }
}

export interface PipelineDependencies {
  fetchPersons: (
    quantity: number,
    options?: FetchPersonsOptions,
  ) => Promise<Person[]>
  writePersons: (persons: AnonymizedPerson[]) => Promise<string[]>
  readPersons: () => Promise<AnonymizedPerson[]>
}

export interface PipelineOptions {
  quantity: number
  report: ReportOptions
  fetch?: FetchPersonsOptions
  now?: Date
}

export interface PipelineResult {
  fetched: number
  stored: number
  report: Report
}

const defaultDependencies: PipelineDependencies = {
  fetchPersons,
  writePersons: storage.writePersons,
  readPersons: storage.readPersons,
}

/**
 * Fetch, anonymize, store and report. Stops with NoDataFetchedError before
 * touching the store when the fetch yields nothing.
 */
export const runPipeline = async (
  options: PipelineOptions,
  dependencies: PipelineDependencies = defaultDependencies,
): Promise<PipelineResult> => {
  log({
    message: 'Starting data fetch and anonymization',
    quantity: options.quantity,
  })
  const persons = await dependencies.fetchPersons(
    options.quantity,
    options.fetch,
  )
  if (persons.length === 0) {
    throw new NoDataFetchedError(options.quantity)
  }

  const anonymized = anonymizePersons(persons, options.now)

  log({ message: 'Saving anonymized data', count: anonymized.length })
  const ids = await dependencies.writePersons(anonymized)

  const report = await generateReport(
    { readPersons: dependencies.readPersons },
    options.report,
  )

  return { fetched: persons.length, stored: ids.length, report }
}
