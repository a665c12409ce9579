import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { AnonymizedPerson } from '../../src/anonymization/types/anonymized-person.ts'
import { fetchPersons } from '../../src/fetching/orchestrator.ts'
import { createApiSession } from '../../src/fetching/session.ts'
import { runPipeline } from '../../src/pipeline/run.ts'
import { renderReport } from '../../src/reports/render.ts'
import { buildEnvelope, buildRawPerson } from '../fixtures/raw-person.ts'

vi.mock('../../src/plumbing/logger.ts', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/plumbing/logger.ts')>()),
  log: vi.fn(),
}))

const personsResponse = (quantity: number): Response => {
  const data = [
    ...Array.from({ length: quantity }, (_, i) =>
      buildRawPerson({
        id: i + 1,
        email: i % 2 === 0 ? `person${i}@gmail.com` : `person${i}@web.de`,
        birthday: '1950-03-03',
      }),
    ),
    buildRawPerson({ birthday: '2023-02-30' }),
  ]
  return new Response(JSON.stringify(buildEnvelope(data)), {
    status: 200,
    headers: { 'content-type': 'application/json' },
  })
}

describe('fetch, anonymize, store and report', () => {
  let stored: AnonymizedPerson[]
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const quantity = Number(
      new URL(String(input)).searchParams.get('_quantity'),
    )
    if (quantity === 1) {
      return new Response('missing', { status: 404, statusText: 'Not Found' })
    }
    return personsResponse(quantity)
  })

  beforeEach(() => {
    stored = []
    fetchMock.mockClear()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should keep valid records of the surviving batches', async () => {
    const session = createApiSession({ sleep: async () => undefined })

    const result = await runPipeline(
      {
        quantity: 5,
        fetch: { session, maxBatchSize: 2, concurrency: 2 },
        report: {
          country: 'Germany',
          emailDomain: 'gmail.com',
          topCountries: 3,
          minAge: 60,
        },
        now: new Date(2024, 5, 15),
      },
      {
        fetchPersons,
        writePersons: async (persons) => {
          stored.push(...persons)
          return persons.map((_, i) => `id-${i}`)
        },
        readPersons: async () => stored,
      },
    )

    expect(fetchMock).toHaveBeenCalledTimes(3)
    expect(result.fetched).toBe(4)
    expect(stored).toHaveLength(4)
    expect(stored.every((person) => person.age_group === '[70-80]')).toBe(true)
    expect(
      stored.filter((person) => person.email_domain === 'gmail.com'),
    ).toHaveLength(2)

    const lines = renderReport(result.report).split('\n')
    expect(lines[4]).toBe('   50.00%')
    expect(lines[7]).toBe('   - Germany: 2 users')
    expect(lines[10]).toBe('   2 users')
  })
})
