import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { AnonymizedPerson } from '../../anonymization/types/anonymized-person.ts'
import type { Person } from '../../persons/types/person.ts'
import { validatePerson } from '../../persons/validator.ts'
import { buildRawPerson } from '../../../tests/fixtures/raw-person.ts'
import {
  NoDataFetchedError,
  type PipelineDependencies,
  runPipeline,
} from '../run.ts'

vi.mock('../../plumbing/logger.ts', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../plumbing/logger.ts')>()),
  log: vi.fn(),
}))

const toPerson = (raw: unknown): Person => {
  const result = validatePerson(raw)
  if (!result.accepted) {
    throw new Error(`fixture rejected: ${result.reason}`)
  }
  return result.person
}

const reportOptions = {
  country: 'Germany',
  emailDomain: 'gmail.com',
  topCountries: 3,
  minAge: 60,
}

const now = new Date(2024, 5, 15)

describe('runPipeline', () => {
  let stored: AnonymizedPerson[]
  let dependencies: PipelineDependencies

  beforeEach(() => {
    stored = []
    dependencies = {
      fetchPersons: vi.fn().mockResolvedValue([]),
      writePersons: vi.fn(async (persons: AnonymizedPerson[]) => {
        stored.push(...persons)
        return persons.map((_, i) => `id-${i}`)
      }),
      readPersons: vi.fn(async () => stored),
    }
  })

  it('should stop before writing when nothing was fetched', async () => {
    await expect(
      runPipeline({ quantity: 10, report: reportOptions, now }, dependencies),
    ).rejects.toThrow(NoDataFetchedError)

    expect(dependencies.writePersons).not.toHaveBeenCalled()
    expect(dependencies.readPersons).not.toHaveBeenCalled()
  })

  it('should anonymize, store and report fetched persons', async () => {
    vi.mocked(dependencies.fetchPersons).mockResolvedValue([
      toPerson(
        buildRawPerson({ email: 'Anna@Gmail.com', birthday: '1960-01-01' }),
      ),
      toPerson(buildRawPerson({ email: 'ben@web.de', birthday: '1990-07-01' })),
      toPerson(
        buildRawPerson(
          { email: 'cleo@gmail.com', birthday: '2000-02-02' },
          { country: 'Austria' },
        ),
      ),
    ])

    const result = await runPipeline(
      { quantity: 3, report: reportOptions, now },
      dependencies,
    )

    expect(dependencies.fetchPersons).toHaveBeenCalledWith(3, undefined)
    expect(stored).toEqual([
      {
        age_group: '[60-70]',
        email_domain: 'gmail.com',
        country: 'Germany',
        city: 'Testville',
      },
      {
        age_group: '[30-40]',
        email_domain: 'web.de',
        country: 'Germany',
        city: 'Testville',
      },
      {
        age_group: '[20-30]',
        email_domain: 'gmail.com',
        country: 'Austria',
        city: 'Testville',
      },
    ])
    expect(result.fetched).toBe(3)
    expect(result.stored).toBe(3)
    expect(result.report.domainPercentageInCountry).toBe(50)
    expect(result.report.topCountriesByDomain).toEqual([
      ['Austria', 1],
      ['Germany', 1],
    ])
    expect(result.report.domainCountAtOrAboveMinAge).toBe(1)
  })

  it('should drop persons born in the future and store the rest', async () => {
    vi.mocked(dependencies.fetchPersons).mockResolvedValue([
      toPerson(buildRawPerson({ birthday: '2030-01-01' })),
      toPerson(buildRawPerson({ birthday: '1980-01-01' })),
    ])

    const result = await runPipeline(
      { quantity: 2, report: reportOptions, now },
      dependencies,
    )

    expect(result.fetched).toBe(2)
    expect(result.stored).toBe(1)
    expect(stored[0].age_group).toBe('[40-50]')
  })

  it('should propagate a failed write', async () => {
    vi.mocked(dependencies.fetchPersons).mockResolvedValue([
      toPerson(buildRawPerson()),
    ])
    vi.mocked(dependencies.writePersons).mockRejectedValue(
      new Error('write timeout'),
    )

    await expect(
      runPipeline({ quantity: 1, report: reportOptions, now }, dependencies),
    ).rejects.toThrow('write timeout')
    expect(dependencies.readPersons).not.toHaveBeenCalled()
  })
})
