import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { DataFileError, DataStore, parseDataFile } from './dataFiles'
import { MatchesFileSchema, ScoringConfigSchema, TournamentFormatSchema } from './schemas'

describe('parseDataFile', () => {
  it('applies schema defaults', () => {
    const format = parseDataFile('tournament.json', '{"groups":["A","B"]}', TournamentFormatSchema)
    expect(format).toEqual({
      groups: ['A', 'B'],
      teamsPerGroup: 4,
      directQualifiersPerGroup: 2,
      bestThirdSlots: 0,
      thirdPlaceMatch: true
    })
  })

  it('names the file and every failing field', () => {
    try {
      parseDataFile('scoring.json', '{"group":{"outcome":1,"exactScore":-1}}', ScoringConfigSchema)
      throw new Error('expected parseDataFile to throw')
    } catch (error) {
      expect(error).toBeInstanceOf(DataFileError)
      if (!(error instanceof DataFileError)) return
      expect(error.file).toBe('scoring.json')
      expect(error.issues).toEqual([
        'group.exactScore: Number must be greater than or equal to 0',
        'knockout: Required'
      ])
    }
  })

  it('rejects text that is not JSON', () => {
    expect(() => parseDataFile('matches.json', 'not json', MatchesFileSchema)).toThrow(DataFileError)
  })

  it('rejects an unknown match stage', () => {
    const raw = JSON.stringify({
      lastUpdated: '2026-06-12T00:00:00Z',
      matches: [{ id: 'm1', number: 1, stage: 'Playoff', status: 'SCHEDULED' }]
    })
    expect(() => parseDataFile('matches.json', raw, MatchesFileSchema)).toThrow(DataFileError)
  })
})

describe('DataStore', () => {
  let dataDir = ''

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'knockout-predictor-'))
  })

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true })
  })

  it('writes JSON that reads back through the schema', async () => {
    const store = new DataStore(dataDir)
    await store.write('scoring.json', { group: { outcome: 1, exactScore: 3 }, knockout: { outcome: 2, exactScore: 6 } })

    expect(await store.readScoring()).toEqual({
      group: { outcome: 1, exactScore: 3 },
      knockout: { outcome: 2, exactScore: 6 }
    })
    expect(await fs.readFile(path.join(dataDir, 'scoring.json'), 'utf8')).toMatch(/\n$/)
  })

  it('returns undefined for a missing optional file', async () => {
    const store = new DataStore(dataDir)
    expect(await store.readSeedingTable()).toBeUndefined()
  })

  it('validates optional files that exist', async () => {
    const store = new DataStore(dataDir)
    await store.write('third-place-seeding.json', { ABCDEFGH: { '3ABCDF': 'lowercase' } })
    await expect(store.readSeedingTable()).rejects.toBeInstanceOf(DataFileError)
  })
})
