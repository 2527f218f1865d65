import fs from 'node:fs/promises'
import path from 'node:path'
import type { ZodType, ZodTypeDef } from 'zod'

import {
  MatchesFileSchema,
  MembersFileSchema,
  PicksFileSchema,
  ScoringConfigSchema,
  ThirdPlaceSeedingTableSchema,
  TournamentFormatSchema
} from './schemas'
import type { ThirdPlaceSeedingTable, TournamentFormat } from '../types/bracket'
import type { MatchesFile } from '../types/matches'
import type { MembersFile } from '../types/members'
import type { PicksFile } from '../types/picks'
import type { ScoringConfig } from '../types/scoring'

export class DataFileError extends Error {
  readonly file: string
  readonly issues: string[]

  constructor(file: string, issues: string[]) {
    super(`Invalid data file ${file}:\n- ${issues.join('\n- ')}`)
    this.name = 'DataFileError'
    this.file = file
    this.issues = issues
  }
}

type Schema<T> = ZodType<T, ZodTypeDef, unknown>

export function parseDataFile<T>(file: string, raw: string, schema: Schema<T>): T {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    throw new DataFileError(file, [error instanceof Error ? error.message : String(error)])
  }
  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    throw new DataFileError(
      file,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    )
  }
  return parsed.data
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

export class DataStore {
  constructor(readonly dataDir: string) {}

  async read<T>(filename: string, schema: Schema<T>): Promise<T> {
    const raw = await fs.readFile(path.join(this.dataDir, filename), 'utf8')
    return parseDataFile(filename, raw, schema)
  }

  async readOptional<T>(filename: string, schema: Schema<T>): Promise<T | undefined> {
    if (!(await fileExists(path.join(this.dataDir, filename)))) return undefined
    return this.read(filename, schema)
  }

  async write(filename: string, data: unknown): Promise<void> {
    await fs.writeFile(path.join(this.dataDir, filename), `${JSON.stringify(data, null, 2)}\n`)
  }

  readMatches(): Promise<MatchesFile> {
    return this.read('matches.json', MatchesFileSchema)
  }

  readPicks(): Promise<PicksFile> {
    return this.read('picks.json', PicksFileSchema)
  }

  readMembers(): Promise<MembersFile> {
    return this.read('members.json', MembersFileSchema)
  }

  readScoring(): Promise<ScoringConfig> {
    return this.read('scoring.json', ScoringConfigSchema)
  }

  readTournament(): Promise<TournamentFormat> {
    return this.read('tournament.json', TournamentFormatSchema)
  }

  readSeedingTable(): Promise<ThirdPlaceSeedingTable | undefined> {
    return this.readOptional('third-place-seeding.json', ThirdPlaceSeedingTableSchema)
  }
}
