import type { Team } from './matches'

export type GroupStandingRow = {
  team: Team
  position: number
  played: number
  won: number
  drawn: number
  lost: number
  goalsFor: number
  goalsAgainst: number
  goalDiff: number
  points: number
}

export type GroupSummary = {
  group: string
  complete: boolean
  standings: GroupStandingRow[]
}

export type ThirdPlaceEntry = GroupStandingRow & {
  group: string
  rank: number
  qualifies: boolean
}

export type ManualRankingError = {
  code: 'INVALID_MANUAL_RANKING'
  message: string
  expectedSize: number
  receivedSize: number
  missing: string[]
  duplicates: string[]
  unknown: string[]
}

export type ThirdPlaceOutcome = {
  ranking: ThirdPlaceEntry[]
  qualifiers: ThirdPlaceEntry[]
  source: 'computed' | 'manual'
  error?: ManualRankingError
}
