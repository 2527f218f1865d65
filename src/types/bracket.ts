import type { KnockoutStage, MatchWinner, Team } from './matches'

export type Placeholder =
  | { kind: 'group-position'; group: string; rank: number }
  | { kind: 'third-place'; candidateGroups: string[] }
  | { kind: 'third-place-rank'; rank: number }
  | { kind: 'match-winner'; matchNumber: number }
  | { kind: 'match-loser'; matchNumber: number }

export type TournamentFormat = {
  groups: string[]
  teamsPerGroup: number
  directQualifiersPerGroup: number
  bestThirdSlots: number
  thirdPlaceMatch: boolean
  firstRoundPairings?: Array<[string, string]>
}

export type KnockoutRound = {
  stage: KnockoutStage
  name: string
  matchCount: number
  firstMatchNumber: number
}

export type KnockoutFixture = {
  number: number
  stage: KnockoutStage
  homeSlot: string
  awaySlot: string
  home: Placeholder
  away: Placeholder
}

export type BracketTopology = {
  format: TournamentFormat
  qualifyingTeams: number
  rounds: KnockoutRound[]
  fixtures: KnockoutFixture[]
}

export type ThirdPlaceSeedingTable = Record<string, Record<string, string>>

export type ResolvedFixture = {
  number: number
  stage: KnockoutStage
  homeSlot: string
  awaySlot: string
  homeTeam: Team | null
  awayTeam: Team | null
  decision?: MatchWinner
  winner: Team | null
  loser: Team | null
}

export type BracketResolution = {
  slots: Map<string, Team | null>
  fixtures: Map<number, ResolvedFixture>
}

export type BracketFile = {
  generatedAt: string
  qualifyingTeams: number
  rounds: KnockoutRound[]
  fixtures: Array<Pick<KnockoutFixture, 'number' | 'stage' | 'homeSlot' | 'awaySlot'>>
}
