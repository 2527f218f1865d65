import type { CompetitionTeam, Member } from './members'

export type LeaderboardEntry = {
  member: Member
  totalPoints: number
  exactPoints: number
  outcomePoints: number
  knockoutPoints: number
  exactCount: number
  picksCount: number
  divergentCount: number
  earliestSubmission?: string
}

export type CompetitionTeamEntry = {
  team: CompetitionTeam
  totalPoints: number
  memberCount: number
  rank: number
}

export type LeaderboardFile = {
  lastUpdated: string
  entries: LeaderboardEntry[]
  teams: CompetitionTeamEntry[]
}
