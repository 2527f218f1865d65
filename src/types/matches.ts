export type KnockoutStage = `R${number}` | 'QF' | 'SF' | 'Third' | 'Final'
export type MatchStage = 'Group' | KnockoutStage
export type MatchStatus = 'SCHEDULED' | 'IN_PLAY' | 'FINISHED'
export type MatchWinner = 'HOME' | 'AWAY'
export type MatchDecision = 'REG' | 'ET' | 'PENS'

export type Team = {
  id: string
  code: string
  name: string
  group?: string
}

export type MatchScore = {
  home: number
  away: number
}

export type Match = {
  id: string
  number: number
  stage: MatchStage
  group?: string
  kickoffUtc?: string
  status: MatchStatus
  homeTeam?: Team
  awayTeam?: Team
  homeSlot?: string
  awaySlot?: string
  score?: MatchScore
  winner?: MatchWinner
  decidedBy?: MatchDecision
}

export type MatchesFile = {
  lastUpdated: string
  teams: Team[]
  matches: Match[]
}
