export type PickWinner = 'HOME' | 'AWAY'
export type PickOutcome = 'WIN' | 'DRAW' | 'LOSS'

export type Pick = {
  id: string
  matchId: string
  userId: string
  homeScore?: number
  awayScore?: number
  outcome?: PickOutcome
  advances?: PickWinner
  pointsEarned?: number
  createdAt: string
  updatedAt: string
}

export type PickInput = {
  matchId: string
  userId: string
  homeScore?: number
  awayScore?: number
  outcome?: PickOutcome
  advances?: PickWinner
}

export type UserPicksDoc = {
  userId: string
  picks: Pick[]
  /** The user's own ordering of the third-placed teams in their predicted tables. */
  thirdPlaceOrder?: string[]
  updatedAt: string
}

export type PicksFile = {
  picks: UserPicksDoc[]
}
