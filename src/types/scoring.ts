export type StageScoring = {
  outcome: number
  exactScore: number
}

export type ScoringConfig = {
  group: StageScoring
  knockout: StageScoring
}

export type PredictionStatus = 'pending' | 'divergent' | 'scored'

export type PredictionScore = {
  points: number
  breakdown: string[]
  status: PredictionStatus
  outcomeCorrect: boolean
  exactScore: boolean
}
