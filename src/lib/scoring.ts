import type { TeamPair } from './bracket'
import {
  getOutcomeFromScore,
  getTeamOnSide,
  getWinnerSide,
  isKnockoutMatch,
  isMatchFinished
} from './matches'
import { getPickOutcome, getPredictedWinner, hasPredictedScores } from './picks'
import type { Match, MatchScore, Team } from '../types/matches'
import type { Pick } from '../types/picks'
import type { PredictionScore, ScoringConfig, StageScoring } from '../types/scoring'

/**
 * An exact score replaces the outcome award rather than adding to it. Knockout
 * values are twice the group values.
 */
export const DEFAULT_SCORING: ScoringConfig = {
  group: { outcome: 1, exactScore: 3 },
  knockout: { outcome: 2, exactScore: 6 }
}

export type KnockoutTeams = {
  actual: TeamPair
  predicted: TeamPair
}

function pending(): PredictionScore {
  return { points: 0, breakdown: [], status: 'pending', outcomeCorrect: false, exactScore: false }
}

function award(config: StageScoring, outcomeCorrect: boolean, exact: boolean, label: string): PredictionScore {
  if (outcomeCorrect && exact) {
    return {
      points: config.exactScore,
      breakdown: [`Exact score (+${config.exactScore})`],
      status: 'scored',
      outcomeCorrect: true,
      exactScore: true
    }
  }
  if (outcomeCorrect) {
    return {
      points: config.outcome,
      breakdown: [`${label} (+${config.outcome})`],
      status: 'scored',
      outcomeCorrect: true,
      exactScore: false
    }
  }
  return { points: 0, breakdown: [], status: 'scored', outcomeCorrect: false, exactScore: false }
}

function scoreGroupPick(pick: Pick, score: MatchScore, config: StageScoring): PredictionScore {
  const outcomeCorrect = getPickOutcome(pick) === getOutcomeFromScore(score)
  const exact = hasPredictedScores(pick) && pick.homeScore === score.home && pick.awayScore === score.away
  return award(config, outcomeCorrect, exact, 'Correct outcome')
}

function isSamePair(a: TeamPair, b: TeamPair): boolean {
  if (!a.home || !a.away || !b.home || !b.away) return false
  const actual = new Set([a.home.id, a.away.id])
  return actual.has(b.home.id) && actual.has(b.away.id) && b.home.id !== b.away.id
}

function goalsByTeam(home: Team, away: Team, homeGoals: number, awayGoals: number): Map<string, number> {
  return new Map([
    [home.id, homeGoals],
    [away.id, awayGoals]
  ])
}

function scoreKnockoutPick(
  pick: Pick,
  match: Match & { score: MatchScore },
  teams: KnockoutTeams,
  config: StageScoring
): PredictionScore {
  const { actual, predicted } = teams
  if (!actual.home || !actual.away) return pending()

  if (!predicted.home || !predicted.away || !isSamePair(actual, predicted)) {
    return {
      points: 0,
      breakdown: ['Bracket diverged: predicted teams did not reach this match'],
      status: 'divergent',
      outcomeCorrect: false,
      exactScore: false
    }
  }

  const actualSide = getWinnerSide(match)
  const predictedSide = getPredictedWinner(pick)
  if (!actualSide || !predictedSide) return award(config, false, false, 'Correct winner')

  const actualWinner = getTeamOnSide(actual, actualSide)
  const predictedWinner = getTeamOnSide(predicted, predictedSide)
  const winnerCorrect = actualWinner !== null && actualWinner.id === predictedWinner?.id

  let exact = false
  if (hasPredictedScores(pick)) {
    const actualGoals = goalsByTeam(actual.home, actual.away, match.score.home, match.score.away)
    const predictedGoals = goalsByTeam(predicted.home, predicted.away, pick.homeScore, pick.awayScore)
    exact = [...actualGoals.entries()].every(([teamId, goals]) => predictedGoals.get(teamId) === goals)
  }

  return award(config, winnerCorrect, exact, 'Correct winner')
}

/**
 * Points for one pick against the authoritative state of its match. Knockout
 * picks only score when the user's bracket put the same two teams in the match,
 * so they stay pending until `teams` is given.
 */
export function scorePrediction(
  pick: Pick,
  match: Match,
  teams?: KnockoutTeams,
  scoring: ScoringConfig = DEFAULT_SCORING
): PredictionScore {
  if (!isMatchFinished(match)) return pending()

  if (!isKnockoutMatch(match)) {
    return scoreGroupPick(pick, match.score, scoring.group)
  }

  if (!teams) return pending()
  return scoreKnockoutPick(pick, match, teams, scoring.knockout)
}

/**
 * Recomputes the cached points of every pick on `match`. Other picks pass
 * through untouched, so re-running with the same state yields the same picks.
 */
export function refreshMatchPoints(
  match: Match,
  picks: Pick[],
  teamsForUser?: (userId: string) => KnockoutTeams | undefined,
  scoring: ScoringConfig = DEFAULT_SCORING
): Pick[] {
  return picks.map((pick) => {
    if (pick.matchId !== match.id) return pick
    const result = scorePrediction(pick, match, teamsForUser?.(pick.userId), scoring)
    return { ...pick, pointsEarned: result.points }
  })
}
