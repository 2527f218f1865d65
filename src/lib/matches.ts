import type { KnockoutStage, Match, MatchScore, MatchStage, MatchWinner, Team } from '../types/matches'

export type MatchOutcome = 'WIN' | 'DRAW' | 'LOSS'

export type MatchIssue = {
  code: 'FINISHED_WITHOUT_SCORE' | 'FINISHED_WITHOUT_WINNER' | 'WINNER_CONTRADICTS_SCORE'
  matchId: string
  message: string
}

export function isKnockoutStage(stage: MatchStage): stage is KnockoutStage {
  return stage !== 'Group'
}

export function isKnockoutMatch(match: Match): boolean {
  return isKnockoutStage(match.stage)
}

export function getOutcomeFromScore(score: MatchScore): MatchOutcome {
  if (score.home > score.away) return 'WIN'
  if (score.away > score.home) return 'LOSS'
  return 'DRAW'
}

export function isMatchFinished(match: Match): match is Match & { score: MatchScore } {
  return match.status === 'FINISHED' && match.score !== undefined
}

export function getWinnerSide(match: Match): MatchWinner | undefined {
  if (!isMatchFinished(match)) return undefined
  if (match.winner) return match.winner
  const outcome = getOutcomeFromScore(match.score)
  if (outcome === 'WIN') return 'HOME'
  if (outcome === 'LOSS') return 'AWAY'
  return undefined
}

export function getTeamOnSide(
  teams: { home: Team | null; away: Team | null },
  side: MatchWinner
): Team | null {
  return side === 'HOME' ? teams.home : teams.away
}

export function validateMatch(match: Match): MatchIssue[] {
  const issues: MatchIssue[] = []
  if (match.status !== 'FINISHED') return issues

  if (!match.score) {
    issues.push({
      code: 'FINISHED_WITHOUT_SCORE',
      matchId: match.id,
      message: `Match ${match.number} is finished but has no score`
    })
    return issues
  }

  if (!isKnockoutMatch(match)) return issues

  if (!match.winner) {
    issues.push({
      code: 'FINISHED_WITHOUT_WINNER',
      matchId: match.id,
      message: `Knockout match ${match.number} is finished but has no winner`
    })
    return issues
  }

  const outcome = getOutcomeFromScore(match.score)
  if ((outcome === 'WIN' && match.winner === 'AWAY') || (outcome === 'LOSS' && match.winner === 'HOME')) {
    issues.push({
      code: 'WINNER_CONTRADICTS_SCORE',
      matchId: match.id,
      message: `Match ${match.number} winner ${match.winner} contradicts score ${match.score.home}-${match.score.away}`
    })
  }
  return issues
}

export function sortMatches(matches: Match[]): Match[] {
  return [...matches].sort((a, b) => a.number - b.number)
}
