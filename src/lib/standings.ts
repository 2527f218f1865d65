import { isMatchFinished } from './matches'
import { hasPredictedScores, indexPicksByMatch } from './picks'
import type { Match, MatchScore, Team } from '../types/matches'
import type { Pick } from '../types/picks'
import type { GroupStandingRow, GroupSummary } from '../types/standings'

/**
 * Where a match result comes from: the authoritative score, or one user's
 * predicted score. `undefined` means the match has no result yet.
 */
export type ResultSource = (match: Match) => MatchScore | undefined

export function actualResults(): ResultSource {
  return (match) => (isMatchFinished(match) ? match.score : undefined)
}

export function predictedResults(picks: Pick[], userId?: string): ResultSource {
  const byMatch = indexPicksByMatch(picks, userId)
  return (match) => {
    const pick = byMatch.get(match.id)
    if (!pick || !hasPredictedScores(pick)) return undefined
    return { home: pick.homeScore, away: pick.awayScore }
  }
}

type RankingStats = {
  points: number
  goalDiff: number
  goalsFor: number
}

export function compareStandings(a: RankingStats, b: RankingStats): number {
  if (b.points !== a.points) return b.points - a.points
  if (b.goalDiff !== a.goalDiff) return b.goalDiff - a.goalDiff
  return b.goalsFor - a.goalsFor
}

function emptyRow(team: Team): GroupStandingRow {
  return {
    team,
    position: 0,
    played: 0,
    won: 0,
    drawn: 0,
    lost: 0,
    goalsFor: 0,
    goalsAgainst: 0,
    goalDiff: 0,
    points: 0
  }
}

function recordResult(row: GroupStandingRow, goalsFor: number, goalsAgainst: number): void {
  row.played += 1
  row.goalsFor += goalsFor
  row.goalsAgainst += goalsAgainst
  row.goalDiff = row.goalsFor - row.goalsAgainst
  if (goalsFor > goalsAgainst) {
    row.won += 1
    row.points += 3
  } else if (goalsFor === goalsAgainst) {
    row.drawn += 1
    row.points += 1
  } else {
    row.lost += 1
  }
}

/**
 * Ranks one group by points, goal difference and goals scored. Teams still level
 * after that keep roster order (or first appearance in `matches` without a roster).
 */
export function computeGroupStandings(
  group: string,
  matches: Match[],
  source: ResultSource,
  roster?: Team[]
): GroupStandingRow[] {
  const rows = new Map<string, GroupStandingRow>()
  const ensureRow = (team: Team) => {
    const existing = rows.get(team.id)
    if (existing) return existing
    const created = emptyRow(team)
    rows.set(team.id, created)
    return created
  }

  for (const team of roster ?? []) {
    ensureRow(team)
  }

  for (const match of matches) {
    if (match.stage !== 'Group' || match.group !== group) continue
    if (!match.homeTeam || !match.awayTeam) continue
    const home = ensureRow(match.homeTeam)
    const away = ensureRow(match.awayTeam)

    const score = source(match)
    if (!score) continue
    recordResult(home, score.home, score.away)
    recordResult(away, score.away, score.home)
  }

  return [...rows.values()]
    .sort(compareStandings)
    .map((row, index) => ({ ...row, position: index + 1 }))
}

export function listGroups(matches: Match[], teams: Team[] = []): string[] {
  const groups = new Set<string>()
  for (const team of teams) {
    if (team.group) groups.add(team.group)
  }
  for (const match of matches) {
    if (match.stage === 'Group' && match.group) groups.add(match.group)
  }
  return [...groups].sort((a, b) => a.localeCompare(b))
}

export function computeAllGroupStandings(
  matches: Match[],
  source: ResultSource,
  teams: Team[] = []
): Map<string, GroupSummary> {
  const summaries = new Map<string, GroupSummary>()

  for (const group of listGroups(matches, teams)) {
    const groupMatches = matches.filter((match) => match.stage === 'Group' && match.group === group)
    const roster = teams.filter((team) => team.group === group)
    const complete =
      groupMatches.length > 0 && groupMatches.every((match) => source(match) !== undefined)
    summaries.set(group, {
      group,
      complete,
      standings: computeGroupStandings(group, groupMatches, source, roster)
    })
  }

  return summaries
}
