import { isKnockoutMatch } from './matches'
import { groupPicksByUser, indexPicksByMatch } from './picks'
import { DEFAULT_SCORING, scorePrediction } from './scoring'
import { buildTournamentState, buildUserBracket, knockoutTeamsFor } from './tournament'
import type { BracketResolution, BracketTopology, ThirdPlaceSeedingTable } from '../types/bracket'
import type { CompetitionTeamEntry, LeaderboardEntry } from '../types/leaderboard'
import type { Match, Team } from '../types/matches'
import type { CompetitionTeam, Member } from '../types/members'
import type { Pick } from '../types/picks'
import type { ScoringConfig } from '../types/scoring'

export function totalScore(picks: Pick[]): number {
  return picks.reduce((sum, pick) => sum + (pick.pointsEarned ?? 0), 0)
}

export type LeaderboardInput = {
  members: Member[]
  matches: Match[]
  picks: Pick[]
  scoring?: ScoringConfig
  teams?: Team[]
  /** Without a topology, knockout picks stay pending. */
  topology?: BracketTopology
  seedingTable?: ThirdPlaceSeedingTable
  /** Manual third-place orders by user id. */
  thirdPlaceOrders?: Map<string, string[]>
}

function emptyEntry(member: Member): LeaderboardEntry {
  return {
    member,
    totalPoints: 0,
    exactPoints: 0,
    outcomePoints: 0,
    knockoutPoints: 0,
    exactCount: 0,
    picksCount: 0,
    divergentCount: 0
  }
}

function toTime(value?: string): number {
  if (!value) return Number.POSITIVE_INFINITY
  const time = new Date(value).getTime()
  return Number.isFinite(time) ? time : Number.POSITIVE_INFINITY
}

export function compareLeaderboardEntries(a: LeaderboardEntry, b: LeaderboardEntry): number {
  if (b.totalPoints !== a.totalPoints) return b.totalPoints - a.totalPoints
  if (b.exactPoints !== a.exactPoints) return b.exactPoints - a.exactPoints
  if (b.outcomePoints !== a.outcomePoints) return b.outcomePoints - a.outcomePoints
  const aTime = toTime(a.earliestSubmission)
  const bTime = toTime(b.earliestSubmission)
  if (aTime !== bTime) return aTime - bTime
  return a.member.name.localeCompare(b.member.name)
}

export function buildLeaderboard(input: LeaderboardInput): LeaderboardEntry[] {
  const { members, matches, picks, scoring = DEFAULT_SCORING, teams = [], topology, seedingTable, thirdPlaceOrders } =
    input
  const matchById = new Map(matches.map((match) => [match.id, match]))
  const entries = new Map<string, LeaderboardEntry>()
  for (const member of members) {
    entries.set(member.id, emptyEntry(member))
  }

  const actual: BracketResolution | undefined = topology
    ? buildTournamentState({ matches, teams, topology, seedingTable }).resolution
    : undefined

  for (const [userId, userPicks] of groupPicksByUser(picks)) {
    const entry = entries.get(userId)
    if (!entry) continue

    const predicted =
      topology && actual
        ? buildUserBracket({
            userId,
            picks: userPicks,
            matches,
            teams,
            topology,
            seedingTable,
            thirdPlaceOrder: thirdPlaceOrders?.get(userId)
          }).resolution
        : undefined

    for (const pick of userPicks) {
      if (toTime(pick.createdAt) < toTime(entry.earliestSubmission)) {
        entry.earliestSubmission = pick.createdAt
      }
    }

    for (const pick of indexPicksByMatch(userPicks).values()) {
      const match = matchById.get(pick.matchId)
      if (!match) continue
      const knockoutTeams = actual && predicted ? knockoutTeamsFor(match, actual, predicted) : undefined
      const result = scorePrediction(pick, match, knockoutTeams, scoring)

      if (result.status === 'pending') continue
      if (result.status === 'divergent') {
        entry.divergentCount += 1
        continue
      }

      entry.picksCount += 1
      entry.totalPoints += result.points
      if (result.exactScore) {
        entry.exactPoints += result.points
        entry.exactCount += 1
      } else if (isKnockoutMatch(match)) {
        entry.knockoutPoints += result.points
      } else {
        entry.outcomePoints += result.points
      }
    }
  }

  return [...entries.values()].sort(compareLeaderboardEntries)
}

/**
 * Sums member totals per competition team. Level teams share a rank (1, 1, 3).
 */
export function buildCompetitionTeamStandings(
  teams: CompetitionTeam[],
  entries: LeaderboardEntry[]
): CompetitionTeamEntry[] {
  const totals = new Map(entries.map((entry) => [entry.member.id, entry.totalPoints]))

  const summed = teams.map((team) => {
    const memberTotals = team.memberIds.flatMap((memberId) => {
      const total = totals.get(memberId)
      return total === undefined ? [] : [total]
    })
    return {
      team,
      totalPoints: memberTotals.reduce((sum, total) => sum + total, 0),
      memberCount: memberTotals.length
    }
  })

  summed.sort((a, b) => b.totalPoints - a.totalPoints || a.team.name.localeCompare(b.team.name))

  let rank = 0
  return summed.map((row, index) => {
    if (index === 0 || row.totalPoints !== summed[index - 1].totalPoints) rank = index + 1
    return { ...row, rank }
  })
}
