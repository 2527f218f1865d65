import { actualDecisions, predictedDecisions, resolveBracket } from './bracket'
import { isKnockoutMatch } from './matches'
import type { KnockoutTeams } from './scoring'
import { actualResults, computeAllGroupStandings, predictedResults } from './standings'
import { rankThirdPlaceTeams } from './thirdPlace'
import type { BracketResolution, BracketTopology, ThirdPlaceSeedingTable } from '../types/bracket'
import type { Match, Team } from '../types/matches'
import type { Pick } from '../types/picks'
import type { GroupSummary, ThirdPlaceOutcome } from '../types/standings'

export type TournamentInput = {
  matches: Match[]
  teams?: Team[]
  topology: BracketTopology
  seedingTable?: ThirdPlaceSeedingTable
}

export type TournamentState = {
  standings: Map<string, GroupSummary>
  thirdPlace: ThirdPlaceOutcome
  resolution: BracketResolution
}

/** Standings, best-third ranking and bracket from authoritative results. */
export function buildTournamentState(input: TournamentInput): TournamentState {
  const { matches, teams = [], topology, seedingTable } = input
  const standings = computeAllGroupStandings(matches, actualResults(), teams)
  const thirdPlace = rankThirdPlaceTeams(standings, topology.format.bestThirdSlots)
  const resolution = resolveBracket({
    topology,
    standings,
    decisions: actualDecisions(matches),
    thirdPlace,
    seedingTable
  })
  return { standings, thirdPlace, resolution }
}

export type UserBracketInput = TournamentInput & {
  userId: string
  picks: Pick[]
  thirdPlaceOrder?: string[]
}

/**
 * The same chain run on one user's predicted scores. The user's manual
 * third-place order, when given, replaces the computed ranking if it is valid.
 */
export function buildUserBracket(input: UserBracketInput): TournamentState {
  const { userId, picks, matches, teams = [], topology, thirdPlaceOrder, seedingTable } = input
  const standings = computeAllGroupStandings(matches, predictedResults(picks, userId), teams)
  const thirdPlace = rankThirdPlaceTeams(standings, topology.format.bestThirdSlots, thirdPlaceOrder)
  const resolution = resolveBracket({
    topology,
    standings,
    decisions: predictedDecisions(matches, picks, userId),
    thirdPlace,
    seedingTable
  })
  return { standings, thirdPlace, resolution }
}

/**
 * Actual and predicted teams for a knockout match. Teams already recorded on the
 * match take over when the authoritative bracket has not resolved a side.
 */
export function knockoutTeamsFor(
  match: Match,
  actual: BracketResolution,
  predicted: BracketResolution
): KnockoutTeams | undefined {
  if (!isKnockoutMatch(match)) return undefined
  const actualFixture = actual.fixtures.get(match.number)
  const predictedFixture = predicted.fixtures.get(match.number)
  return {
    actual: {
      home: actualFixture?.homeTeam ?? match.homeTeam ?? null,
      away: actualFixture?.awayTeam ?? match.awayTeam ?? null
    },
    predicted: {
      home: predictedFixture?.homeTeam ?? null,
      away: predictedFixture?.awayTeam ?? null
    }
  }
}
