import { formatPlaceholder } from './placeholders'
import { getWinnerSide, isKnockoutMatch } from './matches'
import { getPredictedWinner, hasPredictedScores, indexPicksByMatch } from './picks'
import { rankThirdPlaceTeams } from './thirdPlace'
import { assignThirdPlaceSlots, type ThirdPlaceSlot } from './thirdPlaceSeeding'
import type {
  BracketResolution,
  BracketTopology,
  Placeholder,
  ResolvedFixture,
  ThirdPlaceSeedingTable
} from '../types/bracket'
import type { Match, MatchWinner, Team } from '../types/matches'
import type { Pick } from '../types/picks'
import type { GroupSummary, ThirdPlaceOutcome } from '../types/standings'

/** Which side went through in a knockout match, by match number. */
export type KnockoutDecisionSource = (matchNumber: number) => MatchWinner | undefined

export type ResolveBracketInput = {
  topology: BracketTopology
  standings: Map<string, GroupSummary>
  decisions: KnockoutDecisionSource
  thirdPlace?: ThirdPlaceOutcome
  seedingTable?: ThirdPlaceSeedingTable
}

export type TeamPair = {
  home: Team | null
  away: Team | null
}

function indexKnockoutMatches(matches: Match[]): Map<number, Match> {
  const byNumber = new Map<number, Match>()
  for (const match of matches) {
    if (isKnockoutMatch(match)) byNumber.set(match.number, match)
  }
  return byNumber
}

export function actualDecisions(matches: Match[]): KnockoutDecisionSource {
  const byNumber = indexKnockoutMatches(matches)
  return (matchNumber) => {
    const match = byNumber.get(matchNumber)
    return match ? getWinnerSide(match) : undefined
  }
}

export function predictedDecisions(
  matches: Match[],
  picks: Pick[],
  userId?: string
): KnockoutDecisionSource {
  const byNumber = indexKnockoutMatches(matches)
  const picksByMatch = indexPicksByMatch(picks, userId)
  return (matchNumber) => {
    const match = byNumber.get(matchNumber)
    const pick = match ? picksByMatch.get(match.id) : undefined
    if (!pick || !hasPredictedScores(pick)) return undefined
    return getPredictedWinner(pick)
  }
}

function collectThirdPlaceSlots(topology: BracketTopology): ThirdPlaceSlot[] {
  const slots: ThirdPlaceSlot[] = []
  for (const fixture of topology.fixtures) {
    for (const placeholder of [fixture.home, fixture.away]) {
      if (placeholder.kind !== 'third-place') continue
      slots.push({ code: formatPlaceholder(placeholder), candidateGroups: placeholder.candidateGroups })
    }
  }
  return slots
}

/**
 * Resolves every slot of the bracket in ascending match order. A slot whose
 * inputs are not decided yet resolves to `null` (TBD), and so does everything fed
 * by it. Group positions need a complete group; best-third slots need every
 * group complete.
 */
export function resolveBracket(input: ResolveBracketInput): BracketResolution {
  const { topology, standings, decisions, seedingTable } = input
  const slots = new Map<string, Team | null>()
  const fixtures = new Map<number, ResolvedFixture>()

  const allGroupsComplete =
    standings.size > 0 && [...standings.values()].every((summary) => summary.complete)
  const thirdPlace =
    input.thirdPlace ?? rankThirdPlaceTeams(standings, topology.format.bestThirdSlots)
  const qualifiers = allGroupsComplete ? thirdPlace.qualifiers : []
  const thirdPlaceTeams = new Map(qualifiers.map((entry) => [entry.group, entry.team]))
  const thirdPlaceSlots = collectThirdPlaceSlots(topology)
  const thirdPlaceAssignment =
    thirdPlaceSlots.length > 0 && qualifiers.length === thirdPlaceSlots.length
      ? assignThirdPlaceSlots(
          thirdPlaceSlots,
          qualifiers.map((entry) => entry.group),
          seedingTable
        )
      : undefined

  const resolvePlaceholder = (placeholder: Placeholder): Team | null => {
    switch (placeholder.kind) {
      case 'group-position': {
        const summary = standings.get(placeholder.group)
        if (!summary?.complete) return null
        return summary.standings[placeholder.rank - 1]?.team ?? null
      }
      case 'third-place': {
        const group = thirdPlaceAssignment?.get(formatPlaceholder(placeholder))
        return group ? thirdPlaceTeams.get(group) ?? null : null
      }
      case 'third-place-rank':
        return qualifiers[placeholder.rank - 1]?.team ?? null
      case 'match-winner':
        return fixtures.get(placeholder.matchNumber)?.winner ?? null
      case 'match-loser':
        return fixtures.get(placeholder.matchNumber)?.loser ?? null
    }
  }

  const ordered = [...topology.fixtures].sort((a, b) => a.number - b.number)
  for (const fixture of ordered) {
    const homeTeam = resolvePlaceholder(fixture.home)
    const awayTeam = resolvePlaceholder(fixture.away)
    const decision = decisions(fixture.number)
    const winner = decision ? (decision === 'HOME' ? homeTeam : awayTeam) : null
    const loser = decision ? (decision === 'HOME' ? awayTeam : homeTeam) : null

    fixtures.set(fixture.number, {
      number: fixture.number,
      stage: fixture.stage,
      homeSlot: fixture.homeSlot,
      awaySlot: fixture.awaySlot,
      homeTeam,
      awayTeam,
      decision,
      winner,
      loser
    })
    slots.set(fixture.homeSlot, homeTeam)
    slots.set(fixture.awaySlot, awayTeam)
    slots.set(`W${fixture.number}`, winner)
    slots.set(`L${fixture.number}`, loser)
  }

  return { slots, fixtures }
}

export function getResolvedTeams(resolution: BracketResolution, matchNumber: number): TeamPair {
  const fixture = resolution.fixtures.get(matchNumber)
  return { home: fixture?.homeTeam ?? null, away: fixture?.awayTeam ?? null }
}

export function listUnresolvedSlots(resolution: BracketResolution): string[] {
  return [...resolution.slots.entries()]
    .filter(([, team]) => team === null)
    .map(([code]) => code)
}

export function getChampion(resolution: BracketResolution, topology: BracketTopology): Team | null {
  const final = topology.fixtures.find((fixture) => fixture.stage === 'Final')
  if (!final) return null
  return resolution.fixtures.get(final.number)?.winner ?? null
}

export function createKnockoutMatches(topology: BracketTopology): Match[] {
  return topology.fixtures.map((fixture): Match => ({
    id: `match-${fixture.number}`,
    number: fixture.number,
    stage: fixture.stage,
    status: 'SCHEDULED',
    homeSlot: fixture.homeSlot,
    awaySlot: fixture.awaySlot
  }))
}

/**
 * Writes resolved teams onto knockout match records. Teams already set on a
 * match are kept when the resolution has nothing for that side.
 */
export function applyResolvedTeams(matches: Match[], resolution: BracketResolution): Match[] {
  return matches.map((match) => {
    if (!isKnockoutMatch(match)) return match
    const fixture = resolution.fixtures.get(match.number)
    if (!fixture) return match
    return {
      ...match,
      homeSlot: match.homeSlot ?? fixture.homeSlot,
      awaySlot: match.awaySlot ?? fixture.awaySlot,
      homeTeam: fixture.homeTeam ?? match.homeTeam,
      awayTeam: fixture.awayTeam ?? match.awayTeam
    }
  })
}
