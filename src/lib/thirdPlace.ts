import { compareStandings } from './standings'
import type {
  GroupStandingRow,
  GroupSummary,
  ManualRankingError,
  ThirdPlaceEntry,
  ThirdPlaceOutcome
} from '../types/standings'

type Candidate = GroupStandingRow & { group: string }

export type ManualRankingResult =
  | { ok: true; order: Candidate[] }
  | { ok: false; error: ManualRankingError }

export function collectThirdPlaceCandidates(standings: Map<string, GroupSummary>): Candidate[] {
  const candidates: Candidate[] = []
  const groups = [...standings.keys()].sort((a, b) => a.localeCompare(b))
  for (const group of groups) {
    const third = standings.get(group)?.standings[2]
    if (third) candidates.push({ ...third, group })
  }
  return candidates
}

/**
 * A manual order is accepted only as a permutation of the candidate team ids.
 */
export function validateManualRanking(candidates: Candidate[], order: string[]): ManualRankingResult {
  const byTeamId = new Map(candidates.map((candidate) => [candidate.team.id, candidate]))
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  const unknown: string[] = []

  for (const teamId of order) {
    if (seen.has(teamId)) {
      duplicates.add(teamId)
      continue
    }
    seen.add(teamId)
    if (!byTeamId.has(teamId)) unknown.push(teamId)
  }

  const missing = candidates
    .map((candidate) => candidate.team.id)
    .filter((teamId) => !seen.has(teamId))

  if (missing.length === 0 && duplicates.size === 0 && unknown.length === 0 && order.length === candidates.length) {
    const ordered: Candidate[] = []
    for (const teamId of order) {
      const candidate = byTeamId.get(teamId)
      if (candidate) ordered.push(candidate)
    }
    return { ok: true, order: ordered }
  }

  const problems: string[] = []
  if (missing.length > 0) problems.push(`missing ${missing.join(', ')}`)
  if (duplicates.size > 0) problems.push(`duplicated ${[...duplicates].join(', ')}`)
  if (unknown.length > 0) problems.push(`not third-placed ${unknown.join(', ')}`)
  if (problems.length === 0) problems.push(`expected ${candidates.length} entries`)

  return {
    ok: false,
    error: {
      code: 'INVALID_MANUAL_RANKING',
      message: `Manual third-place ranking rejected: ${problems.join('; ')}`,
      expectedSize: candidates.length,
      receivedSize: order.length,
      missing,
      duplicates: [...duplicates],
      unknown
    }
  }
}

function toEntries(ordered: Candidate[], qualifyingSlots: number): ThirdPlaceEntry[] {
  return ordered.map((candidate, index) => ({
    ...candidate,
    rank: index + 1,
    qualifies: index < qualifyingSlots
  }))
}

export function rankThirdPlaceTeams(
  standings: Map<string, GroupSummary>,
  qualifyingSlots: number,
  manualOrder?: string[]
): ThirdPlaceOutcome {
  const candidates = collectThirdPlaceCandidates(standings)
  const computed = [...candidates].sort(compareStandings)

  if (manualOrder !== undefined) {
    const validation = validateManualRanking(candidates, manualOrder)
    if (validation.ok) {
      const ranking = toEntries(validation.order, qualifyingSlots)
      return {
        ranking,
        qualifiers: ranking.filter((entry) => entry.qualifies),
        source: 'manual'
      }
    }
    const ranking = toEntries(computed, qualifyingSlots)
    return {
      ranking,
      qualifiers: ranking.filter((entry) => entry.qualifies),
      source: 'computed',
      error: validation.error
    }
  }

  const ranking = toEntries(computed, qualifyingSlots)
  return {
    ranking,
    qualifiers: ranking.filter((entry) => entry.qualifies),
    source: 'computed'
  }
}
