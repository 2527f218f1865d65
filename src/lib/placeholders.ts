import type { Placeholder } from '../types/bracket'

export type PlaceholderParseResult =
  | { ok: true; placeholder: Placeholder }
  | { ok: false; code: string; message: string }

const GROUP_POSITION = /^([1-9])([A-Z])$/
const THIRD_PLACE_SLOT = /^3([A-Z]{2,})$/
const THIRD_PLACE_RANK = /^3-([1-9]\d*)$/
const MATCH_REFERENCE = /^([WL])([1-9]\d*)$/

/**
 * Slot codes:
 * - `1A`, `2B`: rank within a group
 * - `3ABCDF`: a best-third slot open to the listed groups
 * - `3-1`: the n-th ranked qualifying third-placed team
 * - `W73`, `L101`: winner or loser of an earlier match
 */
export function parsePlaceholder(raw: string): PlaceholderParseResult {
  const code = raw.trim().toUpperCase()

  const groupPosition = GROUP_POSITION.exec(code)
  if (groupPosition) {
    return {
      ok: true,
      placeholder: { kind: 'group-position', rank: Number(groupPosition[1]), group: groupPosition[2] }
    }
  }

  const thirdPlace = THIRD_PLACE_SLOT.exec(code)
  if (thirdPlace) {
    const candidateGroups = [...new Set(thirdPlace[1].split(''))].sort()
    return { ok: true, placeholder: { kind: 'third-place', candidateGroups } }
  }

  const thirdPlaceRank = THIRD_PLACE_RANK.exec(code)
  if (thirdPlaceRank) {
    return { ok: true, placeholder: { kind: 'third-place-rank', rank: Number(thirdPlaceRank[1]) } }
  }

  const reference = MATCH_REFERENCE.exec(code)
  if (reference) {
    const matchNumber = Number(reference[2])
    return {
      ok: true,
      placeholder:
        reference[1] === 'W'
          ? { kind: 'match-winner', matchNumber }
          : { kind: 'match-loser', matchNumber }
    }
  }

  return { ok: false, code: raw, message: `Unrecognized slot code "${raw}"` }
}

export function formatPlaceholder(placeholder: Placeholder): string {
  switch (placeholder.kind) {
    case 'group-position':
      return `${placeholder.rank}${placeholder.group}`
    case 'third-place':
      return `3${placeholder.candidateGroups.join('')}`
    case 'third-place-rank':
      return `3-${placeholder.rank}`
    case 'match-winner':
      return `W${placeholder.matchNumber}`
    case 'match-loser':
      return `L${placeholder.matchNumber}`
  }
}

export function referencedMatchNumber(placeholder: Placeholder): number | undefined {
  if (placeholder.kind === 'match-winner' || placeholder.kind === 'match-loser') {
    return placeholder.matchNumber
  }
  return undefined
}
