import bracketTemplates from '../data/bracketTemplates.json'
import { formatPlaceholder, parsePlaceholder, referencedMatchNumber } from './placeholders'
import { BracketTemplatesSchema } from './schemas'
import type {
  BracketTopology,
  KnockoutFixture,
  KnockoutRound,
  Placeholder,
  TournamentFormat
} from '../types/bracket'
import type { KnockoutStage } from '../types/matches'

const templates = BracketTemplatesSchema.parse(bracketTemplates).templates

export class BracketTopologyError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid bracket topology:\n- ${issues.join('\n- ')}`)
    this.name = 'BracketTopologyError'
    this.issues = issues
  }
}

function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value >= 2 && (value & (value - 1)) === 0
}

function stageForField(teams: number): { stage: KnockoutStage; name: string } {
  if (teams === 8) return { stage: 'QF', name: 'Quarter-finals' }
  if (teams === 4) return { stage: 'SF', name: 'Semi-finals' }
  return { stage: `R${teams}`, name: `Round of ${teams}` }
}

export function qualifyingTeamCount(format: TournamentFormat): number {
  return format.groups.length * format.directQualifiersPerGroup + format.bestThirdSlots
}

export function groupStageMatchCount(format: TournamentFormat): number {
  const perGroup = (format.teamsPerGroup * (format.teamsPerGroup - 1)) / 2
  return format.groups.length * perGroup
}

/**
 * Halves the field round by round down to the semi-finals, then adds the
 * third-place match and the final. 32 teams starting at 73 gives R32 73-88,
 * R16 89-96, QF 97-100, SF 101-102, third place 103, final 104.
 */
export function generateKnockoutRounds(
  qualifyingTeams: number,
  firstMatchNumber: number,
  options: { thirdPlaceMatch?: boolean } = {}
): KnockoutRound[] {
  if (!isPowerOfTwo(qualifyingTeams)) {
    throw new BracketTopologyError([
      `Knockout field of ${qualifyingTeams} teams is not a power of two`
    ])
  }

  const rounds: KnockoutRound[] = []
  let teams = qualifyingTeams
  let matchNumber = firstMatchNumber

  while (teams >= 4) {
    const matchCount = teams / 2
    rounds.push({ ...stageForField(teams), matchCount, firstMatchNumber: matchNumber })
    matchNumber += matchCount
    teams = matchCount
  }

  if ((options.thirdPlaceMatch ?? true) && qualifyingTeams >= 4) {
    rounds.push({ stage: 'Third', name: 'Third place', matchCount: 1, firstMatchNumber: matchNumber })
    matchNumber += 1
  }
  rounds.push({ stage: 'Final', name: 'Final', matchCount: 1, firstMatchNumber: matchNumber })

  return rounds
}

function crossGroups(format: TournamentFormat): Array<[string, string]> {
  const groups = format.groups
  const pairings: Array<[string, string]> = []
  if (groups.length % 2 === 0) {
    for (let index = 0; index < groups.length; index += 2) {
      const first = groups[index]
      const second = groups[index + 1]
      pairings.push([`1${first}`, `2${second}`])
      pairings.push([`1${second}`, `2${first}`])
    }
    return pairings
  }
  const half = Math.floor(groups.length / 2)
  for (let index = 0; index < half; index += 1) {
    const first = groups[index]
    const second = groups[groups.length - 1 - index]
    pairings.push([`1${first}`, `2${second}`])
    pairings.push([`1${second}`, `2${first}`])
  }
  pairings.push([`1${groups[half]}`, `2${groups[half]}`])
  return pairings
}

export function defaultFirstRoundPairings(format: TournamentFormat): Array<[string, string]> {
  const template = templates.find(
    (entry) =>
      entry.groups === format.groups.length &&
      entry.directQualifiersPerGroup === format.directQualifiersPerGroup &&
      entry.bestThirdSlots === format.bestThirdSlots
  )
  if (template) return template.pairings
  if (format.directQualifiersPerGroup === 2 && format.bestThirdSlots === 0) {
    return crossGroups(format)
  }
  return []
}

function parseSlot(code: string, issues: string[]): Placeholder | undefined {
  const parsed = parsePlaceholder(code)
  if (!parsed.ok) {
    issues.push(parsed.message)
    return undefined
  }
  return parsed.placeholder
}

function validateFirstRoundSlot(
  placeholder: Placeholder,
  format: TournamentFormat,
  usedPositions: Set<string>,
  issues: string[]
): void {
  const code = formatPlaceholder(placeholder)
  switch (placeholder.kind) {
    case 'group-position':
      if (!format.groups.includes(placeholder.group)) {
        issues.push(`Slot ${code} references unknown group ${placeholder.group}`)
      }
      if (placeholder.rank > format.directQualifiersPerGroup) {
        issues.push(`Slot ${code} ranks below the ${format.directQualifiersPerGroup} direct qualifiers`)
      }
      if (usedPositions.has(code)) issues.push(`Slot ${code} is used more than once`)
      usedPositions.add(code)
      return
    case 'third-place': {
      const unknownGroups = placeholder.candidateGroups.filter((group) => !format.groups.includes(group))
      if (unknownGroups.length > 0) {
        issues.push(`Slot ${code} lists unknown groups ${unknownGroups.join('')}`)
      }
      if (usedPositions.has(code)) issues.push(`Slot ${code} is used more than once`)
      usedPositions.add(code)
      return
    }
    case 'third-place-rank':
      if (placeholder.rank > format.bestThirdSlots) {
        issues.push(`Slot ${code} exceeds the ${format.bestThirdSlots} best-third slots`)
      }
      if (usedPositions.has(code)) issues.push(`Slot ${code} is used more than once`)
      usedPositions.add(code)
      return
    case 'match-winner':
    case 'match-loser':
      issues.push(`First-round slot ${code} cannot reference another match`)
  }
}

function isThirdPlaceSlot(placeholder: Placeholder): boolean {
  return placeholder.kind === 'third-place' || placeholder.kind === 'third-place-rank'
}

/**
 * Builds and validates the knockout fixtures for a format. Any inconsistency is a
 * setup error and throws `BracketTopologyError` with every issue found.
 */
export function buildBracketTopology(format: TournamentFormat): BracketTopology {
  const issues: string[] = []
  if (format.groups.length === 0) issues.push('Format has no groups')
  if (new Set(format.groups).size !== format.groups.length) issues.push('Format repeats a group label')
  if (format.bestThirdSlots > format.groups.length) {
    issues.push(`${format.bestThirdSlots} best-third slots exceed ${format.groups.length} groups`)
  }
  if (issues.length > 0) throw new BracketTopologyError(issues)

  const qualifyingTeams = qualifyingTeamCount(format)
  const rounds = generateKnockoutRounds(qualifyingTeams, groupStageMatchCount(format) + 1, {
    thirdPlaceMatch: format.thirdPlaceMatch
  })
  const pairings = format.firstRoundPairings ?? defaultFirstRoundPairings(format)
  const [firstRound] = rounds

  if (pairings.length !== firstRound.matchCount) {
    issues.push(
      `${firstRound.name} needs ${firstRound.matchCount} pairings, got ${pairings.length}`
    )
  }

  const fixtures: KnockoutFixture[] = []
  const usedPositions = new Set<string>()
  let thirdPlaceSlots = 0

  pairings.forEach(([homeSlot, awaySlot], index) => {
    const home = parseSlot(homeSlot, issues)
    const away = parseSlot(awaySlot, issues)
    if (!home || !away) return
    validateFirstRoundSlot(home, format, usedPositions, issues)
    validateFirstRoundSlot(away, format, usedPositions, issues)
    if (isThirdPlaceSlot(home)) thirdPlaceSlots += 1
    if (isThirdPlaceSlot(away)) thirdPlaceSlots += 1
    fixtures.push({
      number: firstRound.firstMatchNumber + index,
      stage: firstRound.stage,
      homeSlot: formatPlaceholder(home),
      awaySlot: formatPlaceholder(away),
      home,
      away
    })
  })

  if (thirdPlaceSlots !== format.bestThirdSlots) {
    issues.push(`Pairings use ${thirdPlaceSlots} best-third slots, format has ${format.bestThirdSlots}`)
  }

  const semiFinal = rounds.find((round) => round.stage === 'SF')
  for (let roundIndex = 1; roundIndex < rounds.length; roundIndex += 1) {
    const round = rounds[roundIndex]
    for (let offset = 0; offset < round.matchCount; offset += 1) {
      const number = round.firstMatchNumber + offset
      let home: Placeholder
      let away: Placeholder
      if ((round.stage === 'Third' || round.stage === 'Final') && semiFinal) {
        const kind = round.stage === 'Third' ? 'match-loser' : 'match-winner'
        home = { kind, matchNumber: semiFinal.firstMatchNumber }
        away = { kind, matchNumber: semiFinal.firstMatchNumber + 1 }
      } else {
        const previous = rounds[roundIndex - 1]
        home = { kind: 'match-winner', matchNumber: previous.firstMatchNumber + offset * 2 }
        away = { kind: 'match-winner', matchNumber: previous.firstMatchNumber + offset * 2 + 1 }
      }
      fixtures.push({
        number,
        stage: round.stage,
        homeSlot: formatPlaceholder(home),
        awaySlot: formatPlaceholder(away),
        home,
        away
      })
    }
  }

  const firstNumber = firstRound.firstMatchNumber
  for (const fixture of fixtures) {
    for (const placeholder of [fixture.home, fixture.away]) {
      const reference = referencedMatchNumber(placeholder)
      if (reference === undefined) continue
      if (reference < firstNumber || reference >= fixture.number) {
        issues.push(
          `Match ${fixture.number} references ${formatPlaceholder(placeholder)}, which is not an earlier knockout match`
        )
      }
    }
  }

  if (issues.length > 0) throw new BracketTopologyError(issues)

  return { format, qualifyingTeams, rounds, fixtures }
}
