import process from 'node:process'

import { applyResolvedTeams, listUnresolvedSlots } from '../src/lib/bracket'
import { loadConfig } from '../src/lib/config'
import { DataStore } from '../src/lib/dataFiles'
import { buildCompetitionTeamStandings, buildLeaderboard } from '../src/lib/leaderboard'
import { sortMatches, validateMatch } from '../src/lib/matches'
import { collectThirdPlaceOrders, flattenPicksFile } from '../src/lib/picks'
import { refreshMatchPoints } from '../src/lib/scoring'
import { buildTournamentState, buildUserBracket, knockoutTeamsFor } from '../src/lib/tournament'
import { buildBracketTopology } from '../src/lib/topology'
import type { BracketResolution } from '../src/types/bracket'
import type { LeaderboardFile } from '../src/types/leaderboard'
import type { PicksFile } from '../src/types/picks'

function serializeResolution(resolution: BracketResolution) {
  return {
    slots: Object.fromEntries(
      [...resolution.slots.entries()].map(([code, team]) => [code, team?.id ?? null])
    ),
    fixtures: [...resolution.fixtures.values()].map((fixture) => ({
      number: fixture.number,
      stage: fixture.stage,
      homeSlot: fixture.homeSlot,
      awaySlot: fixture.awaySlot,
      homeTeam: fixture.homeTeam?.id ?? null,
      awayTeam: fixture.awayTeam?.id ?? null,
      winner: fixture.winner?.id ?? null
    }))
  }
}

async function main() {
  const config = loadConfig()
  const store = new DataStore(config.dataDir)

  const matchesFile = await store.readMatches()
  const membersFile = await store.readMembers()
  const picksFile = await store.readPicks()
  const scoring = await store.readScoring()
  const format = await store.readTournament()
  const seedingTable = await store.readSeedingTable()

  for (const issue of matchesFile.matches.flatMap(validateMatch)) {
    console.warn(issue.message)
  }

  const topology = buildBracketTopology(format)
  const tournament = buildTournamentState({
    matches: matchesFile.matches,
    teams: matchesFile.teams,
    topology,
    seedingTable
  })

  const matches = sortMatches(applyResolvedTeams(matchesFile.matches, tournament.resolution))

  const refreshedDocs: PicksFile['picks'] = picksFile.picks.map((doc) => {
    const { thirdPlace, resolution: predicted } = buildUserBracket({
      userId: doc.userId,
      picks: doc.picks,
      matches,
      teams: matchesFile.teams,
      topology,
      thirdPlaceOrder: doc.thirdPlaceOrder,
      seedingTable
    })
    if (thirdPlace.error) {
      console.warn(`${doc.userId}: ${thirdPlace.error.message}`)
    }
    const picks = matches.reduce(
      (current, match) =>
        refreshMatchPoints(match, current, () => knockoutTeamsFor(match, tournament.resolution, predicted), scoring),
      doc.picks
    )
    return { ...doc, picks }
  })
  await store.write('picks.json', { picks: refreshedDocs } satisfies PicksFile)

  const entries = buildLeaderboard({
    members: membersFile.members,
    matches,
    picks: flattenPicksFile({ picks: refreshedDocs }),
    scoring,
    teams: matchesFile.teams,
    topology,
    seedingTable,
    thirdPlaceOrders: collectThirdPlaceOrders(picksFile)
  })

  const output: LeaderboardFile = {
    lastUpdated: matchesFile.lastUpdated || new Date().toISOString(),
    entries,
    teams: buildCompetitionTeamStandings(membersFile.teams ?? [], entries)
  }
  await store.write('leaderboard.json', output)
  await store.write('bracket-resolution.json', serializeResolution(tournament.resolution))

  console.log(`Updated leaderboard.json (${entries.length} entries).`)
  console.log(`Unresolved bracket slots: ${listUnresolvedSlots(tournament.resolution).length}`)
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error)
  process.exitCode = 1
})
