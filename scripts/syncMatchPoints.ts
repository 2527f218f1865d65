import fs from 'node:fs/promises'
import process from 'node:process'

import { loadConfig } from '../src/lib/config'
import { DataStore } from '../src/lib/dataFiles'
import { connectFirestore, FirestorePicksRepository, syncMatchPoints } from '../src/lib/firestorePoints'
import { buildTournamentState, buildUserBracket, knockoutTeamsFor } from '../src/lib/tournament'
import { buildBracketTopology } from '../src/lib/topology'

function parseArgs() {
  const parsed = { matchId: '' }
  for (const arg of process.argv.slice(2)) {
    if (!arg.startsWith('--')) continue
    const [rawKey, rawValue] = arg.slice(2).split('=')
    if (rawKey.trim() === 'match') parsed.matchId = (rawValue ?? '').trim()
  }
  return parsed
}

async function main() {
  const args = parseArgs()
  if (!args.matchId) {
    throw new Error('Usage: points:sync --match=<match id>')
  }

  const config = loadConfig()
  if (!config.credentialsPath) {
    throw new Error('Set GOOGLE_APPLICATION_CREDENTIALS to your service account JSON before syncing.')
  }
  try {
    await fs.access(config.credentialsPath)
  } catch {
    throw new Error(`Service account JSON not found at ${config.credentialsPath}.`)
  }

  const store = new DataStore(config.dataDir)
  const matchesFile = await store.readMatches()
  const scoring = await store.readScoring()
  const format = await store.readTournament()
  const seedingTable = await store.readSeedingTable()

  const match = matchesFile.matches.find((entry) => entry.id === args.matchId)
  if (!match) throw new Error(`Match ${args.matchId} not found in matches.json.`)

  const topology = buildBracketTopology(format)
  const { resolution } = buildTournamentState({
    matches: matchesFile.matches,
    teams: matchesFile.teams,
    topology,
    seedingTable
  })

  const db = connectFirestore(config)
  const repository = new FirestorePicksRepository(db, config.leagueId)
  const result = await syncMatchPoints({
    repository,
    match,
    scoring,
    teamsFor: (entry) => {
      const predicted = buildUserBracket({
        userId: entry.userId,
        picks: entry.picks,
        matches: matchesFile.matches,
        teams: matchesFile.teams,
        topology,
        thirdPlaceOrder: entry.thirdPlaceOrder,
        seedingTable
      }).resolution
      return knockoutTeamsFor(match, resolution, predicted)
    }
  })

  console.log(`League: ${config.leagueId}`)
  console.log(`Match: ${match.id} (#${match.number})`)
  console.log(`Users updated: ${result.updatedUsers}`)
  console.log(`Picks updated: ${result.updatedPicks}`)
  await db.terminate()
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error)
  process.exitCode = 1
})
