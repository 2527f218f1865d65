import process from 'node:process'

import { loadConfig } from '../src/lib/config'
import { DataStore } from '../src/lib/dataFiles'
import { buildBracketTopology } from '../src/lib/topology'
import type { BracketFile } from '../src/types/bracket'

async function main() {
  const config = loadConfig()
  const store = new DataStore(config.dataDir)
  const format = await store.readTournament()
  const topology = buildBracketTopology(format)

  console.log(`${format.groups.length} groups, ${topology.qualifyingTeams} teams in the knockout stage`)
  for (const round of topology.rounds) {
    const lastMatch = round.firstMatchNumber + round.matchCount - 1
    console.log(`  ${round.name}: matches ${round.firstMatchNumber}-${lastMatch}`)
  }

  const output: BracketFile = {
    generatedAt: new Date().toISOString(),
    qualifyingTeams: topology.qualifyingTeams,
    rounds: topology.rounds,
    fixtures: topology.fixtures.map(({ number, stage, homeSlot, awaySlot }) => ({
      number,
      stage,
      homeSlot,
      awaySlot
    }))
  }
  await store.write('bracket.json', output)
  console.log(`Wrote bracket.json (${output.fixtures.length} fixtures).`)
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error)
  process.exitCode = 1
})
