import { describe, expect, it } from 'vitest'

import {
  actualResults,
  computeAllGroupStandings,
  computeGroupStandings,
  predictedResults
} from './standings'
import type { Match, Team } from '../types/matches'
import type { Pick } from '../types/picks'

function team(id: string, group = 'A'): Team {
  return { id, code: id.toUpperCase(), name: `Team ${id}`, group }
}

const t1 = team('t1')
const t2 = team('t2')
const t3 = team('t3')
const t4 = team('t4')

function groupMatch(number: number, home: Team, away: Team, score?: [number, number]): Match {
  return {
    id: `m${number}`,
    number,
    stage: 'Group',
    group: home.group,
    status: score ? 'FINISHED' : 'SCHEDULED',
    homeTeam: home,
    awayTeam: away,
    score: score ? { home: score[0], away: score[1] } : undefined
  }
}

function buildPick(match: Match, homeScore: number, awayScore: number, userId = 'user-1'): Pick {
  return {
    id: `pick-${userId}-${match.id}`,
    matchId: match.id,
    userId,
    homeScore,
    awayScore,
    createdAt: '2026-06-01T00:00:00.000Z',
    updatedAt: '2026-06-01T00:00:00.000Z'
  }
}

const groupA = [
  groupMatch(1, t1, t2, [2, 0]),
  groupMatch(2, t3, t4, [1, 1]),
  groupMatch(3, t1, t3, [1, 1]),
  groupMatch(4, t2, t4, [0, 0]),
  groupMatch(5, t1, t4, [3, 0]),
  groupMatch(6, t2, t3, [1, 0])
]

describe('computeGroupStandings', () => {
  it('ranks a finished group by points then goal difference', () => {
    const rows = computeGroupStandings('A', groupA, actualResults(), [t1, t2, t3, t4])

    expect(rows.map((row) => row.team.id)).toEqual(['t1', 't2', 't3', 't4'])
    expect(rows.map((row) => row.points)).toEqual([7, 4, 2, 2])
    expect(rows[0]).toMatchObject({ played: 3, won: 2, drawn: 1, lost: 0, goalsFor: 6, goalsAgainst: 1, goalDiff: 5 })
    expect(rows[2]).toMatchObject({ goalsFor: 2, goalsAgainst: 3, goalDiff: -1, position: 3 })
    expect(rows[3]).toMatchObject({ goalsFor: 1, goalsAgainst: 4, goalDiff: -3, position: 4 })
  })

  it('breaks a points and goal difference tie on goals scored', () => {
    const matches = [
      groupMatch(1, t1, t2, [3, 3]),
      groupMatch(2, t3, t4, [1, 1])
    ]
    const rows = computeGroupStandings('A', matches, actualResults(), [t3, t4, t1, t2])
    expect(rows.map((row) => row.team.id)).toEqual(['t1', 't2', 't3', 't4'])
  })

  it('keeps roster order when teams are level on every criterion', () => {
    const matches = [groupMatch(1, t1, t2, [1, 1])]
    const rows = computeGroupStandings('A', matches, actualResults(), [t4, t2, t1, t3])
    expect(rows.map((row) => row.team.id)).toEqual(['t2', 't1', 't4', 't3'])
  })

  it('gives the same table when results swap without changing any team totals', () => {
    const original = [
      groupMatch(1, t1, t2, [1, 1]),
      groupMatch(2, t3, t4, [0, 0]),
      groupMatch(3, t1, t3, [2, 1]),
      groupMatch(4, t2, t4, [2, 1]),
      groupMatch(5, t1, t4, [0, 1]),
      groupMatch(6, t2, t3, [0, 1])
    ]
    const swapped = [
      groupMatch(1, t1, t2, [1, 1]),
      groupMatch(2, t3, t4, [0, 0]),
      groupMatch(3, t1, t3, [0, 1]),
      groupMatch(4, t2, t4, [0, 1]),
      groupMatch(5, t1, t4, [2, 1]),
      groupMatch(6, t2, t3, [2, 1])
    ]
    const before = computeGroupStandings('A', original, actualResults(), [t2, t1, t4, t3])
    const after = computeGroupStandings('A', swapped, actualResults(), [t2, t1, t4, t3])

    expect(before.map((row) => [row.team.id, row.points, row.goalsFor])).toEqual([
      ['t2', 4, 3],
      ['t1', 4, 3],
      ['t4', 4, 2],
      ['t3', 4, 2]
    ])
    expect(after).toEqual(before)
  })

  it('returns identical tables for identical input', () => {
    const first = computeGroupStandings('A', groupA, actualResults(), [t1, t2, t3, t4])
    const second = computeGroupStandings('A', groupA, actualResults(), [t1, t2, t3, t4])
    expect(second).toEqual(first)
  })

  it('ignores matches without a result', () => {
    const matches = [groupMatch(1, t1, t2, [1, 0]), groupMatch(2, t3, t4)]
    const rows = computeGroupStandings('A', matches, actualResults())
    expect(rows.find((row) => row.team.id === 't3')?.played).toBe(0)
    expect(rows).toHaveLength(4)
  })
})

describe('computeAllGroupStandings', () => {
  it('marks a group complete only when every match has a result', () => {
    const b1 = team('b1', 'B')
    const b2 = team('b2', 'B')
    const matches = [...groupA, groupMatch(7, b1, b2)]
    const summaries = computeAllGroupStandings(matches, actualResults(), [t1, t2, t3, t4, b1, b2])

    expect([...summaries.keys()]).toEqual(['A', 'B'])
    expect(summaries.get('A')?.complete).toBe(true)
    expect(summaries.get('B')?.complete).toBe(false)
  })

  it('builds standings from one user predictions', () => {
    const unplayed = groupA.map((match) => ({ ...match, status: 'SCHEDULED' as const, score: undefined }))
    const picks = [
      buildPick(unplayed[0], 0, 1),
      buildPick(unplayed[1], 2, 0),
      buildPick(unplayed[2], 0, 0),
      buildPick(unplayed[3], 1, 0),
      buildPick(unplayed[4], 0, 2),
      buildPick(unplayed[5], 2, 2),
      buildPick(unplayed[0], 5, 0, 'user-2')
    ]
    const summary = computeAllGroupStandings(unplayed, predictedResults(picks, 'user-1')).get('A')

    expect(summary?.complete).toBe(true)
    expect(summary?.standings.map((row) => [row.team.id, row.points])).toEqual([
      ['t2', 7],
      ['t3', 5],
      ['t4', 3],
      ['t1', 1]
    ])
  })
})
