import { describe, expect, it } from 'vitest'

import {
  collectThirdPlaceOrders,
  flattenPicksFile,
  getPickOutcome,
  getPredictedWinner,
  indexPicksByMatch,
  isPickComplete,
  upsertPick
} from './picks'
import type { Match } from '../types/matches'
import type { Pick } from '../types/picks'

function buildMatch(overrides: Partial<Match> = {}): Match {
  return {
    id: 'match-1',
    number: 1,
    stage: 'Group',
    group: 'A',
    kickoffUtc: '2026-06-11T19:00:00Z',
    status: 'SCHEDULED',
    homeTeam: { id: 'nor', code: 'NOR', name: 'Northwind' },
    awayTeam: { id: 'oak', code: 'OAK', name: 'Oakhurst' },
    ...overrides
  }
}

function buildPick(overrides: Partial<Pick> = {}): Pick {
  return {
    id: 'pick-user-1-match-1',
    matchId: 'match-1',
    userId: 'user-1',
    createdAt: '2026-06-01T00:00:00.000Z',
    updatedAt: '2026-06-01T00:00:00.000Z',
    ...overrides
  }
}

describe('picks auto derivation', () => {
  it('derives outcome from score input during upsert', () => {
    const picks = upsertPick(
      [],
      { matchId: 'match-1', userId: 'user-1', homeScore: 2, awayScore: 1 },
      '2026-06-02T00:00:00.000Z'
    )
    expect(picks).toHaveLength(1)
    expect(picks[0].id).toBe('pick-user-1-match-1')
    expect(picks[0].outcome).toBe('WIN')
    expect(picks[0].createdAt).toBe('2026-06-02T00:00:00.000Z')
    expect(getPickOutcome(picks[0])).toBe('WIN')
  })

  it('updates an existing pick and keeps its creation time', () => {
    const first = upsertPick(
      [],
      { matchId: 'match-1', userId: 'user-1', homeScore: 0, awayScore: 1 },
      '2026-06-02T00:00:00.000Z'
    )
    const second = upsertPick(
      first,
      { matchId: 'match-1', userId: 'user-1', homeScore: 2, awayScore: 2 },
      '2026-06-03T00:00:00.000Z'
    )
    expect(second).toHaveLength(1)
    expect(second[0].outcome).toBe('DRAW')
    expect(second[0].createdAt).toBe('2026-06-02T00:00:00.000Z')
    expect(second[0].updatedAt).toBe('2026-06-03T00:00:00.000Z')
  })

  it('requires advances for knockout draw picks', () => {
    const knockoutMatch = buildMatch({ stage: 'R16', group: undefined })
    const drawPick = buildPick({ homeScore: 1, awayScore: 1 })
    const withAdvances = buildPick({ homeScore: 1, awayScore: 1, advances: 'AWAY' })

    expect(isPickComplete(knockoutMatch, drawPick)).toBe(false)
    expect(isPickComplete(knockoutMatch, withAdvances)).toBe(true)
    expect(getPredictedWinner(withAdvances)).toBe('AWAY')
  })

  it('prefers the scoreline over a stale advances value', () => {
    expect(getPredictedWinner(buildPick({ homeScore: 0, awayScore: 2, advances: 'HOME' }))).toBe('AWAY')
  })
})

describe('pick indexing', () => {
  it('keeps the most recently updated pick per match', () => {
    const older = buildPick({ id: 'a', homeScore: 1, awayScore: 0, updatedAt: '2026-06-01T00:00:00.000Z' })
    const newer = buildPick({ id: 'b', homeScore: 0, awayScore: 0, updatedAt: '2026-06-05T00:00:00.000Z' })
    const other = buildPick({ id: 'c', userId: 'user-2', updatedAt: '2026-06-09T00:00:00.000Z' })

    const byMatch = indexPicksByMatch([newer, older, other], 'user-1')
    expect(byMatch.get('match-1')?.id).toBe('b')
  })

  it('fills in the user id from the document', () => {
    const picks = flattenPicksFile({
      picks: [
        {
          userId: 'user-3',
          updatedAt: '2026-06-01T00:00:00.000Z',
          picks: [buildPick({ userId: '' })]
        }
      ]
    })
    expect(picks[0].userId).toBe('user-3')
  })
})

describe('collectThirdPlaceOrders', () => {
  it('keys manual orders by user and skips users without one', () => {
    const orders = collectThirdPlaceOrders({
      picks: [
        { userId: 'user-1', picks: [], thirdPlaceOrder: ['b3', 'a3'], updatedAt: '2026-06-01T00:00:00.000Z' },
        { userId: 'user-2', picks: [], updatedAt: '2026-06-01T00:00:00.000Z' }
      ]
    })
    expect([...orders.entries()]).toEqual([['user-1', ['b3', 'a3']]])
  })
})
