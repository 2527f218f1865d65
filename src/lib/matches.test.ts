import { describe, expect, it } from 'vitest'

import { getWinnerSide, sortMatches, validateMatch } from './matches'
import type { Match } from '../types/matches'

function buildMatch(overrides: Partial<Match> = {}): Match {
  return {
    id: 'match-73',
    number: 73,
    stage: 'R32',
    status: 'FINISHED',
    homeTeam: { id: 'nor', code: 'NOR', name: 'Northwind' },
    awayTeam: { id: 'oak', code: 'OAK', name: 'Oakhurst' },
    score: { home: 1, away: 1 },
    winner: 'AWAY',
    decidedBy: 'PENS',
    ...overrides
  }
}

describe('getWinnerSide', () => {
  it('prefers the recorded winner over the score', () => {
    expect(getWinnerSide(buildMatch())).toBe('AWAY')
  })

  it('derives the winner from a decisive score', () => {
    expect(getWinnerSide(buildMatch({ winner: undefined, score: { home: 3, away: 1 } }))).toBe('HOME')
  })

  it('has no winner before the match is finished', () => {
    expect(getWinnerSide(buildMatch({ status: 'IN_PLAY' }))).toBeUndefined()
  })
})

describe('validateMatch', () => {
  it('accepts a shoot-out result', () => {
    expect(validateMatch(buildMatch())).toEqual([])
  })

  it('flags a finished match without a score', () => {
    expect(validateMatch(buildMatch({ score: undefined })).map((issue) => issue.code)).toEqual([
      'FINISHED_WITHOUT_SCORE'
    ])
  })

  it('flags a knockout draw without a winner', () => {
    expect(validateMatch(buildMatch({ winner: undefined })).map((issue) => issue.code)).toEqual([
      'FINISHED_WITHOUT_WINNER'
    ])
  })

  it('flags a winner that contradicts the score', () => {
    expect(validateMatch(buildMatch({ score: { home: 2, away: 0 } }))).toEqual([
      {
        code: 'WINNER_CONTRADICTS_SCORE',
        matchId: 'match-73',
        message: 'Match 73 winner AWAY contradicts score 2-0'
      }
    ])
  })
})

describe('sortMatches', () => {
  it('orders by match number', () => {
    const sorted = sortMatches([buildMatch({ number: 90 }), buildMatch({ number: 74 })])
    expect(sorted.map((match) => match.number)).toEqual([74, 90])
  })
})
