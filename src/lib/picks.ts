import { isKnockoutMatch } from './matches'
import type { Match } from '../types/matches'
import type { Pick, PickInput, PickOutcome, PickWinner, PicksFile } from '../types/picks'

export function upsertPick(picks: Pick[], input: PickInput, now: string = new Date().toISOString()): Pick[] {
  const index = picks.findIndex(
    (pick) => pick.matchId === input.matchId && pick.userId === input.userId
  )
  const outcome = getOutcomeFromScores(input.homeScore, input.awayScore) ?? input.outcome

  if (index === -1) {
    const next: Pick = {
      id: `pick-${input.userId}-${input.matchId}`,
      matchId: input.matchId,
      userId: input.userId,
      homeScore: input.homeScore,
      awayScore: input.awayScore,
      outcome,
      advances: input.advances,
      createdAt: now,
      updatedAt: now
    }
    return [...picks, next]
  }

  const existing = picks[index]
  const updated: Pick = {
    ...existing,
    ...input,
    outcome,
    createdAt: existing.createdAt || now,
    updatedAt: now
  }
  const nextPicks = [...picks]
  nextPicks[index] = updated
  return nextPicks
}

export function hasPredictedScores(pick: Pick): pick is Pick & { homeScore: number; awayScore: number } {
  return typeof pick.homeScore === 'number' && typeof pick.awayScore === 'number'
}

export function getOutcomeFromScores(
  homeScore?: number,
  awayScore?: number
): PickOutcome | undefined {
  if (typeof homeScore !== 'number' || typeof awayScore !== 'number') return undefined
  if (homeScore > awayScore) return 'WIN'
  if (homeScore < awayScore) return 'LOSS'
  return 'DRAW'
}

export function getPickOutcome(pick: Pick): PickOutcome | undefined {
  return getOutcomeFromScores(pick.homeScore, pick.awayScore) ?? pick.outcome
}

export function getPredictedWinner(pick: Pick): PickWinner | undefined {
  const outcome = getPickOutcome(pick)
  if (outcome === 'WIN') return 'HOME'
  if (outcome === 'LOSS') return 'AWAY'
  if (pick.advances === 'HOME' || pick.advances === 'AWAY') return pick.advances
  return undefined
}

export function isPickComplete(match: Match, pick?: Pick): boolean {
  if (!pick || !hasPredictedScores(pick)) return false
  if (!isKnockoutMatch(match)) return true
  return getPredictedWinner(pick) !== undefined
}

export function flattenPicksFile(file: PicksFile): Pick[] {
  return file.picks.flatMap((doc) => doc.picks.map((pick) => ({ ...pick, userId: pick.userId || doc.userId })))
}

export function collectThirdPlaceOrders(file: PicksFile): Map<string, string[]> {
  const orders = new Map<string, string[]>()
  for (const doc of file.picks) {
    if (doc.thirdPlaceOrder) orders.set(doc.userId, doc.thirdPlaceOrder)
  }
  return orders
}

export function groupPicksByUser(picks: Pick[]): Map<string, Pick[]> {
  const byUser = new Map<string, Pick[]>()
  for (const pick of picks) {
    const list = byUser.get(pick.userId) ?? []
    list.push(pick)
    byUser.set(pick.userId, list)
  }
  return byUser
}

/**
 * One pick per match. When a feed repeats a user+match pair, the most recently
 * updated pick wins.
 */
export function indexPicksByMatch(picks: Pick[], userId?: string): Map<string, Pick> {
  const byMatch = new Map<string, Pick>()
  for (const pick of picks) {
    if (userId !== undefined && pick.userId !== userId) continue
    const existing = byMatch.get(pick.matchId)
    if (!existing) {
      byMatch.set(pick.matchId, pick)
      continue
    }
    if (new Date(pick.updatedAt).getTime() > new Date(existing.updatedAt).getTime()) {
      byMatch.set(pick.matchId, pick)
    }
  }
  return byMatch
}
