import { applicationDefault, getApps, initializeApp } from 'firebase-admin/app'
import { getFirestore, type DocumentReference, type Firestore } from 'firebase-admin/firestore'

import type { AppConfig } from './config'
import { DataFileError } from './dataFiles'
import { UserPicksDocSchema } from './schemas'
import { DEFAULT_SCORING, refreshMatchPoints, type KnockoutTeams } from './scoring'
import type { Match } from '../types/matches'
import type { Pick, UserPicksDoc } from '../types/picks'
import type { ScoringConfig } from '../types/scoring'

export interface PicksRepository {
  listUserPicks(): Promise<UserPicksDoc[]>
  saveUserPicks(docs: UserPicksDoc[]): Promise<void>
}

export function sanitizePick(pick: Pick, fallbackTimestamp: string): Pick {
  const cleaned: Pick = {
    id: pick.id,
    matchId: pick.matchId,
    userId: pick.userId,
    createdAt: pick.createdAt || fallbackTimestamp,
    updatedAt: pick.updatedAt || fallbackTimestamp
  }
  if (typeof pick.homeScore === 'number') cleaned.homeScore = pick.homeScore
  if (typeof pick.awayScore === 'number') cleaned.awayScore = pick.awayScore
  if (pick.advances === 'HOME' || pick.advances === 'AWAY') cleaned.advances = pick.advances
  if (pick.outcome) cleaned.outcome = pick.outcome
  if (typeof pick.pointsEarned === 'number') cleaned.pointsEarned = pick.pointsEarned
  return cleaned
}

export function connectFirestore(config: AppConfig): Firestore {
  if (!config.firebaseProjectId) {
    throw new Error('Set FIREBASE_PROJECT_ID before connecting to Firestore.')
  }
  if (getApps().length === 0) {
    initializeApp({ credential: applicationDefault(), projectId: config.firebaseProjectId })
  }
  const db = getFirestore()
  db.settings({ ignoreUndefinedProperties: true })
  return db
}

/** `leagues/{leagueId}/picks/{userId}` documents, each holding one user's picks. */
export class FirestorePicksRepository implements PicksRepository {
  constructor(
    private readonly db: Firestore,
    private readonly leagueId: string,
    private readonly chunkSize = 400
  ) {}

  private picksPath(): string {
    return `leagues/${this.leagueId}/picks`
  }

  async listUserPicks(): Promise<UserPicksDoc[]> {
    const snapshot = await this.db.collection(this.picksPath()).get()
    return snapshot.docs.map((doc) => {
      const parsed = UserPicksDocSchema.safeParse({ userId: doc.id, ...doc.data() })
      if (!parsed.success) {
        throw new DataFileError(
          `${this.picksPath()}/${doc.id}`,
          parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        )
      }
      return parsed.data
    })
  }

  async saveUserPicks(docs: UserPicksDoc[]): Promise<void> {
    const writes: Array<{ ref: DocumentReference; data: UserPicksDoc }> = docs.map((entry) => ({
      ref: this.db.doc(`${this.picksPath()}/${entry.userId}`),
      data: {
        userId: entry.userId,
        picks: entry.picks.map((pick) => sanitizePick(pick, entry.updatedAt)),
        thirdPlaceOrder: entry.thirdPlaceOrder,
        updatedAt: entry.updatedAt
      }
    }))

    for (let i = 0; i < writes.length; i += this.chunkSize) {
      const batch = this.db.batch()
      for (const { ref, data } of writes.slice(i, i + this.chunkSize)) {
        batch.set(ref, data, { merge: true })
      }
      await batch.commit()
    }
  }
}

export type SyncMatchPointsOptions = {
  repository: PicksRepository
  match: Match
  /** Teams of the match in the user's own predicted bracket. */
  teamsFor?: (entry: UserPicksDoc) => KnockoutTeams | undefined
  scoring?: ScoringConfig
  now?: string
}

export type SyncMatchPointsResult = {
  updatedUsers: number
  updatedPicks: number
}

/**
 * Recomputes one match's cached points for every user and writes back only the
 * documents whose points changed, in a single batched pass.
 */
export async function syncMatchPoints(options: SyncMatchPointsOptions): Promise<SyncMatchPointsResult> {
  const { repository, match, teamsFor, scoring = DEFAULT_SCORING } = options
  const now = options.now ?? new Date().toISOString()
  const docs = await repository.listUserPicks()

  const changed: UserPicksDoc[] = []
  let updatedPicks = 0
  for (const entry of docs) {
    const teams = teamsFor?.(entry)
    const refreshed = refreshMatchPoints(match, entry.picks, teams ? () => teams : undefined, scoring)
    const diff = refreshed.filter((pick, index) => pick.pointsEarned !== entry.picks[index].pointsEarned).length
    if (diff === 0) continue
    updatedPicks += diff
    changed.push({ ...entry, picks: refreshed, updatedAt: now })
  }

  if (changed.length > 0) await repository.saveUserPicks(changed)
  return { updatedUsers: changed.length, updatedPicks }
}
