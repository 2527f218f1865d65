import { z } from 'zod'

const groupLabel = z.string().regex(/^[A-Z]$/)
const slotCode = z.string().min(2)
const side = z.enum(['HOME', 'AWAY'])
const goals = z.number().int().min(0)

export const TeamSchema = z.object({
  id: z.string().min(1),
  code: z.string().min(1),
  name: z.string().min(1),
  group: groupLabel.optional()
})

export const MatchSchema = z.object({
  id: z.string().min(1),
  number: z.number().int().positive(),
  stage: z.union([
    z.enum(['Group', 'QF', 'SF', 'Third', 'Final']),
    z.custom<`R${number}`>((value) => typeof value === 'string' && /^R\d+$/.test(value))
  ]),
  group: groupLabel.optional(),
  kickoffUtc: z.string().optional(),
  status: z.enum(['SCHEDULED', 'IN_PLAY', 'FINISHED']),
  homeTeam: TeamSchema.optional(),
  awayTeam: TeamSchema.optional(),
  homeSlot: slotCode.optional(),
  awaySlot: slotCode.optional(),
  score: z.object({ home: goals, away: goals }).optional(),
  winner: side.optional(),
  decidedBy: z.enum(['REG', 'ET', 'PENS']).optional()
})

export const MatchesFileSchema = z.object({
  lastUpdated: z.string(),
  teams: z.array(TeamSchema).default([]),
  matches: z.array(MatchSchema)
})

export const PickSchema = z.object({
  id: z.string().min(1),
  matchId: z.string().min(1),
  userId: z.string().min(1),
  homeScore: goals.optional(),
  awayScore: goals.optional(),
  outcome: z.enum(['WIN', 'DRAW', 'LOSS']).optional(),
  advances: side.optional(),
  pointsEarned: z.number().int().min(0).optional(),
  createdAt: z.string(),
  updatedAt: z.string()
})

export const UserPicksDocSchema = z.object({
  userId: z.string().min(1),
  picks: z.array(PickSchema),
  thirdPlaceOrder: z.array(z.string().min(1)).optional(),
  updatedAt: z.string()
})

export const PicksFileSchema = z.object({
  picks: z.array(UserPicksDocSchema)
})

export const MembersFileSchema = z.object({
  members: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      handle: z.string().optional(),
      email: z.string().optional(),
      isAdmin: z.boolean().optional()
    })
  ),
  teams: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().min(1),
        memberIds: z.array(z.string())
      })
    )
    .optional()
})

const stageScoring = z.object({
  outcome: z.number().int().min(0),
  exactScore: z.number().int().min(0)
})

export const ScoringConfigSchema = z.object({
  group: stageScoring,
  knockout: stageScoring
})

const pairing = z.tuple([slotCode, slotCode])

export const TournamentFormatSchema = z.object({
  groups: z.array(groupLabel).min(1),
  teamsPerGroup: z.number().int().min(2).default(4),
  directQualifiersPerGroup: z.number().int().min(1).default(2),
  bestThirdSlots: z.number().int().min(0).default(0),
  thirdPlaceMatch: z.boolean().default(true),
  firstRoundPairings: z.array(pairing).optional()
})

export const ThirdPlaceSeedingTableSchema = z.record(z.string(), z.record(z.string(), groupLabel))

export const BracketTemplatesSchema = z.object({
  templates: z.array(
    z.object({
      groups: z.number().int().positive(),
      directQualifiersPerGroup: z.number().int().positive(),
      bestThirdSlots: z.number().int().min(0),
      pairings: z.array(pairing)
    })
  )
})
