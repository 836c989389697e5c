/* Storage keys for the persisted engine state. Names are short and stable: renaming one
   orphans whatever a deployed store already holds under it. Each key carries the zod schema
   its value is parsed with on read. Collections keyed by identity are stored as arrays, never
   as objects, so any string is a usable identity. */

import { z } from 'zod'
import { SessionStatus } from '@custodia/dto'
import type { CompetitionSession, PlayerScore } from '@custodia/dto'

export interface StorageKey<T> {
  name: string
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
}

function storageKey<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): StorageKey<T> {
  return { name, schema }
}

export const IdentitySchema = z.string().min(1)
const identity = IdentitySchema
const timestamp = z.number().int().nonnegative()
const count = z.number().int().nonnegative()

export const PlayerScoreSchema: z.ZodType<PlayerScore, z.ZodTypeDef, unknown> = z.object({
  player: identity,
  totalGames: count,
  totalScore: count,
  rank: count,
})

export const CompetitionSessionSchema: z.ZodType<CompetitionSession, z.ZodTypeDef, unknown> = z.object({
  sessionId: count,
  entryFee: z.bigint(),
  deadline: timestamp,
  status: z.nativeEnum(SessionStatus),
  prizePool: z.bigint(),
  totalPlayers: count,
})

export const CampaignKeys = {
  owner: storageKey('owner', identity),
  goal: storageKey('goal', z.bigint()),
  deadline: storageKey('deadline', timestamp),
  totalRaised: storageKey('raised', z.bigint()),
  donations: storageKey('donations', z.array(z.tuple([identity, z.bigint()]))),
  token: storageKey('asset', identity),
  initialized: storageKey('is_init', z.boolean()),
}

export const ContestKeys = {
  admin: storageKey('admin', identity),
  token: storageKey('token', identity),
  session: storageKey('comp', CompetitionSessionSchema),
  leaderboard: storageKey('leader', z.array(PlayerScoreSchema)),
  paidPlayers: storageKey('paid', z.array(identity)),
}
