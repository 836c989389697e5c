import { SessionStatus } from './enums'

/** Opaque participant identity (an account address on the host). */
export type Identity = string

/** Unix timestamp in seconds, as reported by the host clock. */
export type Timestamp = number

export interface CampaignState {
  owner: Identity
  goal: bigint
  deadline: Timestamp
  tokenAddress: Identity
  totalRaised: bigint
  donations: Record<Identity, bigint>
  initialized: boolean
}

export interface CompetitionSession {
  sessionId: number
  entryFee: bigint
  deadline: Timestamp
  status: SessionStatus
  prizePool: bigint
  totalPlayers: number
}

export interface PlayerScore {
  player: Identity
  totalGames: number
  totalScore: number
  rank: number
}

export interface PayoutLine {
  recipient: Identity
  rank: number
  amount: bigint
}

export interface SettlementReport {
  sessionId: number
  prizePool: bigint
  adminFee: bigint
  payouts: PayoutLine[]
  residue: bigint
}
