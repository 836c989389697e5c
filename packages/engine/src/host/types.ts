/**
 * Host collaborators
 * The engines never prove identity, move tokens, persist state or read time themselves;
 * a host supplies these four collaborators and the engines only invoke them.
 */
import type { Identity, Timestamp } from '@custodia/dto'

export interface AuthGuard {
  /** Rejects with AUTH_UNAUTHORIZED unless the invoking party is proven to control `identity`. */
  requireCaller(identity: Identity): Promise<void>
}

export interface TransferReceipt {
  id: string
  from: Identity
  to: Identity
  amount: bigint
}

export interface TransferClient {
  /** Moves `amount` of the settlement asset; rejects if `from` cannot cover or authorize it. */
  transfer(from: Identity, to: Identity, amount: bigint): Promise<TransferReceipt>
}

export interface Clock {
  now(): Promise<Timestamp>
}

export interface KeyValueStore {
  get(key: string): Promise<unknown>
  set(key: string, value: unknown): Promise<void>
  has(key: string): Promise<boolean>
}

export interface SettlementHost {
  auth: AuthGuard
  token: TransferClient
  clock: Clock
  store: KeyValueStore
  /** The engine's own custody account on the token. */
  custody: Identity
  /**
   * Runs one entry point as a single atomic call: callbacks never interleave, and when the
   * callback rejects, no store write made inside it remains visible. Transfers are undone
   * too where the host's token takes part in the same transaction.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>
}
