/**
 * SettlementEngine
 * Shared call discipline for both engines:
 * - every mutating entry point runs inside host.transaction(), one at a time
 * - preconditions are checked before the first transfer; state is written only after transfers succeed
 * - any failure surfaces as a ReasonedRejection, logged once and counted by reason code
 */
import type { Identity } from '@custodia/dto'
import { reject, toRejection } from '@custodia/reasons'
import type { SettlementHost, TransferReceipt } from '../host/types'
import { IdentitySchema } from '../store/keys'
import { TypedStore } from '../store/TypedStore'
import { EngineName, logCall, logRejection } from '../utils/logger'
import { countCall, countRejection } from '../utils/metrics'

export interface CallInfo {
  op: string
  actor?: Identity
}

export abstract class SettlementEngine {
  protected abstract readonly engineName: EngineName
  protected readonly state: TypedStore

  constructor(protected readonly host: SettlementHost) {
    this.state = new TypedStore(host.store)
  }

  protected async call<T>(info: CallInfo, fn: () => Promise<T>, amountOf?: (result: T) => bigint): Promise<T> {
    try {
      const result = await this.host.transaction(fn)
      countCall(this.engineName, info.op)
      logCall({ engine: this.engineName, op: info.op, actor: info.actor, amount: amountOf?.(result) })
      return result
    } catch (e) {
      const rejection = toRejection(e, 'INTERNAL_ERROR')
      countRejection(this.engineName, rejection.code)
      logRejection({ engine: this.engineName, op: info.op, actor: info.actor, reason: rejection.reason })
      throw rejection
    }
  }

  /** Moves value through the host token; collaborator failures become TRANSFER_FAILED. */
  protected async move(from: Identity, to: Identity, amount: bigint): Promise<TransferReceipt> {
    try {
      return await this.host.token.transfer(from, to, amount)
    } catch (e) {
      throw toRejection(e, 'TRANSFER_FAILED')
    }
  }

  protected now(): Promise<number> {
    return this.host.clock.now()
  }

  protected requireCaller(identity: Identity): Promise<void> {
    return this.host.auth.requireCaller(identity)
  }
}

export function requirePositive(amount: bigint, code: 'INPUT_INVALID_AMOUNT' | 'INPUT_INVALID_FEE'): void {
  if (amount <= 0n) throw reject(code, { context: { amount: amount.toString() } })
}

/** Identities are persisted under IdentitySchema; anything it would refuse on read is refused here. */
export function requireIdentity(value: Identity, field: string): void {
  if (!IdentitySchema.safeParse(value).success) throw reject('INPUT_INVALID_IDENTITY', { context: { field } })
}

export function isTimestamp(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}
