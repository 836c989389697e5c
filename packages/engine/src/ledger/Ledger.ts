/**
 * Ledger
 * Per-participant balances plus a running aggregate. Balances are never negative and a
 * refunded participant keeps a zero entry, so history stays queryable.
 */
import type { Identity } from '@custodia/dto'
import { reject } from '@custodia/reasons'

export class Ledger {
  private balances: Map<Identity, bigint> = new Map()
  private aggregate = 0n

  constructor(entries: Record<Identity, bigint> = {}) {
    for (const [id, amount] of Object.entries(entries)) {
      if (amount < 0n) {
        throw reject('INTERNAL_LEDGER_IMBALANCE', { message: 'negative ledger balance', context: { id, amount: amount.toString() } })
      }
      this.balances.set(id, amount)
      this.aggregate += amount
    }
  }

  /** Builds a ledger from the persisted `[identity, balance]` pairs. */
  static fromEntries(entries: Iterable<readonly [Identity, bigint]>): Ledger {
    return new Ledger(Object.fromEntries(entries))
  }

  read(id: Identity): bigint {
    return this.balances.get(id) ?? 0n
  }

  /** Adds a positive amount; returns the participant's new balance. */
  credit(id: Identity, amount: bigint): bigint {
    if (amount <= 0n) throw reject('INPUT_INVALID_AMOUNT', { context: { amount: amount.toString() } })
    const next = this.read(id) + amount
    this.balances.set(id, next)
    this.aggregate += amount
    return next
  }

  /** Returns the whole balance and zeroes it in one step. */
  debitToZero(id: Identity): bigint {
    const amount = this.read(id)
    if (amount <= 0n) throw reject('SETTLE_NOTHING_TO_SETTLE', { context: { id } })
    this.balances.set(id, 0n)
    this.aggregate -= amount
    return amount
  }

  total(): bigint {
    return this.aggregate
  }

  isBalanced(expectedTotal: bigint): boolean {
    let sum = 0n
    for (const v of this.balances.values()) sum += v
    return sum === this.aggregate && sum === expectedTotal
  }

  entries(): Array<[Identity, bigint]> {
    return [...this.balances.entries()]
  }

  toRecord(): Record<Identity, bigint> {
    return Object.fromEntries(this.balances)
  }
}
