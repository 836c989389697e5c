/* In-memory settlement asset: a balance sheet keyed by identity.
   mint() funds test accounts; transfer() is the only way value moves afterwards. */

import { ulid } from 'ulid'
import type { Identity } from '@custodia/dto'
import { reject } from '@custodia/reasons'
import type { TransferClient, TransferReceipt } from '../types'

export class MemoryToken implements TransferClient {
  private balances: Map<Identity, bigint> = new Map()
  private receipts: TransferReceipt[] = []

  constructor(public readonly address: Identity = 'token') {}

  mint(to: Identity, amount: bigint): void {
    this.balances.set(to, this.balanceOf(to) + amount)
  }

  balanceOf(id: Identity): bigint {
    return this.balances.get(id) ?? 0n
  }

  history(): readonly TransferReceipt[] {
    return this.receipts
  }

  async transfer(from: Identity, to: Identity, amount: bigint): Promise<TransferReceipt> {
    if (amount < 0n) throw reject('INPUT_INVALID_AMOUNT', { context: { amount: amount.toString() } })
    const available = this.balanceOf(from)
    if (available < amount) {
      throw reject('TRANSFER_INSUFFICIENT_FUNDS', {
        context: { from, available: available.toString(), amount: amount.toString() },
      })
    }
    this.balances.set(from, available - amount)
    this.balances.set(to, this.balanceOf(to) + amount)
    const receipt: TransferReceipt = { id: ulid(), from, to, amount }
    this.receipts.push(receipt)
    return receipt
  }

  snapshot(): { balances: Map<Identity, bigint>; receipts: number } {
    return { balances: new Map(this.balances), receipts: this.receipts.length }
  }

  restore(snap: { balances: Map<Identity, bigint>; receipts: number }): void {
    this.balances = new Map(snap.balances)
    this.receipts = this.receipts.slice(0, snap.receipts)
  }
}
