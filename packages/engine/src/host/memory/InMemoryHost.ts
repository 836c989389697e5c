/**
 * InMemoryHost
 * Bundles the in-process collaborators and gives each entry point transactional semantics:
 * calls run one at a time through a promise chain, and a rejected call restores the store
 * and token balances captured before it began.
 */
import type { Identity } from '@custodia/dto'
import type { SettlementHost } from '../types'
import { MemoryStore } from './MemoryStore'
import { MemoryToken } from './MemoryToken'
import { MockAuth } from './MockAuth'
import { ManualClock } from './ManualClock'

export interface InMemoryHostOptions {
  custody?: Identity
  now?: number
  token?: MemoryToken
}

export class InMemoryHost implements SettlementHost {
  readonly auth = new MockAuth()
  readonly store = new MemoryStore()
  readonly clock: ManualClock
  readonly token: MemoryToken
  readonly custody: Identity
  private tail: Promise<unknown> = Promise.resolve()

  constructor(opts: InMemoryHostOptions = {}) {
    this.custody = opts.custody ?? 'custody'
    this.clock = new ManualClock(opts.now ?? 0)
    this.token = opts.token ?? new MemoryToken()
  }

  transaction<T>(fn: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const storeSnap = this.store.snapshot()
      const tokenSnap = this.token.snapshot()
      try {
        return await fn()
      } catch (e) {
        this.store.restore(storeSnap)
        this.token.restore(tokenSnap)
        throw e
      }
    }
    const result = this.tail.then(run, run)
    // keep the chain alive past failures; the caller still sees the rejection through `result`
    this.tail = result.catch(() => undefined)
    return result
  }
}
