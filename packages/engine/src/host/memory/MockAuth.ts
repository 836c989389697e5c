import type { Identity } from '@custodia/dto'
import { reject } from '@custodia/reasons'
import type { AuthGuard } from '../types'

/**
 * MockAuth
 * Stand-in for the host's signature check: an identity passes once authorized,
 * or every identity passes under allowAll().
 */
export class MockAuth implements AuthGuard {
  private authorized: Set<Identity> = new Set()
  private all = false

  authorize(...ids: Identity[]): this {
    for (const id of ids) this.authorized.add(id)
    return this
  }

  revoke(id: Identity): this {
    this.authorized.delete(id)
    return this
  }

  allowAll(on = true): this {
    this.all = on
    return this
  }

  async requireCaller(identity: Identity): Promise<void> {
    if (this.all || this.authorized.has(identity)) return
    throw reject('AUTH_UNAUTHORIZED', { context: { identity } })
  }
}
