/**
 * CampaignEngine
 * Single-round pooled funding: donations are accepted while the deadline gate is open; once it
 * closes with the goal missed, each donor can take back exactly what they put in, once.
 * Reaching the goal disables refunds; releasing funds to the owner is outside this engine.
 *
 * @example
 * ```typescript
 * const campaign = new CampaignEngine(host)
 * await campaign.initialize('owner', 100_000_000n, deadline, 'token')
 * await campaign.donate('alice', 25_000_000n)
 * await campaign.getProgressPercentage() // 25n
 * ```
 */
import type { CampaignState, Identity, Timestamp } from '@custodia/dto'
import { progressPercentage } from '@custodia/math'
import { reject } from '@custodia/reasons'
import { SettlementEngine, isTimestamp, requireIdentity, requirePositive } from '../core/SettlementEngine'
import { isOpen, requireClosed, requireOpen } from '../gate/deadlineGate'
import { Ledger } from '../ledger/Ledger'
import { CampaignKeys as K } from '../store/keys'
import { logPayout } from '../utils/logger'
import { countSettled } from '../utils/metrics'

export class CampaignEngine extends SettlementEngine {
  protected readonly engineName = 'campaign' as const

  initialize(owner: Identity, goal: bigint, deadline: Timestamp, tokenAddress: Identity): Promise<void> {
    return this.call({ op: 'initialize', actor: owner }, async () => {
      await this.requireCaller(owner)
      if (await this.state.getOr(K.initialized, false)) throw reject('INIT_ALREADY_INITIALIZED')
      requireIdentity(owner, 'owner')
      requireIdentity(tokenAddress, 'tokenAddress')
      requirePositive(goal, 'INPUT_INVALID_AMOUNT')
      if (!isTimestamp(deadline)) {
        throw reject('INPUT_INVALID_DEADLINE', { message: 'Deadline must be a unix timestamp', context: { deadline } })
      }

      await this.state.set(K.owner, owner)
      await this.state.set(K.goal, goal)
      await this.state.set(K.deadline, deadline)
      await this.state.set(K.totalRaised, 0n)
      await this.state.set(K.token, tokenAddress)
      await this.state.set(K.donations, [])
      await this.state.set(K.initialized, true)
    })
  }

  /** Returns the donor's accumulated contribution after this donation. */
  donate(donor: Identity, amount: bigint): Promise<bigint> {
    return this.call(
      { op: 'donate', actor: donor },
      async () => {
        await this.requireCaller(donor)
        requireIdentity(donor, 'donor')
        const s = await this.requireState()
        requireOpen(await this.now(), s.deadline, 'GATE_CAMPAIGN_ENDED')
        requirePositive(amount, 'INPUT_INVALID_AMOUNT')

        await this.move(donor, this.host.custody, amount)

        const ledger = new Ledger(s.donations)
        const balance = ledger.credit(donor, amount)
        await this.commit(ledger, s.totalRaised + amount)
        return balance
      },
      () => amount
    )
  }

  /** Returns the refunded amount. */
  refund(donor: Identity): Promise<bigint> {
    return this.call(
      { op: 'refund', actor: donor },
      async () => {
        await this.requireCaller(donor)
        requireIdentity(donor, 'donor')
        const s = await this.requireState()
        requireClosed(await this.now(), s.deadline, 'GATE_CAMPAIGN_NOT_ENDED')
        if (s.totalRaised >= s.goal) {
          throw reject('SETTLE_GOAL_REACHED', { context: { goal: s.goal.toString(), raised: s.totalRaised.toString() } })
        }
        const ledger = new Ledger(s.donations)
        const owed = ledger.read(donor)
        if (owed <= 0n) throw reject('SETTLE_NO_DONATION_FOUND', { context: { donor } })

        await this.move(this.host.custody, donor, owed)

        const refunded = ledger.debitToZero(donor)
        await this.commit(ledger, s.totalRaised - refunded)
        logPayout({ engine: 'campaign', kind: 'refund', recipient: donor, amount: refunded })
        countSettled('campaign', 'refund', refunded)
        return refunded
      },
      (refunded) => refunded
    )
  }

  // ===== queries: never fail before initialization =====

  getTotalRaised(): Promise<bigint> {
    return this.state.getOr(K.totalRaised, 0n)
  }

  async getDonation(donor: Identity): Promise<bigint> {
    return Ledger.fromEntries(await this.state.getOr(K.donations, [])).read(donor)
  }

  getGoal(): Promise<bigint> {
    return this.state.getOr(K.goal, 0n)
  }

  getDeadline(): Promise<Timestamp> {
    return this.state.getOr(K.deadline, 0)
  }

  getOwner(): Promise<Identity | undefined> {
    return this.state.get(K.owner)
  }

  getTokenAddress(): Promise<Identity | undefined> {
    return this.state.get(K.token)
  }

  isInitialized(): Promise<boolean> {
    return this.state.getOr(K.initialized, false)
  }

  async isGoalReached(): Promise<boolean> {
    if (!(await this.isInitialized())) return false
    return (await this.getTotalRaised()) >= (await this.getGoal())
  }

  async isEnded(): Promise<boolean> {
    if (!(await this.isInitialized())) return false
    return !isOpen(await this.now(), await this.getDeadline())
  }

  async getProgressPercentage(): Promise<bigint> {
    return progressPercentage(await this.getTotalRaised(), await this.getGoal())
  }

  async getState(): Promise<CampaignState | undefined> {
    if (!(await this.isInitialized())) return undefined
    return this.requireState()
  }

  // ===== internals =====

  private async requireState(): Promise<CampaignState> {
    const initialized = await this.state.getOr(K.initialized, false)
    const owner = await this.state.get(K.owner)
    const goal = await this.state.get(K.goal)
    const deadline = await this.state.get(K.deadline)
    const tokenAddress = await this.state.get(K.token)
    if (!initialized || owner === undefined || goal === undefined || deadline === undefined || tokenAddress === undefined) {
      throw reject('INIT_NOT_INITIALIZED')
    }
    return {
      owner,
      goal,
      deadline,
      tokenAddress,
      totalRaised: await this.state.getOr(K.totalRaised, 0n),
      donations: Object.fromEntries(await this.state.getOr(K.donations, [])),
      initialized,
    }
  }

  private async commit(ledger: Ledger, totalRaised: bigint): Promise<void> {
    if (!ledger.isBalanced(totalRaised)) {
      throw reject('INTERNAL_LEDGER_IMBALANCE', {
        context: { ledger: ledger.total().toString(), totalRaised: totalRaised.toString() },
      })
    }
    await this.state.set(K.donations, ledger.entries())
    await this.state.set(K.totalRaised, totalRaised)
  }
}
