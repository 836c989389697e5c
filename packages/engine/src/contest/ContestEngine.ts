/**
 * ContestEngine
 * Recurring entry-fee competitions. The admin opens a round, players pay per game and submit
 * scores to a ranked leaderboard, and the admin closes the round, which pays the top ranks out
 * of the prize pool through the payout splitter.
 *
 * Which entry flow, fee policy, admin cut and early-end rule apply comes from the ContestProfile.
 */
import { SessionStatus } from '@custodia/dto'
import type { CompetitionSession, Identity, PayoutLine, PlayerScore, SettlementReport, Timestamp } from '@custodia/dto'
import { splitPool } from '@custodia/math'
import { reject } from '@custodia/reasons'
import { SettlementEngine, isTimestamp, requireIdentity, requirePositive } from '../core/SettlementEngine'
import type { SettlementHost } from '../host/types'
import { requireOpen } from '../gate/deadlineGate'
import { Leaderboard } from '../leaderboard/Leaderboard'
import { advanceSession } from '../fsm/transitionExecutor'
import { ContestKeys as K } from '../store/keys'
import { CONTEST_PROFILES, ContestProfile, EntryFlow, assertProfile } from '../profiles'
import { logPayout } from '../utils/logger'
import { countSettled } from '../utils/metrics'

export class ContestEngine extends SettlementEngine {
  protected readonly engineName = 'contest' as const

  readonly profile: ContestProfile

  constructor(host: SettlementHost, profile: ContestProfile = CONTEST_PROFILES.classic) {
    super(host)
    this.profile = assertProfile(profile)
  }

  initialize(admin: Identity, tokenAddress: Identity): Promise<void> {
    return this.call({ op: 'initialize', actor: admin }, async () => {
      await this.requireCaller(admin)
      if (await this.state.has(K.admin)) throw reject('INIT_ALREADY_INITIALIZED')
      requireIdentity(admin, 'admin')
      requireIdentity(tokenAddress, 'tokenAddress')
      await this.state.set(K.admin, admin)
      await this.state.set(K.token, tokenAddress)
    })
  }

  createCompetition(admin: Identity, sessionId: number, deadline: Timestamp, entryFee: bigint): Promise<CompetitionSession> {
    return this.call({ op: 'create_competition', actor: admin }, async () => {
      await this.requireAdmin(admin)
      const prior = await this.state.get(K.session)
      if (prior?.status === SessionStatus.ACTIVE) {
        throw reject('SESSION_ALREADY_ACTIVE', { context: { sessionId: prior.sessionId } })
      }
      if (!Number.isSafeInteger(sessionId) || sessionId < 0) throw reject('INPUT_INVALID_SESSION', { context: { sessionId } })
      const now = await this.now()
      if (!isTimestamp(deadline) || deadline <= now) throw reject('INPUT_INVALID_DEADLINE', { context: { now, deadline } })
      requirePositive(entryFee, 'INPUT_INVALID_FEE')

      const session: CompetitionSession = {
        sessionId,
        entryFee,
        deadline,
        status: SessionStatus.ACTIVE,
        prizePool: 0n,
        totalPlayers: 0,
      }
      advanceSession({ sessionId, from: prior?.status ?? 'NONE', to: SessionStatus.ACTIVE })
      await this.state.set(K.session, session)
      await this.state.set(K.leaderboard, [])
      await this.state.set(K.paidPlayers, [])
      return session
    })
  }

  /** Only under the admin-updatable fee policy; applies to entries paid from now on. */
  updateEntryFee(admin: Identity, entryFee: bigint): Promise<bigint> {
    return this.call({ op: 'update_entry_fee', actor: admin }, async () => {
      await this.requireAdmin(admin)
      if (this.profile.feePolicy !== 'admin-updatable') {
        throw reject('PROFILE_OPERATION_DISABLED', { context: { op: 'update_entry_fee', profile: this.profile.name } })
      }
      requirePositive(entryFee, 'INPUT_INVALID_FEE')
      const session = await this.state.get(K.session)
      if (!session || session.status !== SessionStatus.ACTIVE) throw reject('SESSION_NOT_ACTIVE')
      await this.state.set(K.session, { ...session, entryFee })
      return entryFee
    })
  }

  /** Pay-then-submit flow, first half: pays one game's fee into the pool. */
  payEntryFee(player: Identity): Promise<bigint> {
    return this.call(
      { op: 'pay_entry_fee', actor: player },
      async () => {
        await this.requireCaller(player)
        requireIdentity(player, 'player')
        this.requireFlow('pay-then-submit', 'pay_entry_fee')
        const session = await this.requireOpenSession()
        const paid = await this.loadPaid()
        if (paid.has(player)) throw reject('ENTRY_ALREADY_PAID', { context: { player } })

        await this.move(player, this.host.custody, session.entryFee)

        await this.state.set(K.session, { ...session, prizePool: session.prizePool + session.entryFee })
        paid.add(player)
        await this.state.set(K.paidPlayers, [...paid])
        return session.entryFee
      },
      (fee) => fee
    )
  }

  /** Pay-then-submit flow, second half: consumes the pending entry and records the score. */
  submitScore(player: Identity, score: number): Promise<PlayerScore> {
    return this.call({ op: 'submit_score', actor: player }, async () => {
      await this.requireCaller(player)
      requireIdentity(player, 'player')
      this.requireFlow('pay-then-submit', 'submit_score')
      const session = await this.requireOpenSession()
      const paid = await this.loadPaid()
      if (!paid.has(player)) throw reject('ENTRY_PAYMENT_REQUIRED', { context: { player } })
      const board = await this.loadBoard()
      requireScore(board, player, score)

      const { row, isNew } = board.record(player, score)
      paid.delete(player)
      await this.state.set(K.paidPlayers, [...paid])
      await this.state.set(K.leaderboard, board.toArray())
      await this.state.set(K.session, { ...session, totalPlayers: session.totalPlayers + (isNew ? 1 : 0) })
      return row
    })
  }

  /** Pay-and-submit flow: one call pays the fee and records the score. */
  play(player: Identity, score: number): Promise<PlayerScore> {
    return this.call({ op: 'play', actor: player }, async () => {
      await this.requireCaller(player)
      requireIdentity(player, 'player')
      this.requireFlow('pay-and-submit', 'play')
      const session = await this.requireOpenSession()
      const board = await this.loadBoard()
      requireScore(board, player, score)

      await this.move(player, this.host.custody, session.entryFee)

      const { row, isNew } = board.record(player, score)
      await this.state.set(K.leaderboard, board.toArray())
      await this.state.set(K.session, {
        ...session,
        prizePool: session.prizePool + session.entryFee,
        totalPlayers: session.totalPlayers + (isNew ? 1 : 0),
      })
      return row
    })
  }

  /**
   * Closes the active round and pays out the top ranks.
   * Whatever the split leaves (truncation, fewer ranked players than tiers, or nobody ranked)
   * stays in custody and is reported as residue.
   */
  endCompetition(admin: Identity): Promise<SettlementReport> {
    return this.call({ op: 'end_competition', actor: admin }, async () => {
      const stored = await this.requireAdmin(admin)
      const session = await this.state.get(K.session)
      if (!session || session.status !== SessionStatus.ACTIVE) throw reject('SESSION_NOT_ACTIVE')
      const now = await this.now()
      if (!this.profile.allowEarlyEnd && now < session.deadline) {
        throw reject('GATE_DEADLINE_NOT_REACHED', { context: { now, deadline: session.deadline } })
      }

      const board = await this.loadBoard()
      const winners = board.top(this.profile.tierPercents.length)
      const pool = session.prizePool
      let adminFee = 0n
      const payouts: PayoutLine[] = []

      if (pool > 0n && winners.length > 0) {
        const plan = splitPool(pool, this.profile.adminFeePercent, this.profile.tierPercents, winners.length)
        adminFee = plan.adminFee
        if (adminFee > 0n) await this.move(this.host.custody, stored, adminFee)
        for (let i = 0; i < plan.shares.length; i++) {
          const amount = plan.shares[i]
          const recipient = winners[i].player
          if (amount > 0n) await this.move(this.host.custody, recipient, amount)
          payouts.push({ recipient, rank: winners[i].rank, amount })
        }
      }

      const distributed = payouts.reduce((acc, p) => acc + p.amount, adminFee)
      const residue = pool - distributed
      advanceSession({ sessionId: session.sessionId, from: SessionStatus.ACTIVE, to: SessionStatus.CLAIMED })
      await this.state.set(K.session, { ...session, status: SessionStatus.CLAIMED, prizePool: residue })

      if (adminFee > 0n) {
        logPayout({ engine: 'contest', kind: 'admin_fee', recipient: stored, amount: adminFee })
        countSettled('contest', 'admin_fee', adminFee)
      }
      for (const p of payouts) {
        logPayout({ engine: 'contest', kind: 'prize', recipient: p.recipient, amount: p.amount, rank: p.rank })
        countSettled('contest', 'prize', p.amount)
      }
      return { sessionId: session.sessionId, prizePool: pool, adminFee, payouts, residue }
    })
  }

  // ===== queries: no auth, never fail before initialization =====

  getCompetition(): Promise<CompetitionSession | undefined> {
    return this.state.get(K.session)
  }

  getLeaderboard(): Promise<PlayerScore[]> {
    return this.state.getOr(K.leaderboard, [])
  }

  async getPlayerStats(player: Identity): Promise<PlayerScore | undefined> {
    return (await this.loadBoard()).get(player)
  }

  async getEntryFee(): Promise<bigint> {
    return (await this.state.get(K.session))?.entryFee ?? 0n
  }

  async getPrizePool(): Promise<bigint> {
    return (await this.state.get(K.session))?.prizePool ?? 0n
  }

  getAdmin(): Promise<Identity | undefined> {
    return this.state.get(K.admin)
  }

  getTokenAddress(): Promise<Identity | undefined> {
    return this.state.get(K.token)
  }

  isInitialized(): Promise<boolean> {
    return this.state.has(K.admin)
  }

  async hasPaid(player: Identity): Promise<boolean> {
    return (await this.loadPaid()).has(player)
  }

  // ===== internals =====

  /** Authenticates `admin` and checks it against the stored admin; returns the stored admin. */
  private async requireAdmin(admin: Identity): Promise<Identity> {
    await this.requireCaller(admin)
    const stored = await this.state.get(K.admin)
    if (stored === undefined) throw reject('INIT_NOT_INITIALIZED')
    if (stored !== admin) throw reject('AUTH_UNAUTHORIZED', { message: 'Only admin can manage competitions', context: { caller: admin } })
    return stored
  }

  private requireFlow(flow: EntryFlow, op: string): void {
    if (this.profile.entryFlow !== flow) {
      throw reject('PROFILE_OPERATION_DISABLED', { context: { op, profile: this.profile.name } })
    }
  }

  private async requireOpenSession(): Promise<CompetitionSession> {
    const session = await this.state.get(K.session)
    if (!session || session.status !== SessionStatus.ACTIVE) throw reject('SESSION_NOT_ACTIVE')
    requireOpen(await this.now(), session.deadline, 'GATE_COMPETITION_ENDED')
    return session
  }

  private async loadPaid(): Promise<Set<Identity>> {
    return new Set(await this.state.getOr(K.paidPlayers, []))
  }

  private async loadBoard(): Promise<Leaderboard> {
    return new Leaderboard(await this.state.getOr(K.leaderboard, []))
  }
}

function requireScore(board: Leaderboard, player: Identity, score: number): void {
  const total = (board.get(player)?.totalScore ?? 0) + score
  if (!Number.isSafeInteger(score) || score < 0 || !Number.isSafeInteger(total)) {
    throw reject('INPUT_INVALID_SCORE', { context: { player, score } })
  }
}
