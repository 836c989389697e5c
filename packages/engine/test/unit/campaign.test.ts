import { CampaignEngine } from '../../src/campaign/CampaignEngine'
import { BlockingToken, codeOf, makeHost, quietLogs } from '../helpers/host'

const NOW = 1_000
const DEADLINE = NOW + 86_400
const GOAL = 100_000_000n
const FUNDS = 1_000_000_000n

function setup() {
  const host = makeHost({ now: NOW, ids: ['owner', 'alice', 'bob'], funds: FUNDS })
  const campaign = new CampaignEngine(host)
  return { host, campaign }
}

async function started() {
  const ctx = setup()
  await ctx.campaign.initialize('owner', GOAL, DEADLINE, 'native')
  return ctx
}

describe('CampaignEngine', () => {
  beforeAll(quietLogs)

  describe('queries before initialize', () => {
    it('return defaults instead of failing', async () => {
      const { campaign } = setup()
      expect(await campaign.getTotalRaised()).toBe(0n)
      expect(await campaign.getDonation('alice')).toBe(0n)
      expect(await campaign.getGoal()).toBe(0n)
      expect(await campaign.getDeadline()).toBe(0)
      expect(await campaign.isGoalReached()).toBe(false)
      expect(await campaign.isEnded()).toBe(false)
      expect(await campaign.getProgressPercentage()).toBe(0n)
      expect(await campaign.isInitialized()).toBe(false)
      expect(await campaign.getOwner()).toBeUndefined()
      expect(await campaign.getState()).toBeUndefined()
    })
  })

  describe('initialize', () => {
    it('stores the campaign settings once', async () => {
      const { campaign } = await started()
      expect(await campaign.isInitialized()).toBe(true)
      expect(await campaign.getGoal()).toBe(GOAL)
      expect(await campaign.getDeadline()).toBe(DEADLINE)
      expect(await campaign.getOwner()).toBe('owner')
      expect(await campaign.getTokenAddress()).toBe('native')
      expect(await campaign.getState()).toEqual({
        owner: 'owner',
        goal: GOAL,
        deadline: DEADLINE,
        tokenAddress: 'native',
        totalRaised: 0n,
        donations: {},
        initialized: true,
      })
      expect(await codeOf(campaign.initialize('owner', 5n, DEADLINE, 'native'))).toBe('INIT_ALREADY_INITIALIZED')
      expect(await campaign.getGoal()).toBe(GOAL)
    })

    it('refuses empty identities so queries keep working', async () => {
      const { host, campaign } = setup()
      host.auth.allowAll()
      expect(await codeOf(campaign.initialize('owner', GOAL, DEADLINE, ''))).toBe('INPUT_INVALID_IDENTITY')
      expect(await codeOf(campaign.initialize('', GOAL, DEADLINE, 'native'))).toBe('INPUT_INVALID_IDENTITY')
      expect(await campaign.isInitialized()).toBe(false)
      expect(await campaign.getTokenAddress()).toBeUndefined()

      await campaign.initialize('owner', GOAL, DEADLINE, 'native')
      expect(await codeOf(campaign.donate('', 1n))).toBe('INPUT_INVALID_IDENTITY')
      expect(await campaign.getTotalRaised()).toBe(0n)
    })

    it('requires the owner to authenticate', async () => {
      const { campaign } = setup()
      expect(await codeOf(campaign.initialize('stranger', GOAL, DEADLINE, 'native'))).toBe('AUTH_UNAUTHORIZED')
      expect(await campaign.isInitialized()).toBe(false)
    })

    it('rejects a non-positive goal and a malformed deadline', async () => {
      const { campaign } = setup()
      expect(await codeOf(campaign.initialize('owner', 0n, DEADLINE, 'native'))).toBe('INPUT_INVALID_AMOUNT')
      expect(await codeOf(campaign.initialize('owner', GOAL, -1, 'native'))).toBe('INPUT_INVALID_DEADLINE')
      expect(await codeOf(campaign.initialize('owner', GOAL, 1.5, 'native'))).toBe('INPUT_INVALID_DEADLINE')
      expect(await campaign.isInitialized()).toBe(false)
    })
  })

  describe('donate', () => {
    it('moves funds into custody and credits the donor', async () => {
      const { host, campaign } = await started()
      expect(await campaign.donate('alice', 25_000_000n)).toBe(25_000_000n)
      expect(await campaign.donate('alice', 5_000_000n)).toBe(30_000_000n)
      expect(await campaign.getDonation('alice')).toBe(30_000_000n)
      expect(await campaign.getTotalRaised()).toBe(30_000_000n)
      expect(host.token.balanceOf('alice')).toBe(FUNDS - 30_000_000n)
      expect(host.token.balanceOf(host.custody)).toBe(30_000_000n)
    })

    it('keeps totalRaised equal to the sum of donations', async () => {
      const { campaign } = await started()
      await campaign.donate('alice', 10n)
      await campaign.donate('bob', 20n)
      await campaign.donate('alice', 5n)
      const state = await campaign.getState()
      expect(state?.donations).toEqual({ alice: 15n, bob: 20n })
      expect(state?.totalRaised).toBe(35n)
    })

    it('is open at the deadline and closed one second later', async () => {
      const { host, campaign } = await started()
      host.clock.set(DEADLINE)
      await expect(campaign.donate('alice', 1n)).resolves.toBe(1n)
      host.clock.set(DEADLINE + 1)
      expect(await codeOf(campaign.donate('alice', 1n))).toBe('GATE_CAMPAIGN_ENDED')
      expect(await campaign.getTotalRaised()).toBe(1n)
    })

    it('books donors named like object members', async () => {
      const { host, campaign } = await started()
      for (const id of ['constructor', 'toString', '__proto__']) {
        host.auth.authorize(id)
        host.token.mint(id, FUNDS)
        expect(await campaign.getDonation(id)).toBe(0n)
        expect(await campaign.donate(id, 10n)).toBe(10n)
      }
      await campaign.donate('__proto__', 5n)
      expect(await campaign.getDonation('__proto__')).toBe(15n)
      expect(await campaign.getTotalRaised()).toBe(35n)

      host.clock.set(DEADLINE + 1)
      expect(await campaign.refund('__proto__')).toBe(15n)
      expect(await campaign.getTotalRaised()).toBe(20n)
    })

    it('rejects non-positive amounts', async () => {
      const { campaign } = await started()
      expect(await codeOf(campaign.donate('alice', 0n))).toBe('INPUT_INVALID_AMOUNT')
      expect(await codeOf(campaign.donate('alice', -10n))).toBe('INPUT_INVALID_AMOUNT')
      expect(await campaign.getTotalRaised()).toBe(0n)
    })

    it('requires initialization and the donor signature', async () => {
      const { campaign } = setup()
      expect(await codeOf(campaign.donate('alice', 1n))).toBe('INIT_NOT_INITIALIZED')
      await campaign.initialize('owner', GOAL, DEADLINE, 'native')
      expect(await codeOf(campaign.donate('mallory', 1n))).toBe('AUTH_UNAUTHORIZED')
    })

    it('leaves no trace when the transfer fails', async () => {
      const { host, campaign } = await started()
      expect(await codeOf(campaign.donate('alice', FUNDS + 1n))).toBe('TRANSFER_INSUFFICIENT_FUNDS')
      expect(await campaign.getDonation('alice')).toBe(0n)
      expect(await campaign.getTotalRaised()).toBe(0n)
      expect(host.token.balanceOf('alice')).toBe(FUNDS)
    })

    it('maps collaborator errors to TRANSFER_FAILED', async () => {
      const host = makeHost({ now: NOW, ids: ['owner', 'alice'], funds: FUNDS, token: new BlockingToken('alice') })
      const campaign = new CampaignEngine(host)
      await campaign.initialize('owner', GOAL, DEADLINE, 'native')
      expect(await codeOf(campaign.donate('alice', 1n))).toBe('TRANSFER_FAILED')
      expect(await campaign.getTotalRaised()).toBe(0n)
    })
  })

  describe('progress', () => {
    it('reports truncated percentage without capping at 100', async () => {
      const { campaign } = await started()
      await campaign.donate('alice', 25_000_000n)
      expect(await campaign.getProgressPercentage()).toBe(25n)
      await campaign.donate('bob', 75_000_000n)
      expect(await campaign.getProgressPercentage()).toBe(100n)
      expect(await campaign.isGoalReached()).toBe(true)
      await campaign.donate('alice', 20_000_000n)
      expect(await campaign.getProgressPercentage()).toBe(120n)
    })
  })

  describe('refund', () => {
    it('returns the full donation once the deadline passes with the goal missed', async () => {
      const { host, campaign } = await started()
      await campaign.donate('alice', 30_000_000n)
      host.clock.set(DEADLINE + 1)
      expect(await campaign.isEnded()).toBe(true)

      expect(await campaign.refund('alice')).toBe(30_000_000n)
      expect(await campaign.getDonation('alice')).toBe(0n)
      expect(await campaign.getTotalRaised()).toBe(0n)
      expect(host.token.balanceOf('alice')).toBe(FUNDS)
      expect(host.token.balanceOf(host.custody)).toBe(0n)
    })

    it('never pays the same donor twice', async () => {
      const { host, campaign } = await started()
      await campaign.donate('alice', 30_000_000n)
      await campaign.donate('bob', 10_000_000n)
      host.clock.set(DEADLINE + 1)
      await campaign.refund('alice')
      expect(await codeOf(campaign.refund('alice'))).toBe('SETTLE_NO_DONATION_FOUND')
      expect(host.token.balanceOf('alice')).toBe(FUNDS)
      expect(host.token.balanceOf(host.custody)).toBe(10_000_000n)
      expect(await campaign.getTotalRaised()).toBe(10_000_000n)
      expect((await campaign.getState())?.donations).toEqual({ alice: 0n, bob: 10_000_000n })
    })

    it('is refused while the campaign is still open, including at the deadline', async () => {
      const { host, campaign } = await started()
      await campaign.donate('alice', 1n)
      expect(await codeOf(campaign.refund('alice'))).toBe('GATE_CAMPAIGN_NOT_ENDED')
      host.clock.set(DEADLINE)
      expect(await codeOf(campaign.refund('alice'))).toBe('GATE_CAMPAIGN_NOT_ENDED')
      expect(await campaign.isEnded()).toBe(false)
    })

    it('is refused once the goal was reached', async () => {
      const { host, campaign } = await started()
      await campaign.donate('alice', GOAL)
      host.clock.set(DEADLINE + 1)
      expect(await codeOf(campaign.refund('alice'))).toBe('SETTLE_GOAL_REACHED')
      expect(await campaign.getDonation('alice')).toBe(GOAL)
    })

    it('is refused for addresses that never donated or did not sign', async () => {
      const { host, campaign } = await started()
      await campaign.donate('alice', 1n)
      host.clock.set(DEADLINE + 1)
      expect(await codeOf(campaign.refund('bob'))).toBe('SETTLE_NO_DONATION_FOUND')
      expect(await codeOf(campaign.refund('mallory'))).toBe('AUTH_UNAUTHORIZED')
    })

    it('keeps the donation on record when paying the refund fails', async () => {
      const token = new BlockingToken()
      const host = makeHost({ now: NOW, ids: ['owner', 'alice'], funds: FUNDS, token })
      const campaign = new CampaignEngine(host)
      await campaign.initialize('owner', GOAL, DEADLINE, 'native')
      await campaign.donate('alice', 7n)
      host.clock.set(DEADLINE + 1)

      token.blocked = 'alice'
      expect(await codeOf(campaign.refund('alice'))).toBe('TRANSFER_FAILED')
      expect(await campaign.getDonation('alice')).toBe(7n)
      expect(await campaign.getTotalRaised()).toBe(7n)

      token.blocked = undefined
      expect(await campaign.refund('alice')).toBe(7n)
      expect(token.balanceOf('alice')).toBe(FUNDS)
    })
  })
})
