/**
 * Contest profiles
 * The competition contract shipped in two divergent variants. Rather than merging them,
 * each is a named profile and a deployment picks one (CONTEST_PROFILE).
 *
 * - classic: fixed fee per session, pay then submit as two calls, 10% admin cut before the
 *   50/30/20 split, admin may end the round at any time.
 * - open: admin may change the fee mid-session, one call pays and submits, no admin cut,
 *   the round can only be ended once its deadline is reached.
 */
import { validateSplit } from '@custodia/math'
import { reject } from '@custodia/reasons'

export type FeePolicy = 'fixed' | 'admin-updatable'
export type EntryFlow = 'pay-then-submit' | 'pay-and-submit'
export type ContestProfileName = 'classic' | 'open'

export interface ContestProfile {
  name: ContestProfileName
  feePolicy: FeePolicy
  entryFlow: EntryFlow
  adminFeePercent: bigint
  tierPercents: readonly bigint[]
  allowEarlyEnd: boolean
}

export const CONTEST_PROFILES: Record<ContestProfileName, ContestProfile> = {
  classic: {
    name: 'classic',
    feePolicy: 'fixed',
    entryFlow: 'pay-then-submit',
    adminFeePercent: 10n,
    tierPercents: [50n, 30n, 20n],
    allowEarlyEnd: true,
  },
  open: {
    name: 'open',
    feePolicy: 'admin-updatable',
    entryFlow: 'pay-and-submit',
    adminFeePercent: 0n,
    tierPercents: [50n, 30n, 20n],
    allowEarlyEnd: false,
  },
}

export type ProfileOverrides = Partial<Pick<ContestProfile, 'adminFeePercent' | 'tierPercents' | 'allowEarlyEnd'>>

/** Rejects a profile whose split could pay out more than the pool. */
export function assertProfile(profile: ContestProfile): ContestProfile {
  const problem = validateSplit(profile.adminFeePercent, profile.tierPercents)
  if (problem) {
    throw reject('CONFIG_INVALID', { message: problem, context: { profile: profile.name } })
  }
  return profile
}

/** Resolve a named profile with overrides applied. */
export function resolveProfile(name: ContestProfileName, overrides: ProfileOverrides = {}): ContestProfile {
  return assertProfile({ ...CONTEST_PROFILES[name], ...overrides })
}
