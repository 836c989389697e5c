/**
 * payout.ts
 * Pool distribution helpers for settlement; pure bigint functions only (no I/O, no side-effects).
 */

const max0 = (x: bigint) => (x < 0n ? 0n : x)

/**
 * percentOf
 * Truncating integer percentage: floor(amount * percent / 100) on the non-negative domain.
 */
export function percentOf(amount: bigint, percent: bigint): bigint {
  return (max0(amount) * max0(percent)) / 100n
}

export interface SplitPlan {
  adminFee: bigint
  shares: bigint[]
  residue: bigint
}

/**
 * splitPool
 * Takes the admin cut first, then splits the remainder across ranked recipients by tier.
 * Only min(recipientCount, tiers.length) shares are produced. Whatever truncation or missing
 * ranks leave behind is returned as `residue`; it is never redistributed.
 */
export function splitPool(
  pool: bigint,
  adminFeePercent: bigint,
  tierPercents: readonly bigint[],
  recipientCount: number
): SplitPlan {
  const p = max0(pool)
  const adminFee = percentOf(p, adminFeePercent)
  const remainder = p - adminFee
  const n = Math.max(0, Math.min(recipientCount, tierPercents.length))
  const shares: bigint[] = []
  for (let i = 0; i < n; i++) {
    shares.push(percentOf(remainder, tierPercents[i]))
  }
  const distributed = shares.reduce((acc, s) => acc + s, 0n)
  return { adminFee, shares, residue: remainder - distributed }
}

/**
 * validateSplit
 * Returns a human-readable problem, or null when the percentages can never pay out more than the pool.
 */
export function validateSplit(adminFeePercent: bigint, tierPercents: readonly bigint[]): string | null {
  if (adminFeePercent < 0n || adminFeePercent > 100n) return `admin fee percent out of range: ${adminFeePercent}`
  if (tierPercents.length === 0) return 'at least one payout tier is required'
  for (const t of tierPercents) {
    if (t < 0n) return `negative payout tier: ${t}`
  }
  const sum = tierPercents.reduce((acc, t) => acc + t, 0n)
  if (sum > 100n) return `payout tiers sum to ${sum}%`
  return null
}
