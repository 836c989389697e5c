/**
 * progressPercentage
 * (raised * 100) / goal with truncating division, unbounded above 100; 0 when goal is 0.
 */
export function progressPercentage(raised: bigint, goal: bigint): bigint {
  if (goal === 0n) return 0n
  return (raised * 100n) / goal
}
