/**
 * Deadline gate
 * OPEN while now <= deadline, CLOSED once now > deadline: the deadline second itself is
 * still open. A CLAIMED session is CLOSED regardless of time.
 */
import { GateState, SessionStatus } from '@custodia/dto'
import type { ReasonCode, Timestamp } from '@custodia/dto'
import { reject } from '@custodia/reasons'

export function gate(now: Timestamp, deadline: Timestamp, status?: SessionStatus): GateState {
  if (status === SessionStatus.CLAIMED) return GateState.CLOSED
  return now <= deadline ? GateState.OPEN : GateState.CLOSED
}

export function isOpen(now: Timestamp, deadline: Timestamp): boolean {
  return gate(now, deadline) === GateState.OPEN
}

export function requireOpen(now: Timestamp, deadline: Timestamp, code: ReasonCode): void {
  if (!isOpen(now, deadline)) throw reject(code, { context: { now, deadline } })
}

export function requireClosed(now: Timestamp, deadline: Timestamp, code: ReasonCode): void {
  if (isOpen(now, deadline)) throw reject(code, { context: { now, deadline } })
}
