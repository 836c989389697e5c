import { reject } from '@custodia/reasons'
import { SessionPhase, SessionStateMachine } from './stateMachine'
import { logSessionTransition } from '../utils/logger'
import { countTransition } from '../utils/metrics'

const sm = new SessionStateMachine()

/**
 * Checks a session move against the state machine, then records it.
 * Callers validate user-facing preconditions first; reaching an illegal edge here is a bug.
 */
export function advanceSession(opts: { sessionId: number; from: SessionPhase; to: SessionPhase }): SessionPhase {
  if (!sm.can(opts.from, opts.to)) {
    throw reject('INTERNAL_ERROR', {
      message: `illegal session transition ${opts.from} -> ${opts.to}`,
      context: { sessionId: opts.sessionId, from: opts.from, to: opts.to },
    })
  }
  logSessionTransition({ sessionId: opts.sessionId, from: opts.from, to: opts.to })
  countTransition(opts.from, opts.to)
  return opts.to
}
