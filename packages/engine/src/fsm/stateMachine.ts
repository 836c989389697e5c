import { SessionStatus } from '@custodia/dto'

/** Session lifecycle; NONE is the state before the first competition is created. */
export type SessionPhase = 'NONE' | SessionStatus

export class SessionStateMachine {
  private ALLOWED: Record<SessionPhase, SessionPhase[]> = {
    NONE: [SessionStatus.ACTIVE],
    [SessionStatus.ACTIVE]: [SessionStatus.CLAIMED],
    // a claimed round may be replaced by a fresh one
    [SessionStatus.CLAIMED]: [SessionStatus.ACTIVE],
  }

  can(from: SessionPhase, to: SessionPhase): boolean {
    return this.ALLOWED[from].includes(to)
  }
}
