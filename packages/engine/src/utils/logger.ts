import pino from 'pino'
import type { ReasonDetail } from '@custodia/dto'

export type EngineName = 'campaign' | 'contest'

type CallPayload = {
  engine: EngineName
  op: string
  actor?: string
  amount?: bigint
}

type RejectionPayload = {
  engine: EngineName
  op: string
  actor?: string
  reason: ReasonDetail
}

type SessionTransitionPayload = {
  sessionId: number
  from: string
  to: string
  ts?: string
}

type PayoutPayload = {
  engine: EngineName
  kind: 'refund' | 'admin_fee' | 'prize'
  recipient: string
  amount: bigint
  rank?: number
}

// create default logger; tests can replace via setLogger
let logger: pino.BaseLogger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.BaseLogger) {
  logger = l
}

export function getLogger(): pino.BaseLogger {
  return logger
}

// bigint is not JSON-serializable; amounts are logged as decimal strings
export function logCall(payload: CallPayload): void {
  logger.info({
    event: 'engine.call',
    engine: payload.engine,
    op: payload.op,
    actor: payload.actor,
    amount: payload.amount?.toString()
  })
}

export function logRejection(payload: RejectionPayload): void {
  logger.warn({
    event: 'engine.rejected',
    engine: payload.engine,
    op: payload.op,
    actor: payload.actor,
    code: payload.reason.code,
    category: payload.reason.category,
    context: payload.reason.context
  })
}

export function logSessionTransition(payload: SessionTransitionPayload): void {
  logger.info({
    event: 'session.transition',
    sessionId: payload.sessionId,
    from: payload.from,
    to: payload.to,
    ts: payload.ts ?? new Date().toISOString()
  })
}

export function logPayout(payload: PayoutPayload): void {
  logger.info({
    event: 'settlement.payout',
    engine: payload.engine,
    kind: payload.kind,
    recipient: payload.recipient,
    amount: payload.amount.toString(),
    rank: payload.rank
  })
}

export default logger
