/**
 * ReasonedRejection Error
 * Wraps a ReasonDetail so every failed call aborts with a deterministic, machine-parsable shape.
 * Engines throw it before any state is committed; hosts roll back on it.
 */
import { ReasonCode, ReasonDetail } from '@custodia/dto'
import { reason, ReasonOverrides } from './factory'

export class ReasonedRejection extends Error {
  public readonly reason: ReasonDetail

  constructor(detail: ReasonDetail) {
    super(detail.message)
    this.name = 'ReasonedRejection'
    this.reason = detail
  }

  get code(): ReasonCode {
    return this.reason.code
  }
}

export function reject(code: ReasonCode, overrides?: ReasonOverrides): ReasonedRejection {
  return new ReasonedRejection(reason(code, overrides))
}

export function isReasonedRejection(e: unknown): e is ReasonedRejection {
  return e instanceof ReasonedRejection
}

/**
 * Pass rejections through untouched; wrap anything else under `fallback`,
 * keeping the original message in context.
 */
export function toRejection(e: unknown, fallback: ReasonCode): ReasonedRejection {
  if (isReasonedRejection(e)) return e
  const cause = e instanceof Error ? e.message : String(e)
  return reject(fallback, { context: { cause } })
}
