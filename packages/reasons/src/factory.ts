/**
 * reason() factory
 * Merges a base registry entry with optional overrides.
 * Defaults come from the REASONS registry; overrides can change `message` and add `context`.
 * Adding new codes: extend REASONS in @custodia/dto. Keep codes stable once published.
 */
import { ReasonDetail, ReasonCode, getReason } from '@custodia/dto'

export type ReasonOverrides = Partial<Pick<ReasonDetail, 'message' | 'context'>>

export function reason(code: ReasonCode, overrides?: ReasonOverrides): ReasonDetail {
  const base = getReason(code)
  const context = { ...(base.context || {}), ...(overrides?.context || {}) }
  return {
    ...base,
    message: overrides?.message ?? base.message,
    context: Object.keys(context).length ? context : undefined,
  }
}
