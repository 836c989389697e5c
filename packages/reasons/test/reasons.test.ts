import { REASONS, ReasonCategory, getReason } from '@custodia/dto'
import { reason } from '../src/factory'
import { ReasonedRejection, reject, isReasonedRejection, toRejection } from '../src/errors'

describe('reasons factory', () => {
  test('factory-defaults: exact match for canonical codes', () => {
    const r = reason('INPUT_INVALID_AMOUNT')
    expect(r).toEqual(REASONS.INPUT_INVALID_AMOUNT)
  })

  test('override-context: merges new message and context', () => {
    const r = reason('GATE_CAMPAIGN_ENDED', { message: 'custom', context: { now: 11, deadline: 10 } })
    expect(r.message).toBe('custom')
    expect(r.context).toEqual({ now: 11, deadline: 10 })
    expect(r.category).toBe(ReasonCategory.GATE)
  })

  test('getReason returns the registry entry the factory starts from', () => {
    expect(getReason('INPUT_INVALID_IDENTITY')).toEqual({
      code: 'INPUT_INVALID_IDENTITY',
      category: ReasonCategory.INPUT,
      message: 'Identity must be a non-empty string',
    })
    expect(reason('INPUT_INVALID_IDENTITY')).toEqual(getReason('INPUT_INVALID_IDENTITY'))
  })

  test('every registry entry is keyed by its own code', () => {
    for (const [key, detail] of Object.entries(REASONS)) {
      expect(detail.code).toBe(key)
    }
  })
})

describe('ReasonedRejection', () => {
  test('error-class-shape', () => {
    const err = reject('SETTLE_GOAL_REACHED', { context: { goal: '100' } })
    expect(err).toBeInstanceOf(Error)
    expect(err).toBeInstanceOf(ReasonedRejection)
    expect(err.code).toBe('SETTLE_GOAL_REACHED')
    expect(err.message).toBe(REASONS.SETTLE_GOAL_REACHED.message)
    expect(err.reason.context).toEqual({ goal: '100' })
    expect(isReasonedRejection(err)).toBe(true)
    expect(isReasonedRejection(new Error('x'))).toBe(false)
  })

  test('toRejection passes rejections through and wraps other errors', () => {
    const original = reject('ENTRY_ALREADY_PAID')
    expect(toRejection(original, 'TRANSFER_FAILED')).toBe(original)

    const wrapped = toRejection(new Error('insufficient balance'), 'TRANSFER_FAILED')
    expect(wrapped.code).toBe('TRANSFER_FAILED')
    expect(wrapped.reason.context).toEqual({ cause: 'insufficient balance' })

    expect(toRejection('boom', 'INTERNAL_ERROR').reason.context).toEqual({ cause: 'boom' })
  })
})
