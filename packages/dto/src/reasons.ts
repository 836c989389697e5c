import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // AUTH
  AUTH_UNAUTHORIZED: { code: 'AUTH_UNAUTHORIZED', category: ReasonCategory.AUTH, message: 'Caller failed identity proof for the required role' },

  // INIT
  INIT_ALREADY_INITIALIZED: { code: 'INIT_ALREADY_INITIALIZED', category: ReasonCategory.INIT, message: 'Already initialized' },
  INIT_NOT_INITIALIZED: { code: 'INIT_NOT_INITIALIZED', category: ReasonCategory.INIT, message: 'Not initialized' },

  // INPUT
  INPUT_INVALID_AMOUNT: { code: 'INPUT_INVALID_AMOUNT', category: ReasonCategory.INPUT, message: 'Amount must be positive' },
  INPUT_INVALID_FEE: { code: 'INPUT_INVALID_FEE', category: ReasonCategory.INPUT, message: 'Entry fee must be positive' },
  INPUT_INVALID_DEADLINE: { code: 'INPUT_INVALID_DEADLINE', category: ReasonCategory.INPUT, message: 'Deadline must be in the future' },
  INPUT_INVALID_SCORE: { code: 'INPUT_INVALID_SCORE', category: ReasonCategory.INPUT, message: 'Score must be a non-negative integer' },
  INPUT_INVALID_SESSION: { code: 'INPUT_INVALID_SESSION', category: ReasonCategory.INPUT, message: 'Session id must be a non-negative integer' },
  INPUT_INVALID_IDENTITY: { code: 'INPUT_INVALID_IDENTITY', category: ReasonCategory.INPUT, message: 'Identity must be a non-empty string' },

  // GATE
  GATE_CAMPAIGN_ENDED: { code: 'GATE_CAMPAIGN_ENDED', category: ReasonCategory.GATE, message: 'Campaign has ended' },
  GATE_CAMPAIGN_NOT_ENDED: { code: 'GATE_CAMPAIGN_NOT_ENDED', category: ReasonCategory.GATE, message: 'Campaign has not ended' },
  GATE_COMPETITION_ENDED: { code: 'GATE_COMPETITION_ENDED', category: ReasonCategory.GATE, message: 'Competition has ended' },
  GATE_DEADLINE_NOT_REACHED: { code: 'GATE_DEADLINE_NOT_REACHED', category: ReasonCategory.GATE, message: 'Deadline not reached' },

  // SETTLE
  SETTLE_GOAL_REACHED: { code: 'SETTLE_GOAL_REACHED', category: ReasonCategory.SETTLE, message: 'Goal reached, refunds are disabled' },
  SETTLE_NO_DONATION_FOUND: { code: 'SETTLE_NO_DONATION_FOUND', category: ReasonCategory.SETTLE, message: 'No donations found for this address' },
  SETTLE_NOTHING_TO_SETTLE: { code: 'SETTLE_NOTHING_TO_SETTLE', category: ReasonCategory.SETTLE, message: 'Nothing to settle' },

  // SESSION
  SESSION_ALREADY_ACTIVE: { code: 'SESSION_ALREADY_ACTIVE', category: ReasonCategory.SESSION, message: 'Competition already active' },
  SESSION_NOT_ACTIVE: { code: 'SESSION_NOT_ACTIVE', category: ReasonCategory.SESSION, message: 'Competition not active' },

  // ENTRY
  ENTRY_ALREADY_PAID: { code: 'ENTRY_ALREADY_PAID', category: ReasonCategory.ENTRY, message: 'Player has already paid for a game; submit score first' },
  ENTRY_PAYMENT_REQUIRED: { code: 'ENTRY_PAYMENT_REQUIRED', category: ReasonCategory.ENTRY, message: 'Player must pay entry fee before submitting score' },

  // PROFILE
  PROFILE_OPERATION_DISABLED: { code: 'PROFILE_OPERATION_DISABLED', category: ReasonCategory.PROFILE, message: 'Operation disabled by the contest profile' },

  // TRANSFER
  TRANSFER_FAILED: { code: 'TRANSFER_FAILED', category: ReasonCategory.TRANSFER, message: 'Token transfer failed' },
  TRANSFER_INSUFFICIENT_FUNDS: { code: 'TRANSFER_INSUFFICIENT_FUNDS', category: ReasonCategory.TRANSFER, message: 'Insufficient balance for transfer' },

  // CONFIG
  CONFIG_INVALID: { code: 'CONFIG_INVALID', category: ReasonCategory.CONFIG, message: 'Invalid configuration' },

  // INTERNAL
  INTERNAL_LEDGER_IMBALANCE: { code: 'INTERNAL_LEDGER_IMBALANCE', category: ReasonCategory.INTERNAL, message: 'Ledger does not reconcile with the aggregate' },
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, message: 'Internal error' },
}

export function getReason(code: ReasonCode): ReasonDetail {
  return REASONS[code]
}
