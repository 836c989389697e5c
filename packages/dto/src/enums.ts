export enum SessionStatus {
  ACTIVE = "ACTIVE",
  CLAIMED = "CLAIMED",
}

export enum GateState {
  OPEN = "OPEN",
  CLOSED = "CLOSED",
}

export enum ReasonCategory {
  AUTH = "AUTH",
  INIT = "INIT",
  INPUT = "INPUT",
  GATE = "GATE",
  SETTLE = "SETTLE",
  SESSION = "SESSION",
  ENTRY = "ENTRY",
  PROFILE = "PROFILE",
  TRANSFER = "TRANSFER",
  CONFIG = "CONFIG",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "AUTH_UNAUTHORIZED"
  | "INIT_ALREADY_INITIALIZED"
  | "INIT_NOT_INITIALIZED"
  | "INPUT_INVALID_AMOUNT"
  | "INPUT_INVALID_FEE"
  | "INPUT_INVALID_DEADLINE"
  | "INPUT_INVALID_SCORE"
  | "INPUT_INVALID_SESSION"
  | "INPUT_INVALID_IDENTITY"
  | "GATE_CAMPAIGN_ENDED"
  | "GATE_CAMPAIGN_NOT_ENDED"
  | "GATE_COMPETITION_ENDED"
  | "GATE_DEADLINE_NOT_REACHED"
  | "SETTLE_GOAL_REACHED"
  | "SETTLE_NO_DONATION_FOUND"
  | "SETTLE_NOTHING_TO_SETTLE"
  | "SESSION_ALREADY_ACTIVE"
  | "SESSION_NOT_ACTIVE"
  | "ENTRY_ALREADY_PAID"
  | "ENTRY_PAYMENT_REQUIRED"
  | "PROFILE_OPERATION_DISABLED"
  | "TRANSFER_FAILED"
  | "TRANSFER_INSUFFICIENT_FUNDS"
  | "CONFIG_INVALID"
  | "INTERNAL_LEDGER_IMBALANCE"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  message: string;
  context?: Record<string, string | number | boolean>;
}
