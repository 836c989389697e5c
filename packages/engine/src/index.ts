/**
 * Custodia engine public surface.
 */
export * from './host/types'
export * from './host/memory'
export * from './host/pg'
export * from './store/keys'
export * from './store/TypedStore'
export * from './store/PgStore'
export * from './store/codec'
export * from './ledger/Ledger'
export * from './gate/deadlineGate'
export * from './leaderboard/Leaderboard'
export * from './fsm/stateMachine'
export * from './fsm/transitionExecutor'
export * from './core/SettlementEngine'
export * from './campaign/CampaignEngine'
export * from './contest/ContestEngine'
export * from './profiles'
export * from './config'
export * from './bootstrap'
export { setLogger, getLogger } from './utils/logger'
export { setRegistry, getRegistry } from './utils/metrics'
