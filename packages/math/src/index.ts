/**
 * Custodia Math public surface. Pure, side-effect free helpers.
 */
export * from './payout'
export * from './progress'
