import pino from 'pino'
import { EngineConfig, loadConfig, loadEnvFile } from './config'
import { ContestEngine } from './contest/ContestEngine'
import { CampaignEngine } from './campaign/CampaignEngine'
import { PgHost, PgHostOptions } from './host/pg/PgHost'
import type { SettlementHost } from './host/types'
import { setLogger } from './utils/logger'

/**
 * Reads configuration and points the module logger at the configured level.
 * Without an explicit `source`, .env.custodia is loaded into process.env first.
 */
export function bootstrap(source?: NodeJS.ProcessEnv): EngineConfig {
  if (!source) loadEnvFile()
  const config = loadConfig(source ?? process.env)
  setLogger(pino({ level: config.env.LOG_LEVEL }))
  return config
}

export function createCampaignEngine(host: SettlementHost): CampaignEngine {
  return new CampaignEngine(host)
}

export function createContestEngine(host: SettlementHost, config: EngineConfig = loadConfig()): ContestEngine {
  return new ContestEngine(host, config.contestProfile)
}

/** Postgres-backed host when DATABASE_URL is configured; undefined otherwise. */
export async function createDurableHost(
  config: EngineConfig,
  opts: Omit<PgHostOptions, 'client'>
): Promise<PgHost | undefined> {
  if (!config.env.DATABASE_URL) return undefined
  return PgHost.connect(config.env.DATABASE_URL, opts)
}
