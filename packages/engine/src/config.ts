// src/config.ts

/**
 * Centralized configuration module for environment variables.
 */

import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { z } from 'zod'
import { reject } from '@custodia/reasons'
import { ContestProfile, resolveProfile } from './profiles'

// Resolve repo root for both ts-jest (src) and built (dist/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const repoRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..', '..', '..')

export const ENV_FILE = '.env.custodia'

/** Load .env.custodia from the repo root, with cwd fallback. Existing variables win. */
export function loadEnvFile(): string | null {
  const candidates = [path.join(repoRoot, ENV_FILE), path.join(process.cwd(), ENV_FILE)]
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p })
      return p
    }
  }
  return null
}

const percent = z
  .string()
  .regex(/^\d+$/, 'must be a whole number')
  .transform((s) => BigInt(s))
  .refine((v) => v <= 100n, 'must be between 0 and 100')

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1')

export const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CONTEST_PROFILE: z.enum(['classic', 'open']).default('classic'),
  CONTEST_ADMIN_FEE_PERCENT: percent.optional(),
  CONTEST_PAYOUT_TIERS: z
    .string()
    .transform((s) => s.split(',').map((t) => t.trim()).filter(Boolean))
    .pipe(z.array(percent).min(1))
    .optional(),
  CONTEST_EARLY_END: booleanFlag.optional(),
  DATABASE_URL: z.string().url().optional(),
})

export type Env = z.infer<typeof EnvSchema>

export interface EngineConfig {
  env: Env
  contestProfile: ContestProfile
}

/**
 * Parse an environment record into an EngineConfig.
 * Unknown variables are ignored; any invalid value rejects with CONFIG_INVALID.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): EngineConfig {
  const res = EnvSchema.safeParse(source)
  if (!res.success) {
    const issue = res.error.issues[0]
    throw reject('CONFIG_INVALID', {
      message: `${issue.path.join('.')}: ${issue.message}`,
      context: { variable: issue.path.join('.') },
    })
  }
  const env = res.data
  const contestProfile = resolveProfile(env.CONTEST_PROFILE, {
    ...(env.CONTEST_ADMIN_FEE_PERCENT !== undefined ? { adminFeePercent: env.CONTEST_ADMIN_FEE_PERCENT } : {}),
    ...(env.CONTEST_PAYOUT_TIERS !== undefined ? { tierPercents: env.CONTEST_PAYOUT_TIERS } : {}),
    ...(env.CONTEST_EARLY_END !== undefined ? { allowEarlyEnd: env.CONTEST_EARLY_END } : {}),
  })
  return { env, contestProfile }
}
