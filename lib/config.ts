/**
 * Runtime configuration
 *
 * Read once from environment variables. Everything has a default so the dashboard
 * and the report script run without a .env file.
 */

import { z } from 'zod'
import { LOG_LEVEL_NAMES, type LogLevel } from '@/lib/logger'

export const DEFAULT_STATS_URL =
  'https://github.com/nflverse/nflverse-data/releases/download/stats_player/stats_player_week_{season}.csv'
export const DEFAULT_SCHEDULE_URL = 'https://github.com/nflverse/nfldata/raw/master/data/games.csv'

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v)

const optionalInt = z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional())

const EnvSchema = z.object({
  NFL_SEASON: optionalInt,
  NFL_WEEK: optionalInt,
  NFLVERSE_STATS_URL: z.string().url().optional(),
  NFLVERSE_SCHEDULE_URL: z.string().url().optional(),
  DATA_FETCH_TIMEOUT_MS: optionalInt,
  // also read directly by lib/logger
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVEL_NAMES).optional()),
})

export interface AppConfig {
  season: number
  week: number | null
  statsUrlTemplate: string
  scheduleUrlTemplate: string
  fetchTimeoutMs: number
  logLevel: LogLevel | null
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid environment configuration: ${issues}`)
  }
  const e = parsed.data
  return {
    season: e.NFL_SEASON ?? 2024,
    week: e.NFL_WEEK ?? null,
    statsUrlTemplate: e.NFLVERSE_STATS_URL ?? DEFAULT_STATS_URL,
    scheduleUrlTemplate: e.NFLVERSE_SCHEDULE_URL ?? DEFAULT_SCHEDULE_URL,
    fetchTimeoutMs: e.DATA_FETCH_TIMEOUT_MS ?? 20_000,
    logLevel: e.LOG_LEVEL ?? null,
  }
}

let cached: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig()
  return cached
}

/** Seasons offered in the dashboard selector, newest first */
export function availableSeasons(current: number, count = 3): number[] {
  return Array.from({ length: count }, (_, i) => current - i)
}
