import { NextResponse } from 'next/server'
import { z } from 'zod'
import { getConfig } from '@/lib/config'
import { getDataProvider, type DataProvider } from '@/lib/data-provider'
import type { Logger } from '@/lib/logger'
import { StatsError, isStatsError, toErrorPayload } from '@/lib/stats/errors'
import { latestWeek } from '@/lib/stats/scope'
import type { StatRecord } from '@/lib/stats/types'

export const seasonParam = z.coerce.number().int().min(1999).max(2100).optional()
export const weekParam = z.coerce.number().int().min(1).max(22).optional()

/**
 * Validate query-string parameters against a zod schema
 *
 * @throws StatsError BAD_REQUEST with the zod issues as details
 */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, req: Request): z.infer<S> {
  const { searchParams } = new URL(req.url)
  const parsed = schema.safeParse(Object.fromEntries(searchParams))
  if (!parsed.success) {
    throw new StatsError('BAD_REQUEST', 'Invalid request', { details: parsed.error.issues })
  }
  return parsed.data
}

export function errorResponse(err: unknown, log: Logger): NextResponse {
  const payload = toErrorPayload(err)
  if (isStatsError(err) && err.status < 500) {
    log.debug('Rejected request', { code: err.code, message: err.message })
  } else {
    log.error('Request failed', err)
  }
  return NextResponse.json(payload, { status: payload.status ?? 500 })
}

export interface SeasonContext {
  provider: DataProvider
  season: number
  week: number
  records: StatRecord[]
}

/**
 * Load a season's stat lines and settle the week: explicit param, then NFL_WEEK,
 * then the latest week present in the data.
 */
export async function loadSeason(season?: number, week?: number): Promise<SeasonContext> {
  const config = getConfig()
  const provider = getDataProvider()
  const resolvedSeason = season ?? config.season
  const records = await provider.fetchSeasonStats(resolvedSeason)
  const resolvedWeek = week ?? config.week ?? latestWeek(records) ?? 1
  return { provider, season: resolvedSeason, week: resolvedWeek, records }
}
