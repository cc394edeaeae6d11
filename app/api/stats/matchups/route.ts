import { NextResponse } from 'next/server'
import { z } from 'zod'
import { errorResponse, loadSeason, parseQuery, seasonParam, weekParam } from '@/lib/api/route-helpers'
import { createLogger } from '@/lib/logger'
import { computeMatchups } from '@/lib/stats/matchups'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const log = createLogger('api/stats/matchups')

/**
 * /api/stats/matchups
 *
 * Offensive producers vs. the weakness rank of the defense they face in a week.
 * 404 NO_SCHEDULE_DATA when the week has no games.
 */
const QuerySchema = z.object({
  season: seasonParam,
  week: weekParam,
  favorableOnly: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1'),
})

export async function GET(req: Request) {
  try {
    const q = parseQuery(QuerySchema, req)
    const { provider, season, week, records } = await loadSeason(q.season, q.week)
    const games = await provider.fetchSchedule(season, week)
    const all = computeMatchups(records, games, week)
    const rows = q.favorableOnly ? all.filter((r) => r.favorable) : all

    return NextResponse.json({ season, week, games, rows })
  } catch (err) {
    return errorResponse(err, log)
  }
}
