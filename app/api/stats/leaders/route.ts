import { NextResponse } from 'next/server'
import { z } from 'zod'
import { errorResponse, loadSeason, parseQuery, seasonParam, weekParam } from '@/lib/api/route-helpers'
import { createLogger } from '@/lib/logger'
import { computeLeaders } from '@/lib/stats/leaders'
import { filterByScope } from '@/lib/stats/scope'
import { LEADER_METRICS, SCOPES } from '@/lib/stats/types'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const log = createLogger('api/stats/leaders')

const QuerySchema = z.object({
  season: seasonParam,
  week: weekParam,
  position: z.string().trim().toUpperCase().default('QB'),
  category: z.string().trim().toLowerCase().default('total'),
  scope: z.enum(SCOPES).default('season'),
  metric: z.enum(LEADER_METRICS).default('touchdowns'),
  limit: z.coerce.number().int().min(1).max(100).default(15),
})

export async function GET(req: Request) {
  try {
    const q = parseQuery(QuerySchema, req)
    const { season, week, records } = await loadSeason(q.season, q.week)
    const rows = computeLeaders(filterByScope(records, q.scope, week), q.position, q.category, {
      limit: q.limit,
      metric: q.metric,
    })

    return NextResponse.json({
      season,
      week,
      position: q.position,
      category: q.category,
      scope: q.scope,
      metric: q.metric,
      rows,
    })
  } catch (err) {
    return errorResponse(err, log)
  }
}
