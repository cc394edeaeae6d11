import { NextResponse } from 'next/server'
import { z } from 'zod'
import { errorResponse, loadSeason, parseQuery, seasonParam, weekParam } from '@/lib/api/route-helpers'
import { createLogger } from '@/lib/logger'
import { computeDefenseWeakness } from '@/lib/stats/defense'
import { filterByScope } from '@/lib/stats/scope'
import { SCOPES } from '@/lib/stats/types'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const log = createLogger('api/stats/defense')

/**
 * /api/stats/defense
 *
 * Defenses ranked by touchdowns allowed to one position group.
 * Position is validated by the engine so callers get INVALID_POSITION, not a schema error.
 */
const QuerySchema = z.object({
  season: seasonParam,
  week: weekParam,
  position: z.string().trim().toUpperCase().default('WR'),
  scope: z.enum(SCOPES).default('season'),
})

export async function GET(req: Request) {
  try {
    const q = parseQuery(QuerySchema, req)
    const { season, week, records } = await loadSeason(q.season, q.week)
    const rows = computeDefenseWeakness(filterByScope(records, q.scope, week), q.position)

    return NextResponse.json({ season, week, position: q.position, scope: q.scope, rows })
  } catch (err) {
    return errorResponse(err, log)
  }
}
