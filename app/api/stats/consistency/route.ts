import { NextResponse } from 'next/server'
import { z } from 'zod'
import { errorResponse, loadSeason, parseQuery, seasonParam } from '@/lib/api/route-helpers'
import { createLogger } from '@/lib/logger'
import { DEFAULT_MIN_GAMES, computeConsistency, consistencyHighlights, metricFor } from '@/lib/stats/consistency'
import { assertPosition } from '@/lib/stats/positions'
import { CONSISTENCY_SORTS } from '@/lib/stats/types'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const log = createLogger('api/stats/consistency')

const QuerySchema = z.object({
  season: seasonParam,
  position: z.string().trim().toUpperCase().default('WR'),
  minGames: z.coerce.number().int().min(1).max(22).default(DEFAULT_MIN_GAMES),
  sortBy: z.enum(CONSISTENCY_SORTS).default('rating'),
  limit: z.coerce.number().int().min(1).max(100).default(20),
})

export async function GET(req: Request) {
  try {
    const q = parseQuery(QuerySchema, req)
    const position = assertPosition(q.position)
    const { season, records } = await loadSeason(q.season)
    const all = computeConsistency(records, position, { minGames: q.minGames, sortBy: q.sortBy })

    return NextResponse.json({
      season,
      position,
      metric: metricFor(position),
      minGames: q.minGames,
      sortBy: q.sortBy,
      highlights: consistencyHighlights(all),
      rows: all.slice(0, q.limit),
    })
  } catch (err) {
    return errorResponse(err, log)
  }
}
