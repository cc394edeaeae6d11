import { NextResponse } from 'next/server'
import { z } from 'zod'
import { errorResponse, loadSeason, parseQuery, seasonParam } from '@/lib/api/route-helpers'
import { createLogger } from '@/lib/logger'
import { weeklySeries } from '@/lib/stats/consistency'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const log = createLogger('api/stats/weekly')

const QuerySchema = z.object({
  season: seasonParam,
  position: z.string().trim().toUpperCase().default('WR'),
  playerId: z.string().trim().min(1),
})

export async function GET(req: Request) {
  try {
    const q = parseQuery(QuerySchema, req)
    const { season, records } = await loadSeason(q.season)
    const series = weeklySeries(records, q.position, q.playerId)

    return NextResponse.json({ season, position: q.position, ...series })
  } catch (err) {
    return errorResponse(err, log)
  }
}
