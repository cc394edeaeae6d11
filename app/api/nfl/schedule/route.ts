import { NextResponse } from 'next/server'
import { z } from 'zod'
import { errorResponse, loadSeason, parseQuery, seasonParam, weekParam } from '@/lib/api/route-helpers'
import { createLogger } from '@/lib/logger'
import { matchupLabel, teamName } from '@/lib/nfl/teams'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const log = createLogger('api/nfl/schedule')

const QuerySchema = z.object({
  season: seasonParam,
  week: weekParam,
})

export async function GET(req: Request) {
  try {
    const q = parseQuery(QuerySchema, req)
    const { provider, season, week } = await loadSeason(q.season, q.week)
    const schedule = await provider.fetchSchedule(season, week)

    const games = schedule.map((game) => ({
      ...game,
      display: `${teamName(game.awayTeam)} @ ${teamName(game.homeTeam)}`,
      short: matchupLabel(game.awayTeam, game.homeTeam),
    }))

    return NextResponse.json({
      games,
      week,
      season,
      lastUpdated: new Date().toISOString(),
      totalGames: games.length,
    })
  } catch (err) {
    return errorResponse(err, log)
  }
}
