import { NextResponse } from 'next/server'
import { getConfig } from '@/lib/config'
import { getCacheStats } from '@/lib/data-provider'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

function envOk(name: string) {
  const v = process.env[name]
  return typeof v === 'string' && v.trim().length > 0
}

export async function GET() {
  const config = getConfig()

  return NextResponse.json({
    ok: true,
    defaults: {
      season: config.season,
      week: config.week,
    },
    logLevel: config.logLevel,
    sources: {
      statsUrlTemplate: config.statsUrlTemplate,
      scheduleUrlTemplate: config.scheduleUrlTemplate,
      overridden: envOk('NFLVERSE_STATS_URL') || envOk('NFLVERSE_SCHEDULE_URL'),
    },
    cacheEntries: getCacheStats().entries,
    lastChecked: new Date().toISOString(),
  })
}
