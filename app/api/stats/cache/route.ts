import { NextResponse } from 'next/server'
import { z } from 'zod'
import { errorResponse } from '@/lib/api/route-helpers'
import { clearCache, getCacheStats } from '@/lib/data-provider'
import { createLogger } from '@/lib/logger'
import { StatsError } from '@/lib/stats/errors'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const log = createLogger('api/stats/cache')

const RefreshSchema = z.object({
  season: z.number().int().min(1999).max(2100).optional(),
})

export async function GET() {
  return NextResponse.json({ ...getCacheStats(), lastChecked: new Date().toISOString() })
}

/** Explicit refresh: drop cached downloads for one season, or all of them */
export async function POST(req: Request) {
  try {
    const raw = await req.text()
    let body: unknown = {}
    if (raw.trim()) {
      try {
        body = JSON.parse(raw)
      } catch (err) {
        throw new StatsError('BAD_REQUEST', 'Malformed JSON body', { cause: err })
      }
    }
    const parsed = RefreshSchema.safeParse(body)
    if (!parsed.success) {
      throw new StatsError('BAD_REQUEST', 'Invalid request', { details: parsed.error.issues })
    }

    const cleared = clearCache(parsed.data.season)
    log.info('Cache refreshed', { season: parsed.data.season ?? 'all', cleared })
    return NextResponse.json({ cleared, season: parsed.data.season ?? null })
  } catch (err) {
    return errorResponse(err, log)
  }
}
