/**
 * Browser-side access to the /api/stats routes
 */

import { decodeStatsErrorFromResponse, type StatsErrorPayload } from './errors'
import type {
  ConsistencyHighlights,
  ConsistencyMetric,
  ConsistencyRow,
  ConsistencySort,
  DefenseWeaknessRow,
  LeaderboardRow,
  LeaderMetric,
  MatchupRow,
  ScheduledGame,
  Scope,
  WeeklySeries,
} from './types'

export type QueryParams = Record<string, string | number | boolean | null | undefined>

export type StatsResult<T> = { ok: true; data: T } | { ok: false; error: StatsErrorPayload }

export interface DefenseResponse {
  season: number
  week: number
  position: string
  scope: Scope
  rows: DefenseWeaknessRow[]
}

export interface MatchupsResponse {
  season: number
  week: number
  games: ScheduledGame[]
  rows: MatchupRow[]
}

export interface LeadersResponse {
  season: number
  week: number
  position: string
  category: string
  scope: Scope
  metric: LeaderMetric
  rows: LeaderboardRow[]
}

export interface ConsistencyResponse {
  season: number
  position: string
  metric: ConsistencyMetric
  minGames: number
  sortBy: ConsistencySort
  highlights: ConsistencyHighlights
  rows: ConsistencyRow[]
}

export interface WeeklyResponse extends WeeklySeries {
  season: number
  position: string
}

/** Stable query string: unset values dropped, keys sorted */
export function buildQueryString(params: QueryParams): string {
  const search = new URLSearchParams()
  for (const key of Object.keys(params).sort()) {
    const value = params[key]
    if (value === undefined || value === null || value === '') continue
    search.set(key, String(value))
  }
  const qs = search.toString()
  return qs ? `?${qs}` : ''
}

export async function fetchStats<T>(
  path: string,
  params: QueryParams,
  signal?: AbortSignal
): Promise<StatsResult<T>> {
  try {
    const res = await fetch(`${path}${buildQueryString(params)}`, { signal })
    if (!res.ok) {
      return { ok: false, error: await decodeStatsErrorFromResponse(res) }
    }
    const data: T = await res.json()
    return { ok: true, data }
  } catch (e: unknown) {
    if (e instanceof Error && e.name === 'AbortError') {
      return { ok: false, error: { code: 'ABORTED', status: null, message: 'Request was cancelled' } }
    }
    return {
      ok: false,
      error: {
        code: 'NETWORK_ERROR',
        status: null,
        message: e instanceof Error ? e.message : 'Network error',
      },
    }
  }
}

export async function refreshSeason(season?: number): Promise<StatsResult<{ cleared: number }>> {
  try {
    const res = await fetch('/api/stats/cache', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(season !== undefined ? { season } : {}),
    })
    if (!res.ok) {
      return { ok: false, error: await decodeStatsErrorFromResponse(res) }
    }
    const data: { cleared: number } = await res.json()
    return { ok: true, data }
  } catch (e: unknown) {
    return {
      ok: false,
      error: { code: 'NETWORK_ERROR', status: null, message: e instanceof Error ? e.message : 'Network error' },
    }
  }
}
