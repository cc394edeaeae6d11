/**
 * Data Provider Types
 *
 * Source of the tabular inputs to the aggregation engine. Failures of any kind
 * (network, status, timeout, upstream format) reject with a DATA_UNAVAILABLE StatsError.
 */

import type { ScheduledGame, StatRecord } from '@/lib/stats/types'

export interface DataProvider {
  readonly id: string
  fetchSeasonStats(season: number): Promise<StatRecord[]>
  fetchSchedule(season: number, week: number): Promise<ScheduledGame[]>
}

export interface ProviderConfig {
  statsUrlTemplate?: string
  scheduleUrlTemplate?: string
  timeoutMs?: number
  fetchFn?: typeof fetch
}

export interface NormalizeResult<T> {
  rows: T[]
  skipped: number
}
