/**
 * Process-wide memoization for provider downloads
 *
 * One entry per dataset + season. Entries never expire; they are dropped by an
 * explicit refresh (clearCache) or when the load that filled them fails.
 * Concurrent callers for the same key share the in-flight promise.
 */

import type { ScheduledGame, StatRecord } from '@/lib/stats/types'

export type Dataset = 'stats' | 'schedule'

export interface CacheKey {
  provider: string
  dataset: Dataset
  season: number
}

interface CacheEntry<T> {
  promise: Promise<T>
  fetchedAt: string | null
  size: number | null
  season: number
}

export interface CacheEntryStats {
  key: string
  season: number
  fetchedAt: string | null
  rows: number | null
  pending: boolean
}

export function cacheKeyString(key: CacheKey): string {
  return `${key.provider}:${key.dataset}:${key.season}`
}

class MemoCache<T extends readonly unknown[]> {
  private entries = new Map<string, CacheEntry<T>>()

  has(key: string): boolean {
    return this.entries.has(key)
  }

  getOrLoad(key: string, season: number, loader: () => Promise<T>): Promise<T> {
    const existing = this.entries.get(key)
    if (existing) return existing.promise

    const promise = loader().then(
      (rows) => {
        entry.fetchedAt = new Date().toISOString()
        entry.size = rows.length
        return rows
      },
      (err: unknown) => {
        // a failed load must not stick; the next request retries
        if (this.entries.get(key) === entry) this.entries.delete(key)
        throw err
      }
    )
    const entry: CacheEntry<T> = {
      promise,
      fetchedAt: null,
      size: null,
      season,
    }
    this.entries.set(key, entry)
    return promise
  }

  clear(season?: number): number {
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (season === undefined || entry.season === season) {
        this.entries.delete(key)
        removed++
      }
    }
    return removed
  }

  stats(): CacheEntryStats[] {
    return [...this.entries].map(([key, e]) => ({
      key,
      season: e.season,
      fetchedAt: e.fetchedAt,
      rows: e.size,
      pending: e.fetchedAt === null,
    }))
  }
}

const statsCache = new MemoCache<StatRecord[]>()
const scheduleCache = new MemoCache<ScheduledGame[]>()

export function cachedSeasonStats(
  key: Omit<CacheKey, 'dataset'>,
  loader: () => Promise<StatRecord[]>
): Promise<StatRecord[]> {
  return statsCache.getOrLoad(cacheKeyString({ ...key, dataset: 'stats' }), key.season, loader)
}

export function cachedSeasonSchedule(
  key: Omit<CacheKey, 'dataset'>,
  loader: () => Promise<ScheduledGame[]>
): Promise<ScheduledGame[]> {
  return scheduleCache.getOrLoad(cacheKeyString({ ...key, dataset: 'schedule' }), key.season, loader)
}

export function isCached(key: CacheKey): boolean {
  const cache = key.dataset === 'stats' ? statsCache : scheduleCache
  return cache.has(cacheKeyString(key))
}

/**
 * Explicit refresh: drop one season (or everything) so the next request downloads again
 *
 * @returns number of entries removed
 */
export function clearCache(season?: number): number {
  return statsCache.clear(season) + scheduleCache.clear(season)
}

export function getCacheStats(): { entries: number; stats: CacheEntryStats[]; schedule: CacheEntryStats[] } {
  const stats = statsCache.stats()
  const schedule = scheduleCache.stats()
  return { entries: stats.length + schedule.length, stats, schedule }
}
