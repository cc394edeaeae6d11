/**
 * nflverse Provider
 *
 * Weekly player stats and schedules from the public nflverse CSV releases.
 * Each season's files are downloaded once per process (see ./cache).
 */

import { parse } from 'csv-parse/sync'
import { createLogger } from '@/lib/logger'
import { DEFAULT_SCHEDULE_URL, DEFAULT_STATS_URL } from '@/lib/config'
import { isKnownTeam } from '@/lib/nfl/teams'
import { StatsError, isStatsError } from '@/lib/stats/errors'
import type { ScheduledGame, StatRecord } from '@/lib/stats/types'
import { cachedSeasonSchedule, cachedSeasonStats, isCached } from './cache'
import {
  CsvRowsSchema,
  assertScheduleColumns,
  assertStatColumns,
  normalizeScheduleRows,
  normalizeStatRows,
  type CsvRow,
} from './normalize'
import type { DataProvider, ProviderConfig } from './types'

const log = createLogger('nflverse')
const DEFAULT_TIMEOUT_MS = 20_000

export function seasonUrl(template: string, season: number): string {
  return template.replace(/\{season\}/g, String(season))
}

/** Decode CSV text with a header line into rows keyed by column name */
export function parseCsv(text: string, dataset: string): { header: string[]; rows: CsvRow[] } {
  let raw: unknown
  let header: string[] = []
  try {
    raw = parse(text, {
      columns: (record: string[]) => {
        header = record
        return record
      },
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    })
  } catch (err) {
    throw new StatsError('DATA_UNAVAILABLE', `Could not parse ${dataset} CSV`, { cause: err })
  }

  const rows = CsvRowsSchema.safeParse(raw)
  if (!rows.success) {
    throw new StatsError('DATA_UNAVAILABLE', `Unexpected ${dataset} CSV shape`, { details: rows.error.issues.slice(0, 3) })
  }
  return { header, rows: rows.data }
}

export class NflverseProvider implements DataProvider {
  readonly id = 'nflverse'
  private statsUrlTemplate: string
  private scheduleUrlTemplate: string
  private timeoutMs: number
  private fetchFn: typeof fetch

  constructor(config: ProviderConfig = {}) {
    this.statsUrlTemplate = config.statsUrlTemplate ?? DEFAULT_STATS_URL
    this.scheduleUrlTemplate = config.scheduleUrlTemplate ?? DEFAULT_SCHEDULE_URL
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchFn = config.fetchFn ?? fetch
  }

  fetchSeasonStats(season: number): Promise<StatRecord[]> {
    const hit = isCached({ provider: this.id, dataset: 'stats', season })
    log.debug(hit ? 'Cache hit: player stats' : 'Cache miss: player stats', { season })
    return cachedSeasonStats({ provider: this.id, season }, () => this.loadSeasonStats(season))
  }

  async fetchSchedule(season: number, week: number): Promise<ScheduledGame[]> {
    const games = await this.fetchSeasonSchedule(season)
    return games.filter((g) => g.week === week)
  }

  fetchSeasonSchedule(season: number): Promise<ScheduledGame[]> {
    return cachedSeasonSchedule({ provider: this.id, season }, () => this.loadSeasonSchedule(season))
  }

  private async loadSeasonStats(season: number): Promise<StatRecord[]> {
    const started = Date.now()
    const text = await this.download(seasonUrl(this.statsUrlTemplate, season), 'player stats')
    const { header, rows } = parseCsv(text, 'player stats')
    assertStatColumns(header)

    const result = normalizeStatRows(rows, season)
    if (result.skipped > 0) {
      log.warn('Skipped player stat rows', { season, skipped: result.skipped })
    }
    const unknown = new Set<string>()
    for (const r of result.rows) {
      if (!isKnownTeam(r.team)) unknown.add(r.team)
      if (!isKnownTeam(r.opponent)) unknown.add(r.opponent)
    }
    if (unknown.size > 0) {
      log.warn('Unknown team codes', { season, codes: [...unknown].sort() })
    }
    log.info('Loaded player stats', { season, records: result.rows.length, ms: Date.now() - started })
    return result.rows
  }

  private async loadSeasonSchedule(season: number): Promise<ScheduledGame[]> {
    const text = await this.download(seasonUrl(this.scheduleUrlTemplate, season), 'schedule')
    const { header, rows } = parseCsv(text, 'schedule')
    assertScheduleColumns(header)

    const result = normalizeScheduleRows(rows, season)
    if (result.skipped > 0) {
      log.warn('Skipped schedule rows', { season, skipped: result.skipped })
    }
    log.info('Loaded schedule', { season, games: result.rows.length })
    return result.rows
  }

  private async download(url: string, dataset: string): Promise<string> {
    const controller = new AbortController()
    const t = setTimeout(() => controller.abort(), this.timeoutMs)
    const fetchFn = this.fetchFn
    try {
      const res = await fetchFn(url, { signal: controller.signal, cache: 'no-store' })
      if (!res.ok) {
        throw new StatsError('DATA_UNAVAILABLE', `Upstream ${dataset} request failed with status ${res.status}`, {
          details: { url, status: res.status },
        })
      }
      return await res.text()
    } catch (err) {
      if (isStatsError(err)) throw err
      const aborted = err instanceof Error && err.name === 'AbortError'
      log.error(`Download failed: ${dataset}`, err)
      throw new StatsError(
        'DATA_UNAVAILABLE',
        aborted ? `Upstream ${dataset} request timed out after ${this.timeoutMs}ms` : `Upstream ${dataset} request failed`,
        { details: { url }, cause: err }
      )
    } finally {
      clearTimeout(t)
    }
  }
}
