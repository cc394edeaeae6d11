/**
 * nflverse CSV rows → engine records
 *
 * Column names follow the nflverse releases. The team and player-name columns
 * were renamed between releases, so each has a list of candidates.
 */

import { z } from 'zod'
import { normalizeTeamCode } from '@/lib/nfl/teams'
import { StatsError } from '@/lib/stats/errors'
import type { ScheduledGame, SeasonType, StatRecord } from '@/lib/stats/types'
import type { NormalizeResult } from './types'

export type CsvRow = Record<string, string>

export const TEAM_COLUMNS = ['team', 'recent_team', 'team_abbr'] as const
export const PLAYER_NAME_COLUMNS = ['player_display_name', 'player_name', 'name'] as const

const REQUIRED_STAT_COLUMNS = ['player_id', 'position', 'opponent_team', 'season', 'week'] as const
const REQUIRED_SCHEDULE_COLUMNS = ['game_id', 'season', 'game_type', 'week', 'away_team', 'home_team'] as const

const text = z.string().trim().min(1)

// Empty cells and 'NA' mean "no stat recorded"
const stat = z.preprocess((v) => {
  if (typeof v !== 'string') return 0
  const s = v.trim()
  return s === '' || s === 'NA' ? 0 : s
}, z.coerce.number().finite())

const StatRowSchema = z.object({
  player_id: text,
  position: text,
  opponent_team: text,
  season: z.coerce.number().int(),
  week: z.coerce.number().int().positive(),
  season_type: z.string().trim().default('REG'),
  passing_tds: stat,
  rushing_tds: stat,
  receiving_tds: stat,
  passing_yards: stat,
  rushing_yards: stat,
  receiving_yards: stat,
  fantasy_points_ppr: stat,
})

const ScheduleRowSchema = z.object({
  game_id: text,
  season: z.coerce.number().int(),
  game_type: text,
  week: z.coerce.number().int().positive(),
  gameday: z.string().trim().default(''),
  away_team: text,
  home_team: text,
})

export const CsvRowsSchema = z.array(z.record(z.string()))

function pickColumn(row: CsvRow, candidates: readonly string[]): string | undefined {
  for (const c of candidates) {
    const v = row[c]?.trim()
    if (v) return v
  }
  return undefined
}

function toSeasonType(value: string): SeasonType | null {
  if (value === 'REG') return 'REG'
  if (value === 'POST') return 'POST'
  return null
}

export function assertColumns(header: readonly string[], required: readonly string[], dataset: string): void {
  const missing = required.filter((c) => !header.includes(c))
  if (missing.length > 0) {
    throw new StatsError('DATA_UNAVAILABLE', `Upstream ${dataset} file is missing columns: ${missing.join(', ')}`, {
      details: { dataset, missing },
    })
  }
}

export function assertStatColumns(header: readonly string[]): void {
  assertColumns(header, REQUIRED_STAT_COLUMNS, 'player stats')
  if (!TEAM_COLUMNS.some((c) => header.includes(c))) {
    throw new StatsError('DATA_UNAVAILABLE', `Upstream player stats file has no team column (${TEAM_COLUMNS.join(', ')})`, {
      details: { dataset: 'player stats', missing: [...TEAM_COLUMNS] },
    })
  }
}

export function assertScheduleColumns(header: readonly string[]): void {
  assertColumns(header, REQUIRED_SCHEDULE_COLUMNS, 'schedule')
}

/**
 * Map one stat row. Returns null when the row can't be attributed to a
 * player, team and defense, or sits outside the regular season and playoffs.
 */
export function toStatRecord(row: CsvRow): StatRecord | null {
  const parsed = StatRowSchema.safeParse(row)
  if (!parsed.success) return null
  const r = parsed.data

  const team = pickColumn(row, TEAM_COLUMNS)
  const seasonType = toSeasonType(r.season_type || 'REG')
  if (!team || !seasonType) return null

  return {
    playerId: r.player_id,
    playerName: pickColumn(row, PLAYER_NAME_COLUMNS) ?? r.player_id,
    position: r.position.toUpperCase(),
    team: normalizeTeamCode(team),
    opponent: normalizeTeamCode(r.opponent_team),
    season: r.season,
    week: r.week,
    seasonType,
    passingTds: r.passing_tds,
    rushingTds: r.rushing_tds,
    receivingTds: r.receiving_tds,
    passingYards: r.passing_yards,
    rushingYards: r.rushing_yards,
    receivingYards: r.receiving_yards,
    fantasyPointsPpr: r.fantasy_points_ppr,
  }
}

export function normalizeStatRows(rows: readonly CsvRow[], season: number): NormalizeResult<StatRecord> {
  const out: StatRecord[] = []
  let skipped = 0
  for (const row of rows) {
    const record = toStatRecord(row)
    if (!record) {
      skipped++
      continue
    }
    if (record.season === season) out.push(record)
  }
  return { rows: out, skipped }
}

export function toScheduledGame(row: CsvRow): ScheduledGame | null {
  const parsed = ScheduleRowSchema.safeParse(row)
  if (!parsed.success) return null
  const g = parsed.data
  return {
    gameId: g.game_id,
    season: g.season,
    week: g.week,
    gameType: g.game_type,
    gameday: g.gameday,
    awayTeam: normalizeTeamCode(g.away_team),
    homeTeam: normalizeTeamCode(g.home_team),
  }
}

export function normalizeScheduleRows(rows: readonly CsvRow[], season: number): NormalizeResult<ScheduledGame> {
  const out: ScheduledGame[] = []
  let skipped = 0
  for (const row of rows) {
    const game = toScheduledGame(row)
    if (!game) {
      skipped++
      continue
    }
    if (game.season === season) out.push(game)
  }
  return { rows: out, skipped }
}
