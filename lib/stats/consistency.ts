/**
 * Week-to-week consistency ratings
 *
 * Rating = 100 - (player CV / largest CV in the pool) * 100, so the steadiest
 * producer relative to their own average scores highest. The largest CV is
 * taken before the minimum-games cut.
 */

import { StatsError } from './errors'
import { groupByPlayer } from './players'
import { assertPosition, compareIds, inPositionGroup } from './positions'
import type {
  ConsistencyHighlights,
  ConsistencyMetric,
  ConsistencyRow,
  ConsistencySort,
  Position,
  StatRecord,
  WeeklySeries,
} from './types'

export const DEFAULT_MIN_GAMES = 3

export interface ConsistencyOptions {
  minGames?: number
  sortBy?: ConsistencySort
}

export function metricFor(position: Position): ConsistencyMetric {
  return position === 'QB' ? 'passingYards' : 'fantasyPointsPpr'
}

function round1(n: number): number {
  return Math.round(n * 10) / 10
}

/** Sample standard deviation; null below two values */
export function sampleStdDev(values: readonly number[]): number | null {
  if (values.length < 2) return null
  const mean = values.reduce((s, v) => s + v, 0) / values.length
  const sq = values.reduce((s, v) => s + (v - mean) ** 2, 0)
  return Math.sqrt(sq / (values.length - 1))
}

interface PlayerSpread {
  playerId: string
  playerName: string
  team: string
  values: number[]
  average: number
  stdDev: number | null
  cv: number | null
}

export function computeConsistency(
  records: readonly StatRecord[],
  position: string,
  options: ConsistencyOptions = {}
): ConsistencyRow[] {
  const pos = assertPosition(position)
  const metric = metricFor(pos)
  const minGames = options.minGames ?? DEFAULT_MIN_GAMES

  const spreads: PlayerSpread[] = []
  for (const p of groupByPlayer(records.filter((r) => inPositionGroup(r, pos))).values()) {
    const values = p.records.map((r) => r[metric])
    const average = values.reduce((s, v) => s + v, 0) / values.length
    const stdDev = sampleStdDev(values)
    spreads.push({
      playerId: p.playerId,
      playerName: p.playerName,
      team: p.team,
      values,
      average,
      stdDev,
      cv: stdDev !== null && average > 0 ? (stdDev / average) * 100 : null,
    })
  }

  let maxCv = 0
  for (const s of spreads) {
    if (s.cv !== null && s.cv > maxCv) maxCv = s.cv
  }

  const rows: ConsistencyRow[] = spreads
    .filter((s) => s.values.length >= minGames)
    .map((s) => {
      const floor = Math.min(...s.values)
      const ceiling = Math.max(...s.values)
      let rating: number | null = null
      if (s.cv !== null) rating = maxCv > 0 ? 100 - (s.cv / maxCv) * 100 : 100
      return {
        rank: 0,
        playerId: s.playerId,
        playerName: s.playerName,
        team: s.team,
        metric,
        games: s.values.length,
        average: round1(s.average),
        stdDev: s.stdDev === null ? null : round1(s.stdDev),
        floor,
        ceiling,
        range: round1(ceiling - floor),
        cv: s.cv === null ? null : round1(s.cv),
        rating: rating === null ? null : round1(rating),
      }
    })

  const sortBy = options.sortBy ?? 'rating'
  rows.sort((a, b) => compareBy(a, b, sortBy))
  return rows.map((row, i) => ({ ...row, rank: i + 1 }))
}

/** Descending on the chosen field, nulls last, then player id */
function compareBy(a: ConsistencyRow, b: ConsistencyRow, field: ConsistencySort): number {
  const av = a[field]
  const bv = b[field]
  if (av === null && bv !== null) return 1
  if (bv === null && av !== null) return -1
  return (bv ?? 0) - (av ?? 0) || compareIds(a.playerId, b.playerId)
}

function best(rows: readonly ConsistencyRow[], field: ConsistencySort): ConsistencyRow | null {
  let top: ConsistencyRow | null = null
  for (const row of rows) {
    if (row[field] === null) continue
    if (top === null || compareBy(row, top, field) < 0) top = row
  }
  return top
}

/** Leader of each key metric card, whatever order the rows are in */
export function consistencyHighlights(rows: readonly ConsistencyRow[]): ConsistencyHighlights {
  return {
    mostConsistent: best(rows, 'rating'),
    highestAverage: best(rows, 'average'),
    highestFloor: best(rows, 'floor'),
    highestCeiling: best(rows, 'ceiling'),
  }
}

/**
 * One player's metric week by week, ordered by season then week. Multiple
 * lines in the same week are summed.
 */
export function weeklySeries(records: readonly StatRecord[], position: string, playerId: string): WeeklySeries {
  const pos = assertPosition(position)
  const metric = metricFor(pos)
  const group = groupByPlayer(records.filter((r) => r.playerId === playerId && inPositionGroup(r, pos))).get(playerId)
  if (!group) {
    throw new StatsError('PLAYER_NOT_FOUND', `No ${pos} stat lines for player '${playerId}'`, {
      details: { playerId, position: pos },
    })
  }

  const byWeek = new Map<string, { season: number; week: number; value: number }>()
  for (const r of group.records) {
    const key = `${r.season}-${r.week}`
    const entry = byWeek.get(key)
    if (entry) entry.value += r[metric]
    else byWeek.set(key, { season: r.season, week: r.week, value: r[metric] })
  }

  const ordered = [...byWeek.values()].sort((a, b) => a.season - b.season || a.week - b.week)
  const values = ordered.map((p) => p.value)
  return {
    playerId: group.playerId,
    playerName: group.playerName,
    team: group.team,
    metric,
    points: ordered.map((p) => ({ week: p.week, value: round1(p.value) })),
    average: round1(values.reduce((s, v) => s + v, 0) / values.length),
    min: round1(Math.min(...values)),
    max: round1(Math.max(...values)),
  }
}
