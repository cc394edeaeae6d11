/**
 * Plain-text season report
 *
 * Same engine and column definitions as the dashboard, rendered through formatTable.
 */

import type { DataProvider } from '@/lib/data-provider'
import {
  DEFENSE_COLUMNS,
  MATCHUP_COLUMNS,
  POSITIONS,
  categoryLabel,
  computeDefenseWeakness,
  computeLeaders,
  computeMatchups,
  formatTable,
  isStatsError,
  latestWeek,
  leaderColumns,
  type ScheduledGame,
  type StatRecord,
} from '@/lib/stats'

export const REPORT_TOP = 10

export interface ReportInput {
  season: number
  week: number
  records: readonly StatRecord[]
  schedule: readonly ScheduledGame[]
}

function heading(title: string): string {
  return `\n${title}\n${'='.repeat(title.length)}`
}

export function renderSeasonReport({ season, week, records, schedule }: ReportInput): string {
  const out: string[] = [`NFL season report: ${season}, week ${week} (${records.length} stat lines)`]

  for (const position of POSITIONS) {
    const rows = computeDefenseWeakness(records, position).slice(0, REPORT_TOP)
    out.push(heading(`Most vulnerable defenses vs ${position}`), formatTable(DEFENSE_COLUMNS, rows))
  }

  out.push(heading(`Favorable matchups, week ${week}`))
  try {
    const rows = computeMatchups(records, schedule, week).filter((r) => r.favorable)
    out.push(formatTable(MATCHUP_COLUMNS, rows))
  } catch (err) {
    if (!isStatsError(err) || err.code !== 'NO_SCHEDULE_DATA') throw err
    out.push(`(${err.message})`)
  }

  for (const position of POSITIONS) {
    const rows = computeLeaders(records, position, 'total', { limit: REPORT_TOP })
    out.push(
      heading(`${position} leaders: ${categoryLabel('total')}`),
      formatTable(leaderColumns(position, 'total'), rows)
    )
  }

  return out.join('\n')
}

export interface ReportOptions {
  provider: DataProvider
  season: number
  week: number | null
  write: (text: string) => void
  writeError: (text: string) => void
}

/** Load the season, print the report, and return the process exit code */
export async function runSeasonReport({ provider, season, week, write, writeError }: ReportOptions): Promise<number> {
  try {
    const records = await provider.fetchSeasonStats(season)
    const resolvedWeek = week ?? latestWeek(records) ?? 1
    const schedule = await provider.fetchSchedule(season, resolvedWeek)
    write(renderSeasonReport({ season, week: resolvedWeek, records, schedule }))
    return 0
  } catch (err) {
    if (isStatsError(err) && err.code === 'DATA_UNAVAILABLE') {
      writeError(`Data unavailable: ${err.message}`)
    } else {
      writeError(`Report failed: ${err instanceof Error ? err.message : String(err)}`)
    }
    return 1
  }
}
