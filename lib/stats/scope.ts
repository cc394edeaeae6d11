import type { Scope, StatRecord } from './types'

/** Number of weeks covered by the 'recent' scope, the selected week included */
export const RECENT_WEEKS = 3

export function filterByScope(records: readonly StatRecord[], scope: Scope, week: number): StatRecord[] {
  switch (scope) {
    case 'season':
      return [...records]
    case 'week':
      return records.filter((r) => r.week === week)
    case 'recent':
      return records.filter((r) => r.week > week - RECENT_WEEKS && r.week <= week)
  }
}

/** Highest regular-season week present in the data, or null when there is none */
export function latestWeek(records: readonly StatRecord[]): number | null {
  let max: number | null = null
  for (const r of records) {
    if (r.seasonType !== 'REG') continue
    if (max === null || r.week > max) max = r.week
  }
  return max
}

export function scopeLabel(scope: Scope, week: number): string {
  switch (scope) {
    case 'season':
      return 'Season Total'
    case 'week':
      return `Week ${week} Only`
    case 'recent':
      return `Weeks ${Math.max(1, week - RECENT_WEEKS + 1)}-${week}`
  }
}
