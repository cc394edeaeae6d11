/**
 * Aggregation engine
 *
 * Pure, synchronous transforms from StatRecord tables to ranked rows:
 * StatRecord[] → filterByScope → compute* → *Row[]
 */

export * from './types'
export { StatsError, isStatsError, toErrorPayload } from './errors'
export type { StatsErrorCode, StatsErrorPayload } from './errors'
export { POSITION_GROUPS, isPosition, isTouchdownCategory, categoriesFor } from './positions'
export { filterByScope, latestWeek, scopeLabel, RECENT_WEEKS } from './scope'
export { computeDefenseWeakness } from './defense'
export { computeMatchups, MATCHUP_DEFAULTS } from './matchups'
export type { MatchupOptions } from './matchups'
export { computeLeaders } from './leaders'
export type { LeadersOptions } from './leaders'
export { computeConsistency, consistencyHighlights, DEFAULT_MIN_GAMES, metricFor, weeklySeries } from './consistency'
export type { ConsistencyOptions } from './consistency'
export {
  CONSISTENCY_COLUMNS,
  DEFENSE_COLUMNS,
  MATCHUP_COLUMNS,
  categoryLabel,
  formatCell,
  leaderColumns,
} from './columns'
export type { CellValue, Column } from './columns'
export { formatTable } from './format'
