/**
 * Column definitions shared by the dashboard tables and the report script.
 * A table is an ordered row sequence plus these labels and accessors.
 */

import type {
  ConsistencyRow,
  DefenseWeaknessRow,
  LeaderboardRow,
  MatchupRow,
  Position,
  TouchdownCategory,
} from './types'

export type CellValue = string | number | null

export interface Column<Row> {
  key: string
  label: string
  align?: 'left' | 'right'
  value: (row: Row) => CellValue
}

export function formatCell(value: CellValue): string {
  if (value === null) return '-'
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(value >= 100 ? 1 : 2).replace(/\.?0+$/, '')
  }
  return value
}

export const DEFENSE_COLUMNS: Column<DefenseWeaknessRow>[] = [
  { key: 'rank', label: '#', align: 'right', value: (r) => r.rank },
  { key: 'team', label: 'Defense', value: (r) => r.team },
  { key: 'touchdowns', label: 'TDs Allowed', align: 'right', value: (r) => r.touchdowns },
  { key: 'passingTds', label: 'Pass TDs', align: 'right', value: (r) => r.passingTds },
  { key: 'rushingTds', label: 'Rush TDs', align: 'right', value: (r) => r.rushingTds },
  { key: 'receivingTds', label: 'Rec TDs', align: 'right', value: (r) => r.receivingTds },
  { key: 'yards', label: 'Yards', align: 'right', value: (r) => r.yards },
  { key: 'fantasyPoints', label: 'Fantasy Pts', align: 'right', value: (r) => r.fantasyPoints },
  { key: 'games', label: 'Games', align: 'right', value: (r) => r.games },
]

export const MATCHUP_COLUMNS: Column<MatchupRow>[] = [
  { key: 'playerName', label: 'Player', value: (r) => r.playerName },
  { key: 'position', label: 'Pos', value: (r) => r.position },
  { key: 'team', label: 'Team', value: (r) => r.team },
  { key: 'opponent', label: 'Opp', value: (r) => (r.isHome ? `vs ${r.opponent}` : `@ ${r.opponent}`) },
  { key: 'tdPerGame', label: 'TD/G', align: 'right', value: (r) => r.tdPerGame },
  { key: 'defenseRank', label: 'Def Rank', align: 'right', value: (r) => r.defenseRank },
  { key: 'favorability', label: 'Score', align: 'right', value: (r) => r.favorability },
]

const CATEGORY_LABELS: Record<TouchdownCategory, string> = {
  passing: 'Pass TDs',
  rushing: 'Rush TDs',
  receiving: 'Rec TDs',
  total: 'Total TDs',
}

export function categoryLabel(category: TouchdownCategory): string {
  return CATEGORY_LABELS[category]
}

export function leaderColumns(position: Position, category: TouchdownCategory): Column<LeaderboardRow>[] {
  const breakdown: Column<LeaderboardRow>[] =
    position === 'QB'
      ? [
          { key: 'passingTds', label: 'Pass TDs', align: 'right', value: (r) => r.passingTds },
          { key: 'rushingTds', label: 'Rush TDs', align: 'right', value: (r) => r.rushingTds },
        ]
      : [
          { key: 'rushingTds', label: 'Rush TDs', align: 'right', value: (r) => r.rushingTds },
          { key: 'receivingTds', label: 'Rec TDs', align: 'right', value: (r) => r.receivingTds },
        ]

  return [
    { key: 'rank', label: '#', align: 'right', value: (r) => r.rank },
    { key: 'playerName', label: 'Player', value: (r) => r.playerName },
    { key: 'team', label: 'Team', value: (r) => r.team },
    { key: 'touchdowns', label: CATEGORY_LABELS[category], align: 'right', value: (r) => r.touchdowns },
    ...breakdown.filter((c) => c.label !== CATEGORY_LABELS[category]),
    { key: 'yards', label: 'Yards', align: 'right', value: (r) => r.yards },
    { key: 'fantasyPoints', label: 'Fantasy Pts', align: 'right', value: (r) => r.fantasyPoints },
    { key: 'games', label: 'Games', align: 'right', value: (r) => r.games },
  ]
}

export const CONSISTENCY_COLUMNS: Column<ConsistencyRow>[] = [
  { key: 'rank', label: '#', align: 'right', value: (r) => r.rank },
  { key: 'playerName', label: 'Player', value: (r) => r.playerName },
  { key: 'team', label: 'Team', value: (r) => r.team },
  { key: 'average', label: 'Avg', align: 'right', value: (r) => r.average },
  { key: 'rating', label: 'Consistency', align: 'right', value: (r) => r.rating },
  { key: 'floor', label: 'Floor', align: 'right', value: (r) => r.floor },
  { key: 'ceiling', label: 'Ceiling', align: 'right', value: (r) => r.ceiling },
  { key: 'games', label: 'Games', align: 'right', value: (r) => r.games },
]
