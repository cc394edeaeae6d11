/**
 * Aggregation engine types
 *
 * StatRecord and ScheduledGame are inputs produced by the data provider.
 * Every *Row type is derived per request and never stored.
 */

export const POSITIONS = ['QB', 'RB', 'WR', 'TE'] as const
export type Position = (typeof POSITIONS)[number]

export const TOUCHDOWN_CATEGORIES = ['passing', 'rushing', 'receiving', 'total'] as const
export type TouchdownCategory = (typeof TOUCHDOWN_CATEGORIES)[number]

export const SCOPES = ['season', 'week', 'recent'] as const
export type Scope = (typeof SCOPES)[number]

export const LEADER_METRICS = ['touchdowns', 'yards', 'fantasyPoints'] as const
export type LeaderMetric = (typeof LEADER_METRICS)[number]

export const CONSISTENCY_SORTS = ['rating', 'average', 'floor', 'ceiling'] as const
export type ConsistencySort = (typeof CONSISTENCY_SORTS)[number]

export type SeasonType = 'REG' | 'POST'

export interface StatRecord {
  readonly playerId: string
  readonly playerName: string
  readonly position: string // roster code, e.g. 'FB'
  readonly team: string
  readonly opponent: string // defense faced
  readonly season: number
  readonly week: number
  readonly seasonType: SeasonType
  readonly passingTds: number
  readonly rushingTds: number
  readonly receivingTds: number
  readonly passingYards: number
  readonly rushingYards: number
  readonly receivingYards: number
  readonly fantasyPointsPpr: number
}

export interface ScheduledGame {
  readonly gameId: string
  readonly season: number
  readonly week: number
  readonly gameType: string // 'REG', 'WC', 'DIV', 'CON', 'SB'
  readonly gameday: string
  readonly awayTeam: string
  readonly homeTeam: string
}

export interface DefenseWeaknessRow {
  rank: number
  team: string
  position: Position
  touchdowns: number
  passingTds: number
  rushingTds: number
  receivingTds: number
  yards: number
  fantasyPoints: number
  games: number
}

export interface MatchupRow {
  gameId: string
  week: number
  playerId: string
  playerName: string
  position: Position
  team: string
  opponent: string
  isHome: boolean
  touchdowns: number
  games: number
  tdPerGame: number
  defenseRank: number | null
  defenseTouchdownsAllowed: number
  favorability: number
  favorable: boolean
}

export interface LeaderboardRow {
  rank: number
  playerId: string
  playerName: string
  position: Position
  team: string
  touchdowns: number
  passingTds: number
  rushingTds: number
  receivingTds: number
  yards: number
  fantasyPoints: number
  games: number
}

export type ConsistencyMetric = 'passingYards' | 'fantasyPointsPpr'

export interface ConsistencyRow {
  rank: number
  playerId: string
  playerName: string
  team: string
  metric: ConsistencyMetric
  games: number
  average: number
  stdDev: number | null
  floor: number
  ceiling: number
  range: number
  cv: number | null
  rating: number | null
}

export interface ConsistencyHighlights {
  mostConsistent: ConsistencyRow | null
  highestAverage: ConsistencyRow | null
  highestFloor: ConsistencyRow | null
  highestCeiling: ConsistencyRow | null
}

export interface WeeklyPoint {
  week: number
  value: number
}

export interface WeeklySeries {
  playerId: string
  playerName: string
  team: string
  metric: ConsistencyMetric
  points: WeeklyPoint[]
  average: number
  min: number
  max: number
}
