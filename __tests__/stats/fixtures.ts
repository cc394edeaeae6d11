import type { ScheduledGame, StatRecord } from '@/lib/stats/types'

export function line(overrides: Partial<StatRecord> & Pick<StatRecord, 'playerId'>): StatRecord {
  return {
    playerName: overrides.playerId,
    position: 'WR',
    team: 'KC',
    opponent: 'LV',
    season: 2024,
    week: 1,
    seasonType: 'REG',
    passingTds: 0,
    rushingTds: 0,
    receivingTds: 0,
    passingYards: 0,
    rushingYards: 0,
    receivingYards: 0,
    fantasyPointsPpr: 0,
    ...overrides,
  }
}

export function game(week: number, awayTeam: string, homeTeam: string): ScheduledGame {
  return {
    gameId: `2024_${String(week).padStart(2, '0')}_${awayTeam}_${homeTeam}`,
    season: 2024,
    week,
    gameType: 'REG',
    gameday: '2024-09-08',
    awayTeam,
    homeTeam,
  }
}
