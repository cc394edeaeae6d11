/**
 * Leaderboards per position, ranked by touchdowns, total yards or PPR points
 */

import { groupByPlayer, sumBy } from './players'
import { assertCategory, assertPosition, compareIds, inPositionGroup, totalYards, touchdownsFor } from './positions'
import type { LeaderboardRow, LeaderMetric, StatRecord } from './types'

export interface LeadersOptions {
  limit?: number
  metric?: LeaderMetric
}

function round1(n: number): number {
  return Math.round(n * 10) / 10
}

export function computeLeaders(
  records: readonly StatRecord[],
  position: string,
  category: string,
  options: LeadersOptions = {}
): LeaderboardRow[] {
  const pos = assertPosition(position)
  const cat = assertCategory(pos, category)
  const metric = options.metric ?? 'touchdowns'

  const players = groupByPlayer(records.filter((r) => inPositionGroup(r, pos)))

  const rows: LeaderboardRow[] = []
  for (const p of players.values()) {
    rows.push({
      rank: 0,
      playerId: p.playerId,
      playerName: p.playerName,
      position: pos,
      team: p.team,
      touchdowns: sumBy(p.records, (r) => touchdownsFor(r, cat, pos)),
      passingTds: sumBy(p.records, (r) => r.passingTds),
      rushingTds: sumBy(p.records, (r) => r.rushingTds),
      receivingTds: sumBy(p.records, (r) => r.receivingTds),
      yards: sumBy(p.records, totalYards),
      fantasyPoints: round1(sumBy(p.records, (r) => r.fantasyPointsPpr)),
      games: p.games,
    })
  }

  rows.sort((a, b) => b[metric] - a[metric] || compareIds(a.playerId, b.playerId))
  const limited = options.limit !== undefined ? rows.slice(0, options.limit) : rows
  return limited.map((row, i) => ({ ...row, rank: i + 1 }))
}
