/**
 * Matchup favorability
 *
 * Pairs each offense's top touchdown producers with the weakness rank of the
 * defense they face in the selected week. Only weeks before the selected one feed
 * the ranks and rates, so past weeks are scored with what was known at kickoff.
 */

import { computeDefenseWeakness, rankByTeam } from './defense'
import { StatsError } from './errors'
import { groupByPlayer, sumBy, type PlayerGroup } from './players'
import { compareIds, inPositionGroup, touchdownsFor } from './positions'
import { POSITIONS, type MatchupRow, type Position, type ScheduledGame, type StatRecord } from './types'

const TOP_PLAYERS: Readonly<Record<Position, number>> = { QB: 1, RB: 2, WR: 3, TE: 1 }

export const MATCHUP_DEFAULTS = {
  topPlayers: TOP_PLAYERS,
  weakDefenseCutoff: 10, // top 10 most vulnerable = favorable
} as const

export interface MatchupOptions {
  topPlayers?: Partial<Record<Position, number>>
  weakDefenseCutoff?: number
}

function round3(n: number): number {
  return Math.round(n * 1000) / 1000
}

/** 1 for the most vulnerable defense, 0 for the stingiest, 0 when unranked */
export function defensePercentile(rank: number | null, teamCount: number): number {
  if (rank === null || teamCount === 0) return 0
  if (teamCount === 1) return 1
  return (teamCount - rank) / (teamCount - 1)
}

export function favorabilityScore(tdPerGame: number, rank: number | null, teamCount: number): number {
  return round3(tdPerGame * (0.5 + defensePercentile(rank, teamCount)))
}

interface Producer {
  group: PlayerGroup
  touchdowns: number
  tdPerGame: number
}

function producersByTeam(records: readonly StatRecord[], position: Position): Map<string, Producer[]> {
  const byTeam = new Map<string, Producer[]>()
  const players = groupByPlayer(records.filter((r) => inPositionGroup(r, position)))

  for (const group of players.values()) {
    const touchdowns = sumBy(group.records, (r) => touchdownsFor(r, 'total', position))
    const producer: Producer = {
      group,
      touchdowns,
      tdPerGame: group.games > 0 ? touchdowns / group.games : 0,
    }
    const list = byTeam.get(group.team)
    if (list) list.push(producer)
    else byTeam.set(group.team, [producer])
  }

  for (const list of byTeam.values()) {
    list.sort(
      (a, b) =>
        b.tdPerGame - a.tdPerGame || b.touchdowns - a.touchdowns || compareIds(a.group.playerId, b.group.playerId)
    )
  }
  return byTeam
}

export function computeMatchups(
  records: readonly StatRecord[],
  schedule: readonly ScheduledGame[],
  week: number,
  options: MatchupOptions = {}
): MatchupRow[] {
  const games = schedule.filter((g) => g.week === week)
  if (games.length === 0) {
    throw new StatsError('NO_SCHEDULE_DATA', `No games scheduled for week ${week}`, { details: { week } })
  }

  const cutoff = options.weakDefenseCutoff ?? MATCHUP_DEFAULTS.weakDefenseCutoff
  const prior = records.filter((r) => r.week < week)
  const rows: MatchupRow[] = []

  for (const position of POSITIONS) {
    const weakness = computeDefenseWeakness(prior, position)
    const ranks = rankByTeam(weakness)
    const producers = producersByTeam(prior, position)
    const take = options.topPlayers?.[position] ?? MATCHUP_DEFAULTS.topPlayers[position]

    for (const game of games) {
      const sides = [
        { team: game.awayTeam, opponent: game.homeTeam, isHome: false },
        { team: game.homeTeam, opponent: game.awayTeam, isHome: true },
      ]
      for (const side of sides) {
        const defense = ranks.get(side.opponent)
        const defenseRank = defense?.rank ?? null
        for (const p of (producers.get(side.team) ?? []).slice(0, take)) {
          rows.push({
            gameId: game.gameId,
            week,
            playerId: p.group.playerId,
            playerName: p.group.playerName,
            position,
            team: side.team,
            opponent: side.opponent,
            isHome: side.isHome,
            touchdowns: p.touchdowns,
            games: p.group.games,
            tdPerGame: round3(p.tdPerGame),
            defenseRank,
            defenseTouchdownsAllowed: defense?.touchdowns ?? 0,
            favorability: favorabilityScore(p.tdPerGame, defenseRank, weakness.length),
            favorable: defenseRank !== null && defenseRank <= cutoff,
          })
        }
      }
    }
  }

  return rows.sort(
    (a, b) =>
      b.favorability - a.favorability ||
      compareIds(a.playerId, b.playerId) ||
      compareIds(a.position, b.position)
  )
}
