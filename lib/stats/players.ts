import type { StatRecord } from './types'

export interface PlayerGroup {
  playerId: string
  playerName: string
  team: string
  records: StatRecord[]
  games: number
}

/**
 * Group stat lines by player. `team` and `playerName` come from the player's
 * latest record (season, then week), so a traded player is listed under the current team.
 */
export function groupByPlayer(records: readonly StatRecord[]): Map<string, PlayerGroup> {
  const groups = new Map<string, PlayerGroup>()
  const latest = new Map<string, StatRecord>()
  const gameKeys = new Map<string, Set<string>>()

  for (const r of records) {
    let group = groups.get(r.playerId)
    if (!group) {
      group = { playerId: r.playerId, playerName: r.playerName, team: r.team, records: [], games: 0 }
      groups.set(r.playerId, group)
      gameKeys.set(r.playerId, new Set())
    }
    group.records.push(r)
    gameKeys.get(r.playerId)?.add(`${r.season}-${r.week}`)

    const prev = latest.get(r.playerId)
    if (!prev || r.season > prev.season || (r.season === prev.season && r.week >= prev.week)) {
      latest.set(r.playerId, r)
      group.team = r.team
      group.playerName = r.playerName
    }
  }

  for (const [id, group] of groups) {
    group.games = gameKeys.get(id)?.size ?? 0
  }
  return groups
}

export function sumBy(records: readonly StatRecord[], pick: (r: StatRecord) => number): number {
  let total = 0
  for (const r of records) total += pick(r)
  return total
}
