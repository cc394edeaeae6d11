/**
 * Defense weakness by position
 *
 * Groups the stat lines of one position group by the defense they were produced
 * against. Most touchdowns allowed ranks first.
 */

import { allTouchdowns, assertPosition, compareIds, inPositionGroup, totalYards } from './positions'
import type { DefenseWeaknessRow, StatRecord } from './types'

interface DefenseTotals {
  team: string
  touchdowns: number
  passingTds: number
  rushingTds: number
  receivingTds: number
  yards: number
  fantasyPoints: number
  games: Set<string>
}

export function computeDefenseWeakness(records: readonly StatRecord[], position: string): DefenseWeaknessRow[] {
  const pos = assertPosition(position)
  const byDefense = new Map<string, DefenseTotals>()

  for (const r of records) {
    if (!inPositionGroup(r, pos)) continue
    let totals = byDefense.get(r.opponent)
    if (!totals) {
      totals = {
        team: r.opponent,
        touchdowns: 0,
        passingTds: 0,
        rushingTds: 0,
        receivingTds: 0,
        yards: 0,
        fantasyPoints: 0,
        games: new Set(),
      }
      byDefense.set(r.opponent, totals)
    }
    totals.touchdowns += allTouchdowns(r)
    totals.passingTds += r.passingTds
    totals.rushingTds += r.rushingTds
    totals.receivingTds += r.receivingTds
    totals.yards += totalYards(r)
    totals.fantasyPoints += r.fantasyPointsPpr
    totals.games.add(`${r.season}-${r.week}`)
  }

  const sorted = [...byDefense.values()].sort(
    (a, b) => b.touchdowns - a.touchdowns || compareIds(a.team, b.team)
  )

  return sorted.map((t, i) => ({
    rank: i + 1,
    team: t.team,
    position: pos,
    touchdowns: t.touchdowns,
    passingTds: t.passingTds,
    rushingTds: t.rushingTds,
    receivingTds: t.receivingTds,
    yards: t.yards,
    fantasyPoints: Math.round(t.fantasyPoints * 10) / 10,
    games: t.games.size,
  }))
}

/** Lookup of rank by defending team, built from a weakness table */
export function rankByTeam(rows: readonly DefenseWeaknessRow[]): Map<string, DefenseWeaknessRow> {
  return new Map(rows.map((row) => [row.team, row]))
}
