import { describe, expect, it } from 'vitest'
import { StatsError } from '@/lib/stats/errors'
import { computeMatchups, defensePercentile, favorabilityScore } from '@/lib/stats/matchups'
import { game, line } from './fixtures'

const records = [
  line({ playerId: 'wr-k1', team: 'KC', opponent: 'LV', week: 1, receivingTds: 2 }),
  line({ playerId: 'wr-k1', team: 'KC', opponent: 'DEN', week: 2, receivingTds: 1 }),
  line({ playerId: 'wr-k2', team: 'KC', opponent: 'LV', week: 1 }),
  line({ playerId: 'wr-b1', team: 'BUF', opponent: 'MIA', week: 1, receivingTds: 1 }),
  line({ playerId: 'wr-b1', team: 'BUF', opponent: 'NYJ', week: 2 }),
  // the week being scored never feeds its own ranks
  line({ playerId: 'wr-b1', team: 'BUF', opponent: 'MIA', week: 3, receivingTds: 5 }),
]

const schedule = [game(3, 'KC', 'LV'), game(3, 'BUF', 'MIA'), game(4, 'KC', 'DEN')]

describe('defensePercentile', () => {
  it('maps rank 1 to 1 and the last rank to 0', () => {
    expect(defensePercentile(1, 32)).toBe(1)
    expect(defensePercentile(32, 32)).toBe(0)
  })

  it('is 1 for a lone ranked team and 0 when unranked', () => {
    expect(defensePercentile(1, 1)).toBe(1)
    expect(defensePercentile(null, 10)).toBe(0)
  })
})

describe('favorabilityScore', () => {
  it('rounds to three decimals', () => {
    expect(favorabilityScore(0.5, 3, 4)).toBe(0.417)
    expect(favorabilityScore(1.5, null, 4)).toBe(0.75)
  })
})

describe('computeMatchups', () => {
  it('scores producers against the defense they face, most favorable first', () => {
    const rows = computeMatchups(records, schedule, 3)
    expect(rows.map((r) => [r.playerId, r.opponent, r.defenseRank, r.favorability])).toEqual([
      ['wr-k1', 'LV', 1, 2.25],
      ['wr-b1', 'MIA', 3, 0.417],
      ['wr-k2', 'LV', 1, 0],
    ])
  })

  it('uses only weeks before the selected one', () => {
    const row = computeMatchups(records, schedule, 3).find((r) => r.playerId === 'wr-b1')
    expect(row).toMatchObject({
      gameId: '2024_03_BUF_MIA',
      week: 3,
      position: 'WR',
      team: 'BUF',
      isHome: false,
      touchdowns: 1,
      games: 2,
      tdPerGame: 0.5,
      defenseTouchdownsAllowed: 1,
      favorable: true,
    })
  })

  it('leaves unranked opponents unfavorable', () => {
    const [row] = computeMatchups(records, [game(3, 'CHI', 'KC')], 3)
    expect(row).toMatchObject({ playerId: 'wr-k1', opponent: 'CHI', isHome: true, defenseRank: null, favorable: false })
    expect(row.favorability).toBe(0.75)
  })

  it('honors the cutoff and per-position player counts', () => {
    const rows = computeMatchups(records, schedule, 3, { weakDefenseCutoff: 2, topPlayers: { WR: 1 } })
    expect(rows.map((r) => [r.playerId, r.favorable])).toEqual([
      ['wr-k1', true],
      ['wr-b1', false],
    ])
  })

  it('fails with NO_SCHEDULE_DATA when the week has no games', () => {
    expect(() => computeMatchups(records, schedule, 5)).toThrowError(StatsError)
    expect(() => computeMatchups(records, [], 3)).toThrowError('No games scheduled for week 3')
  })

  it('returns identical output on repeated runs', () => {
    expect(computeMatchups(records, schedule, 3)).toEqual(computeMatchups(records, schedule, 3))
  })
})
