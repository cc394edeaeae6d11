import { beforeEach, describe, expect, it, vi } from 'vitest'

const mocks = vi.hoisted(() => ({
  fetchSeasonStats: vi.fn(),
  fetchSchedule: vi.fn(),
  clearCache: vi.fn(),
  getCacheStats: vi.fn(),
}))

vi.mock('@/lib/data-provider', () => ({
  getDataProvider: () => ({
    id: 'fake',
    fetchSeasonStats: mocks.fetchSeasonStats,
    fetchSchedule: mocks.fetchSchedule,
  }),
  clearCache: mocks.clearCache,
  getCacheStats: mocks.getCacheStats,
}))

vi.mock('@/lib/config', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@/lib/config')>()
  const config = actual.loadConfig({})
  return { ...actual, getConfig: () => config }
})

import { GET as getConsistency } from '@/app/api/stats/consistency/route'
import { GET as getDefense } from '@/app/api/stats/defense/route'
import { GET as getLeaders } from '@/app/api/stats/leaders/route'
import { GET as getMatchups } from '@/app/api/stats/matchups/route'
import { GET as getWeekly } from '@/app/api/stats/weekly/route'
import { GET as getCache, POST as postCache } from '@/app/api/stats/cache/route'
import { GET as getSchedule } from '@/app/api/nfl/schedule/route'
import { GET as getHealth } from '@/app/api/health/route'
import { StatsError } from '@/lib/stats/errors'
import { game, line } from '../stats/fixtures'

const records = [
  line({ playerId: 'w1', team: 'KC', opponent: 'LV', week: 1, receivingTds: 2, fantasyPointsPpr: 20 }),
  line({ playerId: 'w2', team: 'BUF', opponent: 'MIA', week: 2, receivingTds: 1, fantasyPointsPpr: 12 }),
  line({ playerId: 'w1', team: 'KC', opponent: 'DEN', week: 3, receivingTds: 1, fantasyPointsPpr: 14 }),
  line({ playerId: 'q1', position: 'QB', team: 'KC', opponent: 'LV', week: 1, passingTds: 3, passingYards: 280 }),
]

function request(path: string, init?: RequestInit) {
  return new Request(`http://localhost${path}`, init)
}

beforeEach(() => {
  vi.clearAllMocks()
  mocks.fetchSeasonStats.mockResolvedValue(records)
  mocks.fetchSchedule.mockResolvedValue([])
})

describe('GET /api/stats/defense', () => {
  it('ranks defenses for the latest week by default', async () => {
    const res = await getDefense(request('/api/stats/defense?position=wr'))
    expect(res.status).toBe(200)
    const body = await res.json()
    expect(body).toMatchObject({ season: 2024, week: 3, position: 'WR', scope: 'season' })
    expect(body.rows.map((r: { team: string }) => r.team)).toEqual(['LV', 'DEN', 'MIA'])
    expect(mocks.fetchSeasonStats).toHaveBeenCalledWith(2024)
  })

  it('narrows to a single week', async () => {
    const res = await getDefense(request('/api/stats/defense?position=WR&scope=week&week=2&season=2023'))
    const body = await res.json()
    expect(body).toMatchObject({ season: 2023, week: 2, scope: 'week' })
    expect(body.rows).toHaveLength(1)
    expect(body.rows[0]).toMatchObject({ rank: 1, team: 'MIA', touchdowns: 1 })
  })

  it('answers 400 INVALID_POSITION for an unknown position', async () => {
    const res = await getDefense(request('/api/stats/defense?position=K'))
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ code: 'INVALID_POSITION', status: 400 })
  })

  it('answers 400 BAD_REQUEST for an unknown scope', async () => {
    const res = await getDefense(request('/api/stats/defense?scope=decade'))
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ code: 'BAD_REQUEST', message: 'Invalid request' })
  })

  it('answers 503 when the data provider fails', async () => {
    mocks.fetchSeasonStats.mockRejectedValue(new StatsError('DATA_UNAVAILABLE', 'Upstream player stats request failed'))
    const res = await getDefense(request('/api/stats/defense'))
    expect(res.status).toBe(503)
    expect(await res.json()).toMatchObject({ code: 'DATA_UNAVAILABLE', message: 'Upstream player stats request failed' })
  })

  it('answers 500 for anything unexpected', async () => {
    mocks.fetchSeasonStats.mockRejectedValue(new Error('disk on fire'))
    const res = await getDefense(request('/api/stats/defense'))
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ code: 'UNKNOWN_ERROR', status: 500, message: 'disk on fire' })
  })
})

describe('GET /api/stats/leaders', () => {
  it('lists leaders for a position and category', async () => {
    const res = await getLeaders(request('/api/stats/leaders?position=WR&category=Receiving&limit=1'))
    const body = await res.json()
    expect(body).toMatchObject({ position: 'WR', category: 'receiving', scope: 'season' })
    expect(body.rows).toEqual([
      {
        rank: 1,
        playerId: 'w1',
        playerName: 'w1',
        position: 'WR',
        team: 'KC',
        touchdowns: 3,
        passingTds: 0,
        rushingTds: 0,
        receivingTds: 3,
        yards: 0,
        fantasyPoints: 34,
        games: 2,
      },
    ])
  })

  it('ranks by fantasy points when asked', async () => {
    const body = await (await getLeaders(request('/api/stats/leaders?position=WR&metric=fantasyPoints'))).json()
    expect(body.metric).toBe('fantasyPoints')
    expect(body.rows.map((r: { playerId: string; fantasyPoints: number }) => [r.playerId, r.fantasyPoints])).toEqual([
      ['w1', 34],
      ['w2', 12],
    ])
  })

  it('answers 400 BAD_REQUEST for an unknown metric', async () => {
    const res = await getLeaders(request('/api/stats/leaders?metric=tackles'))
    expect(res.status).toBe(400)
    expect((await res.json()).code).toBe('BAD_REQUEST')
  })

  it('answers 400 INVALID_CATEGORY when the position does not track it', async () => {
    const res = await getLeaders(request('/api/stats/leaders?position=QB&category=receiving'))
    expect(res.status).toBe(400)
    expect((await res.json()).code).toBe('INVALID_CATEGORY')
  })
})

describe('GET /api/stats/matchups', () => {
  it('scores the requested week against prior weeks', async () => {
    mocks.fetchSchedule.mockResolvedValue([game(4, 'KC', 'MIA')])
    const res = await getMatchups(request('/api/stats/matchups?week=4'))
    expect(res.status).toBe(200)
    const body = await res.json()
    expect(mocks.fetchSchedule).toHaveBeenCalledWith(2024, 4)
    expect(body.games).toHaveLength(1)
    expect(body.rows.map((r: { playerId: string; favorability: number }) => [r.playerId, r.favorability])).toEqual([
      ['q1', 1.5],
      ['w1', 0.75],
    ])
  })

  it('filters to favorable matchups', async () => {
    mocks.fetchSchedule.mockResolvedValue([game(4, 'KC', 'MIA')])
    const body = await (await getMatchups(request('/api/stats/matchups?week=4&favorableOnly=true'))).json()
    expect(body.rows.map((r: { playerId: string }) => r.playerId)).toEqual(['w1'])
  })

  it('answers 404 NO_SCHEDULE_DATA for a week without games', async () => {
    const res = await getMatchups(request('/api/stats/matchups?week=4'))
    expect(res.status).toBe(404)
    expect(await res.json()).toMatchObject({ code: 'NO_SCHEDULE_DATA', message: 'No games scheduled for week 4' })
  })
})

describe('GET /api/stats/consistency', () => {
  it('rates players with enough games', async () => {
    const body = await (await getConsistency(request('/api/stats/consistency?position=wr&minGames=2'))).json()
    expect(body).toMatchObject({ season: 2024, position: 'WR', metric: 'fantasyPointsPpr', minGames: 2 })
    expect(body.rows.map((r: { playerId: string }) => r.playerId)).toEqual(['w1'])
    expect(body.sortBy).toBe('rating')
    expect(body.highlights.highestCeiling).toMatchObject({ playerId: 'w1', ceiling: 20 })
  })

  it('rejects an unknown sort', async () => {
    const res = await getConsistency(request('/api/stats/consistency?sortBy=vibes'))
    expect(res.status).toBe(400)
  })
})

describe('GET /api/stats/weekly', () => {
  it('returns one player week by week', async () => {
    const res = await getWeekly(request('/api/stats/weekly?position=wr&playerId=w1'))
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      season: 2024,
      position: 'WR',
      playerId: 'w1',
      playerName: 'w1',
      team: 'KC',
      metric: 'fantasyPointsPpr',
      points: [
        { week: 1, value: 20 },
        { week: 3, value: 14 },
      ],
      average: 17,
      min: 14,
      max: 20,
    })
  })

  it('answers 404 PLAYER_NOT_FOUND for an unknown player', async () => {
    const res = await getWeekly(request('/api/stats/weekly?playerId=nobody'))
    expect(res.status).toBe(404)
    expect(await res.json()).toMatchObject({ code: 'PLAYER_NOT_FOUND' })
  })

  it('requires a player id', async () => {
    const res = await getWeekly(request('/api/stats/weekly'))
    expect(res.status).toBe(400)
    expect((await res.json()).code).toBe('BAD_REQUEST')
  })
})

describe('/api/stats/cache', () => {
  it('reports cache entries', async () => {
    mocks.getCacheStats.mockReturnValue({ entries: 0, stats: [], schedule: [] })
    const body = await (await getCache()).json()
    expect(body).toMatchObject({ entries: 0, stats: [], schedule: [] })
  })

  it('clears one season on refresh', async () => {
    mocks.clearCache.mockReturnValue(2)
    const res = await postCache(request('/api/stats/cache', { method: 'POST', body: JSON.stringify({ season: 2023 }) }))
    expect(await res.json()).toEqual({ cleared: 2, season: 2023 })
    expect(mocks.clearCache).toHaveBeenCalledWith(2023)
  })

  it('clears everything without a body', async () => {
    mocks.clearCache.mockReturnValue(4)
    const res = await postCache(request('/api/stats/cache', { method: 'POST' }))
    expect(await res.json()).toEqual({ cleared: 4, season: null })
    expect(mocks.clearCache).toHaveBeenCalledWith(undefined)
  })

  it('rejects malformed JSON', async () => {
    const res = await postCache(request('/api/stats/cache', { method: 'POST', body: '{season:' }))
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ code: 'BAD_REQUEST', message: 'Malformed JSON body' })
  })
})

describe('GET /api/nfl/schedule', () => {
  it('labels the games of the week', async () => {
    mocks.fetchSchedule.mockResolvedValue([game(3, 'KC', 'LV')])
    const body = await (await getSchedule(request('/api/nfl/schedule'))).json()
    expect(body).toMatchObject({ season: 2024, week: 3, totalGames: 1 })
    expect(body.games[0]).toMatchObject({ display: 'Kansas City Chiefs @ Las Vegas Raiders', short: 'KC @ LV' })
  })
})

describe('GET /api/health', () => {
  it('reports defaults and cache size', async () => {
    mocks.getCacheStats.mockReturnValue({ entries: 3, stats: [], schedule: [] })
    const body = await (await getHealth()).json()
    expect(body).toMatchObject({ ok: true, defaults: { season: 2024, week: null }, logLevel: null, cacheEntries: 3 })
  })
})
