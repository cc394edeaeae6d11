import { beforeEach, describe, expect, it } from 'vitest'
import { clearCache, getCacheStats } from '@/lib/data-provider/cache'
import { NflverseProvider, parseCsv, seasonUrl } from '@/lib/data-provider/nflverse'
import { isStatsError } from '@/lib/stats/errors'

const STATS_CSV = [
  'player_id,player_display_name,position,recent_team,opponent_team,season,week,season_type,passing_tds,rushing_tds,receiving_tds,passing_yards,rushing_yards,receiving_yards,fantasy_points_ppr',
  '00-1,Test Wideout,WR,KC,LV,2024,1,REG,0,0,1,0,0,75,19.5',
  '00-2,Test Back,RB,KC,LV,2024,1,REG,0,1,0,0,60,10,17',
  '00-1,Test Wideout,WR,KC,DEN,2024,2,REG,0,0,0,0,0,40,7',
  ',Nobody,WR,KC,DEN,2024,2,REG,0,0,0,0,0,0,0',
].join('\n')

const SCHEDULE_CSV = [
  'game_id,season,game_type,week,gameday,away_team,home_team',
  '2023_01_DET_KC,2023,REG,1,2023-09-07,DET,KC',
  '2024_01_BAL_KC,2024,REG,1,2024-09-05,BAL,KC',
  '2024_01_LV_LAC,2024,REG,1,2024-09-08,LV,LAC',
  '2024_02_KC_CIN,2024,REG,2,2024-09-15,KC,CIN',
].join('\n')

const STATS_URL = 'https://stats.example.test/week_{season}.csv'
const SCHEDULE_URL = 'https://stats.example.test/games.csv'

type Handler = (init?: RequestInit) => Promise<Response>

function fakeFetch(routes: Record<string, Handler>) {
  const calls: string[] = []
  const fetchFn = async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
    calls.push(url)
    const handler = routes[url]
    return handler ? handler(init) : new Response('not found', { status: 404 })
  }
  return { fetchFn, calls }
}

const csv = (body: string): Handler => async () => new Response(body, { status: 200 })

function provider(fetchFn: typeof fetch, timeoutMs = 1000) {
  return new NflverseProvider({ statsUrlTemplate: STATS_URL, scheduleUrlTemplate: SCHEDULE_URL, timeoutMs, fetchFn })
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (err) {
    return err
  }
  throw new Error('expected the promise to reject')
}

beforeEach(() => {
  clearCache()
})

describe('seasonUrl', () => {
  it('fills the season placeholder', () => {
    expect(seasonUrl(STATS_URL, 2023)).toBe('https://stats.example.test/week_2023.csv')
  })
})

describe('parseCsv', () => {
  it('returns the header and keyed rows', () => {
    const { header, rows } = parseCsv('a,b\n1,2\n', 'test')
    expect(header).toEqual(['a', 'b'])
    expect(rows).toEqual([{ a: '1', b: '2' }])
  })

  it('reports malformed files as unavailable data', () => {
    const err = (() => {
      try {
        parseCsv('a,b\n"1,2\n', 'player stats')
      } catch (e) {
        return e
      }
      return null
    })()
    expect(isStatsError(err) && err.code).toBe('DATA_UNAVAILABLE')
    expect(err instanceof Error && err.message).toBe('Could not parse player stats CSV')
  })
})

describe('NflverseProvider', () => {
  it('downloads and normalizes a season once', async () => {
    const { fetchFn, calls } = fakeFetch({ 'https://stats.example.test/week_2024.csv': csv(STATS_CSV) })
    const p = provider(fetchFn)

    const [first, second] = await Promise.all([p.fetchSeasonStats(2024), p.fetchSeasonStats(2024)])
    expect(first).toBe(second)
    expect(first.map((r) => [r.playerId, r.week, r.opponent])).toEqual([
      ['00-1', 1, 'LV'],
      ['00-2', 1, 'LV'],
      ['00-1', 2, 'DEN'],
    ])
    expect(calls).toHaveLength(1)

    await p.fetchSeasonStats(2024)
    expect(calls).toHaveLength(1)
    expect(getCacheStats().stats).toMatchObject([{ key: 'nflverse:stats:2024', season: 2024, rows: 3, pending: false }])
  })

  it('filters the cached season schedule to a week', async () => {
    const { fetchFn, calls } = fakeFetch({ [SCHEDULE_URL]: csv(SCHEDULE_CSV) })
    const p = provider(fetchFn)

    const week1 = await p.fetchSchedule(2024, 1)
    expect(week1.map((g) => g.gameId)).toEqual(['2024_01_BAL_KC', '2024_01_LV_LAC'])
    expect(await p.fetchSchedule(2024, 3)).toEqual([])
    expect(calls).toHaveLength(1)
  })

  it('turns an error status into DATA_UNAVAILABLE', async () => {
    const { fetchFn } = fakeFetch({})
    const err = await rejection(provider(fetchFn).fetchSeasonStats(2024))
    expect(isStatsError(err) && err.code).toBe('DATA_UNAVAILABLE')
    expect(err instanceof Error && err.message).toBe('Upstream player stats request failed with status 404')
  })

  it('rejects files without the expected columns', async () => {
    const { fetchFn } = fakeFetch({ 'https://stats.example.test/week_2024.csv': csv('player_id,week\n00-1,1\n') })
    const err = await rejection(provider(fetchFn).fetchSeasonStats(2024))
    expect(err instanceof Error && err.message).toBe(
      'Upstream player stats file is missing columns: position, opponent_team, season'
    )
  })

  it('does not cache a failed load', async () => {
    let attempts = 0
    const { fetchFn, calls } = fakeFetch({
      'https://stats.example.test/week_2024.csv': async () => {
        attempts++
        return attempts === 1 ? new Response('busy', { status: 503 }) : new Response(STATS_CSV, { status: 200 })
      },
    })
    const p = provider(fetchFn)

    await rejection(p.fetchSeasonStats(2024))
    expect(await p.fetchSeasonStats(2024)).toHaveLength(3)
    expect(calls).toHaveLength(2)
  })

  it('gives up after the timeout', async () => {
    const { fetchFn } = fakeFetch({
      'https://stats.example.test/week_2024.csv': (init) =>
        new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const err = new Error('This operation was aborted')
            err.name = 'AbortError'
            reject(err)
          })
        }),
    })
    const err = await rejection(provider(fetchFn, 10).fetchSeasonStats(2024))
    expect(isStatsError(err) && err.code).toBe('DATA_UNAVAILABLE')
    expect(err instanceof Error && err.message).toBe('Upstream player stats request timed out after 10ms')
  })

  it('downloads again after an explicit refresh', async () => {
    const { fetchFn, calls } = fakeFetch({ 'https://stats.example.test/week_2024.csv': csv(STATS_CSV) })
    const p = provider(fetchFn)

    await p.fetchSeasonStats(2024)
    expect(clearCache(2024)).toBe(1)
    await p.fetchSeasonStats(2024)
    expect(calls).toHaveLength(2)
  })
})
