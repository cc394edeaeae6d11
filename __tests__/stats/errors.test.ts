import { describe, expect, it } from 'vitest'
import { StatsError, decodeStatsErrorFromResponse, decodeStatsErrorPayload, toErrorPayload } from '@/lib/stats/errors'
import { allTouchdowns, assertPosition, categoriesFor, isPosition, touchdownsFor } from '@/lib/stats/positions'
import { line } from './fixtures'

describe('StatsError', () => {
  it('maps codes to HTTP statuses', () => {
    expect(new StatsError('INVALID_POSITION', 'x').status).toBe(400)
    expect(new StatsError('NO_SCHEDULE_DATA', 'x').status).toBe(404)
    expect(new StatsError('DATA_UNAVAILABLE', 'x').status).toBe(503)
  })

  it('keeps the cause', () => {
    const cause = new Error('socket hang up')
    expect(new StatsError('DATA_UNAVAILABLE', 'x', { cause }).cause).toBe(cause)
  })
})

describe('toErrorPayload', () => {
  it('passes StatsError fields through', () => {
    const err = new StatsError('INVALID_CATEGORY', 'bad category', { details: { category: 'kicking' } })
    expect(toErrorPayload(err)).toEqual({
      code: 'INVALID_CATEGORY',
      status: 400,
      message: 'bad category',
      details: { category: 'kicking' },
    })
  })

  it('reports anything else as a 500', () => {
    expect(toErrorPayload(new TypeError('boom'))).toEqual({ code: 'UNKNOWN_ERROR', status: 500, message: 'boom' })
    expect(toErrorPayload('nope')).toEqual({ code: 'UNKNOWN_ERROR', status: 500, message: 'Unexpected error' })
  })
})

describe('decodeStatsErrorPayload', () => {
  it('reads code and message from a JSON body', () => {
    expect(decodeStatsErrorPayload({ status: 404, json: { code: 'NO_SCHEDULE_DATA', message: 'No games' } })).toEqual({
      code: 'NO_SCHEDULE_DATA',
      status: 404,
      message: 'No games',
      details: undefined,
    })
  })

  it('falls back to the text body', () => {
    expect(decodeStatsErrorPayload({ status: 503, text: ' upstream down ' })).toEqual({
      code: 'DATA_UNAVAILABLE',
      status: 503,
      message: 'upstream down',
    })
    expect(decodeStatsErrorPayload({ status: 502, text: '' }).message).toBe('Stats error 502')
  })

  it('decodes a Response', async () => {
    const res = new Response(JSON.stringify({ code: 'BAD_REQUEST', message: 'Invalid request' }), {
      status: 400,
      headers: { 'content-type': 'application/json' },
    })
    expect(await decodeStatsErrorFromResponse(res)).toMatchObject({ code: 'BAD_REQUEST', status: 400 })
  })
})

describe('positions', () => {
  it('validates positions', () => {
    expect(isPosition('TE')).toBe(true)
    expect(isPosition('te')).toBe(false)
    expect(() => assertPosition('K')).toThrowError('Position must be one of QB, RB, WR, TE (got "K")')
  })

  it('lists the categories each position tracks', () => {
    expect(categoriesFor('QB')).toEqual(['passing', 'rushing', 'total'])
    expect(categoriesFor('RB')).toEqual(['rushing', 'receiving', 'total'])
  })

  it('totals the categories the position tracks', () => {
    const r = line({ playerId: 'p', passingTds: 2, rushingTds: 1, receivingTds: 1 })
    expect(touchdownsFor(r, 'total', 'QB')).toBe(3)
    expect(touchdownsFor(r, 'total', 'WR')).toBe(2)
    expect(touchdownsFor(r, 'receiving', 'WR')).toBe(1)
    expect(allTouchdowns(r)).toBe(4)
  })
})
