'use client'

import { useState } from 'react'
import StatsTable from '@/components/StatsTable'
import WeeklyLineChart from '@/components/WeeklyLineChart'
import { useStatsQuery } from '@/app/hooks/useStatsQuery'
import type { ConsistencyResponse, WeeklyResponse } from '@/lib/stats/client'
import { CONSISTENCY_COLUMNS } from '@/lib/stats/columns'
import { DEFAULT_MIN_GAMES } from '@/lib/stats/consistency'
import {
  CONSISTENCY_SORTS,
  type ConsistencyHighlights,
  type ConsistencyRow,
  type ConsistencySort,
  type Position,
} from '@/lib/stats/types'

const MIN_GAMES_OPTIONS = [1, 3, 5, 8]
const CHART_PICKS = 10

const SORT_LABELS: Record<ConsistencySort, string> = {
  rating: 'Most Consistent',
  average: 'Highest Average',
  floor: 'Highest Floor',
  ceiling: 'Highest Ceiling',
}

const HIGHLIGHT_CARDS: { key: keyof ConsistencyHighlights; label: string; value: (r: ConsistencyRow) => number | null }[] = [
  { key: 'mostConsistent', label: 'Most Consistent', value: (r) => r.rating },
  { key: 'highestAverage', label: 'Highest Average', value: (r) => r.average },
  { key: 'highestFloor', label: 'Highest Floor', value: (r) => r.floor },
  { key: 'highestCeiling', label: 'Highest Ceiling', value: (r) => r.ceiling },
]

type Props = {
  season: number
  position: Position
  refreshKey: number
}

export default function ConsistencyTab({ season, position, refreshKey }: Props) {
  const [minGames, setMinGames] = useState(DEFAULT_MIN_GAMES)
  const [sortBy, setSortBy] = useState<ConsistencySort>('rating')
  const [playerId, setPlayerId] = useState('')

  const { data, error, isLoading } = useStatsQuery<ConsistencyResponse>(
    '/api/stats/consistency',
    { season, position, minGames, sortBy },
    refreshKey
  )
  const rows = data?.rows ?? []
  const picks = rows.slice(0, CHART_PICKS)
  // a pick from another position or filter no longer applies
  const selected = picks.some((r) => r.playerId === playerId) ? playerId : ''

  const weekly = useStatsQuery<WeeklyResponse>(
    selected ? '/api/stats/weekly' : null,
    { season, position, playerId: selected },
    refreshKey
  )

  const metric = data?.metric === 'passingYards' ? 'passing yards' : 'PPR fantasy points'

  return (
    <div className="grid gap-4">
      <div className="flex flex-wrap items-center gap-4">
        <div>
          <label htmlFor="min-games" className="text-xs uppercase tracking-wide text-white/60">Minimum games</label>
          <select
            id="min-games"
            className="ml-3 rounded-2xl border border-white/10 bg-black/20 px-3 py-2 text-sm text-white"
            value={minGames}
            onChange={(e) => setMinGames(Number(e.target.value))}
          >
            {MIN_GAMES_OPTIONS.map((n) => (
              <option key={n} value={n}>{n}</option>
            ))}
          </select>
        </div>
        <div className="flex flex-wrap items-center gap-2">
          <span className="text-xs uppercase tracking-wide text-white/60">Sort by</span>
          {CONSISTENCY_SORTS.map((s) => (
            <button
              key={s}
              type="button"
              aria-pressed={s === sortBy}
              onClick={() => setSortBy(s)}
              className={`rounded-full border px-3 py-1 text-xs transition ${s === sortBy ? 'border-emerald-400/40 bg-emerald-500/15 text-emerald-200' : 'border-white/10 bg-white/5 text-white/70 hover:bg-white/10'}`}
            >
              {SORT_LABELS[s]}
            </button>
          ))}
        </div>
      </div>

      {data && (
        <div className="grid grid-cols-2 gap-3 md:grid-cols-4">
          {HIGHLIGHT_CARDS.map((card) => {
            const row = data.highlights[card.key]
            return (
              <div key={card.key} className="rounded-2xl border border-white/10 bg-white/5 p-4">
                <div className="text-xs uppercase tracking-wide text-white/60">{card.label}</div>
                <div className="mt-1 text-base font-semibold text-white">{row ? row.playerName : '-'}</div>
                <div className="text-sm text-emerald-200">{row ? (card.value(row) ?? '-') : ''}</div>
              </div>
            )
          })}
        </div>
      )}

      <StatsTable
        title={`${position} consistency`}
        caption={`Week-to-week ${metric}; 100 = steadiest in the pool`}
        columns={CONSISTENCY_COLUMNS}
        rows={rows}
        rowKey={(r) => r.playerId}
        isLoading={isLoading}
        error={error?.message}
      />

      {picks.length > 0 && (
        <div>
          <label htmlFor="weekly-player" className="text-xs uppercase tracking-wide text-white/60">
            Week-by-week performance
          </label>
          <select
            id="weekly-player"
            className="ml-3 rounded-2xl border border-white/10 bg-black/20 px-3 py-2 text-sm text-white"
            value={selected}
            onChange={(e) => setPlayerId(e.target.value)}
          >
            <option value="">Choose a player</option>
            {picks.map((r) => (
              <option key={r.playerId} value={r.playerId}>{r.playerName}</option>
            ))}
          </select>
        </div>
      )}
      {weekly.error && <div role="alert" className="text-sm text-red-300">{weekly.error.message}</div>}
      {weekly.data && <WeeklyLineChart series={weekly.data} valueLabel={metric} />}
    </div>
  )
}
