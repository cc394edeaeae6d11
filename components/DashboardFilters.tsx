'use client'

import { POSITIONS, SCOPES, type Position, type Scope } from '@/lib/stats/types'

const SCOPE_LABELS: Record<Scope, string> = {
  season: 'Season Total',
  week: 'Week Only',
  recent: 'Last 3 Weeks',
}

const selectClass =
  'mt-2 w-full rounded-2xl border border-white/10 bg-black/20 px-4 py-3 text-white focus:outline-none focus:ring-2 focus:ring-blue-400/40'

type Props = {
  seasons: readonly number[]
  season: number
  week: number | null
  maxWeek: number
  position: Position
  scope: Scope
  isRefreshing: boolean
  onChangeSeason: (value: number) => void
  onChangeWeek: (value: number | null) => void
  onChangePosition: (value: Position) => void
  onChangeScope: (value: Scope) => void
  onRefresh: () => void
}

export default function DashboardFilters({
  seasons,
  season,
  week,
  maxWeek,
  position,
  scope,
  isRefreshing,
  onChangeSeason,
  onChangeWeek,
  onChangePosition,
  onChangeScope,
  onRefresh,
}: Props) {
  const weeks = Array.from({ length: maxWeek }, (_, i) => i + 1)

  return (
    <div className="rounded-3xl border border-white/10 bg-white/5 p-6">
      <div className="grid gap-4 sm:grid-cols-2 lg:grid-cols-5">
        <div>
          <label htmlFor="filter-season" className="text-xs uppercase tracking-wide text-white/60">Season</label>
          <select
            id="filter-season"
            className={selectClass}
            value={season}
            onChange={(e) => onChangeSeason(Number(e.target.value))}
          >
            {seasons.map((s) => (
              <option key={s} value={s}>{s}</option>
            ))}
          </select>
        </div>

        <div>
          <label htmlFor="filter-week" className="text-xs uppercase tracking-wide text-white/60">Week</label>
          <select
            id="filter-week"
            className={selectClass}
            value={week ?? ''}
            onChange={(e) => onChangeWeek(e.target.value ? Number(e.target.value) : null)}
          >
            <option value="">Latest</option>
            {weeks.map((w) => (
              <option key={w} value={w}>Week {w}</option>
            ))}
          </select>
        </div>

        <div>
          <label className="text-xs uppercase tracking-wide text-white/60">Position</label>
          <div className="mt-2 flex flex-wrap gap-2">
            {POSITIONS.map((p) => (
              <button
                key={p}
                type="button"
                aria-pressed={p === position}
                onClick={() => onChangePosition(p)}
                className={`rounded-full border px-3 py-1 text-xs transition ${p === position ? 'border-emerald-400/40 bg-emerald-500/15 text-emerald-200' : 'border-white/10 bg-white/5 text-white/70 hover:bg-white/10'}`}
              >
                {p}
              </button>
            ))}
          </div>
        </div>

        <div>
          <label className="text-xs uppercase tracking-wide text-white/60">Scope</label>
          <div className="mt-2 flex flex-wrap gap-2">
            {SCOPES.map((s) => (
              <button
                key={s}
                type="button"
                aria-pressed={s === scope}
                onClick={() => onChangeScope(s)}
                className={`rounded-full border px-3 py-1 text-xs transition ${s === scope ? 'border-emerald-400/40 bg-emerald-500/15 text-emerald-200' : 'border-white/10 bg-white/5 text-white/70 hover:bg-white/10'}`}
              >
                {SCOPE_LABELS[s]}
              </button>
            ))}
          </div>
        </div>

        <div className="flex items-end">
          <button
            type="button"
            onClick={onRefresh}
            disabled={isRefreshing}
            className="w-full rounded-2xl border border-white/10 bg-white/10 px-4 py-3 text-sm text-white hover:bg-white/15 disabled:opacity-50"
          >
            {isRefreshing ? 'Refreshing…' : 'Refresh data'}
          </button>
        </div>
      </div>
    </div>
  )
}
