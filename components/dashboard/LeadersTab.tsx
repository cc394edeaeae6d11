'use client'

import { useState } from 'react'
import StatsBarChart from '@/components/StatsBarChart'
import StatsTable from '@/components/StatsTable'
import { useStatsQuery } from '@/app/hooks/useStatsQuery'
import type { LeadersResponse } from '@/lib/stats/client'
import { categoryLabel, leaderColumns } from '@/lib/stats/columns'
import { categoriesFor } from '@/lib/stats/positions'
import { scopeLabel } from '@/lib/stats/scope'
import { LEADER_METRICS, type LeaderMetric, type Position, type Scope, type TouchdownCategory } from '@/lib/stats/types'

const METRIC_LABELS: Record<LeaderMetric, string> = {
  touchdowns: 'Touchdowns',
  yards: 'Yards',
  fantasyPoints: 'Fantasy Points',
}

const PILL = 'rounded-full border px-3 py-1 text-xs transition'
const PILL_ON = 'border-emerald-400/40 bg-emerald-500/15 text-emerald-200'
const PILL_OFF = 'border-white/10 bg-white/5 text-white/70 hover:bg-white/10'

type Props = {
  season: number
  week: number | null
  position: Position
  scope: Scope
  refreshKey: number
}

export default function LeadersTab({ season, week, position, scope, refreshKey }: Props) {
  const [picked, setPicked] = useState<TouchdownCategory>('total')
  const [metric, setMetric] = useState<LeaderMetric>('touchdowns')
  const categories = categoriesFor(position)
  // switching QB -> WR drops 'passing'
  const category = categories.includes(picked) ? picked : 'total'

  const { data, error, isLoading } = useStatsQuery<LeadersResponse>(
    '/api/stats/leaders',
    { season, week, position, category, scope, metric, limit: 15 },
    refreshKey
  )
  const rows = data?.rows ?? []
  const valueLabel = metric === 'touchdowns' ? categoryLabel(category) : METRIC_LABELS[metric]

  return (
    <div className="grid gap-5">
      <div className="flex flex-wrap items-center gap-2">
        <span className="text-xs uppercase tracking-wide text-white/60">Show leaders by</span>
        {LEADER_METRICS.map((m) => (
          <button
            key={m}
            type="button"
            aria-pressed={m === metric}
            onClick={() => setMetric(m)}
            className={`${PILL} ${m === metric ? PILL_ON : PILL_OFF}`}
          >
            {METRIC_LABELS[m]}
          </button>
        ))}
      </div>
      {metric === 'touchdowns' && (
        <div className="flex flex-wrap gap-2">
          {categories.map((c) => (
            <button
              key={c}
              type="button"
              aria-pressed={c === category}
              onClick={() => setPicked(c)}
              className={`${PILL} ${c === category ? PILL_ON : PILL_OFF}`}
            >
              {categoryLabel(c)}
            </button>
          ))}
        </div>
      )}
      <StatsBarChart
        title={`${position} ${valueLabel}`}
        data={rows.slice(0, 10).map((r) => ({ label: r.playerName, value: r[metric] }))}
        valueLabel={valueLabel}
      />
      <StatsTable
        title={`${position} leaders by ${METRIC_LABELS[metric].toLowerCase()}`}
        caption={data ? `${data.season} · ${scopeLabel(data.scope, data.week)}` : undefined}
        columns={leaderColumns(position, category)}
        rows={rows}
        rowKey={(r) => r.playerId}
        isLoading={isLoading}
        error={error?.message}
      />
    </div>
  )
}
